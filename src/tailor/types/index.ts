/**
 * Tailor Core Type Definitions
 *
 * Data model for turning one structured history document into job-targeted
 * documents: the history itself, variant configuration, the selected content
 * set, generated candidates, judge results and ATS score reports.
 */

import type { TextCompletion } from '../../shared/llm/types';
import type { TailorErrorCode } from '../errors/types';

export type { TextCompletion };

// ============================================================================
// History Document
// ============================================================================

/**
 * Opaque pass-through record (education, certifications, projects)
 */
export type OpaqueRecord = Record<string, unknown>;

export interface ContactLink {
  label: string;
  url: string;
}

export interface ContactInfo {
  name: string;
  email?: string;
  phone?: string;
  location?: string;
  links?: ContactLink[];
}

export interface SummaryBlock {
  base: string;
  variants?: Record<string, string>;
}

/**
 * A skill is either a bare name or a name restricted to certain variants
 */
export type SkillEntry = string | { name: string; emphasizeFor?: string[] };

export interface Bullet {
  text: string;
  skills?: string[];
  emphasizeFor?: string[];
}

export interface ExperienceEntry {
  company: string;
  title: string;
  location?: string;
  start: string;
  /** null means current */
  end: string | null;
  bullets: Bullet[];
}

export interface HistoryDocument {
  contact: ContactInfo;
  summary: SummaryBlock;
  skills: Record<string, SkillEntry[]>;
  experience: ExperienceEntry[];
  education?: OpaqueRecord[];
  certifications?: OpaqueRecord[];
  projects?: Record<string, OpaqueRecord[]>;
}

// ============================================================================
// Variant Configuration
// ============================================================================

export interface VariantConfig {
  id: string;
  description: string;
  summaryKey: string;
  skillCategories: string[];
  maxBulletsPerEntry: number;
  emphasizeKeywords: string[];
  projectCategories?: string[];
}

// ============================================================================
// Content Set
// ============================================================================

export type SelectionReason = 'emphasized' | 'keyword' | 'fill';

export interface SelectedBullet {
  text: string;
  skills: string[];
  reason: SelectionReason;
  /** Keyword coverage of this bullet against the variant and job keywords */
  coverage: number;
  /** Position in the source entry */
  sourceIndex: number;
}

export interface SelectedExperience {
  company: string;
  title: string;
  location: string | null;
  start: string;
  end: string | null;
  bullets: SelectedBullet[];
  /** Bullets available before the cap was applied */
  totalBullets: number;
}

export interface SkillGroup {
  category: string;
  skills: string[];
}

export interface NormalizedContact {
  name: string;
  email: string | null;
  phone: string | null;
  location: string | null;
  links: ContactLink[];
}

export interface ProjectGroup {
  category: string;
  items: OpaqueRecord[];
}

/**
 * Variant-filtered material handed to rendering and generation.
 * Every field is present; absent data is null or an empty list.
 */
export interface ContentSet {
  variantId: string;
  variantDescription: string;
  contact: NormalizedContact;
  summary: string;
  skills: SkillGroup[];
  experience: SelectedExperience[];
  education: OpaqueRecord[];
  certifications: OpaqueRecord[];
  projects: ProjectGroup[];
  /** Keywords that drove selection: variant emphasis keywords then job keywords */
  keywords: string[];
}

// ============================================================================
// Rendering
// ============================================================================

export type OutputFormat = 'md' | 'tex' | 'txt';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['md', 'tex', 'txt'];

/**
 * Name × format → template body lookup
 */
export interface TemplateRepository {
  get(name: string, format: OutputFormat): string | null;
  list(): Array<{ name: string; format: OutputFormat }>;
}

// ============================================================================
// Candidates
// ============================================================================

export type GenerationMode = 'deterministic' | 'ai';

export type DocumentKind = 'resume' | 'cover-letter';

/**
 * Employer and role a cover letter is addressed to
 */
export interface LetterTarget {
  company: string;
  position: string;
}

export interface Candidate {
  text: string;
  /** Generation index within the run, stable regardless of completion order */
  index: number;
  mode: GenerationMode;
  template: string;
  format: OutputFormat;
  score?: number;
}

export interface GenerateOptions {
  template?: string;
  format?: OutputFormat;
  index?: number;
  jobDescription?: string;
  jobKeywords?: string[];
  signal?: AbortSignal;
  timeoutMs?: number;
  temperature?: number;
  document?: DocumentKind;
  /** Required by cover-letter templates */
  letter?: LetterTarget;
}

// ============================================================================
// Judge
// ============================================================================

export interface JudgeWeights {
  keywords: number;
  faithfulness: number;
  structure: number;
}

export interface CandidateScore {
  index: number;
  keywordCoverage: number;
  faithfulness: number;
  structure: number;
  total: number;
  unsupportedTerms: string[];
}

export interface JudgeResult {
  winner: Candidate;
  scores: CandidateScore[];
}

export type JudgeStrategy = 'select' | 'merge';

// ============================================================================
// Orchestration
// ============================================================================

export type OrchestratorState =
  | 'idle'
  | 'selecting'
  | 'generating'
  | 'judging'
  | 'fallback'
  | 'finalizing'
  | 'done'
  | 'failed';

export interface StateTransition {
  from: OrchestratorState;
  to: OrchestratorState;
  at: number;
}

export interface CandidateFailure {
  index: number;
  code: TailorErrorCode;
  message: string;
}

export type FallbackTrigger = 'capability-unavailable' | 'all-candidates-failed';

export interface FallbackReason {
  kind: FallbackTrigger;
  failures: CandidateFailure[];
}

export interface GenerationConfig {
  numGenerations: number;
  judgeEnabled: boolean;
  fallbackOnFailure: boolean;
  timeoutMs: number;
  concurrency: number;
  template: string;
  format: OutputFormat;
  judgeWeights: JudgeWeights;
  judgeStrategy: JudgeStrategy;
  temperature: number;
}

export interface GenerationRequest {
  history: HistoryDocument;
  variant: VariantConfig;
  mode: GenerationMode;
  jobDescription?: string;
  /** Supplied keywords skip extraction from the job description */
  jobKeywords?: string[];
  template?: string;
  format?: OutputFormat;
  /** Defaults to a resume */
  document?: DocumentKind;
  /** Missing fields fall back to generic wording */
  letter?: Partial<LetterTarget>;
}

export interface SelectionMetadata {
  document: DocumentKind;
  mode: GenerationMode | 'fallback';
  degraded: boolean;
  candidateCount: number;
  judgeScores: CandidateScore[] | null;
  fallbackReason: FallbackReason | null;
  failures: CandidateFailure[];
  transitions: StateTransition[];
  jobKeywords: string[];
}

export interface GenerationDone {
  status: 'done';
  candidate: Candidate;
  contentSet: ContentSet;
  metadata: SelectionMetadata;
}

export interface GenerationFailed {
  status: 'failed';
  error: Error;
  failures: CandidateFailure[];
  transitions: StateTransition[];
}

export type GenerationOutcome = GenerationDone | GenerationFailed;

// ============================================================================
// ATS Scoring
// ============================================================================

export type ATSCategory = 'format' | 'keywords' | 'sections' | 'contact' | 'readability';

export const ATS_CATEGORIES: readonly ATSCategory[] = [
  'format',
  'keywords',
  'sections',
  'contact',
  'readability'
];

export type CategoryWeights = Record<ATSCategory, number>;

export interface CategoryScore {
  category: ATSCategory;
  score: number;
  max: number;
  details: string[];
}

export interface Suggestion {
  category: ATSCategory;
  message: string;
  recoverablePoints: number;
}

export type ScoreBand = 'excellent' | 'good' | 'fair' | 'poor';

export interface ScoreReport {
  total: number;
  maxTotal: number;
  band: ScoreBand;
  summary: string;
  categories: CategoryScore[];
  matchedKeywords: string[];
  missingKeywords: string[];
  suggestions: Suggestion[];
  extractor: string;
}

/**
 * Salient-term extraction from a job description
 */
export interface KeywordExtractor {
  readonly name: string;
  extract(jobDescription: string): Promise<string[]>;
}

export interface MatchResult {
  matchedKeywords: string[];
  coverage: number;
}
