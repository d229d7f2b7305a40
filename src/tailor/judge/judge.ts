/**
 * Judge
 *
 * Scores candidate documents on keyword alignment, faithfulness to the
 * content set and structural completeness, and returns the best one. Scoring
 * is deterministic; equal totals go to the earliest generation index.
 *
 * `merge` is an opt-in alternative that assembles one document from the best
 * section of each candidate.
 */

import type {
  Candidate,
  CandidateScore,
  ContentSet,
  DocumentKind,
  JudgeResult,
  JudgeWeights
} from '../types';
import { JudgeInputError, ConfigurationError } from '../errors/types';
import { matchKeywords } from '../matcher/keywordMatcher';
import { type CanonicalSection, joinSections, presentSections, splitSections } from '../matcher/sections';
import { contentSetText } from '../selector/contentSelector';
import { findUnsupportedTerms } from '../generation/truthfulness';
import { extractKeywordsByPattern } from '../ats/keywordExtractor';
import { createComponentLogger } from '../../shared/logging/logger';

const log = createComponentLogger('judge');

export const DEFAULT_JUDGE_WEIGHTS: JudgeWeights = {
  keywords: 1,
  faithfulness: 1,
  structure: 1
};

export const DEFAULT_REQUIRED_SECTIONS: readonly CanonicalSection[] = ['summary', 'experience', 'skills'];

const LETTER_GREETING = /^\s*(?:\*\*)?(?:dear|hello|to whom)\b/im;
const LETTER_CLOSING = /^\s*(?:\*\*)?(?:sincerely|best regards|kind regards|regards|thank you)\b/im;

export interface JudgeOptions {
  weights?: Partial<JudgeWeights>;
  /** Resume sections counted by the structure score */
  requiredSections?: readonly CanonicalSection[];
  /** Cover letters are scored on greeting, closing and signature instead of sections */
  document?: DocumentKind;
}

export class Judge {
  private readonly weights: JudgeWeights;
  private readonly requiredSections: readonly CanonicalSection[];
  private readonly document: DocumentKind;

  constructor(options: JudgeOptions = {}) {
    this.weights = { ...DEFAULT_JUDGE_WEIGHTS, ...options.weights };
    const values = Object.values(this.weights);
    if (values.some(w => !Number.isFinite(w) || w < 0) || values.every(w => w === 0)) {
      throw new ConfigurationError('judgeWeights', 'weights must be non-negative with a positive sum');
    }
    this.requiredSections = options.requiredSections ?? DEFAULT_REQUIRED_SECTIONS;
    this.document = options.document ?? 'resume';
  }

  /**
   * Score every candidate against the same keywords and source text
   *
   * @param referenceText extra source text the candidates may draw on, such
   * as the deterministic base document
   */
  score(
    candidates: Candidate[],
    jobDescription: string,
    contentSet: ContentSet,
    jobKeywords?: string[],
    referenceText = ''
  ): CandidateScore[] {
    const keywords = this.resolveKeywords(jobDescription, contentSet, jobKeywords);
    const source = `${contentSetText(contentSet)}\n${referenceText}`;
    const weightSum = this.weights.keywords + this.weights.faithfulness + this.weights.structure;

    return candidates.map(candidate => {
      const keywordCoverage = matchKeywords(candidate.text, keywords).coverage;
      const unsupportedTerms = findUnsupportedTerms(candidate.text, source, { watchTerms: keywords });
      const faithfulness = 1 / (1 + unsupportedTerms.length);
      const structure = this.structureScore(candidate.text, contentSet);
      const total =
        (this.weights.keywords * keywordCoverage +
          this.weights.faithfulness * faithfulness +
          this.weights.structure * structure) /
        weightSum;

      return { index: candidate.index, keywordCoverage, faithfulness, structure, total, unsupportedTerms };
    });
  }

  /**
   * Pick the highest-scoring candidate.
   *
   * @throws JudgeInputError for an empty candidate list
   */
  select(
    candidates: Candidate[],
    jobDescription: string,
    contentSet: ContentSet,
    jobKeywords?: string[],
    referenceText = ''
  ): JudgeResult {
    if (candidates.length === 0) {
      throw new JudgeInputError();
    }

    const ordered = [...candidates].sort((a, b) => a.index - b.index);
    const scores = this.score(ordered, jobDescription, contentSet, jobKeywords, referenceText);

    let best = 0;
    for (let i = 1; i < scores.length; i++) {
      if (scores[i].total > scores[best].total) {
        best = i;
      }
    }

    log.debug({ winner: ordered[best].index, totals: scores.map(s => s.total) }, 'Candidate selected');
    return {
      winner: { ...ordered[best], score: scores[best].total },
      scores
    };
  }

  /**
   * Build one document in the section order of the best candidate, taking
   * each section from whichever candidate covers the most keywords in it.
   *
   * @throws JudgeInputError for an empty candidate list
   */
  merge(
    candidates: Candidate[],
    jobDescription: string,
    contentSet: ContentSet,
    jobKeywords?: string[],
    referenceText = ''
  ): JudgeResult {
    const selected = this.select(candidates, jobDescription, contentSet, jobKeywords, referenceText);
    const keywords = this.resolveKeywords(jobDescription, contentSet, jobKeywords);
    const ordered = [...candidates].sort((a, b) => a.index - b.index);
    const sectionsByCandidate = ordered.map(candidate => splitSections(candidate.text));

    const sectionKey = (heading: string): string => heading.trim().toLowerCase();

    const merged = splitSections(selected.winner.text).map(section => {
      if (section.headingLine === null) {
        return section;
      }

      let chosen = section;
      let chosenCoverage = matchKeywords(section.body, keywords).coverage;
      for (const sections of sectionsByCandidate) {
        const match = sections.find(s =>
          section.name ? s.name === section.name : s.headingLine !== null && sectionKey(s.heading) === sectionKey(section.heading)
        );
        if (!match || !match.body.trim()) continue;
        const coverage = matchKeywords(match.body, keywords).coverage;
        if (coverage > chosenCoverage) {
          chosen = match;
          chosenCoverage = coverage;
        }
      }
      return chosen;
    });

    const text = joinSections(merged);
    const [rescored] = this.score(
      [{ ...selected.winner, text }],
      jobDescription,
      contentSet,
      jobKeywords,
      referenceText
    );

    return {
      winner: { ...selected.winner, text, score: rescored.total },
      scores: selected.scores
    };
  }

  private structureScore(text: string, contentSet: ContentSet): number {
    if (this.document === 'cover-letter') {
      const signed = matchKeywords(text, [contentSet.contact.name]).coverage === 1;
      return [LETTER_GREETING.test(text), LETTER_CLOSING.test(text), signed].filter(Boolean).length / 3;
    }
    if (this.requiredSections.length === 0) return 1;
    const present = presentSections(text);
    return this.requiredSections.filter(name => present.has(name)).length / this.requiredSections.length;
  }

  private resolveKeywords(jobDescription: string, contentSet: ContentSet, jobKeywords?: string[]): string[] {
    if (jobKeywords && jobKeywords.length > 0) return jobKeywords;
    const extracted = extractKeywordsByPattern(jobDescription);
    return extracted.length > 0 ? extracted : contentSet.keywords;
  }
}
