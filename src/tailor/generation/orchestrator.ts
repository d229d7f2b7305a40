/**
 * Generation Orchestrator
 *
 * Drives one generation run through
 * idle → selecting → generating → (judging) → finalizing → done,
 * with a fallback branch to the deterministic render and a terminal
 * failed state when fallback is disabled. Resumes and cover letters share
 * the same flow; only the template, prompt and judge differ.
 *
 * Selection and template errors are configuration bugs and are rethrown as
 * they are. Everything that can go wrong while producing a candidate is
 * absorbed into the outcome.
 */

import { randomUUID } from 'crypto';
import type {
  Candidate,
  CandidateFailure,
  ContentSet,
  DocumentKind,
  FallbackReason,
  GenerationConfig,
  GenerationOutcome,
  GenerationRequest,
  JudgeResult,
  KeywordExtractor,
  LetterTarget,
  OrchestratorState,
  OutputFormat,
  StateTransition,
  TextCompletion
} from '../types';
import {
  AllCandidatesFailedError,
  CapabilityUnavailableError,
  ConfigurationError,
  GenerationTimeout,
  SelectionError,
  TailorError,
  TailorErrorCode,
  TemplateError,
  errorCodeOf
} from '../errors/types';
import { DEFAULT_GENERATION_CONFIG } from '../config';
import { GenerationConfigSchema } from '../validation/schemas';
import { zodErrorToValidationResult } from '../validation/validator';
import { distinctKeywords } from '../matcher/keywordMatcher';
import { freezeContentSet, selectContent } from '../selector/contentSelector';
import { Renderer } from '../renderer/renderer';
import { Judge } from '../judge/judge';
import { RegexKeywordExtractor } from '../ats/keywordExtractor';
import { GenerationLogger } from '../logging/logger';
import { createRunLogger } from '../../shared/logging/logger';
import { CandidateGenerator, resolveLetterTarget } from './candidateGenerator';
import { runBounded, type PoolTask } from './workerPool';

const DEFAULT_LETTER_TEMPLATE = 'cover-letter';

const TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  idle: ['selecting'],
  selecting: ['generating'],
  generating: ['judging', 'finalizing', 'fallback', 'failed'],
  judging: ['finalizing'],
  fallback: ['finalizing'],
  finalizing: ['done'],
  done: [],
  failed: []
};

/**
 * Ordered record of the states one run passes through
 */
export class StateTrace {
  private current: OrchestratorState = 'idle';
  private readonly transitions: StateTransition[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  get state(): OrchestratorState {
    return this.current;
  }

  /**
   * @throws Error on a transition the state machine does not allow
   */
  to(next: OrchestratorState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal orchestrator transition ${this.current} → ${next}`);
    }
    this.transitions.push({ from: this.current, to: next, at: this.now() });
    this.current = next;
  }

  list(): StateTransition[] {
    return [...this.transitions];
  }
}

export interface OrchestratorDependencies {
  renderer?: Renderer;
  /** Text-completion capability; AI runs fall back when absent */
  completion?: TextCompletion | null;
  judge?: Judge;
  /** Judge for cover-letter runs */
  letterJudge?: Judge;
  extractor?: KeywordExtractor;
  createRunId?: () => string;
}

/**
 * What every candidate of one run renders
 */
interface RunTarget {
  document: DocumentKind;
  template: string;
  format: OutputFormat;
  letter?: LetterTarget;
}

interface GenerationRound {
  candidates: Candidate[];
  failures: CandidateFailure[];
}

export class GenerationOrchestrator {
  private readonly config: GenerationConfig;
  private readonly renderer: Renderer;
  private readonly generator: CandidateGenerator;
  private readonly judge: Judge;
  private readonly letterJudge: Judge;
  private readonly extractor: KeywordExtractor;
  private readonly createRunId: () => string;

  /**
   * @throws ConfigurationError when the merged configuration is invalid
   */
  constructor(config: Partial<GenerationConfig> = {}, dependencies: OrchestratorDependencies = {}) {
    this.config = {
      ...DEFAULT_GENERATION_CONFIG,
      ...config,
      judgeWeights: { ...DEFAULT_GENERATION_CONFIG.judgeWeights, ...config.judgeWeights }
    };

    const parsed = GenerationConfigSchema.safeParse(this.config);
    if (!parsed.success) {
      const { errors } = zodErrorToValidationResult(parsed.error);
      throw new ConfigurationError(errors[0].field, errors[0].message, errors);
    }

    this.renderer = dependencies.renderer ?? new Renderer();
    this.generator = new CandidateGenerator(this.renderer, dependencies.completion ?? null);
    this.judge = dependencies.judge ?? new Judge({ weights: this.config.judgeWeights });
    this.letterJudge =
      dependencies.letterJudge ?? new Judge({ weights: this.config.judgeWeights, document: 'cover-letter' });
    this.extractor = dependencies.extractor ?? new RegexKeywordExtractor();
    this.createRunId = dependencies.createRunId ?? randomUUID;
  }

  getConfig(): GenerationConfig {
    return { ...this.config, judgeWeights: { ...this.config.judgeWeights } };
  }

  /**
   * Run one generation.
   *
   * @throws SelectionError when the variant does not fit the history
   * @throws TemplateError when the template is missing or does not render
   */
  async run(request: GenerationRequest): Promise<GenerationOutcome> {
    const runId = this.createRunId();
    const log = createRunLogger(runId, request.variant.id);
    const startedAt = Date.now();
    const trace = new StateTrace();
    const document = request.document ?? 'resume';
    const isLetter = document === 'cover-letter';
    const target: RunTarget = {
      document,
      template: request.template ?? (isLetter ? DEFAULT_LETTER_TEMPLATE : this.config.template),
      format: request.format ?? this.config.format,
      letter: isLetter ? resolveLetterTarget(request.letter) : undefined
    };
    const { template, format } = target;
    const jobDescription = request.jobDescription ?? '';

    try {
      trace.to('selecting');
      const jobKeywords = await this.resolveKeywords(request);
      const contentSet = freezeContentSet(selectContent(request.history, request.variant, jobKeywords));
      GenerationLogger.logSelection(runId, contentSet);

      trace.to('generating');
      if (request.mode === 'deterministic') {
        const candidate = await this.generator.generate(contentSet, 'deterministic', target);
        GenerationLogger.logCandidate(runId, candidate);
        return this.finish(runId, trace, startedAt, {
          document,
          candidate,
          contentSet,
          jobKeywords,
          degraded: false,
          judgeScores: null,
          fallbackReason: null,
          failures: [],
          candidateCount: 1
        });
      }

      // Rendered once up front so template errors surface before any model call
      const baseDocument = this.renderer.render(contentSet, template, format, target.letter);

      let fallbackReason: FallbackReason | null = null;
      let round: GenerationRound = { candidates: [], failures: [] };
      if (!this.generator.hasCapability) {
        fallbackReason = { kind: 'capability-unavailable', failures: [] };
      } else {
        round = await this.generateCandidates(runId, contentSet, jobDescription, jobKeywords, target);
        if (round.candidates.length === 0) {
          fallbackReason = { kind: 'all-candidates-failed', failures: round.failures };
        }
      }

      if (fallbackReason) {
        if (!this.config.fallbackOnFailure) {
          trace.to('failed');
          const error =
            fallbackReason.kind === 'capability-unavailable'
              ? new CapabilityUnavailableError()
              : new AllCandidatesFailedError(round.failures.map(f => f.code));
          GenerationLogger.logError(error, runId, { failures: round.failures });
          log.warn({ code: error.code }, 'Generation run failed');
          return { status: 'failed', error, failures: round.failures, transitions: trace.list() };
        }

        trace.to('fallback');
        GenerationLogger.logFallback(runId, fallbackReason);
        log.warn({ kind: fallbackReason.kind }, 'Falling back to deterministic render');
        const candidate: Candidate = { text: baseDocument, index: 0, mode: 'deterministic', template, format };
        return this.finish(runId, trace, startedAt, {
          document,
          candidate,
          contentSet,
          jobKeywords,
          degraded: true,
          judgeScores: null,
          fallbackReason,
          failures: round.failures,
          candidateCount: 0
        });
      }

      let winner = round.candidates[0];
      let judgeScores: JudgeResult['scores'] | null = null;
      if (this.config.judgeEnabled && round.candidates.length >= 2) {
        trace.to('judging');
        const keywords = jobKeywords.length > 0 ? jobKeywords : undefined;
        const judge = isLetter ? this.letterJudge : this.judge;
        const result =
          this.config.judgeStrategy === 'merge'
            ? judge.merge(round.candidates, jobDescription, contentSet, keywords, baseDocument)
            : judge.select(round.candidates, jobDescription, contentSet, keywords, baseDocument);
        winner = result.winner;
        judgeScores = result.scores;
        GenerationLogger.logJudging(runId, result.scores, winner.index);
      }

      return this.finish(runId, trace, startedAt, {
        document,
        candidate: winner,
        contentSet,
        jobKeywords,
        degraded: false,
        judgeScores,
        fallbackReason: null,
        failures: round.failures,
        candidateCount: round.candidates.length
      });
    } catch (error) {
      if (error instanceof SelectionError || error instanceof TemplateError) {
        GenerationLogger.logError(error, runId, { state: trace.state });
      }
      throw error;
    }
  }

  private async resolveKeywords(request: GenerationRequest): Promise<string[]> {
    if (request.jobKeywords && request.jobKeywords.length > 0) {
      return distinctKeywords(request.jobKeywords);
    }
    if (request.jobDescription && request.jobDescription.trim()) {
      return distinctKeywords(await this.extractor.extract(request.jobDescription));
    }
    return [];
  }

  private async generateCandidates(
    runId: string,
    contentSet: ContentSet,
    jobDescription: string,
    jobKeywords: string[],
    target: RunTarget
  ): Promise<GenerationRound> {
    const count = this.config.judgeEnabled ? this.config.numGenerations : 1;
    const { timeoutMs } = this.config;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new GenerationTimeout(timeoutMs)), timeoutMs);
    timer.unref();

    const tasks: PoolTask<Candidate>[] = Array.from({ length: count }, (_, index) => async signal => {
      const startedAt = Date.now();
      const candidate = await this.generator.generate(contentSet, 'ai', {
        ...target,
        index,
        jobDescription: jobDescription || undefined,
        jobKeywords,
        signal,
        timeoutMs,
        temperature: this.config.temperature
      });
      GenerationLogger.logCandidate(runId, candidate, Date.now() - startedAt);
      return candidate;
    });

    const slots = await runBounded(tasks, { concurrency: this.config.concurrency, signal: controller.signal }).finally(
      () => clearTimeout(timer)
    );

    const candidates: Candidate[] = [];
    const failures: CandidateFailure[] = [];
    slots.forEach((slot, index) => {
      if (slot.status === 'fulfilled') {
        candidates.push(slot.value);
        return;
      }
      if (slot.status === 'rejected' && (slot.error instanceof TemplateError || slot.error instanceof SelectionError)) {
        throw slot.error;
      }
      const failure: CandidateFailure =
        slot.status === 'rejected'
          ? {
              index,
              code: errorCodeOf(slot.error),
              message:
                slot.error instanceof TailorError
                  ? slot.error.technicalDetails
                  : slot.error instanceof Error
                    ? slot.error.message
                    : String(slot.error)
            }
          : { index, code: TailorErrorCode.GENERATION_TIMEOUT, message: `Cancelled after ${timeoutMs}ms` };
      failures.push(failure);
      GenerationLogger.logCandidateFailure(runId, failure);
    });

    return { candidates, failures };
  }

  private finish(
    runId: string,
    trace: StateTrace,
    startedAt: number,
    result: {
      document: DocumentKind;
      candidate: Candidate;
      contentSet: ContentSet;
      jobKeywords: string[];
      degraded: boolean;
      judgeScores: JudgeResult['scores'] | null;
      fallbackReason: FallbackReason | null;
      failures: CandidateFailure[];
      candidateCount: number;
    }
  ): GenerationOutcome {
    trace.to('finalizing');
    const mode = result.degraded ? 'fallback' : result.candidate.mode;
    trace.to('done');

    GenerationLogger.logRunComplete(runId, mode, result.degraded, Date.now() - startedAt);
    return {
      status: 'done',
      candidate: result.candidate,
      contentSet: result.contentSet,
      metadata: {
        document: result.document,
        mode,
        degraded: result.degraded,
        candidateCount: result.candidateCount,
        judgeScores: result.judgeScores,
        fallbackReason: result.fallbackReason,
        failures: result.failures,
        transitions: trace.list(),
        jobKeywords: result.jobKeywords
      }
    };
  }
}
