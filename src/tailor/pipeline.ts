/**
 * Tailoring Pipeline
 *
 * Wires configuration, the LLM capability, the orchestrator and the ATS
 * scorer into one object.
 *
 * ```
 * History + Variant + Job → [Orchestrator] → Document → [ATSScorer] → Report
 * ```
 *
 * Usage:
 * ```typescript
 * const pipeline = createTailorPipeline();
 * const result = await pipeline.tailor({ history, variant, mode: 'ai', jobDescription });
 * if (result.outcome.status === 'done') {
 *   console.log(result.outcome.candidate.text, result.report?.total);
 * }
 * ```
 */

import type { GenerationOutcome, GenerationRequest, ScoreReport, TextCompletion } from './types';
import { ConfigManager, type TailorConfig, type TailorConfigInput } from './config';
import { GenerationOrchestrator } from './generation/orchestrator';
import { ATSScorer } from './ats/atsScorer';
import { createKeywordExtractor } from './ats/keywordExtractor';
import { Renderer } from './renderer/renderer';
import { GenerationLogger } from './logging/logger';
import { LLMClient } from '../shared/llm/client';
import { LLMTextCompletion } from '../shared/llm/completion';
import { DEFAULT_LLM_CONFIG } from '../shared/llm/types';
import { createComponentLogger } from '../shared/logging/logger';

const log = createComponentLogger('pipeline');

export interface TailorPipelineOptions {
  config?: TailorConfigInput;
  /** Overrides the capability built from the environment; null disables AI */
  completion?: TextCompletion | null;
  renderer?: Renderer;
  env?: NodeJS.ProcessEnv;
}

export interface TailorResult {
  outcome: GenerationOutcome;
  /** Present when a resume run finished and a job description was given */
  report: ScoreReport | null;
}

export interface TailorPipeline {
  readonly config: TailorConfig;
  readonly orchestrator: GenerationOrchestrator;
  readonly scorer: ATSScorer;
  tailor(request: GenerationRequest): Promise<TailorResult>;
}

/**
 * Text-completion capability for the configured provider, or null when no
 * API key is set
 */
export function createCompletionFromConfig(
  config: TailorConfig,
  env: NodeJS.ProcessEnv = process.env
): TextCompletion | null {
  const { provider } = config.llm;
  const apiKey = provider === 'anthropic' ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;
  if (!apiKey) {
    log.info({ provider }, 'No API key configured, AI generation unavailable');
    return null;
  }

  const client = new LLMClient({
    provider,
    apiKey,
    model: config.llm.model ?? DEFAULT_LLM_CONFIG[provider].model,
    temperature: config.generation.temperature,
    timeout: config.generation.timeoutMs
  });
  return new LLMTextCompletion(client);
}

export function createTailorPipeline(options: TailorPipelineOptions = {}): TailorPipeline {
  const env = options.env ?? process.env;
  const config = new ConfigManager(options.config, env).getConfig();
  GenerationLogger.setEnabled(config.logging.enabled);

  const completion = options.completion !== undefined ? options.completion : createCompletionFromConfig(config, env);
  const extractor = createKeywordExtractor(completion, config.ats.maxKeywords);

  const orchestrator = new GenerationOrchestrator(config.generation, {
    renderer: options.renderer,
    completion,
    extractor
  });
  const scorer = new ATSScorer(extractor, {
    totalPoints: config.ats.totalPoints,
    weights: config.ats.categoryWeights
  });

  return {
    config,
    orchestrator,
    scorer,
    async tailor(request: GenerationRequest): Promise<TailorResult> {
      const outcome = await orchestrator.run(request);
      if (outcome.status !== 'done' || request.document === 'cover-letter' || !request.jobDescription?.trim()) {
        return { outcome, report: null };
      }
      const report = await scorer.score(outcome.candidate.text, request.jobDescription);
      return { outcome, report };
    }
  };
}
