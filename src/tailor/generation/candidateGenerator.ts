/**
 * Candidate Generator
 *
 * Produces one candidate document from a content set, either by rendering a
 * template or by asking a text-completion capability to tailor the rendered
 * base document. AI output is checked for invented facts before it is
 * accepted.
 */

import type {
  Candidate,
  ContentSet,
  GenerateOptions,
  GenerationMode,
  LetterTarget,
  TextCompletion
} from '../types';
import { LLMRequestError } from '../../shared/llm/types';
import {
  CapabilityUnavailableError,
  GenerationProviderError,
  GenerationRateLimited,
  GenerationTimeout,
  TailorError,
  TruthfulnessError
} from '../errors/types';
import { Renderer } from '../renderer/renderer';
import { contentSetText } from '../selector/contentSelector';
import { createComponentLogger } from '../../shared/logging/logger';
import {
  COVER_LETTER_SYSTEM_PROMPT,
  GENERATION_SYSTEM_PROMPT,
  buildCoverLetterPrompt,
  buildGenerationPrompt,
  cleanModelOutput
} from './prompts';
import { findUnsupportedTerms } from './truthfulness';

const log = createComponentLogger('generator');

const DEFAULT_TEMPLATE = 'base';
const DEFAULT_TIMEOUT_MS = 60000;

/**
 * Fill in generic wording for a letter target the caller left incomplete
 */
export function resolveLetterTarget(target: Partial<LetterTarget> = {}): LetterTarget {
  return {
    company: target.company?.trim() || 'the company',
    position: target.position?.trim() || 'the open position'
  };
}

/**
 * Map a capability failure onto the generation error kinds
 */
export function toGenerationError(error: unknown, timeoutMs: number): TailorError {
  if (error instanceof TailorError) {
    return error;
  }
  if (error instanceof LLMRequestError) {
    switch (error.kind) {
      case 'timeout':
        return new GenerationTimeout(timeoutMs, error.message);
      case 'rate-limited':
        return new GenerationRateLimited(error.message);
      case 'provider':
        return new GenerationProviderError(error.message, error.status);
    }
  }
  return new GenerationProviderError(error instanceof Error ? error.message : String(error));
}

export class CandidateGenerator {
  constructor(
    private readonly renderer: Renderer,
    private readonly completion: TextCompletion | null = null
  ) {}

  get hasCapability(): boolean {
    return this.completion !== null;
  }

  /**
   * Generate one candidate.
   *
   * Template errors propagate as they are. AI failures surface as
   * GenerationTimeout, GenerationRateLimited, GenerationProviderError,
   * TruthfulnessError or CapabilityUnavailableError.
   */
  async generate(
    contentSet: ContentSet,
    mode: GenerationMode,
    options: GenerateOptions = {}
  ): Promise<Candidate> {
    const template = options.template ?? DEFAULT_TEMPLATE;
    const format = options.format ?? 'md';
    const index = options.index ?? 0;
    const letter = options.document === 'cover-letter' ? resolveLetterTarget(options.letter) : options.letter;

    const baseDocument = this.renderer.render(contentSet, template, format, letter);
    if (mode === 'deterministic') {
      return { text: baseDocument, index, mode, template, format };
    }

    if (!this.completion) {
      throw new CapabilityUnavailableError();
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const keywords = options.jobKeywords ?? contentSet.keywords;
    const promptInput = { contentSet, baseDocument, format, jobDescription: options.jobDescription, keywords };
    const isLetter = options.document === 'cover-letter';
    const prompt = isLetter
      ? buildCoverLetterPrompt({ ...promptInput, letter: resolveLetterTarget(letter) })
      : buildGenerationPrompt(promptInput);

    let response: string;
    try {
      response = await this.completion.complete(prompt, {
        systemPrompt: isLetter ? COVER_LETTER_SYSTEM_PROMPT : GENERATION_SYSTEM_PROMPT,
        temperature: options.temperature,
        timeoutMs,
        signal: options.signal,
        // Each candidate is an independent sample
        cacheable: false
      });
    } catch (error) {
      const failure = toGenerationError(error, timeoutMs);
      log.warn({ index, code: failure.code }, 'Candidate generation failed');
      throw failure;
    }

    const text = cleanModelOutput(response);
    const unsupported = findUnsupportedTerms(text, `${contentSetText(contentSet)}\n${baseDocument}`, {
      watchTerms: keywords
    });
    if (unsupported.length > 0) {
      log.warn({ index, unsupported }, 'Candidate rejected by truthfulness check');
      throw new TruthfulnessError(unsupported);
    }

    log.debug({ index, length: text.length }, 'Candidate generated');
    return { text, index, mode: 'ai', template, format };
  }
}
