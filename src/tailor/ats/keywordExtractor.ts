/**
 * Keyword Extractors
 *
 * Two interchangeable ways to pull salient terms out of a job description:
 * a pattern-based extractor that needs nothing external, and an AI-assisted
 * one that falls back to patterns whenever the model call or its output
 * fails. Which one runs is decided once, at construction.
 */

import { z } from 'zod';
import type { KeywordExtractor, TextCompletion } from '../types';
import { parseJsonResponse } from '../../shared/llm/client';
import { createComponentLogger } from '../../shared/logging/logger';
import { distinctKeywords } from '../matcher/keywordMatcher';
import { handleEncoding } from '../matcher/textNormalizer';
import { COMMON_CAPITALIZED, TECH_VOCABULARY, findTerms } from '../matcher/vocabulary';
import { buildKeywordPrompt } from '../generation/prompts';

const log = createComponentLogger('keywords');

export const DEFAULT_MAX_KEYWORDS = 20;

// GraphQL, TypeScript, PostgreSQL
const CAMEL_CASE = /(?<![A-Za-z0-9])[A-Z][a-z0-9]+(?:[A-Z][A-Za-z0-9]*)+(?![A-Za-z0-9])/g;
// AWS, SQL, GCP
const ALL_CAPS = /(?<![A-Za-z0-9])[A-Z]{2,6}(?![A-Za-z0-9])/g;
// C++, C#, .NET, CI/CD, Node.js
const SYMBOL_TERM = /(?<![A-Za-z0-9])(?:[A-Za-z]+(?:\+\+|#)|\.[A-Z][A-Za-z]+|[A-Z][A-Za-z]*\/[A-Z][A-Za-z]*|[A-Za-z]+\.js)(?![A-Za-z0-9])/g;

/**
 * Vocabulary and pattern hits, in order of first occurrence, spelled as in
 * the job description
 */
export function extractKeywordsByPattern(jobDescription: string, maxKeywords = DEFAULT_MAX_KEYWORDS): string[] {
  const text = handleEncoding(jobDescription);
  const hits: Array<{ surface: string; index: number }> = findTerms(text, TECH_VOCABULARY).map(t => ({
    surface: t.surface,
    index: t.index
  }));

  for (const pattern of [CAMEL_CASE, ALL_CAPS, SYMBOL_TERM]) {
    for (const match of text.matchAll(pattern)) {
      const surface = match[0];
      if (COMMON_CAPITALIZED.has(surface.toLowerCase())) continue;
      hits.push({ surface, index: match.index ?? 0 });
    }
  }

  // A hit inside a longer hit at the same spot is the same mention
  const outer = hits.filter(
    hit =>
      !hits.some(
        other =>
          other.surface.length > hit.surface.length &&
          hit.index >= other.index &&
          hit.index + hit.surface.length <= other.index + other.surface.length
      )
  );

  return distinctKeywords(outer.sort((a, b) => a.index - b.index).map(h => h.surface)).slice(0, maxKeywords);
}

export class RegexKeywordExtractor implements KeywordExtractor {
  readonly name = 'regex';

  constructor(private readonly maxKeywords = DEFAULT_MAX_KEYWORDS) {}

  async extract(jobDescription: string): Promise<string[]> {
    return extractKeywordsByPattern(jobDescription, this.maxKeywords);
  }
}

const KeywordResponseSchema = z.union([
  z.object({ keywords: z.array(z.unknown()) }),
  z.array(z.unknown())
]);

export class AIKeywordExtractor implements KeywordExtractor {
  readonly name = 'ai';

  constructor(
    private readonly completion: TextCompletion,
    private readonly fallback: KeywordExtractor = new RegexKeywordExtractor(),
    private readonly maxKeywords = DEFAULT_MAX_KEYWORDS
  ) {}

  async extract(jobDescription: string): Promise<string[]> {
    if (!jobDescription.trim()) {
      return [];
    }

    try {
      const response = await this.completion.complete(buildKeywordPrompt(jobDescription, this.maxKeywords), {
        temperature: 0,
        json: true
      });
      const parsed = KeywordResponseSchema.parse(parseJsonResponse(response));
      const raw = Array.isArray(parsed) ? parsed : parsed.keywords;
      const keywords = distinctKeywords(
        raw.filter((k): k is string => typeof k === 'string' && k.trim().length > 0)
      ).slice(0, this.maxKeywords);

      if (keywords.length > 0) {
        return keywords;
      }
      log.warn('AI keyword extraction returned no keywords, using fallback');
    } catch (error) {
      log.warn(
        { err: error instanceof Error ? error.message : String(error), fallback: this.fallback.name },
        'AI keyword extraction failed, using fallback'
      );
    }

    return this.fallback.extract(jobDescription);
  }
}

/**
 * AI extraction when a capability is configured, pattern extraction otherwise
 */
export function createKeywordExtractor(
  completion: TextCompletion | null | undefined,
  maxKeywords = DEFAULT_MAX_KEYWORDS
): KeywordExtractor {
  const regex = new RegexKeywordExtractor(maxKeywords);
  return completion ? new AIKeywordExtractor(completion, regex, maxKeywords) : regex;
}
