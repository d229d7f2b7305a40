/**
 * Keyword Matcher
 *
 * Exact, case-insensitive keyword matching. Single-token keywords match on
 * word boundaries; multi-word phrases match as substrings of the normalized
 * corpus. No stemming and no fuzzy matching.
 */

import type { MatchResult } from '../types';
import { escapeRegExp, normalizeText } from './textNormalizer';

const WORD_CHAR = 'a-z0-9';

function isPhrase(normalizedKeyword: string): boolean {
  return normalizedKeyword.includes(' ');
}

function boundaryPattern(normalizedKeyword: string, flags: string): RegExp {
  return new RegExp(`(?<![${WORD_CHAR}])${escapeRegExp(normalizedKeyword)}(?![${WORD_CHAR}])`, flags);
}

/**
 * Keywords deduplicated on their normalized form, first spelling kept
 */
export function distinctKeywords(keywords: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const keyword of keywords) {
    const normalized = normalizeText(keyword);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    result.push(keyword.trim());
  }
  return result;
}

/**
 * Whether one keyword occurs in already-normalized text
 */
export function containsKeyword(normalizedCorpus: string, keyword: string): boolean {
  const normalized = normalizeText(keyword);
  if (!normalized) return false;
  if (isPhrase(normalized)) {
    return normalizedCorpus.includes(normalized);
  }
  return boundaryPattern(normalized, '').test(normalizedCorpus);
}

/**
 * Match a keyword set against a corpus.
 *
 * `matchedKeywords` keeps the caller's spelling and input order; coverage is
 * matched / distinct keywords, and 0 for an empty set.
 */
export function matchKeywords(corpusText: string, keywords: Iterable<string>): MatchResult {
  const distinct = distinctKeywords(keywords);
  if (distinct.length === 0) {
    return { matchedKeywords: [], coverage: 0 };
  }

  const corpus = normalizeText(corpusText);
  const matchedKeywords = distinct.filter(keyword => containsKeyword(corpus, keyword));

  return {
    matchedKeywords,
    coverage: matchedKeywords.length / distinct.length
  };
}

/**
 * Occurrences of one keyword under the same matching rules
 */
export function countKeyword(corpusText: string, keyword: string): number {
  const normalized = normalizeText(keyword);
  if (!normalized) return 0;
  const corpus = normalizeText(corpusText);

  if (isPhrase(normalized)) {
    let count = 0;
    let from = corpus.indexOf(normalized);
    while (from !== -1) {
      count++;
      from = corpus.indexOf(normalized, from + normalized.length);
    }
    return count;
  }

  return corpus.match(boundaryPattern(normalized, 'g'))?.length ?? 0;
}

export interface KeywordDensity {
  keyword: string;
  count: number;
  /** Occurrences per 100 words of corpus */
  perHundredWords: number;
}

/**
 * Per-keyword occurrence counts, in keyword input order
 */
export function keywordDensity(corpusText: string, keywords: Iterable<string>): KeywordDensity[] {
  const words = normalizeText(corpusText).split(' ').filter(Boolean).length;
  return distinctKeywords(keywords).map(keyword => {
    const count = countKeyword(corpusText, keyword);
    return {
      keyword,
      count,
      perHundredWords: words === 0 ? 0 : Math.round((count / words) * 10000) / 100
    };
  });
}
