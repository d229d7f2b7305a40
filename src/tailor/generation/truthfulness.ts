/**
 * Truthfulness check for generated documents.
 *
 * A generated document may only mention proper nouns and known technology
 * terms that already appear in its source material (the content set and the
 * deterministic base document). Anything else counts as an invented fact.
 */

import { containsKeyword } from '../matcher/keywordMatcher';
import { handleEncoding, normalizeText } from '../matcher/textNormalizer';
import { ACTION_VERBS, COMMON_CAPITALIZED, TECH_VOCABULARY, findTerms } from '../matcher/vocabulary';

const LIST_MARKER = /^\s*(?:#{1,6}|[-*+•]|\d+[.)]|\\item)\s+/;
const MARKUP = /[*_`>|[\](){}\\]/g;
const WORD = /[A-Za-z0-9][A-Za-z0-9+#.&/'-]*/g;
const SENTENCE_END = /[.!?:;]\s*$/;

export interface TruthCheckOptions {
  /** Extra terms to watch for, typically the job keywords */
  watchTerms?: readonly string[];
  vocabulary?: readonly string[];
}

function trimWord(word: string): string {
  return word.replace(/[.&/'-]+$/, '');
}

/**
 * Capitalized words that may name a person, company, title or place.
 * A word opening a line or sentence is kept too, unless it is a common
 * word or an action verb.
 */
export function properNounCandidates(text: string): string[] {
  const result: string[] = [];

  for (const rawLine of handleEncoding(text).split('\n')) {
    const line = rawLine.replace(LIST_MARKER, '').replace(MARKUP, ' ');
    let first = true;

    for (const match of line.matchAll(WORD)) {
      const index = match.index ?? 0;
      const word = trimWord(match[0]);
      const opensSentence = first || SENTENCE_END.test(line.slice(0, index));
      first = false;

      if (!word || !/[A-Z]/.test(word)) continue;
      const lower = word.toLowerCase();
      if (COMMON_CAPITALIZED.has(lower)) continue;
      if (opensSentence && ACTION_VERBS.has(lower)) continue;
      result.push(word);
    }
  }

  return result;
}

/**
 * Terms in `output` unsupported by `sourceText`, in order of first appearance
 */
export function findUnsupportedTerms(
  output: string,
  sourceText: string,
  options: TruthCheckOptions = {}
): string[] {
  const source = normalizeText(sourceText);
  const watched = [...(options.vocabulary ?? TECH_VOCABULARY), ...(options.watchTerms ?? [])];

  const flagged: Array<{ term: string; index: number }> = [];
  for (const occurrence of findTerms(output, watched)) {
    if (!containsKeyword(source, occurrence.term)) {
      flagged.push({ term: occurrence.surface, index: occurrence.index });
    }
  }

  const normalizedOutput = handleEncoding(output);
  for (const word of properNounCandidates(output)) {
    if (!containsKeyword(source, word)) {
      flagged.push({ term: word, index: normalizedOutput.indexOf(word) });
    }
  }

  const seen = new Set<string>();
  return flagged
    .sort((a, b) => a.index - b.index)
    .filter(({ term }) => {
      const key = term.toLowerCase();
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    })
    .map(({ term }) => term);
}
