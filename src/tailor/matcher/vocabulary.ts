/**
 * Word lists shared by truthfulness checks, keyword extraction and ATS
 * readability scoring.
 */

import techVocabulary from '../data/tech-vocabulary.json';
import actionVerbs from '../data/action-verbs.json';
import commonCapitalized from '../data/common-capitalized.json';
import { escapeRegExp, handleEncoding } from './textNormalizer';

export const TECH_VOCABULARY: readonly string[] = techVocabulary.terms;

export const ACTION_VERBS: ReadonlySet<string> = new Set(actionVerbs.verbs.map(v => v.toLowerCase()));

/**
 * Capitalized words that say nothing about facts: months, headings, pronouns
 */
export const COMMON_CAPITALIZED: ReadonlySet<string> = new Set(
  commonCapitalized.words.map(w => w.toLowerCase())
);

export interface TermOccurrence {
  /** Canonical spelling from the word list */
  term: string;
  /** Spelling as it appears in the text */
  surface: string;
  index: number;
}

/**
 * Pattern for one term. Terms of two characters or fewer (`Go`, `C#`) match
 * case-sensitively so ordinary words are not mistaken for them.
 */
export function termPattern(term: string): RegExp {
  const body = term
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
  const flags = term.trim().length <= 2 ? 'g' : 'gi';
  return new RegExp(`(?<![A-Za-z0-9])${body}(?![A-Za-z0-9+#])`, flags);
}

/**
 * First occurrence of each term found in the text, ordered by position
 */
export function findTerms(text: string, terms: readonly string[] = TECH_VOCABULARY): TermOccurrence[] {
  const source = handleEncoding(text);
  const found: TermOccurrence[] = [];

  for (const term of terms) {
    const match = termPattern(term).exec(source);
    if (match) {
      found.push({ term, surface: match[0].replace(/\s+/g, ' '), index: match.index });
    }
  }

  // A term inside a longer found term at the same spot (`React` in `React Native`) is dropped
  const covered = found.filter(
    occurrence =>
      !found.some(
        other =>
          other !== occurrence &&
          other.surface.length > occurrence.surface.length &&
          occurrence.index >= other.index &&
          occurrence.index + occurrence.surface.length <= other.index + other.surface.length
      )
  );

  return covered.sort((a, b) => a.index - b.index);
}
