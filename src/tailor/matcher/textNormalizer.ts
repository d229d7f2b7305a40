/**
 * Text Normalization Utilities
 *
 * Normalization shared by keyword matching, truthfulness checks and ATS
 * scoring, so every comparison sees text the same way.
 */

/**
 * Lowercases and collapses whitespace. Punctuation is kept so that terms such
 * as `c++` and `node.js` survive.
 */
export function normalizeText(text: string): string {
  if (!text) {
    return '';
  }

  return handleEncoding(text)
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Replaces typographic characters with plain equivalents and drops control
 * characters other than line breaks and tabs.
 */
export function handleEncoding(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/[\u201C\u201D]/g, '"')
    .replace(/[\u2013\u2014]/g, '-')
    .replace(/\u2026/g, '...')
    .replace(/\u00A0/g, ' ')
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, '');
}

/**
 * Cleans whitespace while preserving line structure
 */
export function cleanWhitespace(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\t/g, ' ')
    .replace(/ +/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Escapes a literal for use inside a RegExp
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Splits prose into word tokens, keeping inner punctuation such as `node.js`
 * or `ci/cd` attached to the word.
 */
export function tokenize(text: string): string[] {
  return handleEncoding(text).match(/[A-Za-z0-9][A-Za-z0-9+#./&-]*[A-Za-z0-9+#]|[A-Za-z0-9]/g) ?? [];
}
