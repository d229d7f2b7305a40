/**
 * Template helpers registered on every renderer environment
 */

import type { HelperDelegate } from 'handlebars';

const LATEX_REPLACEMENTS: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '&': '\\&',
  '%': '\\%',
  $: '\\$',
  '#': '\\#',
  _: '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\^{}',
  '™': '\\textsuperscript{TM}',
  '®': '\\textsuperscript{R}',
  '©': '\\textcopyright{}',
  '±': '$\\pm$',
  '≥': '$\\ge$',
  '≤': '$\\le$',
  '→': '$\\rightarrow$',
  '—': '---',
  '–': '--'
};

const LATEX_SPECIALS = new RegExp(
  `[${Object.keys(LATEX_REPLACEMENTS).map(ch => (/[\\\]^-]/.test(ch) ? `\\${ch}` : ch)).join('')}]`,
  'g'
);

const TITLE_SMALL_WORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'but', 'for', 'nor', 'so', 'yet',
  'at', 'by', 'in', 'of', 'on', 'to', 'up', 'as', 'with'
]);

/**
 * Escape LaTeX specials and turn `**bold**` into `\textbf{bold}`
 */
export function latexEscape(text: string): string {
  if (!text) return '';
  return text
    .replace(LATEX_SPECIALS, ch => LATEX_REPLACEMENTS[ch] ?? ch)
    .replace(/\*\*([^*]+)\*\*/g, '\\textbf{$1}');
}

/**
 * Title case with small words lowercased after the first word.
 * Underscores read as spaces, so `cloud_platforms` becomes `Cloud Platforms`.
 */
export function properTitle(text: string): string {
  if (!text) return '';
  const words = text.replace(/_/g, ' ').split(/\s+/).filter(Boolean);
  return words
    .map((word, index) => {
      const lower = word.toLowerCase();
      if (index > 0 && TITLE_SMALL_WORDS.has(lower)) return lower;
      return lower.charAt(0).toUpperCase() + lower.slice(1);
    })
    .join(' ');
}

/**
 * `start - end`, with `Present` for an open end
 */
export function formatPeriod(start: string, end: string | null | undefined): string {
  return `${start} - ${end ? end : 'Present'}`;
}

const URL_UNSAFE: Record<string, string> = {
  '{': '%7B',
  '}': '%7D',
  '\\': '%5C',
  ' ': '%20'
};

/**
 * Escape a URL for the first argument of `\href`
 */
export function latexUrl(url: string): string {
  return url.replace(/[{}\\ ]/g, ch => URL_UNSAFE[ch] ?? ch).replace(/[%#]/g, ch => `\\${ch}`);
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : value === null || value === undefined ? '' : String(value);
}

// Handlebars passes its options hash as the final argument
const latex: HelperDelegate = (value: unknown) => latexEscape(asString(value));

const latexUrlHelper: HelperDelegate = (value: unknown) => latexUrl(asString(value));

const title: HelperDelegate = (value: unknown) => properTitle(asString(value));

const join: HelperDelegate = (list: unknown, ...rest: unknown[]) => {
  const separator = rest.length > 1 && typeof rest[0] === 'string' ? rest[0] : ', ';
  return Array.isArray(list) ? list.map(asString).join(separator) : asString(list);
};

const period: HelperDelegate = (start: unknown, ...rest: unknown[]) => {
  const end = rest.length > 1 ? rest[0] : null;
  return formatPeriod(asString(start), typeof end === 'string' ? end : null);
};

export const TEMPLATE_HELPERS: Record<string, HelperDelegate> = {
  latex,
  latexUrl: latexUrlHelper,
  title,
  join,
  period
};
