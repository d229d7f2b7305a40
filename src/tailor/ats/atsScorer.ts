/**
 * ATS Scorer
 *
 * Scores a rendered document for applicant-tracking-system compatibility in
 * five independent categories and returns remediation suggestions ordered by
 * how many points each would recover.
 */

import type {
  ATSCategory,
  CategoryScore,
  CategoryWeights,
  KeywordExtractor,
  ScoreBand,
  ScoreReport,
  Suggestion
} from '../types';
import { ATS_CATEGORIES } from '../types';
import { ConfigurationError } from '../errors/types';
import { distinctKeywords, matchKeywords } from '../matcher/keywordMatcher';
import { presentSections, type CanonicalSection } from '../matcher/sections';
import { handleEncoding, tokenize } from '../matcher/textNormalizer';
import { ACTION_VERBS } from '../matcher/vocabulary';
import { GenerationLogger } from '../logging/logger';
import { RegexKeywordExtractor } from './keywordExtractor';

export const DEFAULT_CATEGORY_WEIGHTS: CategoryWeights = {
  format: 20,
  keywords: 30,
  sections: 20,
  contact: 15,
  readability: 15
};

export const DEFAULT_TOTAL_POINTS = 100;

const SCORED_SECTIONS: readonly CanonicalSection[] = ['experience', 'education', 'skills', 'summary'];

const SPECIAL_CHAR_LIMIT = 50;
const ACRONYM_DENSITY_LIMIT = 0.08;
const ACTION_VERB_RATIO = 0.5;

const EMAIL = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const EMAIL_LIKE = /\S+@\S+/;
const PHONE = /(?<!\d)(?:\+?\d{1,3}[\s.-]?)?(?:\(\d{3}\)|\d{3})[\s.-]?\d{3}[\s.-]?\d{4}(?!\d)/;
const PHONE_LABEL = /\b(?:phone|tel|mobile|cell)\b\s*:?\s*([+\d().\s-]{4,})/i;
const PROFESSIONAL_LINK = /\b(?:linkedin\.com|github\.com|gitlab\.com)\//i;

const TABLE = /^\s*\|.*\|.*\|\s*$|\\begin\{tabular\}|<table\b/im;
const IMAGE = /!\[[^\]]*\]\([^)]*\)|\\includegraphics|<img\b/i;
const SPECIAL_CHAR = /[^A-Za-z0-9\s\-.,@()#/:;%$+&'"!?]/g;

const BULLET = /^\s*(?:[-*+•]|\\item|\d+[.)])\s+(.+)$/;
const METRIC =
  /\d+(?:\.\d+)?\s*(?:%|percent\b|x\b|k\b|m\b|\+)|\$\s?\d|\d+\s*(?:users|customers|clients|projects|engineers|people|requests|ms|hours|days|weeks|teams|services|million|billion)\b/i;
const ACRONYM = /(?<![A-Za-z0-9])[A-Z]{2,}(?![A-Za-z0-9])/g;

/**
 * Remove Markdown and LaTeX markup so only the readable text is measured
 */
export function stripMarkup(text: string): string {
  return handleEncoding(text)
    .replace(/\\[a-zA-Z]+\*?(?:\[[^\]]*\])?/g, ' ')
    .replace(/[{}]/g, ' ')
    .replace(/^\s*#{1,6}\s+/gm, '')
    .replace(/\[([^\]]*)\]\(([^)]*)\)/g, '$1 $2')
    .replace(/\*\*|__|`/g, '')
    .replace(/^\s*[-*+•]\s+/gm, '');
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function scoreBand(percentage: number): ScoreBand {
  if (percentage >= 85) return 'excellent';
  if (percentage >= 70) return 'good';
  if (percentage >= 50) return 'fair';
  return 'poor';
}

const BAND_SUMMARIES: Record<ScoreBand, string> = {
  excellent: 'Excellent: the document is highly ATS-optimized.',
  good: 'Good: the document is ATS-friendly with room for improvement.',
  fair: 'Fair: some optimization is needed for ATS compatibility.',
  poor: 'Poor: the document needs significant ATS optimization.'
};

interface CategoryOutcome {
  /** Fraction of the category's points earned */
  fraction: number;
  details: string[];
  /** Remediations with the fraction of the category each would recover */
  fixes: Array<{ message: string; fraction: number }>;
}

export interface ATSScorerOptions {
  totalPoints?: number;
  weights?: CategoryWeights;
}

export class ATSScorer {
  private readonly totalPoints: number;
  private readonly defaultWeights: CategoryWeights;

  constructor(
    private readonly extractor: KeywordExtractor = new RegexKeywordExtractor(),
    options: ATSScorerOptions = {}
  ) {
    this.totalPoints = options.totalPoints ?? DEFAULT_TOTAL_POINTS;
    this.defaultWeights = options.weights ?? DEFAULT_CATEGORY_WEIGHTS;
    this.validateWeights(this.defaultWeights);
  }

  /**
   * @throws ConfigurationError when weights are negative or do not sum to the total
   */
  validateWeights(weights: CategoryWeights): void {
    for (const category of ATS_CATEGORIES) {
      const weight = weights[category];
      if (!Number.isFinite(weight) || weight < 0) {
        throw new ConfigurationError(`categoryWeights.${category}`, `must be a non-negative number, got ${weight}`);
      }
    }
    const sum = ATS_CATEGORIES.reduce((acc, category) => acc + weights[category], 0);
    if (Math.abs(sum - this.totalPoints) > 1e-9) {
      throw new ConfigurationError('categoryWeights', `weights sum to ${sum}, expected ${this.totalPoints}`);
    }
  }

  async score(
    renderedDocument: string,
    jobDescription: string,
    categoryWeights?: CategoryWeights
  ): Promise<ScoreReport> {
    const weights = categoryWeights ?? this.defaultWeights;
    this.validateWeights(weights);

    const keywords = distinctKeywords(await this.extractor.extract(jobDescription));
    const match = matchKeywords(renderedDocument, keywords);
    const matched = new Set(match.matchedKeywords);
    const missingKeywords = keywords.filter(k => !matched.has(k));

    const outcomes: Record<ATSCategory, CategoryOutcome> = {
      format: this.checkFormat(renderedDocument),
      keywords: this.checkKeywords(keywords.length, match.matchedKeywords, missingKeywords),
      sections: this.checkSections(renderedDocument),
      contact: this.checkContact(renderedDocument),
      readability: this.checkReadability(renderedDocument)
    };

    const categories: CategoryScore[] = [];
    const suggestions: Suggestion[] = [];
    for (const category of ATS_CATEGORIES) {
      const max = weights[category];
      const outcome = outcomes[category];
      const fraction = Math.min(1, Math.max(0, outcome.fraction));
      categories.push({
        category,
        score: Math.min(max, Math.max(0, Math.round(max * fraction))),
        max,
        details: outcome.details
      });
      for (const fix of outcome.fixes) {
        suggestions.push({ category, message: fix.message, recoverablePoints: round2(max * fix.fraction) });
      }
    }

    // Array.prototype.sort is stable, so ties keep category order
    suggestions.sort((a, b) => b.recoverablePoints - a.recoverablePoints);

    const total = categories.reduce((acc, c) => acc + c.score, 0);
    const percentage = this.totalPoints === 0 ? 0 : (total / this.totalPoints) * 100;
    const band = scoreBand(percentage);

    const report: ScoreReport = {
      total,
      maxTotal: this.totalPoints,
      band,
      summary: BAND_SUMMARIES[band],
      categories,
      matchedKeywords: match.matchedKeywords,
      missingKeywords,
      suggestions,
      extractor: this.extractor.name
    };

    GenerationLogger.logScoring(report);
    return report;
  }

  private checkFormat(document: string): CategoryOutcome {
    const details: string[] = [];
    const fixes: CategoryOutcome['fixes'] = [];
    let fraction = 1;

    if (TABLE.test(document)) {
      fraction -= 0.5;
      details.push('Tables detected (may not parse)');
      fixes.push({ message: 'Replace tables with simple lists', fraction: 0.5 });
    } else {
      details.push('No tables detected');
    }

    if (IMAGE.test(document)) {
      fraction -= 0.5;
      details.push('Embedded images detected (not text-extractable)');
      fixes.push({ message: 'Remove embedded images', fraction: 0.5 });
    }

    const specialChars = stripMarkup(document).match(SPECIAL_CHAR)?.length ?? 0;
    if (specialChars > SPECIAL_CHAR_LIMIT) {
      fraction -= 0.25;
      details.push(`${specialChars} special characters`);
      fixes.push({ message: 'Reduce special characters for cleaner parsing', fraction: 0.25 });
    } else {
      details.push('Minimal special characters');
    }

    return { fraction: Math.max(0, fraction), details, fixes };
  }

  private checkKeywords(total: number, matchedKeywords: string[], missingKeywords: string[]): CategoryOutcome {
    if (total === 0) {
      return { fraction: 1, details: ['No job keywords to match'], fixes: [] };
    }

    const details = [`Job keywords: ${total}`, `Matched: ${matchedKeywords.length}`];
    const fixes: CategoryOutcome['fixes'] = [];
    if (missingKeywords.length > 0) {
      details.push(`Missing: ${missingKeywords.join(', ')}`);
      fixes.push({
        message: `Add these keywords where truthful: ${missingKeywords.slice(0, 5).join(', ')}`,
        fraction: missingKeywords.length / total
      });
    }

    return { fraction: matchedKeywords.length / total, details, fixes };
  }

  private checkSections(document: string): CategoryOutcome {
    const present = presentSections(document);
    const details: string[] = [];
    const fixes: CategoryOutcome['fixes'] = [];
    const share = 1 / SCORED_SECTIONS.length;

    for (const section of SCORED_SECTIONS) {
      if (present.has(section)) {
        details.push(`${section} section present`);
      } else {
        fixes.push({ message: `Add a ${section} section with a standard heading`, fraction: share });
      }
    }

    return { fraction: (SCORED_SECTIONS.length - fixes.length) * share, details, fixes };
  }

  private checkContact(document: string): CategoryOutcome {
    const details: string[] = [];
    const fixes: CategoryOutcome['fixes'] = [];
    let fraction = 0;

    if (EMAIL.test(document)) {
      fraction += 0.4;
      details.push('Email present and valid');
    } else if (EMAIL_LIKE.test(document)) {
      fixes.push({ message: 'Fix the email address format', fraction: 0.4 });
    } else {
      fixes.push({ message: 'Add an email address', fraction: 0.4 });
    }

    const labelled = PHONE_LABEL.exec(document);
    if (PHONE.test(document)) {
      fraction += 0.4;
      details.push('Phone present and valid');
    } else if (labelled && /\d/.test(labelled[1])) {
      fixes.push({ message: 'Fix the phone number format', fraction: 0.4 });
    } else {
      fixes.push({ message: 'Add a phone number', fraction: 0.4 });
    }

    if (PROFESSIONAL_LINK.test(document)) {
      fraction += 0.2;
      details.push('Professional profile link present');
    } else {
      fixes.push({ message: 'Add a LinkedIn or GitHub profile link', fraction: 0.2 });
    }

    return { fraction, details, fixes };
  }

  private checkReadability(document: string): CategoryOutcome {
    const details: string[] = [];
    const fixes: CategoryOutcome['fixes'] = [];
    let fraction = 0;

    const bullets = document
      .split('\n')
      .map(line => BULLET.exec(line)?.[1])
      .filter((text): text is string => text !== undefined);
    const actionLed = bullets.filter(text => {
      const first = tokenize(stripMarkup(text))[0];
      return first !== undefined && ACTION_VERBS.has(first.toLowerCase());
    }).length;

    if (bullets.length > 0 && actionLed / bullets.length >= ACTION_VERB_RATIO) {
      fraction += 0.4;
      details.push(`${actionLed} of ${bullets.length} bullets start with an action verb`);
    } else if (bullets.length === 0) {
      fixes.push({ message: 'Use bullet points that start with action verbs', fraction: 0.4 });
    } else {
      fixes.push({ message: 'Start more bullets with action verbs (e.g. built, led, reduced)', fraction: 0.4 });
    }

    if (METRIC.test(document)) {
      fraction += 0.3;
      details.push('Quantified achievements present');
    } else {
      fixes.push({ message: "Add quantified metrics (e.g. 'cut latency by 30%')", fraction: 0.3 });
    }

    const plain = stripMarkup(document);
    const words = tokenize(plain).length;
    const acronyms = plain.match(ACRONYM)?.length ?? 0;
    const density = words === 0 ? 0 : acronyms / words;
    if (density <= ACRONYM_DENSITY_LIMIT) {
      fraction += 0.3;
      details.push(`Acronym density ${(density * 100).toFixed(1)}%`);
    } else {
      fixes.push({ message: 'Spell out acronyms or use fewer of them', fraction: 0.3 });
    }

    return { fraction, details, fixes };
  }
}
