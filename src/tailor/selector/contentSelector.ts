/**
 * Content Selector
 *
 * Deterministically resolves which parts of a history document apply to a
 * variant and an optional set of job keywords. Bullets are chosen per
 * experience entry in precedence order until the variant's cap:
 *
 * 1. Bullets emphasized for the variant, in document order
 * 2. Bullets matching a variant or job keyword, by coverage descending
 * 3. The first unused bullets in document order
 *
 * The function is pure: identical inputs produce structurally identical
 * content sets.
 */

import type {
  Bullet,
  ContactInfo,
  ContentSet,
  ExperienceEntry,
  HistoryDocument,
  NormalizedContact,
  ProjectGroup,
  SelectedBullet,
  SelectedExperience,
  SkillEntry,
  SkillGroup,
  VariantConfig
} from '../types';
import { SelectionError } from '../errors/types';
import { containsKeyword, distinctKeywords, matchKeywords } from '../matcher/keywordMatcher';
import { normalizeText } from '../matcher/textNormalizer';

const VERSION_PREFIX = /^v\d+(?:\.\d+)*-/i;

/**
 * Names under which a variant may be referenced in `emphasizeFor`:
 * its id, its summary key, and its id without a version prefix
 * (`v1-backend` is also `backend`).
 */
export function variantKeys(variant: VariantConfig): Set<string> {
  const keys = new Set<string>();
  for (const key of [variant.id, variant.summaryKey, variant.id.replace(VERSION_PREFIX, '')]) {
    const normalized = key.trim().toLowerCase();
    if (normalized) keys.add(normalized);
  }
  return keys;
}

function isEmphasizedFor(emphasizeFor: string[] | undefined, keys: Set<string>): boolean {
  return (emphasizeFor ?? []).some(name => keys.has(name.trim().toLowerCase()));
}

function validateVariant(history: HistoryDocument, variant: VariantConfig): void {
  if (!variant.id.trim()) {
    throw new SelectionError('Variant id must not be empty');
  }
  if (!Number.isInteger(variant.maxBulletsPerEntry) || variant.maxBulletsPerEntry < 1) {
    throw new SelectionError(
      `maxBulletsPerEntry must be a positive integer, got ${variant.maxBulletsPerEntry}`,
      { variant: variant.id }
    );
  }
  for (const category of variant.skillCategories) {
    if (!Object.prototype.hasOwnProperty.call(history.skills, category)) {
      throw new SelectionError(`Skill category "${category}" is not present in the history document`, {
        variant: variant.id,
        category
      });
    }
  }
  const projects = history.projects ?? {};
  for (const category of variant.projectCategories ?? []) {
    if (!Object.prototype.hasOwnProperty.call(projects, category)) {
      throw new SelectionError(`Project category "${category}" is not present in the history document`, {
        variant: variant.id,
        category
      });
    }
  }
}

/**
 * Select up to `cap` bullets from one entry
 */
export function selectBullets(
  bullets: Bullet[],
  cap: number,
  keys: Set<string>,
  keywords: string[]
): SelectedBullet[] {
  const selected: SelectedBullet[] = [];
  const used = new Set<number>();

  const take = (index: number, reason: SelectedBullet['reason'], coverage: number): void => {
    const bullet = bullets[index];
    selected.push({
      text: bullet.text,
      skills: [...(bullet.skills ?? [])],
      reason,
      coverage,
      sourceIndex: index
    });
    used.add(index);
  };

  const coverages = bullets.map(bullet => matchKeywords(bullet.text, keywords).coverage);

  bullets.forEach((bullet, index) => {
    if (selected.length < cap && isEmphasizedFor(bullet.emphasizeFor, keys)) {
      take(index, 'emphasized', coverages[index]);
    }
  });

  const keywordMatches = bullets
    .map((_, index) => index)
    .filter(index => !used.has(index) && coverages[index] > 0)
    .sort((a, b) => coverages[b] - coverages[a] || a - b);
  for (const index of keywordMatches) {
    if (selected.length >= cap) break;
    take(index, 'keyword', coverages[index]);
  }

  for (let index = 0; index < bullets.length && selected.length < cap; index++) {
    if (!used.has(index)) {
      take(index, 'fill', coverages[index]);
    }
  }

  return selected;
}

function selectExperience(
  entry: ExperienceEntry,
  cap: number,
  keys: Set<string>,
  keywords: string[]
): SelectedExperience {
  return {
    company: entry.company,
    title: entry.title,
    location: entry.location ?? null,
    start: entry.start,
    end: entry.end,
    bullets: selectBullets(entry.bullets, cap, keys, keywords),
    totalBullets: entry.bullets.length
  };
}

function skillName(entry: SkillEntry): string {
  return typeof entry === 'string' ? entry : entry.name;
}

/**
 * Skills for the variant's categories, in the variant's order. Restricted
 * entries survive only when they name the variant; entries matching a job
 * keyword move to the front of their category.
 */
export function selectSkills(
  history: HistoryDocument,
  variant: VariantConfig,
  keys: Set<string>,
  jobKeywords: string[]
): SkillGroup[] {
  return variant.skillCategories.map(category => {
    const entries = history.skills[category].filter(
      entry =>
        typeof entry === 'string' ||
        !entry.emphasizeFor ||
        entry.emphasizeFor.length === 0 ||
        isEmphasizedFor(entry.emphasizeFor, keys)
    );
    const names = entries.map(skillName);

    const prioritized: string[] = [];
    const rest: string[] = [];
    for (const name of names) {
      const normalized = normalizeText(name);
      const matchesJob = jobKeywords.some(keyword => containsKeyword(normalized, keyword));
      (matchesJob ? prioritized : rest).push(name);
    }

    return { category, skills: [...prioritized, ...rest] };
  });
}

function selectProjects(history: HistoryDocument, variant: VariantConfig): ProjectGroup[] {
  const projects = history.projects ?? {};
  const categories = variant.projectCategories ?? Object.keys(projects);
  return categories.map(category => ({
    category,
    items: projects[category].map(item => structuredClone(item))
  }));
}

export function normalizeContact(contact: ContactInfo): NormalizedContact {
  return {
    name: contact.name.trim(),
    email: contact.email?.trim() || null,
    phone: contact.phone?.trim() || null,
    location: contact.location?.trim() || null,
    links: (contact.links ?? []).map(link => ({ label: link.label, url: link.url }))
  };
}

/**
 * Resolve the summary for a variant, falling back to the base summary
 */
export function resolveSummary(history: HistoryDocument, variant: VariantConfig): string {
  const override = history.summary.variants?.[variant.summaryKey];
  return override !== undefined && override.trim() !== '' ? override : history.summary.base;
}

/**
 * Select the content for one variant and job.
 *
 * @throws SelectionError when the variant references categories the history
 * does not have, or its cap or id is invalid
 */
export function selectContent(
  history: HistoryDocument,
  variant: VariantConfig,
  jobKeywords: string[] = []
): ContentSet {
  validateVariant(history, variant);

  const keys = variantKeys(variant);
  const job = distinctKeywords(jobKeywords);
  const keywords = distinctKeywords([...variant.emphasizeKeywords, ...job]);

  return {
    variantId: variant.id,
    variantDescription: variant.description,
    contact: normalizeContact(history.contact),
    summary: resolveSummary(history, variant),
    skills: selectSkills(history, variant, keys, job),
    experience: history.experience.map(entry =>
      selectExperience(entry, variant.maxBulletsPerEntry, keys, keywords)
    ),
    education: (history.education ?? []).map(item => structuredClone(item)),
    certifications: (history.certifications ?? []).map(item => structuredClone(item)),
    projects: selectProjects(history, variant),
    keywords
  };
}

/**
 * Freeze a content set so concurrent candidate tasks can share it. Only
 * objects owned by the content set are reached, since `selectContent` copies
 * everything it takes from the history.
 */
export function freezeContentSet(contentSet: ContentSet): Readonly<ContentSet> {
  const freeze = (value: unknown): void => {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      Object.freeze(value);
      for (const child of Object.values(value)) {
        freeze(child);
      }
    }
  };
  freeze(contentSet);
  return contentSet;
}

/**
 * Plain text of everything in a content set, used as the truth corpus
 */
export function contentSetText(contentSet: ContentSet): string {
  const parts: string[] = [
    contentSet.contact.name,
    contentSet.contact.email ?? '',
    contentSet.contact.location ?? '',
    ...contentSet.contact.links.flatMap(link => [link.label, link.url]),
    contentSet.summary,
    ...contentSet.skills.flatMap(group => [group.category, ...group.skills]),
    ...contentSet.experience.flatMap(entry => [
      entry.company,
      entry.title,
      entry.location ?? '',
      ...entry.bullets.flatMap(bullet => [bullet.text, ...bullet.skills])
    ])
  ];

  const collect = (value: unknown): void => {
    if (typeof value === 'string') {
      parts.push(value);
    } else if (Array.isArray(value)) {
      value.forEach(collect);
    } else if (value !== null && typeof value === 'object') {
      Object.values(value).forEach(collect);
    }
  };
  collect(contentSet.education);
  collect(contentSet.certifications);
  collect(contentSet.projects);

  return parts.filter(Boolean).join('\n');
}
