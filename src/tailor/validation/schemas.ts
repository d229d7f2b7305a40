/**
 * Validation Schemas
 *
 * Zod schemas for the history document, variant configuration and
 * generation configuration.
 */

import { z } from 'zod';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * Sortable month number for `YYYY`, `YYYY-MM`, `YYYY-MM-DD`, `MM/YYYY` or
 * `Mon YYYY`; null when the period is free text
 */
export function periodOrdinal(period: string): number | null {
  const text = period.trim().toLowerCase();

  const iso = /^(\d{4})(?:-(\d{1,2})(?:-\d{1,2})?)?$/.exec(text);
  if (iso) return Number(iso[1]) * 12 + (iso[2] ? Number(iso[2]) - 1 : 0);

  const slash = /^(\d{1,2})\/(\d{4})$/.exec(text);
  if (slash) return Number(slash[2]) * 12 + Number(slash[1]) - 1;

  const named = /^([a-z]{3})[a-z]*\.?\s+(\d{4})$/.exec(text);
  if (named && MONTHS.includes(named[1])) return Number(named[2]) * 12 + MONTHS.indexOf(named[1]);

  return null;
}

const NonEmptyString = z.string().trim().min(1, 'Cannot be empty or whitespace only');

export const ContactLinkSchema = z.object({
  label: NonEmptyString,
  url: NonEmptyString
});

export const ContactInfoSchema = z.object({
  name: NonEmptyString,
  email: z.string().optional(),
  phone: z.string().optional(),
  location: z.string().optional(),
  links: z.array(ContactLinkSchema).optional()
});

export const SummaryBlockSchema = z.object({
  base: z.string(),
  variants: z.record(z.string()).optional()
});

export const SkillEntrySchema = z.union([
  NonEmptyString,
  z.object({
    name: NonEmptyString,
    emphasizeFor: z.array(z.string()).optional()
  })
]);

export const BulletSchema = z.object({
  text: NonEmptyString,
  skills: z.array(z.string()).optional(),
  emphasizeFor: z.array(z.string()).optional()
});

export const ExperienceEntrySchema = z
  .object({
    company: NonEmptyString,
    title: NonEmptyString,
    location: z.string().optional(),
    start: NonEmptyString,
    end: z.string().nullable(),
    bullets: z.array(BulletSchema)
  })
  .refine(
    entry => {
      if (entry.end === null) return true;
      const start = periodOrdinal(entry.start);
      const end = periodOrdinal(entry.end);
      return start === null || end === null || start <= end;
    },
    { message: 'Start period must not be after end period', path: ['end'] }
  );

const OpaqueRecordSchema = z.record(z.unknown());

export const HistoryDocumentSchema = z.object({
  contact: ContactInfoSchema,
  summary: SummaryBlockSchema,
  skills: z.record(z.array(SkillEntrySchema)),
  experience: z.array(ExperienceEntrySchema),
  education: z.array(OpaqueRecordSchema).optional(),
  certifications: z.array(OpaqueRecordSchema).optional(),
  projects: z.record(z.array(OpaqueRecordSchema)).optional()
});

export const VariantConfigSchema = z.object({
  id: NonEmptyString,
  description: z.string(),
  summaryKey: z.string(),
  skillCategories: z.array(z.string()),
  maxBulletsPerEntry: z.number().int().min(1, 'Must be at least 1'),
  emphasizeKeywords: z.array(z.string()),
  projectCategories: z.array(z.string()).optional()
});

export const JudgeWeightsSchema = z
  .object({
    keywords: z.number().min(0),
    faithfulness: z.number().min(0),
    structure: z.number().min(0)
  })
  .refine(w => w.keywords + w.faithfulness + w.structure > 0, { message: 'Weights must have a positive sum' });

export const GenerationConfigSchema = z.object({
  numGenerations: z.number().int().min(1, 'Must be at least 1'),
  judgeEnabled: z.boolean(),
  fallbackOnFailure: z.boolean(),
  timeoutMs: z.number().int().positive(),
  concurrency: z.number().int().min(1, 'Must be at least 1'),
  template: NonEmptyString,
  format: z.enum(['md', 'tex', 'txt']),
  judgeWeights: JudgeWeightsSchema,
  judgeStrategy: z.enum(['select', 'merge']),
  temperature: z.number().min(0).max(2)
});
