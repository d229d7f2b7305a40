/**
 * Generation Prompts
 *
 * Instruction text for AI candidate generation and keyword extraction, plus
 * cleanup of what the model sends back.
 */

import type { ContentSet, LetterTarget, OutputFormat } from '../types';

export const GENERATION_SYSTEM_PROMPT =
  'You are an expert resume writer. You tailor resumes to job descriptions by reordering and rephrasing existing material. You never invent experience, employers, skills, metrics or dates.';

export const COVER_LETTER_SYSTEM_PROMPT =
  'You are an expert cover letter writer. You write truthful, concise cover letters from a candidate\'s existing resume material. You never invent experience, employers, skills, metrics or dates.';

const FORMAT_NAMES: Record<OutputFormat, string> = {
  md: 'Markdown',
  tex: 'LaTeX',
  txt: 'plain text'
};

export interface GenerationPromptInput {
  contentSet: ContentSet;
  baseDocument: string;
  format: OutputFormat;
  jobDescription?: string;
  keywords: string[];
}

/**
 * Instruction for one AI candidate
 */
export function buildGenerationPrompt(input: GenerationPromptInput): string {
  const { contentSet, baseDocument, format, jobDescription, keywords } = input;
  const formatName = FORMAT_NAMES[format];

  return `Tailor the resume below for the target role.

SOURCE MATERIAL (the only facts you may use):
${JSON.stringify(contentSet, null, 2)}

BASE RESUME (${formatName}):
${baseDocument}

JOB DESCRIPTION:
${jobDescription?.trim() || 'Not provided. Tailor for the variant: ' + contentSet.variantDescription}

KEY REQUIREMENTS:
${keywords.length > 0 ? keywords.join(', ') : 'None identified'}

RULES:
1. Reorder and rephrase only. Never invent facts that are not in the source material.
2. Do not add employers, job titles, technologies, certifications or numbers that the source material does not contain.
3. Do not change dates, company names or job titles.
4. Keep every section of the base resume and keep the same ${formatName} structure.
5. Put the bullets most relevant to the key requirements first within each role.
6. Keep the length close to the base resume.

OUTPUT:
Return only the resume in ${formatName}. No introduction, no commentary, no code fences.`;
}

export interface CoverLetterPromptInput extends GenerationPromptInput {
  letter: LetterTarget;
}

/**
 * Instruction for one AI cover letter candidate
 */
export function buildCoverLetterPrompt(input: CoverLetterPromptInput): string {
  const { contentSet, baseDocument, format, jobDescription, keywords, letter } = input;
  const formatName = FORMAT_NAMES[format];

  return `Write a cover letter for the ${letter.position} role at ${letter.company}.

SOURCE MATERIAL (the only facts you may use about the candidate):
${JSON.stringify(contentSet, null, 2)}

DRAFT LETTER (${formatName}):
${baseDocument}

JOB DESCRIPTION:
${jobDescription?.trim() || 'Not provided. Write for the variant: ' + contentSet.variantDescription}

KEY REQUIREMENTS:
${keywords.length > 0 ? keywords.join(', ') : 'None identified'}

RULES:
1. Open with a paragraph naming the ${letter.position} role and ${letter.company}.
2. Summarize the most relevant experience in two or three sentences.
3. Highlight three or four achievements from the source material that match the key requirements.
4. Do not add employers, job titles, technologies, certifications or numbers that the source material does not contain.
5. Keep the greeting, the closing and the candidate's name from the draft letter.
6. Keep it under 400 words.

OUTPUT:
Return only the letter in ${formatName}. No introduction, no commentary, no code fences.`;
}

/**
 * Instruction for AI keyword extraction
 */
export function buildKeywordPrompt(jobDescription: string, maxKeywords: number): string {
  return `Extract the key technical skills, technologies, tools and qualifications from this job posting.

JOB DESCRIPTION:
${jobDescription}

INSTRUCTIONS:
- Extract specific technical skills, technologies, programming languages, frameworks and tools
- Include soft skills only when they are explicitly required
- Spell each keyword exactly as it appears in the job description
- Put the most important keywords first
- Return at most ${maxKeywords} keywords

Return a JSON object: {"keywords": ["keyword1", "keyword2"]}`;
}

const CODE_BLOCK = /```[A-Za-z]*[ \t]*\n([\s\S]*?)\n?```/;

const PREAMBLE = [
  /^(?:here(?:'s| is)|below is|the (?:customized|tailored|updated) (?:resume|cover letter))[^\n]*\n+/i,
  /^(?:sure|certainly|of course)[^\n]*\n+/i
];

const TRAILER = /\n+(?:let me know|i hope|feel free|note:)[^\n]*$/i;

/**
 * Strip code fences and chatty preambles from a model response
 */
export function cleanModelOutput(response: string): string {
  const fenced = CODE_BLOCK.exec(response);
  if (fenced && fenced[1].trim()) {
    return fenced[1].trim();
  }

  let cleaned = response.trim();
  for (let pass = 0; pass < 2; pass++) {
    for (const pattern of PREAMBLE) {
      cleaned = cleaned.replace(pattern, '');
    }
  }
  cleaned = cleaned.replace(TRAILER, '');

  return cleaned.trim() || response.trim();
}
