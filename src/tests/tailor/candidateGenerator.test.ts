/**
 * Tests for single-candidate generation
 */

import { describe, it, expect } from 'vitest';
import { CandidateGenerator, resolveLetterTarget, toGenerationError } from '../../tailor/generation/candidateGenerator';
import { COVER_LETTER_SYSTEM_PROMPT, GENERATION_SYSTEM_PROMPT } from '../../tailor/generation/prompts';
import { Renderer } from '../../tailor/renderer/renderer';
import { selectContent } from '../../tailor/selector/contentSelector';
import {
  CapabilityUnavailableError,
  GenerationTimeout,
  TailorErrorCode,
  TemplateNotFoundError,
  TruthfulnessError
} from '../../tailor/errors/types';
import { LLMRequestError } from '../../shared/llm/types';
import { ScriptedCompletion, backendVariant, plainTemplates, sampleHistory } from './fixtures';

const contentSet = selectContent(sampleHistory(), backendVariant(), ['Terraform']);
const renderer = new Renderer(plainTemplates());
const baseDocument = renderer.render(contentSet, 'plain');

describe('CandidateGenerator', () => {
  describe('deterministic mode', () => {
    it('should return the rendered template', async () => {
      const candidate = await new CandidateGenerator(renderer).generate(contentSet, 'deterministic', {
        template: 'plain',
        index: 2
      });
      expect(candidate).toEqual({ text: baseDocument, index: 2, mode: 'deterministic', template: 'plain', format: 'md' });
    });
  });

  describe('ai mode', () => {
    it('should fail with CapabilityUnavailableError when no capability is configured', async () => {
      const generator = new CandidateGenerator(renderer);
      expect(generator.hasCapability).toBe(false);
      await expect(generator.generate(contentSet, 'ai', { template: 'plain' })).rejects.toBeInstanceOf(
        CapabilityUnavailableError
      );
    });

    it('should clean the model output and tag the candidate', async () => {
      const completion = new ScriptedCompletion([`Here is the tailored resume:\n\n${baseDocument}`]);
      const candidate = await new CandidateGenerator(renderer, completion).generate(contentSet, 'ai', {
        template: 'plain',
        index: 1
      });
      expect(candidate).toEqual({ text: baseDocument.trim(), index: 1, mode: 'ai', template: 'plain', format: 'md' });
    });

    it('should send an uncached request with the generation instructions', async () => {
      const completion = new ScriptedCompletion([baseDocument]);
      const controller = new AbortController();
      await new CandidateGenerator(renderer, completion).generate(contentSet, 'ai', {
        template: 'plain',
        jobDescription: 'Platform role using Terraform',
        timeoutMs: 5000,
        temperature: 0.3,
        signal: controller.signal
      });

      expect(completion.calls).toHaveLength(1);
      const [{ prompt, constraints }] = completion.calls;
      expect(constraints).toEqual({
        systemPrompt: GENERATION_SYSTEM_PROMPT,
        temperature: 0.3,
        timeoutMs: 5000,
        signal: controller.signal,
        cacheable: false
      });
      expect(prompt).toContain('JOB DESCRIPTION:\nPlatform role using Terraform');
      expect(prompt).toContain('KEY REQUIREMENTS:\nKubernetes, Terraform');
    });

    it('should reject output that invents facts', async () => {
      const completion = new ScriptedCompletion([`${baseDocument}\n- Led Rust rewrite at Initech`]);
      const error = await new CandidateGenerator(renderer, completion)
        .generate(contentSet, 'ai', { template: 'plain' })
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(TruthfulnessError);
      expect(error).toMatchObject({ unsupportedTerms: ['Rust', 'Initech'] });
    });

    describe('with the bundled templates', () => {
      const bundled = new Renderer();

      it('should reject a renamed company in the minimal template', async () => {
        const base = bundled.render(contentSet, 'minimal');
        expect(base).toContain('**Northwind Labs** Senior Engineer');

        const completion = new ScriptedCompletion([base.replace('**Northwind Labs**', '**Initech**')]);
        const error = await new CandidateGenerator(bundled, completion)
          .generate(contentSet, 'ai', { template: 'minimal' })
          .catch((e: unknown) => e);
        expect(error).toBeInstanceOf(TruthfulnessError);
        expect(error).toMatchObject({ unsupportedTerms: ['Initech'] });
      });

      it('should reject an inflated job title in the base template', async () => {
        const base = bundled.render(contentSet, 'base');
        expect(base).toContain('### Senior Engineer, Northwind Labs');

        const completion = new ScriptedCompletion([
          base.replace('### Senior Engineer, Northwind Labs', '### Principal Engineer, Northwind Labs')
        ]);
        const error = await new CandidateGenerator(bundled, completion)
          .generate(contentSet, 'ai', { template: 'base' })
          .catch((e: unknown) => e);
        expect(error).toBeInstanceOf(TruthfulnessError);
        expect(error).toMatchObject({ unsupportedTerms: ['Principal'] });
      });

      it('should accept the base render returned unchanged', async () => {
        const base = bundled.render(contentSet, 'base');
        const candidate = await new CandidateGenerator(bundled, new ScriptedCompletion([base])).generate(
          contentSet,
          'ai',
          { template: 'base' }
        );
        expect(candidate.text).toBe(base.trim());
      });
    });

    it('should classify capability failures', async () => {
      const cases: Array<[Error, TailorErrorCode]> = [
        [new LLMRequestError('timeout', 'timed out'), TailorErrorCode.GENERATION_TIMEOUT],
        [new LLMRequestError('rate-limited', 'slow down', 429), TailorErrorCode.GENERATION_RATE_LIMITED],
        [new LLMRequestError('provider', 'bad gateway', 502), TailorErrorCode.GENERATION_PROVIDER_ERROR],
        [new Error('socket hang up'), TailorErrorCode.GENERATION_PROVIDER_ERROR]
      ];

      for (const [failure, code] of cases) {
        const generator = new CandidateGenerator(renderer, new ScriptedCompletion([failure]));
        await expect(generator.generate(contentSet, 'ai', { template: 'plain' })).rejects.toMatchObject({ code });
      }
    });

    it('should let template errors through before calling the capability', async () => {
      const completion = new ScriptedCompletion([baseDocument]);
      await expect(
        new CandidateGenerator(renderer, completion).generate(contentSet, 'ai', { template: 'missing' })
      ).rejects.toBeInstanceOf(TemplateNotFoundError);
      expect(completion.calls).toHaveLength(0);
    });
  });

  describe('cover letters', () => {
    const bundled = new Renderer();
    const target = { company: 'Globex', position: 'Platform Engineer' };
    const letter = bundled.render(contentSet, 'cover-letter', 'md', target);

    it('should render the letter deterministically for the target', async () => {
      const candidate = await new CandidateGenerator(bundled).generate(contentSet, 'deterministic', {
        template: 'cover-letter',
        document: 'cover-letter',
        letter: target
      });
      expect(candidate.text).toBe(letter);
    });

    it('should ask for a letter and accept the target company', async () => {
      const completion = new ScriptedCompletion([letter.replace('I work with', 'I currently work with')]);
      const candidate = await new CandidateGenerator(bundled, completion).generate(contentSet, 'ai', {
        template: 'cover-letter',
        document: 'cover-letter',
        letter: target
      });

      expect(candidate.text).toContain('I currently work with TypeScript');
      const [{ prompt, constraints }] = completion.calls;
      expect(constraints.systemPrompt).toBe(COVER_LETTER_SYSTEM_PROMPT);
      expect(prompt).toContain('Write a cover letter for the Platform Engineer role at Globex.');
      expect(prompt).toContain('DRAFT LETTER (Markdown):\n**Jordan Avery**');
    });

    it('should reject a letter addressed to another company', async () => {
      const completion = new ScriptedCompletion([letter.replace('Dear hiring team at Globex', 'Dear hiring team at Initech')]);
      const error = await new CandidateGenerator(bundled, completion)
        .generate(contentSet, 'ai', { template: 'cover-letter', document: 'cover-letter', letter: target })
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(TruthfulnessError);
      expect(error).toMatchObject({ unsupportedTerms: ['Initech'] });
    });

    it('should fill in generic wording for a missing target', () => {
      expect(resolveLetterTarget()).toEqual({ company: 'the company', position: 'the open position' });
      expect(resolveLetterTarget({ company: ' Globex ', position: '' })).toEqual({
        company: 'Globex',
        position: 'the open position'
      });
    });
  });

  describe('toGenerationError', () => {
    it('should keep errors that are already classified', () => {
      const timeout = new GenerationTimeout(100);
      expect(toGenerationError(timeout, 100)).toBe(timeout);
    });

    it('should carry the provider status', () => {
      expect(toGenerationError(new LLMRequestError('provider', 'boom', 500), 100)).toMatchObject({
        code: TailorErrorCode.GENERATION_PROVIDER_ERROR,
        context: { status: 500 }
      });
      expect(toGenerationError('text', 100)).toMatchObject({ technicalDetails: expect.stringContaining('text') });
    });
  });
});
