/**
 * Tests for the generation orchestrator state machine
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { GenerationOrchestrator, StateTrace } from '../../tailor/generation/orchestrator';
import { Renderer } from '../../tailor/renderer/renderer';
import { Judge } from '../../tailor/judge/judge';
import { selectContent } from '../../tailor/selector/contentSelector';
import { GenerationLogger, LogType } from '../../tailor/logging/logger';
import {
  AllCandidatesFailedError,
  CapabilityUnavailableError,
  ConfigurationError,
  SelectionError,
  TailorErrorCode,
  TemplateNotFoundError
} from '../../tailor/errors/types';
import type {
  GenerationConfig,
  GenerationDone,
  GenerationOutcome,
  GenerationRequest,
  KeywordExtractor,
  OrchestratorState
} from '../../tailor/types';
import type { TextCompletion } from '../../shared/llm/types';
import { ScriptedCompletion, backendVariant, delayed, plainTemplates, sampleHistory } from './fixtures';

const JOB_KEYWORDS = ['TypeScript', 'Go', 'Python', 'Kubernetes', 'Terraform'];

/**
 * A candidate that only restates source material, listing the given skills
 */
function candidateText(skills: string[]): string {
  return [
    '## Summary',
    'Backend engineer focused on distributed services.',
    '',
    '## Skills',
    `- ${skills.join(', ')}`,
    '',
    '## Experience',
    '### Northwind Labs'
  ].join('\n');
}

// Keyword coverage 0.4, 0.8 and 0.6 against JOB_KEYWORDS
const WEAK = candidateText(['TypeScript', 'Kubernetes']);
const STRONG = candidateText(['TypeScript', 'Go', 'Python', 'Kubernetes']);
const MEDIUM = candidateText(['TypeScript', 'Python', 'Kubernetes']);

const renderer = new Renderer(plainTemplates());

function orchestrator(
  config: Partial<GenerationConfig> = {},
  completion: TextCompletion | null = null,
  extra: { judge?: Judge; extractor?: KeywordExtractor } = {}
): GenerationOrchestrator {
  return new GenerationOrchestrator(
    { template: 'plain', ...config },
    { renderer, completion, createRunId: () => 'run-1', ...extra }
  );
}

function request(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return { history: sampleHistory(), variant: backendVariant(), mode: 'ai', ...overrides };
}

function expectDone(outcome: GenerationOutcome): GenerationDone {
  if (outcome.status !== 'done') {
    throw new Error(`Expected a completed run, got ${outcome.status}`);
  }
  return outcome;
}

function states(outcome: GenerationOutcome): OrchestratorState[] {
  const transitions = outcome.status === 'done' ? outcome.metadata.transitions : outcome.transitions;
  return transitions.map(t => t.to);
}

describe('GenerationOrchestrator', () => {
  beforeEach(() => {
    GenerationLogger.clearLogs();
  });

  describe('deterministic mode', () => {
    it('should render the selected content without calling the capability', async () => {
      const completion = new ScriptedCompletion([STRONG]);
      const outcome = expectDone(await orchestrator({}, completion).run(request({ mode: 'deterministic' })));

      const expected = renderer.render(selectContent(sampleHistory(), backendVariant(), []), 'plain');
      expect(outcome.candidate).toEqual({ text: expected, index: 0, mode: 'deterministic', template: 'plain', format: 'md' });
      expect(outcome.metadata).toMatchObject({
        mode: 'deterministic',
        degraded: false,
        candidateCount: 1,
        judgeScores: null,
        fallbackReason: null,
        failures: [],
        jobKeywords: []
      });
      expect(states(outcome)).toEqual(['selecting', 'generating', 'finalizing', 'done']);
      expect(completion.calls).toHaveLength(0);
    });

    it('should record the run in the generation log', async () => {
      await orchestrator().run(request({ mode: 'deterministic' }));
      const types = GenerationLogger.getLogsForRun('run-1').map(entry => entry.type);
      expect(types).toEqual([LogType.SELECTION, LogType.CANDIDATE, LogType.INFO]);
    });
  });

  describe('fallback', () => {
    it('should degrade to the deterministic render when no capability is configured', async () => {
      const outcome = expectDone(await orchestrator().run(request()));

      const expected = renderer.render(selectContent(sampleHistory(), backendVariant(), []), 'plain');
      expect(outcome.candidate.text).toBe(expected);
      expect(outcome.candidate.mode).toBe('deterministic');
      expect(outcome.metadata).toMatchObject({
        mode: 'fallback',
        degraded: true,
        candidateCount: 0,
        fallbackReason: { kind: 'capability-unavailable', failures: [] }
      });
      expect(states(outcome)).toEqual(['selecting', 'generating', 'fallback', 'finalizing', 'done']);
      expect(GenerationLogger.getLogsByType(LogType.FALLBACK)).toHaveLength(1);
    });

    it('should degrade when every candidate fails and keep the failures', async () => {
      const completion = new ScriptedCompletion([new Error('upstream 500')]);
      const outcome = expectDone(await orchestrator({}, completion).run(request({ jobKeywords: JOB_KEYWORDS })));

      expect(completion.calls).toHaveLength(3);
      const expected = renderer.render(selectContent(sampleHistory(), backendVariant(), JOB_KEYWORDS), 'plain');
      expect(outcome.candidate).toEqual({ text: expected, index: 0, mode: 'deterministic', template: 'plain', format: 'md' });
      expect(outcome.metadata.mode).toBe('fallback');
      expect(outcome.metadata.fallbackReason?.kind).toBe('all-candidates-failed');
      expect(outcome.metadata.failures.map(f => [f.index, f.code])).toEqual([
        [0, TailorErrorCode.GENERATION_PROVIDER_ERROR],
        [1, TailorErrorCode.GENERATION_PROVIDER_ERROR],
        [2, TailorErrorCode.GENERATION_PROVIDER_ERROR]
      ]);
    });

    it('should never hand the judge an empty candidate list', async () => {
      for (const strategy of ['select', 'merge'] as const) {
        const judge = new Judge();
        const select = vi.spyOn(judge, 'select');
        const merge = vi.spyOn(judge, 'merge');
        const failing = new ScriptedCompletion([new Error('upstream 500')]);

        const allFailed = expectDone(
          await orchestrator({ judgeStrategy: strategy }, failing, { judge }).run(request({ jobKeywords: JOB_KEYWORDS }))
        );
        const unavailable = expectDone(
          await orchestrator({ judgeStrategy: strategy }, null, { judge }).run(request({ jobKeywords: JOB_KEYWORDS }))
        );

        expect(allFailed.metadata.fallbackReason?.kind).toBe('all-candidates-failed');
        expect(unavailable.metadata.fallbackReason?.kind).toBe('capability-unavailable');
        expect(select).not.toHaveBeenCalled();
        expect(merge).not.toHaveBeenCalled();
      }
    });

    it('should fail with CapabilityUnavailableError when fallback is disabled', async () => {
      const outcome = await orchestrator({ fallbackOnFailure: false }).run(request());

      expect(outcome.status).toBe('failed');
      if (outcome.status === 'failed') {
        expect(outcome.error).toBeInstanceOf(CapabilityUnavailableError);
      }
      expect(states(outcome)).toEqual(['selecting', 'generating', 'failed']);
    });

    it('should fail with AllCandidatesFailedError when fallback is disabled', async () => {
      const completion = new ScriptedCompletion([new Error('upstream 500')]);
      const outcome = await orchestrator({ fallbackOnFailure: false, numGenerations: 2 }, completion).run(request());

      expect(outcome.status).toBe('failed');
      if (outcome.status === 'failed') {
        expect(outcome.error).toBeInstanceOf(AllCandidatesFailedError);
        expect(outcome.error).toMatchObject({
          codes: [TailorErrorCode.GENERATION_PROVIDER_ERROR, TailorErrorCode.GENERATION_PROVIDER_ERROR]
        });
        expect(outcome.failures).toHaveLength(2);
      }
    });
  });

  describe('ai mode with judging', () => {
    it('should pick the candidate with the best keyword coverage', async () => {
      const completion = new ScriptedCompletion([WEAK, STRONG, MEDIUM]);
      const outcome = expectDone(await orchestrator({}, completion).run(request({ jobKeywords: JOB_KEYWORDS })));

      expect(outcome.candidate.index).toBe(1);
      expect(outcome.candidate.text).toBe(STRONG);
      expect(outcome.metadata.mode).toBe('ai');
      expect(outcome.metadata.degraded).toBe(false);
      expect(outcome.metadata.candidateCount).toBe(3);
      expect(outcome.metadata.judgeScores?.map(s => s.keywordCoverage)).toEqual([0.4, 0.8, 0.6]);
      expect(outcome.metadata.jobKeywords).toEqual(JOB_KEYWORDS);
      expect(states(outcome)).toEqual(['selecting', 'generating', 'judging', 'finalizing', 'done']);
    });

    it('should keep generation indices when candidates finish out of order', async () => {
      const texts = [WEAK, STRONG, MEDIUM];
      const waits = [30, 5, 15];
      let call = 0;
      const completion = new ScriptedCompletion([
        (_prompt, constraints) => {
          const i = call++;
          return delayed(texts[i], waits[i], constraints.signal);
        }
      ]);

      const outcome = expectDone(await orchestrator({}, completion).run(request({ jobKeywords: JOB_KEYWORDS })));
      expect(outcome.candidate.index).toBe(1);
      expect(outcome.metadata.judgeScores?.map(s => s.index)).toEqual([0, 1, 2]);
    });

    it('should break ties in favour of the lowest index', async () => {
      const completion = new ScriptedCompletion([MEDIUM]);
      const outcome = expectDone(await orchestrator({}, completion).run(request({ jobKeywords: JOB_KEYWORDS })));
      expect(outcome.candidate.index).toBe(0);
    });

    it('should judge the survivors of a partial failure', async () => {
      const completion = new ScriptedCompletion([WEAK, new Error('upstream 500'), MEDIUM]);
      const outcome = expectDone(await orchestrator({}, completion).run(request({ jobKeywords: JOB_KEYWORDS })));

      expect(outcome.candidate.index).toBe(2);
      expect(outcome.metadata.candidateCount).toBe(2);
      expect(outcome.metadata.failures).toEqual([
        { index: 1, code: TailorErrorCode.GENERATION_PROVIDER_ERROR, message: 'upstream 500' }
      ]);
    });

    it('should skip the judge when only one candidate survives', async () => {
      const judge = new Judge();
      const select = vi.spyOn(judge, 'select');
      const completion = new ScriptedCompletion([new Error('upstream 500'), STRONG, new Error('upstream 500')]);
      const outcome = expectDone(
        await orchestrator({}, completion, { judge }).run(request({ jobKeywords: JOB_KEYWORDS }))
      );

      expect(select).not.toHaveBeenCalled();
      expect(outcome.candidate.index).toBe(1);
      expect(outcome.metadata.judgeScores).toBeNull();
      expect(states(outcome)).toEqual(['selecting', 'generating', 'finalizing', 'done']);
    });

    it('should generate a single candidate when judging is disabled', async () => {
      const completion = new ScriptedCompletion([STRONG]);
      const outcome = expectDone(
        await orchestrator({ judgeEnabled: false }, completion).run(request({ jobKeywords: JOB_KEYWORDS }))
      );
      expect(completion.calls).toHaveLength(1);
      expect(outcome.metadata.candidateCount).toBe(1);
      expect(outcome.metadata.judgeScores).toBeNull();
    });

    it('should keep finished candidates when the run times out', async () => {
      const texts = [MEDIUM, STRONG, STRONG];
      const waits = [5, 1000, 1000];
      let call = 0;
      const completion = new ScriptedCompletion([
        (_prompt, constraints) => {
          const i = call++;
          return delayed(texts[i], waits[i], constraints.signal);
        }
      ]);

      const outcome = expectDone(
        await orchestrator({ timeoutMs: 50 }, completion).run(request({ jobKeywords: JOB_KEYWORDS }))
      );
      expect(outcome.candidate.index).toBe(0);
      expect(outcome.metadata.degraded).toBe(false);
      expect(outcome.metadata.failures.map(f => [f.index, f.code])).toEqual([
        [1, TailorErrorCode.GENERATION_TIMEOUT],
        [2, TailorErrorCode.GENERATION_TIMEOUT]
      ]);
    });
  });

  describe('cover letters', () => {
    const bundled = new Renderer();
    const target = { company: 'Globex', position: 'Platform Engineer' };
    const letter = bundled.render(
      selectContent(sampleHistory(), backendVariant(), JOB_KEYWORDS),
      'cover-letter',
      'md',
      target
    );

    function letters(completion: TextCompletion | null, extra: { judge?: Judge; letterJudge?: Judge } = {}) {
      return new GenerationOrchestrator({}, { renderer: bundled, completion, createRunId: () => 'run-1', ...extra });
    }

    function letterRequest(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
      return request({ document: 'cover-letter', letter: target, jobKeywords: JOB_KEYWORDS, ...overrides });
    }

    it('should render the cover-letter template deterministically', async () => {
      const outcome = expectDone(await letters(null).run(letterRequest({ mode: 'deterministic' })));
      expect(outcome.candidate).toEqual({ text: letter, index: 0, mode: 'deterministic', template: 'cover-letter', format: 'md' });
      expect(outcome.metadata.document).toBe('cover-letter');
    });

    it('should judge letter candidates with the letter judge', async () => {
      const judge = new Judge();
      const letterJudge = new Judge({ document: 'cover-letter' });
      const resumeSelect = vi.spyOn(judge, 'select');
      const letterSelect = vi.spyOn(letterJudge, 'select');
      const completion = new ScriptedCompletion([letter.replace('Sincerely,\n', ''), letter]);

      const outcome = expectDone(await letters(completion, { judge, letterJudge }).run(letterRequest()));

      expect(resumeSelect).not.toHaveBeenCalled();
      expect(letterSelect).toHaveBeenCalledTimes(1);
      expect(outcome.candidate.index).toBe(1);
      expect(outcome.metadata.judgeScores?.map(s => s.structure)).toEqual([2 / 3, 1, 1]);
      expect(completion.calls[0].prompt).toContain('Write a cover letter for the Platform Engineer role at Globex.');
    });

    it('should fall back to the rendered letter without a capability', async () => {
      const outcome = expectDone(await letters(null).run(letterRequest()));
      expect(outcome.candidate.text).toBe(letter);
      expect(outcome.metadata).toMatchObject({ document: 'cover-letter', mode: 'fallback', degraded: true });
    });

    it('should address a letter without a target generically', async () => {
      const outcome = expectDone(await letters(null).run(letterRequest({ mode: 'deterministic', letter: undefined })));
      expect(outcome.candidate.text.split('\n')).toContain('Dear hiring team at the company,');
    });
  });

  describe('keywords', () => {
    it('should extract keywords from the job description when none are supplied', async () => {
      const extractor: KeywordExtractor = { name: 'stub', extract: async () => ['Terraform', 'terraform'] };
      const outcome = expectDone(
        await orchestrator({}, null, { extractor }).run(
          request({ mode: 'deterministic', jobDescription: 'Infrastructure role' })
        )
      );
      expect(outcome.metadata.jobKeywords).toEqual(['Terraform']);
      expect(outcome.contentSet.keywords).toEqual(['Kubernetes', 'Terraform']);
    });

    it('should prefer supplied keywords over extraction', async () => {
      const extractor: KeywordExtractor = { name: 'stub', extract: vi.fn(async () => ['Helm']) };
      const outcome = expectDone(
        await orchestrator({}, null, { extractor }).run(
          request({ mode: 'deterministic', jobDescription: 'Infrastructure role', jobKeywords: ['Go'] })
        )
      );
      expect(extractor.extract).not.toHaveBeenCalled();
      expect(outcome.metadata.jobKeywords).toEqual(['Go']);
    });
  });

  describe('configuration errors', () => {
    it('should propagate selection errors', async () => {
      const completion = new ScriptedCompletion([STRONG]);
      const run = orchestrator({}, completion).run(
        request({ variant: backendVariant({ skillCategories: ['databases'] }) })
      );
      await expect(run).rejects.toBeInstanceOf(SelectionError);
      expect(completion.calls).toHaveLength(0);
    });

    it('should propagate template errors before any model call', async () => {
      const completion = new ScriptedCompletion([STRONG]);
      await expect(orchestrator({}, completion).run(request({ template: 'missing' }))).rejects.toBeInstanceOf(
        TemplateNotFoundError
      );
      expect(completion.calls).toHaveLength(0);
    });

    it('should reject an invalid configuration', () => {
      expect(() => orchestrator({ numGenerations: 0 })).toThrow(ConfigurationError);
      expect(() => orchestrator({ concurrency: 1.5 })).toThrow(ConfigurationError);
      expect(() => orchestrator({ judgeWeights: { keywords: -1, faithfulness: 1, structure: 1 } })).toThrow(
        ConfigurationError
      );
    });
  });
});

describe('StateTrace', () => {
  it('should record allowed transitions in order', () => {
    let clock = 0;
    const trace = new StateTrace(() => ++clock);
    trace.to('selecting');
    trace.to('generating');
    expect(trace.state).toBe('generating');
    expect(trace.list()).toEqual([
      { from: 'idle', to: 'selecting', at: 1 },
      { from: 'selecting', to: 'generating', at: 2 }
    ]);
  });

  it('should refuse a transition the state machine does not allow', () => {
    const trace = new StateTrace();
    expect(() => trace.to('judging')).toThrow('Illegal orchestrator transition idle → judging');
  });
});
