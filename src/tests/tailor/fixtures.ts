/**
 * Shared test data and an in-process stand-in for the text-completion
 * capability
 */

import type { HistoryDocument, VariantConfig } from '../../tailor/types';
import type { CompletionConstraints, TextCompletion } from '../../shared/llm/types';
import { InMemoryTemplateRepository } from '../../tailor/renderer/templateRepository';

export function sampleHistory(): HistoryDocument {
  return {
    contact: {
      name: 'Jordan Avery',
      email: 'jordan@example.com',
      phone: '555-123-4567',
      location: 'Denver, CO',
      links: [{ label: 'GitHub', url: 'https://github.com/javery' }]
    },
    summary: {
      base: 'Engineer who builds reliable systems.',
      variants: { backend: 'Backend engineer focused on distributed services.' }
    },
    skills: {
      languages: ['TypeScript', 'Go', 'Python'],
      infrastructure: ['Kubernetes', 'Terraform', { name: 'Helm', emphasizeFor: ['platform'] }],
      frontend: ['React']
    },
    experience: [
      {
        company: 'Northwind Labs',
        title: 'Senior Engineer',
        location: 'Denver, CO',
        start: '2021-03',
        end: null,
        bullets: [
          { text: 'Migrated batch jobs to Kubernetes', skills: ['Kubernetes'] },
          { text: 'Designed the billing API for partner integrations', emphasizeFor: ['backend'] },
          { text: 'Automated Kubernetes deploys with Terraform' },
          { text: 'Mentored four junior engineers' },
          { text: 'Wrote onboarding documentation' }
        ]
      },
      {
        company: 'Contoso Retail',
        title: 'Software Engineer',
        start: '2018-06',
        end: '2021-02',
        bullets: [
          { text: 'Built React dashboards for store managers', emphasizeFor: ['frontend'] },
          { text: 'Cut checkout latency by 40% with Go services', skills: ['Go'] }
        ]
      }
    ],
    education: [{ degree: 'B.S. Computer Science', institution: 'State University', year: 2018 }],
    certifications: [{ name: 'Certified Kubernetes Administrator', issuer: 'CNCF' }],
    projects: {
      open_source: [{ name: 'queue-kit', description: 'A small job queue' }]
    }
  };
}

export function backendVariant(overrides: Partial<VariantConfig> = {}): VariantConfig {
  return {
    id: 'v1-backend',
    description: 'Backend engineering roles',
    summaryKey: 'backend',
    skillCategories: ['languages', 'infrastructure'],
    maxBulletsPerEntry: 3,
    emphasizeKeywords: ['Kubernetes'],
    ...overrides
  };
}

/**
 * Templates whose output is easy to predict line by line
 */
export function plainTemplates(): InMemoryTemplateRepository {
  return new InMemoryTemplateRepository([
    {
      name: 'plain',
      format: 'md',
      body: [
        '# {{contact.name}}',
        '',
        '## Summary',
        '{{summary}}',
        '',
        '## Skills',
        '{{#each skills}}',
        '- {{join skills ", "}}',
        '{{/each}}',
        '',
        '## Experience',
        '{{#each experience}}',
        '### {{company}}',
        '{{#each bullets}}',
        '- {{text}}',
        '{{/each}}',
        '{{/each}}'
      ].join('\n')
    }
  ]);
}

export type ScriptStep =
  | string
  | Error
  | ((prompt: string, constraints: CompletionConstraints) => Promise<string>);

/**
 * Answers each call with the next scripted step; the last step repeats
 */
export class ScriptedCompletion implements TextCompletion {
  readonly calls: Array<{ prompt: string; constraints: CompletionConstraints }> = [];

  constructor(private readonly steps: ScriptStep[]) {}

  async complete(prompt: string, constraints: CompletionConstraints = {}): Promise<string> {
    this.calls.push({ prompt, constraints });
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)];
    if (typeof step === 'string') return step;
    if (step instanceof Error) throw step;
    return step(prompt, constraints);
  }
}

/**
 * Resolves after `ms`, or rejects as soon as the signal aborts
 */
export function delayed(text: string, ms: number, signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(text), ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true }
    );
  });
}

/**
 * Whatever `fn` throws, or undefined
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
