/**
 * Tests for template rendering and helpers
 */

import { describe, it, expect } from 'vitest';
import { Renderer } from '../../tailor/renderer/renderer';
import { FileTemplateRepository, InMemoryTemplateRepository } from '../../tailor/renderer/templateRepository';
import { formatPeriod, latexEscape, latexUrl, properTitle } from '../../tailor/renderer/helpers';
import { selectContent } from '../../tailor/selector/contentSelector';
import {
  MissingContextError,
  TailorErrorCode,
  TemplateError,
  TemplateNotFoundError
} from '../../tailor/errors/types';
import { backendVariant, plainTemplates, sampleHistory, thrown } from './fixtures';

const content = () => selectContent(sampleHistory(), backendVariant(), ['Terraform']);

describe('Template helpers', () => {
  it('should escape LaTeX special characters', () => {
    expect(latexEscape('50% of R&D_ops #1 ~ $5')).toBe('50\\% of R\\&D\\_ops \\#1 \\textasciitilde{} \\$5');
  });

  it('should escape URLs for \\href', () => {
    expect(latexUrl('https://example.com/a%20b?q=1#top')).toBe('https://example.com/a\\%20b?q=1\\#top');
    expect(latexUrl('https://example.com/{x} y')).toBe('https://example.com/\\%7Bx\\%7D\\%20y');
  });

  it('should convert bold markup to \\textbf', () => {
    expect(latexEscape('**Led** the team')).toBe('\\textbf{Led} the team');
  });

  it('should title-case with small words lowercased', () => {
    expect(properTitle('cloud_platforms')).toBe('Cloud Platforms');
    expect(properTitle('tools and frameworks')).toBe('Tools and Frameworks');
    expect(properTitle('the BEST of')).toBe('The Best of');
  });

  it('should format open and closed periods', () => {
    expect(formatPeriod('2020', null)).toBe('2020 - Present');
    expect(formatPeriod('2020', '2022')).toBe('2020 - 2022');
  });
});

describe('Renderer', () => {
  it('should render a content set line by line', () => {
    const text = new Renderer(plainTemplates()).render(content(), 'plain');
    expect(text.trimEnd()).toBe(
      [
        '# Jordan Avery',
        '',
        '## Summary',
        'Backend engineer focused on distributed services.',
        '',
        '## Skills',
        '- TypeScript, Go, Python',
        '- Terraform, Kubernetes',
        '',
        '## Experience',
        '### Northwind Labs',
        '- Designed the billing API for partner integrations',
        '- Automated Kubernetes deploys with Terraform',
        '- Migrated batch jobs to Kubernetes',
        '### Contoso Retail',
        '- Built React dashboards for store managers',
        '- Cut checkout latency by 40% with Go services'
      ].join('\n')
    );
  });

  it('should be deterministic', () => {
    const renderer = new Renderer();
    expect(renderer.render(content(), 'base')).toBe(renderer.render(content(), 'base'));
  });

  it('should render the bundled Markdown template', () => {
    const lines = new Renderer().render(content(), 'base', 'md').split('\n');
    expect(lines).toContain('# Jordan Avery');
    expect(lines).toContain('jordan@example.com | 555-123-4567 | Denver, CO');
    expect(lines).toContain('[GitHub](https://github.com/javery)');
    expect(lines).toContain('- **Languages:** TypeScript, Go, Python');
    expect(lines).toContain('### Senior Engineer, Northwind Labs');
    expect(lines).toContain('2021-03 - Present | Denver, CO');
    expect(lines).toContain('2018-06 - 2021-02');
    expect(lines).toContain('- **queue-kit**: A small job queue');
    expect(lines).toContain('- B.S. Computer Science, State University (2018)');
    expect(lines).toContain('- Certified Kubernetes Administrator, CNCF');
  });

  it('should render the bundled LaTeX template with escaping', () => {
    const lines = new Renderer().render(content(), 'base', 'tex').split('\n');
    expect(lines).toContain('{\\LARGE \\textbf{Jordan Avery}}\\\\');
    expect(lines).toContain('\\section*{Experience}');
    expect(lines).toContain('  \\item \\textbf{Languages:} TypeScript, Go, Python');
    expect(lines).toContain('\\textbf{Senior Engineer}, Northwind Labs \\hfill 2021-03 - Present');
    expect(lines).toContain('  \\item Cut checkout latency by 40\\% with Go services');
  });

  it('should escape link targets in the LaTeX template', () => {
    const history = sampleHistory();
    history.contact.links = [{ label: 'Portfolio', url: 'https://example.com/work#100%' }];
    const lines = new Renderer().render(selectContent(history, backendVariant()), 'base', 'tex').split('\n');
    expect(lines).toContain(
      '\\href{mailto:jordan@example.com}{jordan@example.com} $\\cdot$ 555-123-4567 $\\cdot$ Denver, CO'
    );
    expect(lines).toContain(' $\\cdot$ \\href{https://example.com/work\\#100\\%}{Portfolio}');
  });

  it('should render the bundled plain-text template', () => {
    const lines = new Renderer().render(content(), 'base', 'txt').split('\n');
    expect(lines).toContain('EXPERIENCE');
    expect(lines).toContain('Senior Engineer, Northwind Labs (2021-03 - Present)');
    expect(lines).toContain('  * Designed the billing API for partner integrations');
  });

  it('should render the bundled cover letter for a target', () => {
    const text = new Renderer().render(content(), 'cover-letter', 'md', {
      company: 'Globex',
      position: 'Platform Engineer'
    });
    const lines = text.split('\n');

    expect(lines[0]).toBe('**Jordan Avery**');
    expect(lines).toContain('Dear hiring team at Globex,');
    expect(lines).toContain(
      'I am writing to apply for the Platform Engineer role at Globex. Backend engineer focused on distributed services.'
    );
    expect(text).toContain(
      [
        'As Senior Engineer at Northwind Labs, I:',
        '- Designed the billing API for partner integrations',
        '- Automated Kubernetes deploys with Terraform',
        '- Migrated batch jobs to Kubernetes'
      ].join('\n')
    );
    expect(lines).toContain('I work with TypeScript, Go, Python, Terraform, Kubernetes.');
    expect(text.trimEnd().endsWith('Sincerely,\nJordan Avery')).toBe(true);
  });

  it('should require a letter target for the cover letter', () => {
    const error = thrown(() => new Renderer().render(content(), 'cover-letter'));
    expect(error).toBeInstanceOf(MissingContextError);
  });

  it('should fail with TemplateNotFoundError for an unknown template', () => {
    const error = thrown(() => new Renderer().render(content(), 'fancy'));
    expect(error).toBeInstanceOf(TemplateNotFoundError);
    expect(error).toBeInstanceOf(TemplateError);
  });

  it('should fail with MissingContextError for a field the content set lacks', () => {
    const repository = new InMemoryTemplateRepository().set('broken', 'md', '{{contact.fax}}');
    const error = thrown(() => new Renderer(repository).render(content(), 'broken'));
    expect(error).toBeInstanceOf(MissingContextError);
  });

  it('should report malformed templates as TEMPLATE_INVALID', () => {
    const repository = new InMemoryTemplateRepository().set('broken', 'md', '{{#each skills}}');
    expect(thrown(() => new Renderer(repository).render(content(), 'broken'))).toMatchObject({
      code: TailorErrorCode.TEMPLATE_INVALID
    });
  });

  it('should report which templates exist', () => {
    const renderer = new Renderer();
    expect(renderer.has('base', 'tex')).toBe(true);
    expect(renderer.has('minimal', 'tex')).toBe(false);
  });
});

describe('Template repositories', () => {
  it('should list the bundled templates', () => {
    expect(new FileTemplateRepository().list()).toEqual([
      { name: 'base', format: 'md' },
      { name: 'base', format: 'tex' },
      { name: 'base', format: 'txt' },
      { name: 'cover-letter', format: 'md' },
      { name: 'cover-letter', format: 'txt' },
      { name: 'minimal', format: 'md' }
    ]);
  });

  it('should refuse template names that are not plain identifiers', () => {
    expect(new FileTemplateRepository().get('../templates/base', 'md')).toBeNull();
  });

  it('should list in-memory templates', () => {
    expect(plainTemplates().list()).toEqual([{ name: 'plain', format: 'md' }]);
  });
});
