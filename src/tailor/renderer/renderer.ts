/**
 * Renderer
 *
 * Applies a content set to a named template. Templates compile in strict
 * mode, so a reference to a field the content set lacks is a hard failure
 * rather than a silent blank.
 */

import Handlebars from 'handlebars';
import type { ContentSet, LetterTarget, OutputFormat, TemplateRepository } from '../types';
import {
  MissingContextError,
  TailorErrorCode,
  TemplateError,
  TemplateNotFoundError
} from '../errors/types';
import { createComponentLogger } from '../../shared/logging/logger';
import { FileTemplateRepository } from './templateRepository';
import { TEMPLATE_HELPERS } from './helpers';

const log = createComponentLogger('renderer');

interface RenderContext extends ContentSet {
  letter?: LetterTarget;
}

type CompiledTemplate = (context: RenderContext) => string;

export class Renderer {
  private readonly env: typeof Handlebars;
  private compiled = new Map<string, CompiledTemplate>();

  constructor(private readonly repository: TemplateRepository = new FileTemplateRepository()) {
    this.env = Handlebars.create();
    this.env.registerHelper(TEMPLATE_HELPERS);
  }

  /**
   * Render a content set.
   *
   * @throws TemplateNotFoundError for an unknown template
   * @throws MissingContextError when the template references an absent field
   */
  render(contentSet: ContentSet, templateName: string, format: OutputFormat = 'md', letter?: LetterTarget): string {
    const template = this.compile(templateName, format);
    const context: RenderContext = letter ? { ...contentSet, letter } : contentSet;

    try {
      const text = template(context);
      log.debug({ template: templateName, format, length: text.length }, 'Template rendered');
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (/not defined in/.test(message)) {
        throw new MissingContextError(templateName, message);
      }
      throw new TemplateError(
        TailorErrorCode.TEMPLATE_INVALID,
        `Template "${templateName}" failed to render`,
        message,
        { templateName, format }
      );
    }
  }

  has(templateName: string, format: OutputFormat): boolean {
    return this.repository.get(templateName, format) !== null;
  }

  private compile(templateName: string, format: OutputFormat): CompiledTemplate {
    const key = `${templateName}.${format}`;
    const cached = this.compiled.get(key);
    if (cached) {
      return cached;
    }

    const source = this.repository.get(templateName, format);
    if (source === null) {
      throw new TemplateNotFoundError(templateName, format);
    }

    const compiled: CompiledTemplate = this.env.compile<RenderContext>(source, {
      strict: true,
      noEscape: true
    });
    this.compiled.set(key, compiled);
    return compiled;
  }
}
