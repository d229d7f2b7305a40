/**
 * Template repositories: name × format → template body
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { OutputFormat, TemplateRepository } from '../types';
import { OUTPUT_FORMATS } from '../types';

const TEMPLATE_FILE = /^([A-Za-z0-9_-]+)\.(md|tex|txt)\.hbs$/;

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Directory holding the bundled templates
 */
export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL('../../../templates', import.meta.url));

export class InMemoryTemplateRepository implements TemplateRepository {
  private templates = new Map<string, string>();

  constructor(entries: Array<{ name: string; format: OutputFormat; body: string }> = []) {
    for (const entry of entries) {
      this.set(entry.name, entry.format, entry.body);
    }
  }

  set(name: string, format: OutputFormat, body: string): this {
    this.templates.set(`${name}.${format}`, body);
    return this;
  }

  get(name: string, format: OutputFormat): string | null {
    return this.templates.get(`${name}.${format}`) ?? null;
  }

  list(): Array<{ name: string; format: OutputFormat }> {
    return [...this.templates.keys()].flatMap(key => {
      const dot = key.lastIndexOf('.');
      const format = key.slice(dot + 1);
      return isOutputFormat(format) ? [{ name: key.slice(0, dot), format }] : [];
    });
  }
}

/**
 * Reads `<dir>/<name>.<format>.hbs`, caching bodies after the first read
 */
export class FileTemplateRepository implements TemplateRepository {
  private cache = new Map<string, string>();

  constructor(private readonly directory: string = BUNDLED_TEMPLATES_DIR) {}

  get(name: string, format: OutputFormat): string | null {
    if (!/^[A-Za-z0-9_-]+$/.test(name)) {
      return null;
    }

    const key = `${name}.${format}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const path = join(this.directory, `${key}.hbs`);
    if (!existsSync(path)) {
      return null;
    }

    const body = readFileSync(path, 'utf-8');
    this.cache.set(key, body);
    return body;
  }

  list(): Array<{ name: string; format: OutputFormat }> {
    if (!existsSync(this.directory)) {
      return [];
    }
    return readdirSync(this.directory)
      .sort()
      .flatMap(file => {
        const match = TEMPLATE_FILE.exec(file);
        if (!match) return [];
        const format = match[2];
        return isOutputFormat(format) ? [{ name: match[1], format }] : [];
      });
  }
}
