/**
 * Configuration Management
 *
 * Centralized configuration for the generation pipeline with environment
 * variable support. Precedence: defaults < environment < provided object.
 */

import 'dotenv/config';
import { z } from 'zod';
import type { CategoryWeights, GenerationConfig } from '../types';
import { ConfigurationError } from '../errors/types';
import { GenerationConfigSchema } from '../validation/schemas';
import { zodErrorToValidationResult } from '../validation/validator';
import { DEFAULT_JUDGE_WEIGHTS } from '../judge/judge';
import { DEFAULT_CATEGORY_WEIGHTS, DEFAULT_TOTAL_POINTS } from '../ats/atsScorer';
import { LLM_PROVIDERS, type LLMProvider } from '../../shared/llm/types';

export interface TailorConfig {
  generation: GenerationConfig;

  ats: {
    totalPoints: number;
    categoryWeights: CategoryWeights;
    maxKeywords: number;
  };

  llm: {
    provider: LLMProvider;
    /** Provider default when unset */
    model?: string;
  };

  logging: {
    enabled: boolean;
  };
}

export interface TailorConfigInput {
  generation?: Partial<GenerationConfig>;
  ats?: Partial<TailorConfig['ats']>;
  llm?: Partial<TailorConfig['llm']>;
  logging?: Partial<TailorConfig['logging']>;
}

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
  numGenerations: 3,
  judgeEnabled: true,
  fallbackOnFailure: true,
  timeoutMs: 60000,
  concurrency: 3,
  template: 'base',
  format: 'md',
  judgeWeights: DEFAULT_JUDGE_WEIGHTS,
  judgeStrategy: 'select',
  temperature: 0.7
};

export const DEFAULT_CONFIG: TailorConfig = {
  generation: DEFAULT_GENERATION_CONFIG,
  ats: {
    totalPoints: DEFAULT_TOTAL_POINTS,
    categoryWeights: DEFAULT_CATEGORY_WEIGHTS,
    maxKeywords: 20
  },
  llm: {
    provider: 'anthropic'
  },
  logging: {
    enabled: true
  }
};

const AtsConfigSchema = z.object({
  totalPoints: z.number().positive(),
  categoryWeights: z.object({
    format: z.number().min(0),
    keywords: z.number().min(0),
    sections: z.number().min(0),
    contact: z.number().min(0),
    readability: z.number().min(0)
  }),
  maxKeywords: z.number().int().min(1)
});

function isProvider(value: string | undefined): value is LLMProvider {
  return LLM_PROVIDERS.some(provider => provider === value);
}

function isFormat(value: string | undefined): value is GenerationConfig['format'] {
  return value === 'md' || value === 'tex' || value === 'txt';
}

function isStrategy(value: string | undefined): value is GenerationConfig['judgeStrategy'] {
  return value === 'select' || value === 'merge';
}

function parseInteger(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value.toLowerCase() !== 'false' && value !== '0';
}

export class ConfigManager {
  private config: TailorConfig;

  constructor(config?: TailorConfigInput, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig(config);
    this.validateConfig();
  }

  private envLayer(): TailorConfigInput {
    const env = this.env;
    return {
      generation: {
        numGenerations: parseInteger(env.TAILOR_NUM_GENERATIONS),
        judgeEnabled: parseBoolean(env.TAILOR_JUDGE_ENABLED),
        fallbackOnFailure: parseBoolean(env.TAILOR_FALLBACK_ON_FAILURE),
        timeoutMs: parseInteger(env.TAILOR_TIMEOUT_MS),
        concurrency: parseInteger(env.TAILOR_CONCURRENCY),
        template: env.TAILOR_TEMPLATE || undefined,
        format: isFormat(env.TAILOR_FORMAT) ? env.TAILOR_FORMAT : undefined,
        judgeStrategy: isStrategy(env.TAILOR_JUDGE_STRATEGY) ? env.TAILOR_JUDGE_STRATEGY : undefined,
        temperature: parseNumber(env.LLM_TEMPERATURE)
      },
      ats: {
        maxKeywords: parseInteger(env.TAILOR_MAX_KEYWORDS)
      },
      llm: {
        provider: isProvider(env.LLM_PROVIDER) ? env.LLM_PROVIDER : undefined,
        model: env.LLM_MODEL || undefined
      },
      logging: {
        enabled: parseBoolean(env.TAILOR_LOGGING_ENABLED)
      }
    };
  }

  private loadConfig(provided: TailorConfigInput = {}): TailorConfig {
    return this.merge(this.merge(DEFAULT_CONFIG, this.envLayer()), provided);
  }

  private merge(base: TailorConfig, layer: TailorConfigInput): TailorConfig {
    const generation = layer.generation ?? {};
    const weights = generation.judgeWeights;
    const ats = layer.ats ?? {};
    const categoryWeights = ats.categoryWeights;

    return {
      generation: {
        numGenerations: generation.numGenerations ?? base.generation.numGenerations,
        judgeEnabled: generation.judgeEnabled ?? base.generation.judgeEnabled,
        fallbackOnFailure: generation.fallbackOnFailure ?? base.generation.fallbackOnFailure,
        timeoutMs: generation.timeoutMs ?? base.generation.timeoutMs,
        concurrency: generation.concurrency ?? base.generation.concurrency,
        template: generation.template ?? base.generation.template,
        format: generation.format ?? base.generation.format,
        judgeWeights: {
          keywords: weights?.keywords ?? base.generation.judgeWeights.keywords,
          faithfulness: weights?.faithfulness ?? base.generation.judgeWeights.faithfulness,
          structure: weights?.structure ?? base.generation.judgeWeights.structure
        },
        judgeStrategy: generation.judgeStrategy ?? base.generation.judgeStrategy,
        temperature: generation.temperature ?? base.generation.temperature
      },
      ats: {
        totalPoints: ats.totalPoints ?? base.ats.totalPoints,
        categoryWeights: {
          format: categoryWeights?.format ?? base.ats.categoryWeights.format,
          keywords: categoryWeights?.keywords ?? base.ats.categoryWeights.keywords,
          sections: categoryWeights?.sections ?? base.ats.categoryWeights.sections,
          contact: categoryWeights?.contact ?? base.ats.categoryWeights.contact,
          readability: categoryWeights?.readability ?? base.ats.categoryWeights.readability
        },
        maxKeywords: ats.maxKeywords ?? base.ats.maxKeywords
      },
      llm: {
        provider: layer.llm?.provider ?? base.llm.provider,
        model: layer.llm?.model ?? base.llm.model
      },
      logging: {
        enabled: layer.logging?.enabled ?? base.logging.enabled
      }
    };
  }

  /**
   * @throws ConfigurationError naming the first invalid field
   */
  private validateConfig(): void {
    const generation = GenerationConfigSchema.safeParse(this.config.generation);
    if (!generation.success) {
      const { errors } = zodErrorToValidationResult(generation.error);
      throw new ConfigurationError(`generation.${errors[0].field}`, errors[0].message, errors);
    }

    const ats = AtsConfigSchema.safeParse(this.config.ats);
    if (!ats.success) {
      const { errors } = zodErrorToValidationResult(ats.error);
      throw new ConfigurationError(`ats.${errors[0].field}`, errors[0].message, errors);
    }

    const weights = this.config.ats.categoryWeights;
    const sum = weights.format + weights.keywords + weights.sections + weights.contact + weights.readability;
    if (Math.abs(sum - this.config.ats.totalPoints) > 1e-9) {
      throw new ConfigurationError(
        'ats.categoryWeights',
        `Weights must sum to ${this.config.ats.totalPoints} (current sum: ${sum})`
      );
    }
  }

  getConfig(): TailorConfig {
    return { ...this.config };
  }

  updateConfig(updates: TailorConfigInput): void {
    const previous = this.config;
    this.config = this.merge(this.config, updates);
    try {
      this.validateConfig();
    } catch (error) {
      this.config = previous;
      throw error;
    }
  }

  getGenerationConfig(): GenerationConfig {
    return { ...this.config.generation, judgeWeights: { ...this.config.generation.judgeWeights } };
  }

  getCategoryWeights(): CategoryWeights {
    return { ...this.config.ats.categoryWeights };
  }
}

let globalConfig: ConfigManager | null = null;

export function initializeConfig(config?: TailorConfigInput): ConfigManager {
  globalConfig = new ConfigManager(config);
  return globalConfig;
}

export function getConfig(): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager();
  }
  return globalConfig;
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = null;
}
