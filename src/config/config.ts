/**
 * Testimony Engine - Configuration Manager
 * Defaults, then the first config file found, then environment variables.
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { z } from 'zod';
import {
  CONFIG_FILE_NAMES,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_HISTORY_TURNS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_PROMPT_LIES,
  DEFAULT_PROMPT_MEMORIES,
  DEFAULT_PROMPT_TURNS,
  DEFAULT_TEMPERATURE,
} from './constants.js';
import { ConfigurationError, getErrorMessage } from '../core/errors.js';
import { logger } from '../services/Logger.js';
import { firstIssue, formatIssuePath, valueAtPath } from '../utils/issues.js';
import type {
  DialogueConfig,
  EngineConfig,
  EngineConfigOverrides,
  LoggingConfig,
  ProviderConfig,
} from '../types/index.js';

export function createDefaultConfig(): EngineConfig {
  return {
    provider: {
      type: 'mock',
      model: DEFAULT_GEMINI_MODEL,
      maxTokens: DEFAULT_MAX_TOKENS,
      temperature: DEFAULT_TEMPERATURE,
    },
    logging: {
      level: 'info',
      verbose: false,
      headless: false,
    },
    dialogue: {
      factChecking: true,
      historyTurns: DEFAULT_HISTORY_TURNS,
      promptTurns: DEFAULT_PROMPT_TURNS,
      promptMemories: DEFAULT_PROMPT_MEMORIES,
      promptLies: DEFAULT_PROMPT_LIES,
    },
  };
}

// ============================================================================
// Schemas
// ============================================================================

const ProviderTypeSchema = z.enum(['gemini', 'mock']);
const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const ProviderSectionSchema = z
  .object({
    type: ProviderTypeSchema,
    model: z.string().min(1),
    apiKey: z.string().min(1),
    maxTokens: z.number().int().min(1),
    temperature: z.number().min(0).max(2),
  })
  .partial();

const LoggingSectionSchema = z
  .object({
    level: LogLevelSchema,
    verbose: z.boolean(),
    headless: z.boolean(),
  })
  .partial();

const DialogueSectionSchema = z
  .object({
    factChecking: z.boolean(),
    historyTurns: z.number().int().min(0),
    promptTurns: z.number().int().min(0),
    promptMemories: z.number().int().min(0),
    promptLies: z.number().int().min(0),
  })
  .partial();

const ConfigFileSchema = z.object({
  provider: ProviderSectionSchema.optional(),
  logging: LoggingSectionSchema.optional(),
  dialogue: DialogueSectionSchema.optional(),
});

const envFlag = z.enum(['true', '1', 'false', '0']).transform((flag) => flag === 'true' || flag === '1');

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().optional(),
  AI_PROVIDER: z.string().toLowerCase().pipe(ProviderTypeSchema).optional(),
  AI_MODEL: z.string().optional(),
  TESTIMONY_LOG_LEVEL: z.string().toLowerCase().pipe(LogLevelSchema).optional(),
  TESTIMONY_VERBOSE: envFlag.optional(),
  TESTIMONY_HEADLESS: envFlag.optional(),
  TESTIMONY_FACT_CHECKING: envFlag.optional(),
});

/**
 * Parse with a schema; the first issue becomes a ConfigurationError whose
 * context names the key and the rejected value
 */
function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, root: string): z.output<T> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issue = firstIssue(result.error);
  const path = issue?.path ?? [];
  const key = formatIssuePath(path, root);
  throw new ConfigurationError(`Invalid config value for ${key}: ${issue?.message ?? 'invalid'}`, {
    context: { key, value: valueAtPath(raw, path) },
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check an untrusted document against the config shape
 */
export function parseConfigOverrides(raw: unknown): EngineConfigOverrides {
  return parseWith(ConfigFileSchema, raw, 'config');
}

export interface ConfigManagerOptions {
  /** Directory searched for config files; defaults to process.cwd() */
  cwd?: string;
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Configuration loader with file discovery
 */
export class ConfigManager {
  private config: EngineConfig;
  private configPath?: string;
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(customPath?: string, options: ConfigManagerOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
    this.config = createDefaultConfig();
    this.loadFromFiles(customPath);
    this.loadFromEnv();
  }

  /**
   * Load the first readable config file (priority: custom > .testimonyrc >
   * .testimonyrc.json > testimony.config.json)
   */
  private loadFromFiles(customPath?: string): void {
    const searchPaths = customPath
      ? [resolve(this.cwd, customPath)]
      : CONFIG_FILE_NAMES.map((name) => join(this.cwd, name));

    for (const filePath of searchPaths) {
      if (!existsSync(filePath)) {
        if (customPath) {
          throw new ConfigurationError(`Config file not found: ${filePath}`, {
            context: { file: filePath },
          });
        }
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
      } catch (error: unknown) {
        logger.warn(`Skipping config file ${filePath}: ${getErrorMessage(error)}`);
        continue;
      }

      if (!isRecord(parsed)) {
        logger.warn(`Skipping config file ${filePath}: not a JSON object`);
        continue;
      }

      this.mergeConfig(parseConfigOverrides(parsed));
      this.configPath = filePath;
      break;
    }
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    // Empty variables count as unset
    const present = Object.fromEntries(
      Object.entries(this.env).filter(([, value]) => value !== undefined && value !== ''),
    );
    const env = parseWith(EnvSchema, present, 'env');
    const provider: Partial<ProviderConfig> = {};
    const logging: Partial<LoggingConfig> = {};
    const dialogue: Partial<DialogueConfig> = {};

    if (env.GEMINI_API_KEY !== undefined) {
      provider.apiKey = env.GEMINI_API_KEY;
      provider.type = 'gemini';
    }
    if (env.AI_PROVIDER !== undefined) provider.type = env.AI_PROVIDER;
    if (env.AI_MODEL !== undefined) provider.model = env.AI_MODEL;

    if (env.TESTIMONY_LOG_LEVEL !== undefined) logging.level = env.TESTIMONY_LOG_LEVEL;
    if (env.TESTIMONY_VERBOSE !== undefined) logging.verbose = env.TESTIMONY_VERBOSE;
    if (env.TESTIMONY_HEADLESS !== undefined) logging.headless = env.TESTIMONY_HEADLESS;

    if (env.TESTIMONY_FACT_CHECKING !== undefined) {
      dialogue.factChecking = env.TESTIMONY_FACT_CHECKING;
    }

    this.mergeConfig({ provider, logging, dialogue });
  }

  /**
   * Merge partial config into current config
   */
  private mergeConfig(partial: EngineConfigOverrides): void {
    if (partial.provider) {
      this.config.provider = { ...this.config.provider, ...partial.provider };
    }
    if (partial.logging) {
      this.config.logging = { ...this.config.logging, ...partial.logging };
    }
    if (partial.dialogue) {
      this.config.dialogue = { ...this.config.dialogue, ...partial.dialogue };
    }
  }

  // Getters
  get provider(): ProviderConfig {
    return this.config.provider;
  }

  get logging(): LoggingConfig {
    return this.config.logging;
  }

  get dialogue(): DialogueConfig {
    return this.config.dialogue;
  }

  get all(): EngineConfig {
    return {
      provider: { ...this.config.provider },
      logging: { ...this.config.logging },
      dialogue: { ...this.config.dialogue },
    };
  }

  get configFile(): string | undefined {
    return this.configPath;
  }

  /**
   * Update config at runtime; values are checked like file values
   */
  set(overrides: EngineConfigOverrides): void {
    this.mergeConfig(parseConfigOverrides(overrides));
  }

  /**
   * Push the logging section into the shared logger
   */
  applyLogging(): void {
    logger.configure(this.config.logging);
  }
}

// Singleton instance
let configInstance: ConfigManager | null = null;

export function getConfig(customPath?: string): ConfigManager {
  if (!configInstance || customPath) {
    configInstance = new ConfigManager(customPath);
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
