/**
 * Testimony Engine - Configuration Types
 */

import type { LogLevel, ProviderType } from './provider.js';

export interface ProviderConfig {
  type: ProviderType;
  model: string;
  apiKey?: string;
  maxTokens: number;
  temperature: number;
}

export interface LoggingConfig {
  level: LogLevel;
  verbose: boolean;
  headless: boolean;
}

export interface DialogueConfig {
  /** Validate every generated reply */
  factChecking: boolean;
  /** Turns returned by getConversationHistory by default */
  historyTurns: number;
  /** Conversation turns quoted in a prompt */
  promptTurns: number;
  /** Memories included in the character context */
  promptMemories: number;
  /** Lies and omissions quoted in a prompt */
  promptLies: number;
}

export interface EngineConfig {
  provider: ProviderConfig;
  logging: LoggingConfig;
  dialogue: DialogueConfig;
}

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};
