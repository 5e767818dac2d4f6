/**
 * Testimony Engine - Provider Types
 * The text generator is an external collaborator: prompt in, text out.
 */

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  systemInstruction?: string;
}

export interface TextGenerator {
  readonly name: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export type ProviderType = 'gemini' | 'mock';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
