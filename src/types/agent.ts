/**
 * Testimony Engine - Agent Types
 */

import type { FactValue } from './world.js';

export type MemoryType = 'conversation' | 'observation' | 'lie' | 'omission' | 'event';

export interface MemoryEntry {
  /** ISO-8601 */
  readonly timestamp: string;
  readonly type: MemoryType;
  readonly content: string;
  readonly context: Readonly<Record<string, unknown>>;
  /** -10 to +10 */
  readonly emotionalImpact: number;
}

export interface ConversationTurn {
  readonly timestamp: string;
  readonly speaker: string;
  readonly message: string;
}

export interface CharacterTrait {
  name: string;
  description: string;
  /** 1-10 */
  intensity: number;
}

export interface CharacterProfile {
  name: string;
  personality: string;
  background?: string;
  goals?: string[];
  fears?: string[];
  secrets?: string[];
  traits?: CharacterTrait[];
  /** Other character name -> how this character sees them */
  relationships?: Record<string, string>;
  currentLocation?: string;
  emotionalState?: string;
}

/**
 * Anything that can carry secrets for the deception classifier
 */
export interface SecretHolder {
  readonly name: string;
  readonly secrets: readonly string[];
}

export interface CharacterContext {
  name: string;
  personality: string;
  background: string;
  goals: string[];
  fears: string[];
  secrets: string[];
  traits: Array<{ name: string; description: string }>;
  relationships: Record<string, string>;
  currentLocation: string;
  emotionalState: string;
  knownFacts: Record<string, FactValue>;
  recentMemories: Array<{ type: MemoryType; content: string }>;
  liesTold: Array<{ content: string; context: Readonly<Record<string, unknown>> }>;
  omissionsMade: Array<{ content: string; context: Readonly<Record<string, unknown>> }>;
}

export interface NpcStatus {
  name: string;
  location: string;
  emotionalState: string;
  conversationTurns: number;
  memories: number;
  liesTold: number;
  omissionsMade: number;
  secrets: string[];
  goals: string[];
}
