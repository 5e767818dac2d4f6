/**
 * Testimony Engine - Dialogue Types
 */

import type { ValidationSummary } from './claims.js';
import type { WorldSummary } from './world.js';

export interface ClaimReport {
  claim: string;
  isValid: boolean;
  isLie: boolean;
  isOmission: boolean;
  reason: string;
}

export interface TurnMetadata {
  npcName?: string;
  validationEnabled?: boolean;
  /** Present only when fact checking ran */
  isValid?: boolean;
  validationResults?: ClaimReport[];
  likelyLies?: string[];
  likelyOmissions?: string[];
  /** Present only when the turn could not run */
  error?: string;
}

export interface TurnResult {
  response: string;
  metadata: TurnMetadata;
}

export interface DeceptionRecord {
  timestamp: string;
  content: string;
  context: Readonly<Record<string, unknown>>;
}

export interface EngineStats {
  totalNpcs: number;
  npcNames: string[];
  worldState: WorldSummary;
  aiProvider: string;
  /** Present when fact checking is enabled */
  factChecking?: ValidationSummary;
}
