/**
 * Testimony Engine - Claim Types
 */

import type { FactValue } from './world.js';

interface ClaimBase {
  /** Verbatim substring of the statement the claim came from */
  readonly claimText: string;
  readonly key: string;
  readonly value: string;
}

/** "I was in the library" */
export interface LocationClaim extends ClaimBase {
  readonly category: 'location';
}

/** "at 9pm", "last night" */
export interface TimeClaim extends ClaimBase {
  readonly category: 'time';
}

/** "I saw Nathan" */
export interface PersonClaim extends ClaimBase {
  readonly category: 'person';
}

/** A claim about a stored fact, checked by key */
export interface FactClaim extends ClaimBase {
  readonly category: 'fact';
}

export type Claim = LocationClaim | TimeClaim | PersonClaim | FactClaim;

export type ClaimCategory = Claim['category'];

/**
 * Verdict for one claim
 */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly claim: Claim;
  readonly reason: string;
  readonly worldTruth?: FactValue;
  /** Marked deliberate lie, or a contradiction of a stored fact */
  readonly isLie: boolean;
  readonly isOmission: boolean;
}

export interface StatementValidation {
  /** False when any claim is invalid without being a lie */
  isValid: boolean;
  results: ValidationResult[];
}

export interface ValidationSummary {
  totalValidations: number;
  validClaims: number;
  invalidClaims: number;
  intentionalLies: number;
  omissions: number;
  /** Percentage, 0 when nothing has been validated */
  accuracyRate: number;
}

export interface DeceptionAnalysis {
  likelyLies: string[];
  likelyOmissions: string[];
}
