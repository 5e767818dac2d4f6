/**
 * ClaimValidator - checks extracted claims against recorded truth
 *
 * A deliberate lie or omission marked by the caller is never an
 * inconsistency; it is recorded as such. Everything else is judged against
 * the world model under an open-world assumption: information the world
 * does not hold is not presumed false.
 *
 * Verdicts produced by judging (not by markers) go to the validation
 * history in call order. The history only grows.
 */

import { logger } from '../../services/Logger.js';
import { factValueMatches, formatFactValue } from '../FactValue.js';
import { VisibilityResolver } from '../VisibilityResolver.js';
import { PatternClaimExtractor, type ClaimExtractor } from './ClaimExtractor.js';
import type { WorldModel } from '../WorldModel.js';
import type {
  Claim,
  FactValue,
  StatementValidation,
  ValidationResult,
  ValidationSummary,
} from '../../types/index.js';

export interface ClaimValidatorOptions {
  /** Defaults to the pattern extractor over the same world */
  extractor?: ClaimExtractor;
}

interface Verdict {
  isValid: boolean;
  reason: string;
  worldTruth?: FactValue;
  isLie?: boolean;
  isOmission?: boolean;
}

function createResult(claim: Claim, verdict: Verdict): ValidationResult {
  return Object.freeze({
    isValid: verdict.isValid,
    claim,
    reason: verdict.reason,
    worldTruth: verdict.worldTruth,
    isLie: verdict.isLie ?? false,
    isOmission: verdict.isOmission ?? false,
  });
}

export class ClaimValidator {
  private readonly extractor: ClaimExtractor;
  private readonly visibility: VisibilityResolver;
  private validationHistory: ValidationResult[] = [];

  constructor(
    private readonly world: WorldModel,
    options: ClaimValidatorOptions = {},
  ) {
    this.extractor = options.extractor ?? new PatternClaimExtractor(world);
    this.visibility = new VisibilityResolver(world);
  }

  extractClaims(statement: string): Claim[] {
    return this.extractor.extract(statement);
  }

  /**
   * Validate one claim made by a character
   */
  validateClaim(
    claim: Claim,
    character: string,
    isIntentionalLie: boolean = false,
    isIntentionalOmission: boolean = false,
  ): ValidationResult {
    if (isIntentionalLie) {
      const result = createResult(claim, {
        isValid: true,
        reason: 'Intentional lie by character',
        isLie: true,
      });
      logger.verdict(character, result);
      return result;
    }

    if (isIntentionalOmission) {
      const result = createResult(claim, {
        isValid: true,
        reason: 'Intentional omission by character',
        isOmission: true,
      });
      logger.verdict(character, result);
      return result;
    }

    const result = createResult(claim, this.judge(claim));
    this.validationHistory.push(result);
    logger.verdict(character, result);
    return result;
  }

  /**
   * Extract and validate every claim in a statement. Claims whose text is
   * listed in markedLies / markedOmissions (exact match) are recorded as
   * deliberate. The statement fails only on an unmarked contradiction that
   * is not itself a lie.
   */
  validateStatement(
    statement: string,
    character: string,
    markedLies: readonly string[] = [],
    markedOmissions: readonly string[] = [],
  ): StatementValidation {
    const results: ValidationResult[] = [];
    let isValid = true;

    for (const claim of this.extractClaims(statement)) {
      const result = this.validateClaim(
        claim,
        character,
        markedLies.includes(claim.claimText),
        markedOmissions.includes(claim.claimText),
      );
      results.push(result);

      if (!result.isValid && !result.isLie) {
        isValid = false;
      }
    }

    return { isValid, results };
  }

  /**
   * Whether the character is entitled to know the fact
   */
  checkKnowledgeConsistency(character: string, factKey: string): boolean {
    return this.visibility.knows(character, factKey);
  }

  getValidationSummary(): ValidationSummary {
    const total = this.validationHistory.length;
    const valid = this.validationHistory.filter((r) => r.isValid).length;
    const lies = this.validationHistory.filter((r) => r.isLie).length;
    const omissions = this.validationHistory.filter((r) => r.isOmission).length;

    return {
      totalValidations: total,
      validClaims: valid,
      invalidClaims: total - valid,
      intentionalLies: lies,
      omissions,
      accuracyRate: total > 0 ? (valid / total) * 100 : 0,
    };
  }

  getValidationHistory(): readonly ValidationResult[] {
    return [...this.validationHistory];
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private judge(claim: Claim): Verdict {
    switch (claim.category) {
      case 'location': {
        const known = this.world.resolveLocation(claim.value);
        if (known !== undefined) {
          return {
            isValid: true,
            reason: 'Location exists in world',
            worldTruth: { kind: 'string', value: known },
          };
        }
        return {
          isValid: false,
          reason: `Location '${claim.value}' does not exist in world state`,
        };
      }

      case 'person':
        if (this.world.hasCharacter(claim.value)) {
          return {
            isValid: true,
            reason: 'Character exists in world',
            worldTruth: { kind: 'string', value: claim.value },
          };
        }
        return {
          isValid: false,
          reason: `Character '${claim.value}' does not exist in world state`,
        };

      case 'time':
      case 'fact':
        return this.judgeByKey(claim);
    }
  }

  private judgeByKey(claim: Claim): Verdict {
    const truth = this.world.getFact(claim.key);

    if (truth === undefined) {
      return { isValid: true, reason: 'No contradiction with known facts' };
    }

    if (factValueMatches(truth, claim.value)) {
      return { isValid: true, reason: 'Matches world state fact', worldTruth: truth };
    }

    // Contradicting a stored fact without a marker is an unintentional lie
    return {
      isValid: false,
      reason: `Contradicts world state. Truth: ${formatFactValue(truth)}`,
      worldTruth: truth,
      isLie: true,
    };
  }
}
