/**
 * ClaimExtractor - turns a free-text statement into typed claims
 *
 * The pattern extractor is a claim proposal mechanism, not a parser. It
 * misses plenty (under-extraction is accepted) and anything that implements
 * ClaimExtractor can replace it without touching the validator.
 */

import { CLAIM_KEYS } from '../../config/constants.js';
import type { WorldModel } from '../WorldModel.js';
import type { Claim, LocationClaim, PersonClaim, TimeClaim } from '../../types/index.js';

export interface ClaimExtractor {
  extract(statement: string): Claim[];
}

// "I was in the library", "I saw him in the garden"
const LOCATION_PATTERNS: readonly RegExp[] = [
  /(?:I (?:was|am)|he (?:was|is)|she (?:was|is)|they (?:were|are)) (?:in|at) (?:the )?(\w+)/gi,
  /(?:saw|found|met) (?:\w+ )?(?:in|at) (?:the )?(\w+)/gi,
];

// "at 9pm", "at 10:30 am", "last night"
const TIME_PATTERNS: readonly RegExp[] = [
  /at (\d{1,2}(?::\d{2})?\s*(?:am|pm))/gi,
  /(last night|this morning|yesterday|tonight)/gi,
];

// "I saw John", "Mary was there"
const PERSON_PATTERNS: readonly RegExp[] = [
  /(?:saw|met|spoke with|talked to) (\w+)/gi,
  /(\w+) (?:was|is) (?:there|here|present)/gi,
];

function* scan(patterns: readonly RegExp[], statement: string): Generator<{ text: string; token: string }> {
  for (const pattern of patterns) {
    for (const match of statement.matchAll(pattern)) {
      const token = match[1];
      if (token !== undefined) {
        yield { text: match[0], token };
      }
    }
  }
}

export class PatternClaimExtractor implements ClaimExtractor {
  constructor(private readonly world: WorldModel) {}

  /**
   * Location claims first, then time, then person mentions
   */
  extract(statement: string): Claim[] {
    const claims: Claim[] = [];

    for (const { text, token } of scan(LOCATION_PATTERNS, statement)) {
      const claim: LocationClaim = {
        category: 'location',
        claimText: text,
        key: CLAIM_KEYS.LOCATION,
        value: token,
      };
      claims.push(claim);
    }

    for (const { text, token } of scan(TIME_PATTERNS, statement)) {
      const claim: TimeClaim = {
        category: 'time',
        claimText: text,
        key: CLAIM_KEYS.TIME,
        value: token,
      };
      claims.push(claim);
    }

    for (const { text, token } of scan(PERSON_PATTERNS, statement)) {
      // Only registered characters count; anyone else is dropped
      const name = this.resolveCharacter(token);
      if (name === undefined) {
        continue;
      }
      const claim: PersonClaim = {
        category: 'person',
        claimText: text,
        key: CLAIM_KEYS.PERSON,
        value: name,
      };
      claims.push(claim);
    }

    return claims;
  }

  /**
   * A token names a character when it is the full registered name, or the
   * first word of exactly one registered name ("Nathan" for "Nathan Cross").
   */
  private resolveCharacter(token: string): string | undefined {
    if (this.world.hasCharacter(token)) {
      return token;
    }

    const candidates = this.world
      .getCharacters()
      .filter((name) => name.split(/\s+/)[0] === token);

    return candidates.length === 1 ? candidates[0] : undefined;
  }
}
