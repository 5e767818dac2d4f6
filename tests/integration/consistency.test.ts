/**
 * End-to-end knowledge consistency
 */

import { describe, it, expect } from 'vitest';
import { ClaimValidator } from '../../src/core/validation/ClaimValidator.js';
import { VisibilityResolver } from '../../src/core/VisibilityResolver.js';
import { WorldModel } from '../../src/core/WorldModel.js';

describe('knowledge consistency', () => {
  it('should tie locations, schedules and visibility together', () => {
    const world = new WorldModel();
    const validator = new ClaimValidator(world);
    const visibility = new VisibilityResolver(world);

    world.addLocation('Library');
    world.addFact({ key: 'victim', value: 'Elias', isPublic: true });

    const [claim] = validator.extractClaims('I was in the library');
    expect(claim).toBeDefined();
    if (claim) {
      const result = validator.validateClaim(claim, 'Helena');
      expect(result.isValid).toBe(true);
      expect(result.reason).toBe('Location exists in world');
    }

    world.schedule.addScheduleEntry({
      character: 'Nathan',
      day: 1,
      period: 'early_evening',
      location: 'Sitting Room',
      activity: 'Reading',
    });
    expect(world.schedule.verifyCharacterClaimTimeLocation('Nathan', 'Dining Room', 1, 'early_evening')).toEqual({
      isConsistent: false,
      actualLocation: 'Sitting Room',
    });

    world.addFact({ key: 'cause_of_death', value: 'Poison', isPublic: false, witnesses: ['Nathan'] });
    expect(visibility.knows('Helena', 'cause_of_death')).toBe(false);
    expect(visibility.knows('Nathan', 'cause_of_death')).toBe(true);
  });
});
