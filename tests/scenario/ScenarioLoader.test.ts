/**
 * Tests for ScenarioLoader
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { InvalidPeriodError, ValidationError } from '../../src/core/errors.js';
import { VisibilityResolver } from '../../src/core/VisibilityResolver.js';
import { buildScenario, loadScenario } from '../../src/scenario/ScenarioLoader.js';

const MANOR = fileURLToPath(new URL('../fixtures/manor.json', import.meta.url));

function fieldOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.field;
    }
    throw error;
  }
  return undefined;
}

describe('ScenarioLoader', () => {
  describe('loadScenario', () => {
    it('should build the world from the fixture', async () => {
      const { world, npcs, scene } = await loadScenario(MANOR);

      expect(scene).toContain('Thornfield Manor');
      expect(world.getWorldSummary()).toEqual({
        totalFacts: 7,
        totalEvents: 3,
        totalRelationships: 2,
        totalScheduleEntries: 3,
        publicFacts: 5,
        privateFacts: 2,
        locations: ['Library', 'Sitting Room', 'Dining Room', 'Kitchen', 'Garden'],
        characters: ['Elias Thornfield', 'Helena', 'Nathan', 'Marta'],
      });
      expect(npcs.map((n) => n.name)).toEqual(['Nathan', 'Marta']);
      expect(npcs[0]?.getEmotionalState()).toBe('guarded');
    });

    it('should keep typed fact values', async () => {
      const { world } = await loadScenario(MANOR);

      expect(world.getFact('death_event')).toEqual({ kind: 'reference', ref: 'evt_death' });
      expect(world.getFact('guests_at_dinner')).toEqual({ kind: 'number', value: 3 });
      expect(world.getFact('will_rewritten')).toEqual({ kind: 'boolean', value: true });
      expect(world.getFactDetails('nathan_alibi')?.anchor).toEqual({ day: 1, period: 'early_evening' });
    });

    it('should keep event ordering and causes', async () => {
      const { world } = await loadScenario(MANOR);

      expect(world.getTimeline().map((e) => e.eventId)).toEqual(['evt_dinner', 'evt_tea', 'evt_death']);
      expect(world.getCausalChain('evt_death').map((e) => e.eventId)).toEqual([
        'evt_dinner',
        'evt_tea',
        'evt_death',
      ]);
    });

    it('should apply visibility to the loaded data', async () => {
      const { world } = await loadScenario(MANOR);
      const visibility = new VisibilityResolver(world);

      expect(visibility.knows('Nathan', 'cause_of_death')).toBe(true);
      expect(visibility.knows('Helena', 'cause_of_death')).toBe(false);
      expect(visibility.getVisibleSchedule('Helena', 'Nathan').map((e) => e.location)).toEqual(['Sitting Room']);
    });

    it('should fail on a missing file', async () => {
      await expect(loadScenario(MANOR.replace('manor.json', 'absent.json'))).rejects.toThrow(ValidationError);
    });
  });

  describe('buildScenario', () => {
    it('should accept an empty document', () => {
      const { world, npcs, scene } = buildScenario({});
      expect(world.getWorldSummary().totalFacts).toBe(0);
      expect(npcs).toEqual([]);
      expect(scene).toBe('');
    });

    it('should reject a document that is not an object', () => {
      expect(fieldOf(() => buildScenario([]))).toBe('scenario');
    });

    it('should name the field of a bad record', () => {
      expect(fieldOf(() => buildScenario({ facts: [{ key: 'x' }] }))).toBe('facts[0].value');
      expect(fieldOf(() => buildScenario({ locations: ['Hall', 7] }))).toBe('locations[1]');
      expect(
        fieldOf(() => buildScenario({ schedule: [{ character: 'A', day: '1', period: 'noon', location: 'Hall', activity: 'x' }] })),
      ).toBe('schedule[0].day');
      expect(fieldOf(() => buildScenario({ npcs: [{ name: 'A' }] }))).toBe('npcs[0].personality');
    });

    it('should describe an unsupported fact value', () => {
      try {
        buildScenario({ facts: [{ key: 'k', value: 'v' }, { key: 'x', value: { id: 'evt' } }] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.field).toBe('facts[1].value');
          expect(error.message).toBe('facts[1].value: must be a string, number, boolean or { "ref": string }');
        }
      }
    });

    it('should check the whole document before touching the world', () => {
      expect(
        fieldOf(() =>
          buildScenario({
            schedule: [{ character: 'A', day: 1, period: 'teatime', location: 'Hall', activity: 'Tea' }],
            npcs: [{ name: 'A', personality: 'p', goals: 'none' }],
          }),
        ),
      ).toBe('npcs[0].goals');
    });

    it('should prefix world-model errors with the record path', () => {
      expect(
        fieldOf(() =>
          buildScenario({
            relationships: [
              { characterA: 'A', characterB: 'B', relationshipType: 't', description: '', strength: 12 },
            ],
          }),
        ),
      ).toBe('relationships[0].strength');
    });

    it('should pass through invalid periods with the record path', () => {
      try {
        buildScenario({
          schedule: [{ character: 'A', day: 1, period: 'teatime', location: 'Hall', activity: 'Tea' }],
        });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidPeriodError);
        if (error instanceof InvalidPeriodError) {
          expect(error.context.path).toBe('schedule[0]');
        }
      }
    });

    it('should validate NPC traits', () => {
      expect(
        fieldOf(() =>
          buildScenario({
            npcs: [{ name: 'A', personality: 'p', traits: [{ name: 't', description: 'd', intensity: 0 }] }],
          }),
        ),
      ).toBe('npcs[0].intensity');
    });
  });
});
