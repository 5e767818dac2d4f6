/**
 * Tests for WorldModel
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidPeriodError, ValidationError } from '../../src/core/errors.js';
import { reference } from '../../src/core/FactValue.js';
import { WorldModel } from '../../src/core/WorldModel.js';

describe('WorldModel', () => {
  let world: WorldModel;

  beforeEach(() => {
    world = new WorldModel();
  });

  describe('facts', () => {
    it('should store a fact with defaults', () => {
      const fact = world.addFact({ key: 'victim', value: 'Elias' });

      expect(fact).toEqual({
        key: 'victim',
        value: { kind: 'string', value: 'Elias' },
        category: 'general',
        isPublic: true,
        witnesses: [],
        source: 'world',
        timestamp: undefined,
        eventId: undefined,
        anchor: undefined,
      });
      expect(Object.isFrozen(fact)).toBe(true);
      expect(world.getFact('victim')).toEqual({ kind: 'string', value: 'Elias' });
    });

    it('should return undefined for a missing key', () => {
      expect(world.getFact('weapon')).toBeUndefined();
      expect(world.getFactDetails('weapon')).toBeUndefined();
      expect(world.hasFact('weapon')).toBe(false);
    });

    it('should overwrite by key', () => {
      world.addFact({ key: 'weather', value: 'rain' });
      world.addFact({ key: 'weather', value: 'fog' });

      expect(world.getFact('weather')).toEqual({ kind: 'string', value: 'fog' });
      expect(world.queryFacts()).toHaveLength(1);
    });

    it('should dedupe witnesses in order', () => {
      const fact = world.addFact({
        key: 'affair',
        value: true,
        isPublic: false,
        witnesses: ['Helena', 'Nathan', 'Helena'],
      });
      expect(fact.witnesses).toEqual(['Helena', 'Nathan']);
    });

    it('should keep references as references', () => {
      world.addFact({ key: 'murder_event', value: reference('evt_poison') });
      expect(world.getFact('murder_event')).toEqual({ kind: 'reference', ref: 'evt_poison' });
    });

    it('should reject an empty key', () => {
      expect(() => world.addFact({ key: '  ', value: 'x' })).toThrow(ValidationError);
      expect(world.queryFacts()).toHaveLength(0);
    });

    it('should anchor a fact to a schedule slot', () => {
      const fact = world.addFact({
        key: 'nathan_alibi',
        value: 'Sitting Room',
        scheduleDay: 1,
        schedulePeriod: 'early_evening',
      });
      expect(fact.anchor).toEqual({ day: 1, period: 'early_evening' });
    });

    it('should reject a half-specified anchor', () => {
      expect(() => world.addFact({ key: 'alibi', value: 'x', scheduleDay: 1 })).toThrow(
        ValidationError,
      );
      expect(world.hasFact('alibi')).toBe(false);
    });

    it('should reject an anchor with an unknown period without storing', () => {
      expect(() =>
        world.addFact({ key: 'alibi', value: 'x', scheduleDay: 1, schedulePeriod: 'dusk' }),
      ).toThrow(InvalidPeriodError);
      expect(world.hasFact('alibi')).toBe(false);
    });

    it('should query by category and visibility', () => {
      world.addFact({ key: 'victim', value: 'Elias', category: 'death' });
      world.addFact({ key: 'cause_of_death', value: 'Poison', category: 'death', isPublic: false });
      world.addFact({ key: 'weather', value: 'rain', category: 'setting' });

      expect(world.queryFacts({ category: 'death' }).map((f) => f.key)).toEqual([
        'victim',
        'cause_of_death',
      ]);
      expect(world.queryFacts({ isPublic: false }).map((f) => f.key)).toEqual(['cause_of_death']);
      expect(
        world.queryFacts({ category: 'death', isPublic: true }).map((f) => f.key),
      ).toEqual(['victim']);
    });
  });

  describe('events', () => {
    it('should register location and characters of an event', () => {
      world.addEvent({
        eventId: 'evt_dinner',
        description: 'Dinner is served',
        timestamp: 'Day 1 - evening',
        location: 'Dining Room',
        participants: ['Elias', 'Helena'],
        witnesses: ['Marta'],
      });

      expect(world.getLocations()).toEqual(['Dining Room']);
      expect(world.getCharacters()).toEqual(['Elias', 'Helena', 'Marta']);
      expect(world.getEvent('evt_dinner')?.sequenceOrder).toBe(0);
    });

    it('should find events by location and by character', () => {
      world.addEvent({ eventId: 'a', description: 'A', timestamp: 't1', location: 'Library', participants: ['Nathan'] });
      world.addEvent({ eventId: 'b', description: 'B', timestamp: 't1', location: 'Garden', witnesses: ['Nathan'] });
      world.addEvent({ eventId: 'c', description: 'C', timestamp: 't2', location: 'Library', participants: ['Helena'] });

      expect(world.getEventsAtLocation('Library').map((e) => e.eventId)).toEqual(['a', 'c']);
      expect(world.getEventsAtLocation('library')).toEqual([]);
      expect(world.getEventsWithCharacter('Nathan').map((e) => e.eventId)).toEqual(['a', 'b']);
    });

    it('should reject a non-integer sequenceOrder', () => {
      expect(() =>
        world.addEvent({ eventId: 'x', description: 'X', timestamp: 't', location: 'Hall', sequenceOrder: 1.5 }),
      ).toThrow(ValidationError);
      expect(world.getEvent('x')).toBeUndefined();
    });

    it('should order the timeline by sequenceOrder within a timestamp', () => {
      world.addEvent({ eventId: 'second', description: '', timestamp: 'Day 1 - evening', location: 'Hall', sequenceOrder: 2 });
      world.addEvent({ eventId: 'later', description: '', timestamp: 'Day 1 - night', location: 'Hall', sequenceOrder: 1 });
      world.addEvent({ eventId: 'first', description: '', timestamp: 'Day 1 - evening', location: 'Hall', sequenceOrder: 1 });

      expect(world.getTimeline().map((e) => e.eventId)).toEqual(['first', 'second', 'later']);
    });

    it('should walk the causal chain root first', () => {
      world.addEvent({ eventId: 'quarrel', description: '', timestamp: 't1', location: 'Study' });
      world.addEvent({ eventId: 'poison', description: '', timestamp: 't2', location: 'Kitchen', causedBy: 'quarrel' });
      world.addEvent({ eventId: 'death', description: '', timestamp: 't3', location: 'Library', causedBy: 'poison' });

      expect(world.getCausalChain('death').map((e) => e.eventId)).toEqual(['quarrel', 'poison', 'death']);
    });

    it('should stop at a dangling cause and survive cycles', () => {
      world.addEvent({ eventId: 'orphan', description: '', timestamp: 't', location: 'Hall', causedBy: 'missing' });
      world.addEvent({ eventId: 'x', description: '', timestamp: 't', location: 'Hall', causedBy: 'y' });
      world.addEvent({ eventId: 'y', description: '', timestamp: 't', location: 'Hall', causedBy: 'x' });

      expect(world.getCausalChain('orphan').map((e) => e.eventId)).toEqual(['orphan']);
      expect(world.getCausalChain('x').map((e) => e.eventId)).toEqual(['y', 'x']);
      expect(world.getCausalChain('nope')).toEqual([]);
    });
  });

  describe('relationships', () => {
    it('should store relationships and find them from either side', () => {
      world.addRelationship({
        characterA: 'Helena',
        characterB: 'Elias',
        relationshipType: 'siblings',
        description: 'Estranged sister',
        strength: 3,
      });

      expect(world.getRelationships('Elias')).toHaveLength(1);
      expect(world.getRelationshipBetween('Elias', 'Helena')[0]?.relationshipType).toBe('siblings');
      expect(world.getCharacters()).toEqual(['Helena', 'Elias']);
    });

    it('should default strength to 5 and isPublic to true', () => {
      const rel = world.addRelationship({
        characterA: 'A',
        characterB: 'B',
        relationshipType: 'acquaintance',
        description: '',
      });
      expect(rel.strength).toBe(5);
      expect(rel.isPublic).toBe(true);
    });

    it('should reject strength outside 1-10', () => {
      for (const strength of [0, 11, 2.5]) {
        expect(() =>
          world.addRelationship({ characterA: 'A', characterB: 'B', relationshipType: 't', description: '', strength }),
        ).toThrow(ValidationError);
      }
      expect(world.getRelationships('A')).toEqual([]);
    });
  });

  describe('locations and characters', () => {
    it('should resolve locations case-insensitively to the registered spelling', () => {
      world.addLocation('Library');
      expect(world.resolveLocation('library')).toBe('Library');
      expect(world.hasLocation('LIBRARY')).toBe(true);
      expect(world.resolveLocation('Cellar')).toBeUndefined();
    });

    it('should keep registries free of duplicates', () => {
      world.addCharacter('Nathan');
      world.addCharacter('Nathan');
      world.addLocation('Hall');
      world.addLocation('Hall');
      expect(world.getCharacters()).toEqual(['Nathan']);
      expect(world.getLocations()).toEqual(['Hall']);
    });

    it('should match characters exactly', () => {
      world.addCharacter('Nathan');
      expect(world.hasCharacter('Nathan')).toBe(true);
      expect(world.hasCharacter('nathan')).toBe(false);
    });
  });

  it('should summarise the world', () => {
    world.addLocation('Library');
    world.addFact({ key: 'victim', value: 'Elias' });
    world.addFact({ key: 'cause_of_death', value: 'Poison', isPublic: false, witnesses: ['Nathan'] });
    world.schedule.addScheduleEntry({
      character: 'Nathan',
      day: 1,
      period: 'early_evening',
      location: 'Sitting Room',
      activity: 'Reading',
    });

    expect(world.getWorldSummary()).toEqual({
      totalFacts: 2,
      totalEvents: 0,
      totalRelationships: 0,
      totalScheduleEntries: 1,
      publicFacts: 1,
      privateFacts: 1,
      locations: ['Library'],
      characters: ['Nathan'],
    });
  });
});
