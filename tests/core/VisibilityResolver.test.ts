/**
 * Tests for VisibilityResolver
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { VisibilityResolver } from '../../src/core/VisibilityResolver.js';
import { WorldModel } from '../../src/core/WorldModel.js';

describe('VisibilityResolver', () => {
  let world: WorldModel;
  let visibility: VisibilityResolver;

  beforeEach(() => {
    world = new WorldModel();
    visibility = new VisibilityResolver(world);

    world.addFact({ key: 'victim', value: 'Elias', category: 'death' });
    world.addFact({ key: 'cause_of_death', value: 'Poison', category: 'death', isPublic: false, witnesses: ['Nathan'] });
    world.addFact({ key: 'will_changed', value: true, isPublic: false, witnesses: ['Helena', 'Marta'] });
  });

  describe('knows', () => {
    it('should equal isPublic or witnessed for every fact and character', () => {
      const characters = ['Nathan', 'Helena', 'Marta', 'Stranger'];
      for (const fact of world.queryFacts()) {
        for (const character of characters) {
          expect(visibility.knows(character, fact.key)).toBe(
            fact.isPublic || fact.witnesses.includes(character),
          );
        }
      }
    });

    it('should be false for an unknown fact', () => {
      expect(visibility.knows('Nathan', 'weapon')).toBe(false);
    });

    it('should compare names exactly', () => {
      expect(visibility.knows('nathan', 'cause_of_death')).toBe(false);
    });
  });

  describe('events', () => {
    it('should know events taken part in or witnessed', () => {
      world.addEvent({
        eventId: 'evt_argument',
        description: 'Raised voices in the study',
        timestamp: 'Day 1 - afternoon',
        location: 'Study',
        participants: ['Elias', 'Helena'],
        witnesses: ['Marta'],
      });

      expect(visibility.knowsEvent('Helena', 'evt_argument')).toBe(true);
      expect(visibility.knowsEvent('Marta', 'evt_argument')).toBe(true);
      expect(visibility.knowsEvent('Nathan', 'evt_argument')).toBe(false);
      expect(visibility.knowsEvent('Marta', 'evt_missing')).toBe(false);
    });
  });

  describe('schedule visibility', () => {
    beforeEach(() => {
      world.schedule.addScheduleEntry({ character: 'Nathan', day: 1, period: 'afternoon', location: 'Garden', activity: 'Walking' });
      world.schedule.addScheduleEntry({
        character: 'Nathan',
        day: 1,
        period: 'early_evening',
        location: 'Cellar',
        activity: 'Meeting in secret',
        isPublic: false,
        companions: ['Marta'],
      });
    });

    it('should hide private entries from non-witnesses', () => {
      expect(visibility.getVisibleSchedule('Helena', 'Nathan').map((e) => e.location)).toEqual(['Garden']);
    });

    it('should show private entries to companions', () => {
      expect(visibility.getVisibleSchedule('Marta', 'Nathan').map((e) => e.location)).toEqual(['Garden', 'Cellar']);
    });

    it('should always show a character their own schedule', () => {
      const [, secret] = world.schedule.getCharacterSchedule('Nathan');
      expect(secret).toBeDefined();
      if (secret) {
        expect(visibility.canSeeScheduleEntry('Nathan', secret)).toBe(true);
      }
    });
  });

  describe('exportCharacterKnowledge', () => {
    it('should bundle facts, events, relationships and schedule', () => {
      world.addEvent({
        eventId: 'evt_dinner',
        description: 'Dinner',
        timestamp: 'Day 1 - evening',
        location: 'Dining Room',
        participants: ['Nathan'],
      });
      world.addRelationship({
        characterA: 'Helena',
        characterB: 'Nathan',
        relationshipType: 'cousins',
        description: 'Old rivals',
      });
      world.schedule.addScheduleEntry({ character: 'Nathan', day: 1, period: 'evening', location: 'Dining Room', activity: 'Dinner' });

      const knowledge = visibility.exportCharacterKnowledge('Nathan');

      expect(knowledge.character).toBe('Nathan');
      expect(knowledge.knownFacts).toEqual([
        { key: 'victim', value: { kind: 'string', value: 'Elias' }, category: 'death' },
        { key: 'cause_of_death', value: { kind: 'string', value: 'Poison' }, category: 'death' },
      ]);
      expect(knowledge.knownEvents).toEqual([
        { eventId: 'evt_dinner', description: 'Dinner', timestamp: 'Day 1 - evening', location: 'Dining Room' },
      ]);
      expect(knowledge.relationships).toEqual([{ with: 'Helena', type: 'cousins', description: 'Old rivals' }]);
      expect(knowledge.schedule.map((e) => e.location)).toEqual(['Dining Room']);
    });

    it('should give an unknown character only public facts', () => {
      const knowledge = visibility.exportCharacterKnowledge('Stranger');
      expect(knowledge.knownFacts.map((f) => f.key)).toEqual(['victim']);
      expect(knowledge.knownEvents).toEqual([]);
      expect(knowledge.relationships).toEqual([]);
      expect(knowledge.schedule).toEqual([]);
    });
  });
});
