/**
 * VisibilityResolver - who may truthfully know what
 *
 * A fact is knowable by a character iff it is public or the character
 * witnessed it. Stateless: every answer is recomputed from the world model.
 */

import type { WorldModel } from './WorldModel.js';
import type { CharacterKnowledge, ScheduleEntry } from '../types/index.js';

export class VisibilityResolver {
  constructor(private readonly world: WorldModel) {}

  /**
   * False for a key the world does not hold
   */
  knows(character: string, factKey: string): boolean {
    const fact = this.world.getFactDetails(factKey);
    if (!fact) {
      return false;
    }
    return fact.isPublic || fact.witnesses.includes(character);
  }

  knowsEvent(character: string, eventId: string): boolean {
    const event = this.world.getEvent(eventId);
    if (!event) {
      return false;
    }
    return event.participants.includes(character) || event.witnesses.includes(character);
  }

  canSeeScheduleEntry(character: string, entry: ScheduleEntry): boolean {
    return entry.isPublic || entry.witnesses.includes(character);
  }

  /**
   * The part of subject's schedule the observer is entitled to know
   */
  getVisibleSchedule(observer: string, subject: string, day?: number): ScheduleEntry[] {
    return this.world.schedule
      .getCharacterSchedule(subject, day)
      .filter((entry) => this.canSeeScheduleEntry(observer, entry));
  }

  /**
   * Briefing bundle for a generation call about this character: known facts,
   * events taken part in or witnessed, relationships, full schedule.
   */
  exportCharacterKnowledge(character: string): CharacterKnowledge {
    const knownFacts = this.world
      .queryFacts()
      .filter((fact) => this.knows(character, fact.key))
      .map((fact) => ({ key: fact.key, value: fact.value, category: fact.category }));

    const knownEvents = this.world.getEventsWithCharacter(character).map((event) => ({
      eventId: event.eventId,
      description: event.description,
      timestamp: event.timestamp,
      location: event.location,
    }));

    const relationships = this.world.getRelationships(character).map((r) => ({
      with: r.characterA === character ? r.characterB : r.characterA,
      type: r.relationshipType,
      description: r.description,
    }));

    return {
      character,
      knownFacts,
      knownEvents,
      relationships,
      schedule: this.world.schedule.getCharacterSchedule(character),
    };
  }
}
