/**
 * WorldModel - authoritative store of what actually happened
 *
 * Single owner of facts, events, relationships, locations, the character
 * registry and the schedule. Every mutation is last-write-wins by key/id;
 * nothing is versioned. Queries return copies, never the backing maps.
 */

import {
  DEFAULT_FACT_CATEGORY,
  DEFAULT_FACT_SOURCE,
  DEFAULT_RELATIONSHIP_STRENGTH,
  MAX_RELATIONSHIP_STRENGTH,
  MIN_RELATIONSHIP_STRENGTH,
} from '../config/constants.js';
import { logger } from '../services/Logger.js';
import { ValidationError } from './errors.js';
import { toFactValue } from './FactValue.js';
import { ScheduleIndex } from './ScheduleIndex.js';
import { createTimeBlock } from './TimeBlock.js';
import type {
  EventInput,
  Fact,
  FactInput,
  FactQuery,
  FactValue,
  Relationship,
  RelationshipInput,
  TimeBlock,
  WorldEvent,
  WorldSummary,
} from '../types/index.js';

function requireText(value: string, field: string): void {
  if (value.trim().length === 0) {
    throw new ValidationError(`${field} must not be empty`, field);
  }
}

function uniqueInOrder(names: readonly string[]): string[] {
  return [...new Set(names)];
}

export class WorldModel {
  private facts: Map<string, Fact> = new Map();
  private events: Map<string, WorldEvent> = new Map();
  private relationships: Relationship[] = [];
  private locations: Set<string> = new Set();
  private characters: Set<string> = new Set();

  readonly schedule: ScheduleIndex;

  constructor() {
    this.schedule = new ScheduleIndex(this);
  }

  // ===========================================================================
  // FACTS
  // ===========================================================================

  /**
   * Add or overwrite a fact by key
   *
   * @throws InvalidPeriodError if the schedule anchor names an unknown period
   * @throws ValidationError if the key is empty or the anchor is incomplete
   */
  addFact(input: FactInput): Fact {
    requireText(input.key, 'key');

    let anchor: TimeBlock | undefined;
    if (input.scheduleDay !== undefined || input.schedulePeriod !== undefined) {
      if (input.scheduleDay === undefined || input.schedulePeriod === undefined) {
        throw new ValidationError(
          `Fact '${input.key}': schedule anchor needs both a day and a period`,
          'schedulePeriod',
        );
      }
      anchor = createTimeBlock(input.scheduleDay, input.schedulePeriod);
    }

    const fact: Fact = Object.freeze({
      key: input.key,
      value: Object.freeze(toFactValue(input.value)),
      category: input.category ?? DEFAULT_FACT_CATEGORY,
      isPublic: input.isPublic ?? true,
      witnesses: Object.freeze(uniqueInOrder(input.witnesses ?? [])),
      source: input.source ?? DEFAULT_FACT_SOURCE,
      timestamp: input.timestamp,
      eventId: input.eventId,
      anchor,
    });

    this.facts.set(fact.key, fact);
    logger.authored('fact', fact.key);
    return fact;
  }

  /**
   * Fact value by key, undefined when absent
   */
  getFact(key: string): FactValue | undefined {
    return this.facts.get(key)?.value;
  }

  getFactDetails(key: string): Fact | undefined {
    return this.facts.get(key);
  }

  hasFact(key: string): boolean {
    return this.facts.has(key);
  }

  queryFacts(query: FactQuery = {}): Fact[] {
    let results = Array.from(this.facts.values());

    if (query.category) {
      results = results.filter((f) => f.category === query.category);
    }

    if (query.isPublic !== undefined) {
      results = results.filter((f) => f.isPublic === query.isPublic);
    }

    return results;
  }

  // ===========================================================================
  // EVENTS
  // ===========================================================================

  /**
   * Add or overwrite an event. Registers its location and everyone involved.
   * causedBy is stored as given.
   */
  addEvent(input: EventInput): WorldEvent {
    requireText(input.eventId, 'eventId');
    if (input.sequenceOrder !== undefined && !Number.isInteger(input.sequenceOrder)) {
      throw new ValidationError(
        `Event '${input.eventId}': sequenceOrder must be an integer`,
        'sequenceOrder',
      );
    }

    const participants = uniqueInOrder(input.participants ?? []);
    const witnesses = uniqueInOrder(input.witnesses ?? []);

    const event: WorldEvent = Object.freeze({
      eventId: input.eventId,
      description: input.description,
      timestamp: input.timestamp,
      location: input.location,
      participants: Object.freeze(participants),
      witnesses: Object.freeze(witnesses),
      details: Object.freeze({ ...(input.details ?? {}) }),
      sequenceOrder: input.sequenceOrder ?? 0,
      causedBy: input.causedBy,
    });

    this.events.set(event.eventId, event);
    this.addLocation(event.location);
    for (const character of [...participants, ...witnesses]) {
      this.addCharacter(character);
    }

    logger.authored('event', event.eventId);
    return event;
  }

  getEvent(eventId: string): WorldEvent | undefined {
    return this.events.get(eventId);
  }

  getEventsAtLocation(location: string): WorldEvent[] {
    return Array.from(this.events.values()).filter((e) => e.location === location);
  }

  /**
   * Events the character took part in or witnessed
   */
  getEventsWithCharacter(character: string): WorldEvent[] {
    return Array.from(this.events.values()).filter(
      (e) => e.participants.includes(character) || e.witnesses.includes(character),
    );
  }

  /**
   * Events grouped by display timestamp (in order of first appearance),
   * ordered by sequenceOrder within each timestamp
   */
  getTimeline(): WorldEvent[] {
    const groups = new Map<string, WorldEvent[]>();
    for (const event of this.events.values()) {
      const group = groups.get(event.timestamp);
      if (group) {
        group.push(event);
      } else {
        groups.set(event.timestamp, [event]);
      }
    }

    const timeline: WorldEvent[] = [];
    for (const group of groups.values()) {
      timeline.push(...group.sort((a, b) => a.sequenceOrder - b.sequenceOrder));
    }
    return timeline;
  }

  /**
   * Walk causedBy links back from an event. Returned root cause first.
   * Stops at a dangling reference or when a cycle closes.
   */
  getCausalChain(eventId: string): WorldEvent[] {
    const chain: WorldEvent[] = [];
    const seen = new Set<string>();
    let current = this.events.get(eventId);

    while (current && !seen.has(current.eventId)) {
      seen.add(current.eventId);
      chain.unshift(current);
      current = current.causedBy !== undefined ? this.events.get(current.causedBy) : undefined;
    }

    return chain;
  }

  // ===========================================================================
  // RELATIONSHIPS
  // ===========================================================================

  /**
   * @throws ValidationError if strength is not an integer in 1-10
   */
  addRelationship(input: RelationshipInput): Relationship {
    const strength = input.strength ?? DEFAULT_RELATIONSHIP_STRENGTH;
    if (
      !Number.isInteger(strength) ||
      strength < MIN_RELATIONSHIP_STRENGTH ||
      strength > MAX_RELATIONSHIP_STRENGTH
    ) {
      throw new ValidationError(
        `Relationship strength must be an integer from ${MIN_RELATIONSHIP_STRENGTH} to ${MAX_RELATIONSHIP_STRENGTH}, got ${strength}`,
        'strength',
      );
    }

    const relationship: Relationship = Object.freeze({
      characterA: input.characterA,
      characterB: input.characterB,
      relationshipType: input.relationshipType,
      description: input.description,
      strength,
      isPublic: input.isPublic ?? true,
    });

    this.relationships.push(relationship);
    this.addCharacter(input.characterA);
    this.addCharacter(input.characterB);

    logger.authored('relationship', `${input.characterA} <-> ${input.characterB}`);
    return relationship;
  }

  getRelationships(character: string): Relationship[] {
    return this.relationships.filter(
      (r) => r.characterA === character || r.characterB === character,
    );
  }

  /**
   * Relationships between two characters, in either order
   */
  getRelationshipBetween(characterA: string, characterB: string): Relationship[] {
    return this.relationships.filter(
      (r) =>
        (r.characterA === characterA && r.characterB === characterB) ||
        (r.characterA === characterB && r.characterB === characterA),
    );
  }

  // ===========================================================================
  // LOCATIONS & CHARACTERS
  // ===========================================================================

  addLocation(location: string): void {
    this.locations.add(location);
  }

  /**
   * Registered spelling of a location, matched case-insensitively
   */
  resolveLocation(location: string): string | undefined {
    const wanted = location.toLowerCase();
    for (const known of this.locations) {
      if (known.toLowerCase() === wanted) {
        return known;
      }
    }
    return undefined;
  }

  hasLocation(location: string): boolean {
    return this.resolveLocation(location) !== undefined;
  }

  getLocations(): string[] {
    return Array.from(this.locations);
  }

  addCharacter(character: string): void {
    this.characters.add(character);
  }

  hasCharacter(character: string): boolean {
    return this.characters.has(character);
  }

  getCharacters(): string[] {
    return Array.from(this.characters);
  }

  // ===========================================================================
  // SUMMARY
  // ===========================================================================

  getWorldSummary(): WorldSummary {
    const facts = Array.from(this.facts.values());
    const publicFacts = facts.filter((f) => f.isPublic).length;

    return {
      totalFacts: facts.length,
      totalEvents: this.events.size,
      totalRelationships: this.relationships.length,
      totalScheduleEntries: this.schedule.getEntryCount(),
      publicFacts,
      privateFacts: facts.length - publicFacts,
      locations: this.getLocations(),
      characters: this.getCharacters(),
    };
  }
}
