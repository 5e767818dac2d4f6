/**
 * Testimony Engine - World Types
 *
 * Records held by the WorldModel. Everything here is ground truth: what
 * happened, where everyone was, and who is entitled to know it.
 */

import type { TimePeriod } from '../config/constants.js';

// ============================================
// Fact values
// ============================================

/**
 * Typed fact value. References point at another world entity by id
 * (an event, a character, a location).
 */
export type FactValue =
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'reference'; ref: string };

/**
 * Anything accepted where a fact value is expected
 */
export type FactValueInput = FactValue | string | number | boolean;

// ============================================
// Time
// ============================================

export interface TimeBlock {
  /** Day number, starting at 1 */
  readonly day: number;
  readonly period: TimePeriod;
}

// ============================================
// Facts
// ============================================

export interface Fact {
  readonly key: string;
  readonly value: FactValue;
  /** e.g. "setting", "death", "testimony", "alibi" */
  readonly category: string;
  /** Public facts are common knowledge */
  readonly isPublic: boolean;
  /** Characters permitted to know a non-public fact, in insertion order */
  readonly witnesses: readonly string[];
  /** Who established this fact */
  readonly source: string;
  /** Display timestamp */
  readonly timestamp?: string;
  /** Event this fact arises from */
  readonly eventId?: string;
  /** Schedule slot this fact is anchored to */
  readonly anchor?: TimeBlock;
}

export interface FactInput {
  key: string;
  value: FactValueInput;
  category?: string;
  isPublic?: boolean;
  witnesses?: readonly string[];
  source?: string;
  timestamp?: string;
  eventId?: string;
  scheduleDay?: number;
  schedulePeriod?: string;
}

export interface FactQuery {
  category?: string;
  isPublic?: boolean;
}

// ============================================
// Events
// ============================================

export interface WorldEvent {
  readonly eventId: string;
  readonly description: string;
  /** Display timestamp, e.g. "Day 1 - Early Evening" */
  readonly timestamp: string;
  readonly location: string;
  readonly participants: readonly string[];
  readonly witnesses: readonly string[];
  readonly details: Readonly<Record<string, unknown>>;
  /** Tie-break among events sharing a timestamp */
  readonly sequenceOrder: number;
  /** eventId of the event that led to this one; not checked for existence */
  readonly causedBy?: string;
}

export interface EventInput {
  eventId: string;
  description: string;
  timestamp: string;
  location: string;
  participants?: readonly string[];
  witnesses?: readonly string[];
  details?: Record<string, unknown>;
  sequenceOrder?: number;
  causedBy?: string;
}

// ============================================
// Relationships
// ============================================

export interface Relationship {
  readonly characterA: string;
  readonly characterB: string;
  /** e.g. "siblings", "employee", "acquaintance" */
  readonly relationshipType: string;
  readonly description: string;
  /** 1-10 */
  readonly strength: number;
  readonly isPublic: boolean;
}

export interface RelationshipInput {
  characterA: string;
  characterB: string;
  relationshipType: string;
  description: string;
  strength?: number;
  isPublic?: boolean;
}

// ============================================
// Schedule
// ============================================

export interface ScheduleEntry {
  readonly character: string;
  readonly block: TimeBlock;
  readonly location: string;
  readonly activity: string;
  readonly companions: readonly string[];
  readonly isPublic: boolean;
  /** Explicit witnesses, the character and every companion */
  readonly witnesses: readonly string[];
  readonly notes: string;
}

export interface ScheduleEntryInput {
  character: string;
  day: number;
  period: string;
  location: string;
  activity: string;
  companions?: readonly string[];
  isPublic?: boolean;
  witnesses?: readonly string[];
  notes?: string;
}

export interface LocationCheck {
  /** True when the claim matches, or when nothing is recorded for the slot */
  isConsistent: boolean;
  /** Recorded location, absent when the slot has no entry */
  actualLocation: string | undefined;
}

// ============================================
// Summaries and knowledge export
// ============================================

export interface WorldSummary {
  totalFacts: number;
  totalEvents: number;
  totalRelationships: number;
  totalScheduleEntries: number;
  publicFacts: number;
  privateFacts: number;
  locations: string[];
  characters: string[];
}

export interface KnownFact {
  key: string;
  value: FactValue;
  category: string;
}

export interface KnownEvent {
  eventId: string;
  description: string;
  timestamp: string;
  location: string;
}

export interface KnownRelationship {
  with: string;
  type: string;
  description: string;
}

/**
 * Everything a character may truthfully reference
 */
export interface CharacterKnowledge {
  character: string;
  knownFacts: KnownFact[];
  knownEvents: KnownEvent[];
  relationships: KnownRelationship[];
  schedule: ScheduleEntry[];
}
