/**
 * Scenario document schemas
 *
 * Shapes only. Ranges and periods are left to the world model and the
 * agents, which report them with their own error types.
 *
 * @module scenario/schema
 */

import { z } from 'zod';
import { reference } from '../core/FactValue.js';

const names = z.array(z.string());

/** JSON scalar, or { "ref": "<id>" } for a reference */
export const FactValueSchema = z.union(
  [
    z.string(),
    z.number(),
    z.boolean(),
    z.object({ ref: z.string() }).transform((value) => reference(value.ref)),
  ],
  { errorMap: () => ({ message: 'must be a string, number, boolean or { "ref": string }' }) },
);

export const FactSchema = z.object({
  key: z.string(),
  value: FactValueSchema,
  category: z.string().optional(),
  isPublic: z.boolean().optional(),
  witnesses: names.optional(),
  source: z.string().optional(),
  timestamp: z.string().optional(),
  eventId: z.string().optional(),
  scheduleDay: z.number().optional(),
  schedulePeriod: z.string().optional(),
});

export const EventSchema = z.object({
  eventId: z.string(),
  description: z.string(),
  timestamp: z.string(),
  location: z.string(),
  participants: names.optional(),
  witnesses: names.optional(),
  details: z.record(z.unknown()).optional(),
  sequenceOrder: z.number().optional(),
  causedBy: z.string().optional(),
});

export const RelationshipSchema = z.object({
  characterA: z.string(),
  characterB: z.string(),
  relationshipType: z.string(),
  description: z.string(),
  strength: z.number().optional(),
  isPublic: z.boolean().optional(),
});

export const ScheduleEntrySchema = z.object({
  character: z.string(),
  day: z.number(),
  period: z.string(),
  location: z.string(),
  activity: z.string(),
  companions: names.optional(),
  isPublic: z.boolean().optional(),
  witnesses: names.optional(),
  notes: z.string().optional(),
});

export const TraitSchema = z.object({
  name: z.string(),
  description: z.string(),
  intensity: z.number(),
});

export const NpcSchema = z.object({
  name: z.string(),
  personality: z.string(),
  background: z.string().optional(),
  goals: names.optional(),
  fears: names.optional(),
  secrets: names.optional(),
  traits: z.array(TraitSchema).optional(),
  relationships: z.record(z.string()).optional(),
  currentLocation: z.string().optional(),
  emotionalState: z.string().optional(),
});

export const ScenarioSchema = z.object({
  scene: z.string().default(''),
  locations: names.default([]),
  characters: names.default([]),
  events: z.array(EventSchema).default([]),
  facts: z.array(FactSchema).default([]),
  relationships: z.array(RelationshipSchema).default([]),
  schedule: z.array(ScheduleEntrySchema).default([]),
  npcs: z.array(NpcSchema).default([]),
});

export type ScenarioDocument = z.infer<typeof ScenarioSchema>;
