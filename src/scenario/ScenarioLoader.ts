/**
 * ScenarioLoader - builds a world and its NPCs from a JSON document
 *
 * Scenario documents are untrusted input. The whole document is checked
 * against the zod schema before anything reaches the world model; a bad
 * record throws a ValidationError naming the field path (e.g.
 * "schedule[2].day").
 *
 * @module scenario/ScenarioLoader
 */

import { readFile } from 'fs/promises';
import { CharacterAgent } from '../core/agent/index.js';
import { EngineError, getErrorMessage, ValidationError } from '../core/errors.js';
import { WorldModel } from '../core/WorldModel.js';
import { logger } from '../services/Logger.js';
import { firstIssue, formatIssuePath } from '../utils/issues.js';
import { ScenarioSchema, type ScenarioDocument } from './schema.js';

export interface Scenario {
  world: WorldModel;
  npcs: CharacterAgent[];
  scene: string;
}

/**
 * Check a document against the scenario schema; the first issue becomes a
 * ValidationError whose field is the issue path
 */
function parseDocument(data: unknown): ScenarioDocument {
  const result = ScenarioSchema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issue = firstIssue(result.error);
  const field = formatIssuePath(issue?.path ?? [], 'scenario');
  throw new ValidationError(`${field}: ${issue?.message ?? 'invalid scenario'}`, field, {
    context: { issues: result.error.issues.length },
  });
}

/**
 * Re-label errors raised by the world model with the path of the record
 * that caused them
 */
function atPath<T>(path: string, fn: () => T): T {
  try {
    return fn();
  } catch (error: unknown) {
    if (error instanceof ValidationError) {
      const field = error.field ? `${path}.${error.field}` : path;
      throw new ValidationError(`${path}: ${error.message}`, field, { cause: error });
    }
    if (error instanceof EngineError) {
      throw error.withContext({ path });
    }
    throw error;
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Build a scenario from a parsed JSON document
 */
export function buildScenario(data: unknown): Scenario {
  const doc = parseDocument(data);
  const world = new WorldModel();

  doc.locations.forEach((location) => world.addLocation(location));
  doc.characters.forEach((name) => world.addCharacter(name));

  doc.events.forEach((input, i) => atPath(`events[${i}]`, () => world.addEvent(input)));
  doc.facts.forEach((input, i) => atPath(`facts[${i}]`, () => world.addFact(input)));
  doc.relationships.forEach((input, i) =>
    atPath(`relationships[${i}]`, () => world.addRelationship(input)),
  );
  doc.schedule.forEach((input, i) =>
    atPath(`schedule[${i}]`, () => world.schedule.addScheduleEntry(input)),
  );

  const npcs = doc.npcs.map((profile, i) => {
    const npc = atPath(`npcs[${i}]`, () => new CharacterAgent(profile));
    world.addCharacter(npc.name);
    return npc;
  });

  const summary = world.getWorldSummary();
  logger.debug(
    `Scenario loaded: ${summary.totalFacts} facts, ${summary.totalEvents} events, ` +
      `${summary.totalScheduleEntries} schedule entries, ${npcs.length} NPCs`,
  );

  return { world, npcs, scene: doc.scene };
}

/**
 * Read and build a scenario file
 */
export async function loadScenario(path: string): Promise<Scenario> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error: unknown) {
    throw new ValidationError(`Cannot read scenario ${path}: ${getErrorMessage(error)}`, undefined, {
      cause: error instanceof Error ? error : undefined,
      context: { path },
    });
  }
  return buildScenario(data);
}
