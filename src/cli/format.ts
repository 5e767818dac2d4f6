/**
 * CLI report formatting
 * Plain text, one line per record; bin/ adds the colour.
 *
 * @module cli/format
 */

import { normalizeError } from '../core/errors.js';
import { formatFactValue } from '../core/FactValue.js';
import { formatTimeBlock } from '../core/TimeBlock.js';
import type {
  CharacterKnowledge,
  ScheduleEntry,
  StatementValidation,
  ValidationResult,
  ValidationSummary,
  WorldSummary,
} from '../types/index.js';

export function formatWorldSummary(summary: WorldSummary): string[] {
  return [
    `Facts: ${summary.totalFacts} (${summary.publicFacts} public, ${summary.privateFacts} private)`,
    `Events: ${summary.totalEvents}`,
    `Relationships: ${summary.totalRelationships}`,
    `Schedule entries: ${summary.totalScheduleEntries}`,
    `Locations: ${summary.locations.join(', ') || '(none)'}`,
    `Characters: ${summary.characters.join(', ') || '(none)'}`,
  ];
}

export function formatScheduleEntry(entry: ScheduleEntry): string {
  const company = entry.companions.length > 0 ? ` with ${entry.companions.join(', ')}` : '';
  const visibility = entry.isPublic ? '' : ' [private]';
  return `${formatTimeBlock(entry.block)}: ${entry.location} - ${entry.activity}${company}${visibility}`;
}

export function formatKnowledge(knowledge: CharacterKnowledge): string[] {
  const lines = [`Knowledge of ${knowledge.character}`];

  lines.push(`Facts (${knowledge.knownFacts.length}):`);
  for (const fact of knowledge.knownFacts) {
    lines.push(`  ${fact.key} = ${formatFactValue(fact.value)} [${fact.category}]`);
  }

  lines.push(`Events (${knowledge.knownEvents.length}):`);
  for (const event of knowledge.knownEvents) {
    lines.push(`  ${event.eventId}: ${event.description} (${event.timestamp}, ${event.location})`);
  }

  lines.push(`Relationships (${knowledge.relationships.length}):`);
  for (const rel of knowledge.relationships) {
    lines.push(`  ${rel.with}: ${rel.type} - ${rel.description}`);
  }

  lines.push(`Schedule (${knowledge.schedule.length}):`);
  for (const entry of knowledge.schedule) {
    lines.push(`  ${formatScheduleEntry(entry)}`);
  }

  return lines;
}

export function formatVerdict(result: ValidationResult): string {
  const status = result.isValid ? 'OK  ' : 'FAIL';
  const flag = result.isLie ? ' [LIE]' : result.isOmission ? ' [OMISSION]' : '';
  return `${status} ${result.claim.category} "${result.claim.claimText}"${flag}: ${result.reason}`;
}

export function formatStatementCheck(validation: StatementValidation): string[] {
  if (validation.results.length === 0) {
    return ['No claims found'];
  }
  return [
    ...validation.results.map(formatVerdict),
    `Statement ${validation.isValid ? 'consistent' : 'inconsistent'}`,
  ];
}

export function formatValidationSummary(summary: ValidationSummary): string {
  return (
    `${summary.validClaims}/${summary.totalValidations} claims valid ` +
    `(${summary.accuracyRate.toFixed(1)}%), ${summary.intentionalLies} lies`
  );
}

/**
 * "[CODE] message", with the record path when the error carries one
 */
export function formatError(error: unknown): string {
  const normalized = normalizeError(error);
  const path = normalized.context.path;
  const where = typeof path === 'string' ? ` (at ${path})` : '';
  return `[${normalized.code}] ${normalized.message}${where}`;
}
