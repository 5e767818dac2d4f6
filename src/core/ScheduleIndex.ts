/**
 * ScheduleIndex - per-character timeline of where everyone provably was
 *
 * Absence of data is never a contradiction: a slot with no entry verifies
 * any claimed location.
 */

import { logger } from '../services/Logger.js';
import { compareTimeBlocks, createTimeBlock } from './TimeBlock.js';
import type { LocationCheck, ScheduleEntry, ScheduleEntryInput } from '../types/index.js';

/**
 * The part of the world model the schedule needs to keep the character
 * registry in step with authored entries.
 */
export interface CharacterRegistry {
  addCharacter(name: string): void;
  getCharacters(): string[];
}

function uniqueInOrder(names: readonly string[]): string[] {
  return [...new Set(names)];
}

function sameLocation(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class ScheduleIndex {
  private schedules: Map<string, ScheduleEntry[]> = new Map();

  constructor(private readonly registry: CharacterRegistry) {}

  /**
   * Append an entry to a character's schedule.
   * Several entries may share a slot (movement within a period).
   *
   * @throws InvalidPeriodError for a period outside the canonical set
   * @throws ValidationError for a day that is not a positive integer
   */
  addScheduleEntry(input: ScheduleEntryInput): ScheduleEntry {
    // Validate before touching any state
    const block = createTimeBlock(input.day, input.period);
    const companions = uniqueInOrder(input.companions ?? []);

    const entry: ScheduleEntry = Object.freeze({
      character: input.character,
      block,
      location: input.location,
      activity: input.activity,
      companions: Object.freeze(companions),
      isPublic: input.isPublic ?? true,
      witnesses: Object.freeze(
        uniqueInOrder([...(input.witnesses ?? []), input.character, ...companions]),
      ),
      notes: input.notes ?? '',
    });

    this.registry.addCharacter(input.character);
    let list = this.schedules.get(input.character);
    if (!list) {
      list = [];
      this.schedules.set(input.character, list);
    }
    list.push(entry);

    logger.authored('schedule', `${input.character} @ Day ${block.day} ${block.period}: ${input.location}`);
    return entry;
  }

  /**
   * Entries for a character sorted by (day, period); empty for unknown characters
   */
  getCharacterSchedule(character: string, day?: number): ScheduleEntry[] {
    const entries = this.schedules.get(character) ?? [];
    const filtered = day === undefined ? [...entries] : entries.filter((e) => e.block.day === day);
    // Array.prototype.sort is stable, so same-slot entries keep authoring order
    return filtered.sort((a, b) => compareTimeBlocks(a.block, b.block));
  }

  /**
   * Location of the first entry in the slot, undefined if none
   */
  getCharacterLocationAtTime(character: string, day: number, period: string): string | undefined {
    const entries = this.schedules.get(character) ?? [];
    const match = entries.find((e) => e.block.day === day && e.block.period === period);
    return match?.location;
  }

  getCharactersAtLocationTime(location: string, day: number, period: string): string[] {
    return this.registry.getCharacters().filter((character) => {
      const actual = this.getCharacterLocationAtTime(character, day, period);
      return actual !== undefined && sameLocation(actual, location);
    });
  }

  verifyCharacterClaimTimeLocation(
    character: string,
    claimedLocation: string,
    day: number,
    period: string,
  ): LocationCheck {
    const actualLocation = this.getCharacterLocationAtTime(character, day, period);
    if (actualLocation === undefined) {
      return { isConsistent: true, actualLocation: undefined };
    }
    return {
      isConsistent: sameLocation(actualLocation, claimedLocation),
      actualLocation,
    };
  }

  /**
   * Every entry in a slot, grouped by character in order of first scheduling
   */
  getEntriesAt(day: number, period: string): ScheduleEntry[] {
    const entries: ScheduleEntry[] = [];
    for (const list of this.schedules.values()) {
      entries.push(...list.filter((e) => e.block.day === day && e.block.period === period));
    }
    return entries;
  }

  getEntryCount(): number {
    let count = 0;
    for (const list of this.schedules.values()) {
      count += list.length;
    }
    return count;
  }
}
