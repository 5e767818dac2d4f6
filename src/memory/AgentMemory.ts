/**
 * AgentMemory - what one NPC remembers saying, seeing and hiding
 *
 * Append-only log. Lies and omissions are also indexed separately so a
 * prompt can remind the character what it has already claimed; their order
 * is the order the turns happened in.
 */

import {
  DEFAULT_HISTORY_TURNS,
  MAX_EMOTIONAL_IMPACT,
  MIN_EMOTIONAL_IMPACT,
} from '../config/constants.js';
import type { ConversationTurn, MemoryEntry, MemoryType } from '../types/index.js';

function clampImpact(impact: number): number {
  return Math.min(MAX_EMOTIONAL_IMPACT, Math.max(MIN_EMOTIONAL_IMPACT, Math.round(impact)));
}

export class AgentMemory {
  private memories: MemoryEntry[] = [];
  private conversation: ConversationTurn[] = [];
  private liesTold: MemoryEntry[] = [];
  private omissionsMade: MemoryEntry[] = [];

  addMemory(
    type: MemoryType,
    content: string,
    context: Record<string, unknown> = {},
    emotionalImpact: number = 0,
  ): MemoryEntry {
    const entry: MemoryEntry = Object.freeze({
      timestamp: new Date().toISOString(),
      type,
      content,
      context: Object.freeze({ ...context }),
      emotionalImpact: clampImpact(emotionalImpact),
    });

    this.memories.push(entry);

    if (type === 'lie') {
      this.liesTold.push(entry);
    } else if (type === 'omission') {
      this.omissionsMade.push(entry);
    }

    return entry;
  }

  /**
   * Record a turn; also kept as a conversation memory
   */
  addConversationTurn(speaker: string, message: string): void {
    this.conversation.push(
      Object.freeze({ timestamp: new Date().toISOString(), speaker, message }),
    );
    this.addMemory('conversation', `${speaker}: ${message}`, { speaker });
  }

  getRecentConversation(turns: number = DEFAULT_HISTORY_TURNS): ConversationTurn[] {
    return turns > 0 ? this.conversation.slice(-turns) : [];
  }

  getRecentMemories(count: number): MemoryEntry[] {
    return count > 0 ? this.memories.slice(-count) : [];
  }

  getLiesTold(): MemoryEntry[] {
    return [...this.liesTold];
  }

  getOmissionsMade(): MemoryEntry[] {
    return [...this.omissionsMade];
  }

  getMemoryCount(): number {
    return this.memories.length;
  }

  getConversationLength(): number {
    return this.conversation.length;
  }

  /**
   * Forget the conversation only; memories, lies and omissions stay
   */
  resetConversation(): void {
    this.conversation = [];
  }
}
