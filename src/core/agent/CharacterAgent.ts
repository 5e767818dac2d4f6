/**
 * CharacterAgent - an NPC with a profile, secrets and a memory
 *
 * Knowledge is not authored here: it is synced from the world model
 * through the visibility rules, so an agent can only be briefed on what it
 * is entitled to know.
 *
 * @module core/agent/CharacterAgent
 */

import {
  DEFAULT_PROMPT_LIES,
  DEFAULT_PROMPT_MEMORIES,
  DEFAULT_PROMPT_TURNS,
  MAX_TRAIT_INTENSITY,
  MIN_TRAIT_INTENSITY,
} from '../../config/constants.js';
import { AgentMemory } from '../../memory/AgentMemory.js';
import { ValidationError } from '../errors.js';
import { buildDialoguePrompt } from './prompts.js';
import type {
  CharacterContext,
  CharacterKnowledge,
  CharacterProfile,
  CharacterTrait,
  FactValue,
  SecretHolder,
} from '../../types/index.js';

export interface PromptLimits {
  promptTurns: number;
  promptMemories: number;
  promptLies: number;
}

const DEFAULT_LIMITS: PromptLimits = {
  promptTurns: DEFAULT_PROMPT_TURNS,
  promptMemories: DEFAULT_PROMPT_MEMORIES,
  promptLies: DEFAULT_PROMPT_LIES,
};

function validateTrait(trait: CharacterTrait): CharacterTrait {
  if (
    !Number.isInteger(trait.intensity) ||
    trait.intensity < MIN_TRAIT_INTENSITY ||
    trait.intensity > MAX_TRAIT_INTENSITY
  ) {
    throw new ValidationError(
      `Trait '${trait.name}': intensity must be an integer from ${MIN_TRAIT_INTENSITY} to ${MAX_TRAIT_INTENSITY}`,
      'intensity',
    );
  }
  return { ...trait };
}

export class CharacterAgent implements SecretHolder {
  readonly name: string;
  readonly personality: string;
  readonly background: string;
  readonly goals: string[];
  readonly fears: string[];
  readonly secrets: string[];
  readonly traits: CharacterTrait[];
  relationships: Record<string, string>;
  readonly memory = new AgentMemory();

  private currentLocation: string;
  private emotionalState: string;
  private knownFacts: Map<string, FactValue> = new Map();
  private witnessedEvents: string[] = [];

  constructor(profile: CharacterProfile) {
    if (profile.name.trim().length === 0) {
      throw new ValidationError('Character name must not be empty', 'name');
    }
    this.name = profile.name;
    this.personality = profile.personality;
    this.background = profile.background ?? '';
    this.goals = [...(profile.goals ?? [])];
    this.fears = [...(profile.fears ?? [])];
    this.secrets = [...(profile.secrets ?? [])];
    this.traits = (profile.traits ?? []).map(validateTrait);
    this.relationships = { ...(profile.relationships ?? {}) };
    this.currentLocation = profile.currentLocation ?? 'unknown';
    this.emotionalState = profile.emotionalState ?? 'neutral';
  }

  getCurrentLocation(): string {
    return this.currentLocation;
  }

  getEmotionalState(): string {
    return this.emotionalState;
  }

  setLocation(location: string): void {
    const previous = this.currentLocation;
    this.currentLocation = location;
    this.memory.addMemory('observation', `Moved from ${previous} to ${location}`, {
      from: previous,
      to: location,
    });
  }

  updateEmotionalState(state: string): void {
    const previous = this.emotionalState;
    this.emotionalState = state;
    this.memory.addMemory('observation', `Emotional state changed to: ${state}`, {
      previousState: previous,
    });
  }

  addKnownFact(key: string, value: FactValue): void {
    this.knownFacts.set(key, value);
  }

  knowsFact(key: string): boolean {
    return this.knownFacts.has(key);
  }

  addWitnessedEvent(eventId: string): void {
    if (!this.witnessedEvents.includes(eventId)) {
      this.witnessedEvents.push(eventId);
    }
  }

  getWitnessedEvents(): string[] {
    return [...this.witnessedEvents];
  }

  /**
   * Replace the character's view with the bundle, so facts it may no
   * longer know are dropped
   */
  syncKnowledge(knowledge: CharacterKnowledge): void {
    this.knownFacts = new Map();
    this.witnessedEvents = [];
    for (const fact of knowledge.knownFacts) {
      this.addKnownFact(fact.key, fact.value);
    }
    for (const event of knowledge.knownEvents) {
      this.addWitnessedEvent(event.eventId);
    }
  }

  getCharacterContext(limits: PromptLimits = DEFAULT_LIMITS): CharacterContext {
    return {
      name: this.name,
      personality: this.personality,
      background: this.background,
      goals: [...this.goals],
      fears: [...this.fears],
      secrets: [...this.secrets],
      traits: this.traits.map((t) => ({ name: t.name, description: t.description })),
      relationships: { ...this.relationships },
      currentLocation: this.currentLocation,
      emotionalState: this.emotionalState,
      knownFacts: Object.fromEntries(this.knownFacts),
      recentMemories: this.memory
        .getRecentMemories(limits.promptMemories)
        .map((m) => ({ type: m.type, content: m.content })),
      liesTold: this.memory.getLiesTold().map((l) => ({ content: l.content, context: l.context })),
      omissionsMade: this.memory
        .getOmissionsMade()
        .map((o) => ({ content: o.content, context: o.context })),
    };
  }

  buildDialoguePrompt(
    playerMessage: string,
    scene: string,
    knowledge: CharacterKnowledge,
    limits: PromptLimits = DEFAULT_LIMITS,
  ): string {
    const lies = this.memory.getLiesTold();
    const omissions = this.memory.getOmissionsMade();

    return buildDialoguePrompt({
      name: this.name,
      personality: this.personality,
      background: this.background,
      currentLocation: this.currentLocation,
      emotionalState: this.emotionalState,
      goals: this.goals,
      fears: this.fears,
      secrets: this.secrets,
      relationships: this.relationships,
      knowledge,
      lies: limits.promptLies > 0 ? lies.slice(-limits.promptLies) : [],
      omissions: limits.promptLies > 0 ? omissions.slice(-limits.promptLies) : [],
      recentTurns: this.memory.getRecentConversation(limits.promptTurns),
      scene,
      playerMessage,
    });
  }
}
