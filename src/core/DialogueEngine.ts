/**
 * DialogueEngine - runs conversation turns between the player and NPCs
 *
 * Each turn syncs the NPC's entitled knowledge from the world, asks the
 * generator for a reply and fact-checks that reply. Turns run one at a time
 * so validation history and memory logs keep the order turns were taken in.
 *
 * @module core/DialogueEngine
 */

import pLimit from 'p-limit';
import {
  DEFAULT_HISTORY_TURNS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_PLAYER_NAME,
  DEFAULT_PROMPT_LIES,
  DEFAULT_PROMPT_MEMORIES,
  DEFAULT_PROMPT_TURNS,
  DEFAULT_TEMPERATURE,
} from '../config/constants.js';
import { logger } from '../services/Logger.js';
import { CharacterAgent, NPC_SYSTEM_INSTRUCTION } from './agent/index.js';
import { ClaimValidator } from './validation/ClaimValidator.js';
import { DeceptionClassifier } from './validation/DeceptionClassifier.js';
import { VisibilityResolver } from './VisibilityResolver.js';
import type { WorldModel } from './WorldModel.js';
import type {
  ConversationTurn,
  DeceptionRecord,
  DialogueConfig,
  EngineStats,
  MemoryEntry,
  NpcStatus,
  TextGenerator,
  TurnMetadata,
  TurnResult,
} from '../types/index.js';

export interface DialogueEngineOptions extends Partial<DialogueConfig> {
  maxTokens?: number;
  temperature?: number;
  /** Share a validator (and its history) with other callers */
  validator?: ClaimValidator;
}

function toRecord(entry: MemoryEntry): DeceptionRecord {
  return { timestamp: entry.timestamp, content: entry.content, context: entry.context };
}

export class DialogueEngine {
  readonly validator: ClaimValidator | undefined;
  private readonly visibility: VisibilityResolver;
  private readonly classifier = new DeceptionClassifier();
  private readonly npcs: Map<string, CharacterAgent> = new Map();
  private readonly lock = pLimit(1);
  private readonly options: Required<Omit<DialogueEngineOptions, 'validator'>>;
  private currentScene = '';

  constructor(
    private readonly world: WorldModel,
    private readonly generator: TextGenerator,
    options: DialogueEngineOptions = {},
  ) {
    this.options = {
      factChecking: options.factChecking ?? true,
      historyTurns: options.historyTurns ?? DEFAULT_HISTORY_TURNS,
      promptTurns: options.promptTurns ?? DEFAULT_PROMPT_TURNS,
      promptMemories: options.promptMemories ?? DEFAULT_PROMPT_MEMORIES,
      promptLies: options.promptLies ?? DEFAULT_PROMPT_LIES,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
    this.visibility = new VisibilityResolver(world);
    this.validator = this.options.factChecking
      ? (options.validator ?? new ClaimValidator(world))
      : undefined;
  }

  /**
   * Register an NPC. The NPC also becomes a known character of the world.
   */
  addNpc(npc: CharacterAgent): void {
    this.npcs.set(npc.name.toLowerCase(), npc);
    this.world.addCharacter(npc.name);
    logger.debug(`[Engine] Added NPC: ${npc.name}`);
  }

  getNpc(name: string): CharacterAgent | undefined {
    return this.npcs.get(name.toLowerCase());
  }

  setScene(scene: string): void {
    this.currentScene = scene;
    logger.debug(`[Engine] Scene updated: ${scene}`);
  }

  getScene(): string {
    return this.currentScene;
  }

  syncNpcKnowledge(npc: CharacterAgent): void {
    npc.syncKnowledge(this.visibility.exportCharacterKnowledge(npc.name));
  }

  /**
   * Take one conversation turn. An unknown NPC yields an error turn.
   * Generator failures reject; the player's message stays recorded.
   */
  converse(
    npcName: string,
    playerMessage: string,
    playerName: string = DEFAULT_PLAYER_NAME,
  ): Promise<TurnResult> {
    return this.lock(() => this.runTurn(npcName, playerMessage, playerName));
  }

  getConversationHistory(
    npcName: string,
    turns: number = this.options.historyTurns,
  ): ConversationTurn[] {
    return this.getNpc(npcName)?.memory.getRecentConversation(turns) ?? [];
  }

  getNpcLies(npcName: string): DeceptionRecord[] {
    return this.getNpc(npcName)?.memory.getLiesTold().map(toRecord) ?? [];
  }

  getNpcOmissions(npcName: string): DeceptionRecord[] {
    return this.getNpc(npcName)?.memory.getOmissionsMade().map(toRecord) ?? [];
  }

  getAllNpcs(): string[] {
    return [...this.npcs.values()].map((npc) => npc.name);
  }

  getNpcStatus(npcName: string): NpcStatus | undefined {
    const npc = this.getNpc(npcName);
    if (!npc) return undefined;

    return {
      name: npc.name,
      location: npc.getCurrentLocation(),
      emotionalState: npc.getEmotionalState(),
      conversationTurns: npc.memory.getConversationLength(),
      memories: npc.memory.getMemoryCount(),
      liesTold: npc.memory.getLiesTold().length,
      omissionsMade: npc.memory.getOmissionsMade().length,
      secrets: [...npc.secrets],
      goals: [...npc.goals],
    };
  }

  resetConversation(npcName: string): boolean {
    const npc = this.getNpc(npcName);
    if (!npc) return false;

    npc.memory.resetConversation();
    logger.debug(`[Engine] Reset conversation with ${npc.name}`);
    return true;
  }

  getEngineStats(): EngineStats {
    const stats: EngineStats = {
      totalNpcs: this.npcs.size,
      npcNames: this.getAllNpcs(),
      worldState: this.world.getWorldSummary(),
      aiProvider: this.generator.name,
    };
    if (this.validator) {
      stats.factChecking = this.validator.getValidationSummary();
    }
    return stats;
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private async runTurn(
    npcName: string,
    playerMessage: string,
    playerName: string,
  ): Promise<TurnResult> {
    const npc = this.getNpc(npcName);
    if (!npc) {
      logger.warn(`[Engine] NPC '${npcName}' not found`);
      return { response: `[Error: NPC '${npcName}' not found]`, metadata: { error: 'NPC not found' } };
    }

    const knowledge = this.visibility.exportCharacterKnowledge(npc.name);
    npc.syncKnowledge(knowledge);

    npc.memory.addConversationTurn(playerName, playerMessage);
    logger.turn(playerName, playerMessage);

    const prompt = npc.buildDialoguePrompt(playerMessage, this.currentScene, knowledge, {
      promptTurns: this.options.promptTurns,
      promptMemories: this.options.promptMemories,
      promptLies: this.options.promptLies,
    });

    const response = await this.generator.generate(prompt, {
      systemInstruction: NPC_SYSTEM_INSTRUCTION,
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
    });

    npc.memory.addConversationTurn(npc.name, response);
    logger.turn(npc.name, response);

    const metadata: TurnMetadata = {
      npcName: npc.name,
      validationEnabled: this.validator !== undefined,
    };

    if (!this.validator) {
      return { response, metadata };
    }

    const deception = this.classifier.analyzeForDeception(response, npc);
    const { isValid, results } = this.validator.validateStatement(response, npc.name);

    for (const result of results) {
      if (result.isLie) {
        npc.memory.addMemory('lie', `Lied: ${result.claim.claimText}`, {
          playerMessage,
          reason: result.reason,
        });
      } else if (result.isOmission) {
        npc.memory.addMemory(
          'omission',
          `Omitted information related to: ${result.claim.claimText}`,
          { playerMessage },
        );
      }
    }

    metadata.isValid = isValid;
    metadata.validationResults = results.map((r) => ({
      claim: r.claim.claimText,
      isValid: r.isValid,
      isLie: r.isLie,
      isOmission: r.isOmission,
      reason: r.reason,
    }));
    metadata.likelyLies = deception.likelyLies;
    metadata.likelyOmissions = deception.likelyOmissions;

    return { response, metadata };
  }
}
