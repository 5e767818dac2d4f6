/**
 * Prompt construction for NPC dialogue
 *
 * The prompt is the only channel through which the generator learns what a
 * character may reference, so facts, events and the character's own
 * timeline all come from the visibility-filtered knowledge bundle.
 *
 * @module core/agent/prompts
 */

import { formatFactValue } from '../FactValue.js';
import { formatTimeBlock } from '../TimeBlock.js';
import type { CharacterKnowledge, ConversationTurn, MemoryEntry } from '../../types/index.js';

export const NPC_SYSTEM_INSTRUCTION =
  'You are a character in a murder mystery game. Stay in character and respond naturally.';

export interface DialoguePromptInput {
  name: string;
  personality: string;
  background: string;
  currentLocation: string;
  emotionalState: string;
  goals: readonly string[];
  fears: readonly string[];
  secrets: readonly string[];
  relationships: Readonly<Record<string, string>>;
  knowledge: CharacterKnowledge;
  lies: readonly MemoryEntry[];
  omissions: readonly MemoryEntry[];
  recentTurns: readonly ConversationTurn[];
  scene: string;
  playerMessage: string;
}

function bullets(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join('\n');
}

function knownFactLines(knowledge: CharacterKnowledge): string[] {
  return knowledge.knownFacts.map((f) => `${f.key}: ${formatFactValue(f.value)}`);
}

function timelineLines(knowledge: CharacterKnowledge): string[] {
  return knowledge.schedule.map((entry) => {
    const company = entry.companions.length > 0 ? ` (with ${entry.companions.join(', ')})` : '';
    return `${formatTimeBlock(entry.block)}: ${entry.location} - ${entry.activity}${company}`;
  });
}

export function buildDialoguePrompt(input: DialoguePromptInput): string {
  const relationships = Object.entries(input.relationships).map(([who, desc]) => `${who}: ${desc}`);
  const events = input.knowledge.knownEvents.map(
    (e) => `${e.timestamp} at ${e.location}: ${e.description}`,
  );
  const conversation = input.recentTurns.map((turn) => `${turn.speaker}: ${turn.message}`).join('\n');

  return `You are ${input.name}, an NPC in a murder mystery game.

CHARACTER PROFILE:
- Personality: ${input.personality}
- Background: ${input.background}
- Current Location: ${input.currentLocation}
- Emotional State: ${input.emotionalState}

GOALS:
${bullets(input.goals)}

FEARS:
${bullets(input.fears)}

SECRETS (things you want to hide):
${bullets(input.secrets)}

RELATIONSHIPS:
${bullets(relationships)}

WHAT YOU KNOW (facts you're aware of):
${bullets(knownFactLines(input.knowledge))}

EVENTS YOU TOOK PART IN OR WITNESSED:
${bullets(events)}

YOUR TIMELINE (where you actually were):
${bullets(timelineLines(input.knowledge))}

LIES YOU'VE TOLD RECENTLY:
${bullets(input.lies.map((lie) => lie.content))}

THINGS YOU'VE DELIBERATELY OMITTED:
${bullets(input.omissions.map((omission) => omission.content))}

RECENT CONVERSATION:
${conversation}

CURRENT SCENE:
${input.scene || 'No specific scene details.'}

PLAYER'S QUESTION/STATEMENT:
${input.playerMessage}

INSTRUCTIONS:
1. Respond in character as ${input.name}
2. Stay true to your personality, goals, and fears
3. You may choose to lie or omit information to protect your secrets or achieve your goals
4. If you make a claim about facts, it should align with what you know OR be a deliberate deception
5. Never place yourself somewhere your timeline contradicts unless you mean to lie
6. Keep responses relatively brief (1-3 sentences typically)

YOUR RESPONSE (as ${input.name}):`;
}
