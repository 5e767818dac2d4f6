/**
 * Agent - Module index
 *
 * @module core/agent/index
 */

export { CharacterAgent, type PromptLimits } from './CharacterAgent.js';
export { buildDialoguePrompt, NPC_SYSTEM_INSTRUCTION, type DialoguePromptInput } from './prompts.js';
