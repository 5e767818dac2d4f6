/**
 * Testimony Engine - Main Module Index
 */

// ============================================================
// Configuration
// ============================================================

export * from './config/constants.js';
export {
  ConfigManager,
  createDefaultConfig,
  getConfig,
  parseConfigOverrides,
  resetConfig,
  type ConfigManagerOptions,
} from './config/config.js';

// ============================================================
// World model
// ============================================================

export { WorldModel } from './core/WorldModel.js';
export { ScheduleIndex, type CharacterRegistry } from './core/ScheduleIndex.js';
export { VisibilityResolver } from './core/VisibilityResolver.js';
export {
  compareTimeBlocks,
  createTimeBlock,
  formatTimeBlock,
  isTimePeriod,
  periodIndex,
  timeBlocksEqual,
} from './core/TimeBlock.js';
export { factValueMatches, formatFactValue, reference, toFactValue } from './core/FactValue.js';

// ============================================================
// Validation
// ============================================================

export { PatternClaimExtractor, type ClaimExtractor } from './core/validation/ClaimExtractor.js';
export { ClaimValidator, type ClaimValidatorOptions } from './core/validation/ClaimValidator.js';
export { DeceptionClassifier } from './core/validation/DeceptionClassifier.js';

// ============================================================
// Agents and dialogue
// ============================================================

export { AgentMemory } from './memory/AgentMemory.js';
export * from './core/agent/index.js';
export { DialogueEngine, type DialogueEngineOptions } from './core/DialogueEngine.js';
export * from './providers/index.js';
export { buildScenario, loadScenario, type Scenario } from './scenario/ScenarioLoader.js';
export { ScenarioSchema, type ScenarioDocument } from './scenario/schema.js';

// ============================================================
// Errors and logging
// ============================================================

export * from './core/errors.js';
export { Logger, logger, type LoggerOptions } from './services/Logger.js';

export type * from './types/index.js';
