/**
 * Testimony Engine - Constants
 * Centralized configuration values
 */

/**
 * Canonical time periods of a day, in order.
 */
export const TIME_PERIODS = [
  'early_morning',
  'morning',
  'noon',
  'afternoon',
  'early_evening',
  'evening',
  'night',
  'late_night',
  'overnight',
] as const;

export type TimePeriod = (typeof TIME_PERIODS)[number];

// Fact defaults
export const DEFAULT_FACT_CATEGORY = 'general';
export const DEFAULT_FACT_SOURCE = 'world';

// Relationship strength bounds (inclusive)
export const MIN_RELATIONSHIP_STRENGTH = 1;
export const MAX_RELATIONSHIP_STRENGTH = 10;
export const DEFAULT_RELATIONSHIP_STRENGTH = 5;

// Agent memory bounds
export const MIN_EMOTIONAL_IMPACT = -10;
export const MAX_EMOTIONAL_IMPACT = 10;
export const MIN_TRAIT_INTENSITY = 1;
export const MAX_TRAIT_INTENSITY = 10;

// Claim keys produced by the pattern extractor
export const CLAIM_KEYS = {
  LOCATION: 'mentioned_location',
  TIME: 'mentioned_time',
  PERSON: 'mentioned_person',
} as const;

// Dialogue limits
export const DEFAULT_HISTORY_TURNS = 10;
export const DEFAULT_PROMPT_TURNS = 5;
export const DEFAULT_PROMPT_MEMORIES = 20;
export const DEFAULT_PROMPT_LIES = 5;
export const DEFAULT_MAX_TOKENS = 500;
export const DEFAULT_TEMPERATURE = 0.8;

// Text generation
export const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash';
export const DEFAULT_PLAYER_NAME = 'Player';

// Config file discovery, in priority order
export const CONFIG_FILE_NAMES = ['.testimonyrc', '.testimonyrc.json', 'testimony.config.json'] as const;

// Display truncation lengths
export const CLAIM_TRUNCATION = 60;
export const SEPARATOR_WIDTH = 50;
