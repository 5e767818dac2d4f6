/**
 * CLI Configuration - config loading, banner and engine setup
 *
 * @module bin/cli-config
 */

import chalk from 'chalk';
import { getConfig } from '../src/config/config.js';
import { DialogueEngine } from '../src/core/DialogueEngine.js';
import { createTextGenerator } from '../src/providers/index.js';
import { loadScenario, type Scenario } from '../src/scenario/ScenarioLoader.js';
import { logger } from '../src/services/Logger.js';

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

export function printBanner(title: string): void {
  logger.banner(title);
}

/**
 * Load .env, read config and apply the logging section.
 * dotenv is imported dynamically so it runs before config reads process.env.
 */
export async function initializeConfig(options: GlobalOptions = {}) {
  await import('dotenv/config');
  const config = getConfig(options.config);
  if (options.verbose) {
    config.set({ logging: { verbose: true } });
  }
  config.applyLogging();
  return config;
}

export async function openScenario(file: string, options: GlobalOptions = {}): Promise<Scenario> {
  await initializeConfig(options);
  return loadScenario(file);
}

/**
 * Scenario plus a dialogue engine with every NPC registered
 */
export async function openEngine(
  file: string,
  options: GlobalOptions = {},
): Promise<{ scenario: Scenario; engine: DialogueEngine }> {
  const config = await initializeConfig(options);
  const scenario = await loadScenario(file);
  const generator = createTextGenerator(config.provider);

  const engine = new DialogueEngine(scenario.world, generator, {
    ...config.dialogue,
    maxTokens: config.provider.maxTokens,
    temperature: config.provider.temperature,
  });
  for (const npc of scenario.npcs) {
    engine.addNpc(npc);
  }
  engine.setScene(scenario.scene);

  if (generator.name === 'mock') {
    console.log(chalk.yellow('Using mock provider (set GEMINI_API_KEY for live replies)'));
  }

  return { scenario, engine };
}
