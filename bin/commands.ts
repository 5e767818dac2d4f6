/**
 * CLI Commands - Commander.js subcommand registration
 *
 * @module bin/commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  formatKnowledge,
  formatScheduleEntry,
  formatStatementCheck,
  formatValidationSummary,
  formatWorldSummary,
} from '../src/cli/format.js';
import { collect, parseDay } from '../src/cli/options.js';
import { DEFAULT_PLAYER_NAME } from '../src/config/constants.js';
import { ClaimValidator } from '../src/core/validation/ClaimValidator.js';
import { DeceptionClassifier } from '../src/core/validation/DeceptionClassifier.js';
import { VisibilityResolver } from '../src/core/VisibilityResolver.js';
import { openEngine, openScenario, printBanner, type GlobalOptions } from './cli-config.js';
import { runInteractiveMode } from './interactive.js';

function globals(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return { config: opts.config, verbose: opts.verbose };
}

function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

export function registerCommands(program: Command): void {
  // ── SUMMARY ──
  program
    .command('summary <scenario>')
    .description('Print counts, locations and characters of a scenario world')
    .action(async (file: string, _options: unknown, command: Command) => {
      const { world } = await openScenario(file, globals(command));
      printBanner('World Summary');
      printLines(formatWorldSummary(world.getWorldSummary()));
    });

  // ── TIMELINE ──
  program
    .command('timeline <scenario> <character>')
    .description("Print a character's schedule, optionally as another character sees it")
    .option('-d, --day <day>', 'Restrict to one day', parseDay)
    .option('-a, --as <observer>', 'Only entries visible to this character')
    .action(
      async (
        file: string,
        character: string,
        options: { day?: number; as?: string },
        command: Command,
      ) => {
        const { world } = await openScenario(file, globals(command));
        const entries = options.as
          ? new VisibilityResolver(world).getVisibleSchedule(options.as, character, options.day)
          : world.schedule.getCharacterSchedule(character, options.day);

        printBanner(`Timeline: ${character}`);
        if (entries.length === 0) {
          console.log(chalk.gray('(no entries)'));
        }
        printLines(entries.map(formatScheduleEntry));
      },
    );

  // ── KNOWLEDGE ──
  program
    .command('knowledge <scenario> <character>')
    .description('Print everything a character is entitled to know')
    .action(async (file: string, character: string, _options: unknown, command: Command) => {
      const { world } = await openScenario(file, globals(command));
      printLines(formatKnowledge(new VisibilityResolver(world).exportCharacterKnowledge(character)));
    });

  // ── CHECK ──
  program
    .command('check <scenario> <character> <statement>')
    .description("Validate a character's statement against the world")
    .option('-l, --lie <claim>', 'Claim text the character says knowingly (repeatable)', collect, [])
    .option('-o, --omission <claim>', 'Claim text marked as an omission (repeatable)', collect, [])
    .action(
      async (
        file: string,
        character: string,
        statement: string,
        options: { lie: string[]; omission: string[] },
        command: Command,
      ) => {
        const { world, npcs } = await openScenario(file, globals(command));
        const validator = new ClaimValidator(world);
        const validation = validator.validateStatement(
          statement,
          character,
          options.lie,
          options.omission,
        );

        printBanner(`Check: ${character}`);
        for (const line of formatStatementCheck(validation)) {
          const colour = line.startsWith('FAIL') ? chalk.red : chalk.white;
          console.log(colour(line));
        }

        const npc = npcs.find((n) => n.name.toLowerCase() === character.toLowerCase());
        if (npc) {
          const { likelyOmissions } = new DeceptionClassifier().analyzeForDeception(statement, npc);
          for (const signal of likelyOmissions) {
            console.log(chalk.yellow(signal));
          }
        }

        console.log(chalk.gray(formatValidationSummary(validator.getValidationSummary())));
        if (!validation.isValid) {
          process.exitCode = 1;
        }
      },
    );

  // ── TALK ──
  program
    .command('talk <scenario> <npc>')
    .description('Interrogate an NPC interactively')
    .option('-p, --player <name>', 'Name the NPC knows you by', DEFAULT_PLAYER_NAME)
    .action(async (file: string, npc: string, options: { player: string }, command: Command) => {
      const { engine } = await openEngine(file, globals(command));
      await runInteractiveMode(engine, npc, options.player);
    });
}
