/**
 * Interactive Mode - question loop over the suspects of a scenario
 *
 * @module bin/interactive
 */

import chalk from 'chalk';
import * as readline from 'readline/promises';
import { InterrogationSession, type OutputLine, type Tone } from '../src/cli/session.js';
import type { DialogueEngine } from '../src/core/DialogueEngine.js';

const TONES: Record<Tone, (text: string) => string> = {
  info: chalk.gray,
  warn: chalk.yellow,
  error: chalk.red,
  lie: chalk.red,
  npc: chalk.cyan,
};

function print(lines: OutputLine[]): void {
  for (const line of lines) {
    console.log(TONES[line.tone](line.text));
  }
}

export async function runInteractiveMode(
  engine: DialogueEngine,
  npcName: string,
  playerName: string,
): Promise<void> {
  const session = new InterrogationSession(engine, npcName, playerName);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  console.log(chalk.cyan(`Talking to ${session.npcName}. /help for commands.`));

  try {
    for (;;) {
      const input = (await rl.question(chalk.green(`${playerName} -> ${session.npcName}> `))).trim();
      if (input.length === 0) continue;

      if (input.startsWith('/')) {
        const outcome = session.command(input);
        print(outcome.lines);
        if (outcome.quit) break;
        continue;
      }

      print(await session.ask(input));
    }
  } finally {
    rl.close();
  }
}
