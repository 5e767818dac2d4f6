/**
 * InterrogationSession - slash commands and questions for the talk loop
 *
 * Holds which suspect is being questioned; the readline loop in bin/ only
 * reads input and colours the returned lines.
 *
 * @module cli/session
 */

import { DEFAULT_PLAYER_NAME } from '../config/constants.js';
import type { DialogueEngine } from '../core/DialogueEngine.js';
import { getErrorCode, ValidationError } from '../core/errors.js';
import { formatError, formatValidationSummary, formatWorldSummary } from './format.js';

export type Tone = 'info' | 'warn' | 'error' | 'lie' | 'npc';

export interface OutputLine {
  text: string;
  tone: Tone;
}

export interface CommandOutcome {
  lines: OutputLine[];
  quit: boolean;
}

export const SESSION_HELP = [
  '/npcs          suspects in this scenario',
  '/talk <npc>    question another suspect',
  '/scene         the current scene',
  '/world         world summary',
  '/status        current NPC location, mood and deception counts',
  '/lies          lies the current NPC has told',
  '/history       recent conversation',
  '/stats         engine statistics',
  '/reset         forget the conversation with the current NPC',
  '/quit          leave',
];

const info = (text: string): OutputLine => ({ text, tone: 'info' });
const warn = (text: string): OutputLine => ({ text, tone: 'warn' });

export class InterrogationSession {
  private current: string;

  constructor(
    private readonly engine: DialogueEngine,
    npcName: string,
    readonly playerName: string = DEFAULT_PLAYER_NAME,
  ) {
    const npc = engine.getNpc(npcName);
    if (!npc) {
      throw new ValidationError(
        `NPC '${npcName}' not found. Available: ${engine.getAllNpcs().join(', ')}`,
        'npc',
      );
    }
    this.current = npc.name;
  }

  get npcName(): string {
    return this.current;
  }

  /**
   * Run one slash command
   */
  command(input: string): CommandOutcome {
    const [name = '', ...rest] = input.trim().split(/\s+/);
    const arg = rest.join(' ');
    const done = (...lines: OutputLine[]): CommandOutcome => ({ lines, quit: false });

    switch (name) {
      case '/quit':
      case '/exit':
        return { lines: [], quit: true };
      case '/help':
        return done(...SESSION_HELP.map(info));
      case '/npcs':
        return done(...this.listNpcs());
      case '/talk':
        return done(this.switchTo(arg));
      case '/scene':
        return done(info(this.engine.getScene() || 'No scene set.'));
      case '/world':
        return done(...formatWorldSummary(this.engine.getEngineStats().worldState).map(info));
      case '/status': {
        const status = this.engine.getNpcStatus(this.current);
        if (!status) return done();
        return done(
          info(
            `${status.name} @ ${status.location}, ${status.emotionalState}; ` +
              `${status.conversationTurns} turns, ${status.liesTold} lies, ${status.omissionsMade} omissions`,
          ),
        );
      }
      case '/lies': {
        const lies = this.engine.getNpcLies(this.current);
        if (lies.length === 0) return done(info(`${this.current} has told no lies yet.`));
        return done(...lies.map((lie) => ({ text: `${lie.timestamp} ${lie.content}`, tone: 'lie' as const })));
      }
      case '/history':
        return done(
          ...this.engine.getConversationHistory(this.current).map((turn) => info(`${turn.speaker}: ${turn.message}`)),
        );
      case '/stats': {
        const stats = this.engine.getEngineStats();
        const lines = [info(`${stats.totalNpcs} NPCs via ${stats.aiProvider}`)];
        if (stats.factChecking) {
          lines.push(info(formatValidationSummary(stats.factChecking)));
        }
        return done(...lines);
      }
      case '/reset':
        this.engine.resetConversation(this.current);
        return done(info(`Conversation with ${this.current} reset`));
      default:
        return done(warn(`Unknown command ${name}. Try /help`));
    }
  }

  /**
   * Put a question to the current NPC. Generator failures come back as
   * error lines so the loop keeps running.
   */
  async ask(message: string): Promise<OutputLine[]> {
    try {
      const { response, metadata } = await this.engine.converse(this.current, message, this.playerName);
      const lines: OutputLine[] = [{ text: `${this.current}: ${response}`, tone: 'npc' }];
      for (const result of metadata.validationResults ?? []) {
        if (result.isLie) {
          lines.push({ text: `  [LIE] ${result.claim}: ${result.reason}`, tone: 'lie' });
        }
      }
      return lines;
    } catch (error: unknown) {
      const lines: OutputLine[] = [{ text: `Generation failed: ${formatError(error)}`, tone: 'error' }];
      if (getErrorCode(error) === 'RATE_LIMIT_ERROR') {
        lines.push(warn('Rate limited; wait a moment and ask again.'));
      }
      return lines;
    }
  }

  private listNpcs(): OutputLine[] {
    return this.engine.getAllNpcs().map((name) => {
      const status = this.engine.getNpcStatus(name);
      const where = status ? ` @ ${status.location}` : '';
      const marker = name === this.current ? '*' : '-';
      return info(`${marker} ${name}${where}`);
    });
  }

  private switchTo(name: string): OutputLine {
    if (name.length === 0) {
      return warn('Usage: /talk <npc>');
    }
    const npc = this.engine.getNpc(name);
    if (!npc) {
      return warn(`NPC '${name}' not found. Available: ${this.engine.getAllNpcs().join(', ')}`);
    }
    this.current = npc.name;
    return info(`Now talking to ${npc.name}`);
  }
}
