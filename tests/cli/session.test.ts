/**
 * Tests for InterrogationSession
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InterrogationSession } from '../../src/cli/session.js';
import { CharacterAgent } from '../../src/core/agent/CharacterAgent.js';
import { DialogueEngine } from '../../src/core/DialogueEngine.js';
import { GeminiError, ValidationError } from '../../src/core/errors.js';
import { WorldModel } from '../../src/core/WorldModel.js';
import { MockProvider } from '../../src/providers/MockProvider.js';
import type { TextGenerator } from '../../src/types/index.js';

function buildEngine(generator: TextGenerator): DialogueEngine {
  const world = new WorldModel();
  world.addLocation('Library');
  world.addLocation('Sitting Room');
  world.addFact({ key: 'victim', value: 'Elias' });
  world.addFact({ key: 'mentioned_time', value: '8pm' });

  const engine = new DialogueEngine(world, generator);
  engine.addNpc(new CharacterAgent({ name: 'Nathan', personality: 'Evasive', currentLocation: 'Library' }));
  engine.addNpc(new CharacterAgent({ name: 'Marta', personality: 'Blunt' }));
  return engine;
}

const texts = (lines: { text: string }[]): string[] => lines.map((line) => line.text);

describe('InterrogationSession', () => {
  let provider: MockProvider;
  let engine: DialogueEngine;
  let session: InterrogationSession;

  beforeEach(() => {
    provider = new MockProvider(['We dined at 10pm.']);
    engine = buildEngine(provider);
    session = new InterrogationSession(engine, 'nathan', 'Inspector');
  });

  it('should start with the named NPC', () => {
    expect(session.npcName).toBe('Nathan');
  });

  it('should refuse an unknown NPC', () => {
    expect(() => new InterrogationSession(engine, 'Bob')).toThrow(ValidationError);
    expect(() => new InterrogationSession(engine, 'Bob')).toThrow(
      "NPC 'Bob' not found. Available: Nathan, Marta",
    );
  });

  describe('suspects', () => {
    it('should list suspects with the current one marked', () => {
      expect(texts(session.command('/npcs').lines)).toEqual(['* Nathan @ Library', '- Marta @ unknown']);
    });

    it('should switch to another suspect', () => {
      const outcome = session.command('/talk marta');

      expect(outcome).toEqual({ lines: [{ text: 'Now talking to Marta', tone: 'info' }], quit: false });
      expect(session.npcName).toBe('Marta');
      expect(texts(session.command('/npcs').lines)).toEqual(['- Nathan @ Library', '* Marta @ unknown']);
    });

    it('should keep the current suspect on a bad switch', () => {
      expect(session.command('/talk').lines).toEqual([{ text: 'Usage: /talk <npc>', tone: 'warn' }]);
      expect(session.command('/talk Bob').lines).toEqual([
        { text: "NPC 'Bob' not found. Available: Nathan, Marta", tone: 'warn' },
      ]);
      expect(session.npcName).toBe('Nathan');
    });

    it('should send questions to the current suspect', async () => {
      session.command('/talk Marta');
      provider.queue('I was asleep.');

      const lines = await session.ask('Where were you?');

      expect(lines).toEqual([{ text: 'Marta: I was asleep.', tone: 'npc' }]);
      expect(engine.getConversationHistory('Marta')).toHaveLength(2);
      expect(engine.getConversationHistory('Nathan')).toEqual([]);
    });
  });

  describe('views', () => {
    it('should show the scene', () => {
      expect(texts(session.command('/scene').lines)).toEqual(['No scene set.']);
      engine.setScene('Rain against the windows');
      expect(texts(session.command('/scene').lines)).toEqual(['Rain against the windows']);
    });

    it('should show the world summary', () => {
      expect(texts(session.command('/world').lines)).toEqual([
        'Facts: 2 (2 public, 0 private)',
        'Events: 0',
        'Relationships: 0',
        'Schedule entries: 0',
        'Locations: Library, Sitting Room',
        'Characters: Nathan, Marta',
      ]);
    });
  });

  describe('questions', () => {
    it('should flag lies in the reply', async () => {
      const lines = await session.ask('When was dinner?');

      expect(lines).toEqual([
        { text: 'Nathan: We dined at 10pm.', tone: 'npc' },
        { text: '  [LIE] at 10pm: Contradicts world state. Truth: 8pm', tone: 'lie' },
      ]);

      const lies = session.command('/lies').lines;
      expect(lies).toHaveLength(1);
      expect(lies[0]?.tone).toBe('lie');
      expect(lies[0]?.text.endsWith(' Lied: at 10pm')).toBe(true);
    });

    it('should report that no lies were told', () => {
      expect(texts(session.command('/lies').lines)).toEqual(['Nathan has told no lies yet.']);
    });

    it('should report generator failures and keep going', async () => {
      const failing: TextGenerator = {
        name: 'failing',
        generate: async () => {
          throw new GeminiError('Gemini API Error (test-model): 429 Too Many Requests', {
            code: 'RATE_LIMIT_ERROR',
          });
        },
      };
      const failingSession = new InterrogationSession(buildEngine(failing), 'Nathan');

      expect(await failingSession.ask('Hello?')).toEqual([
        {
          text: 'Generation failed: [RATE_LIMIT_ERROR] Gemini API Error (test-model): 429 Too Many Requests',
          tone: 'error',
        },
        { text: 'Rate limited; wait a moment and ask again.', tone: 'warn' },
      ]);
    });

    it('should forget the conversation on reset', async () => {
      await session.ask('Hello?');
      expect(session.command('/reset').lines).toEqual([{ text: 'Conversation with Nathan reset', tone: 'info' }]);
      expect(texts(session.command('/history').lines)).toEqual([]);
    });
  });

  it('should quit and reject unknown commands', () => {
    expect(session.command('/quit')).toEqual({ lines: [], quit: true });
    expect(session.command('/bogus').lines).toEqual([{ text: 'Unknown command /bogus. Try /help', tone: 'warn' }]);
  });
});
