/**
 * Testimony Engine - Mock Provider
 * Canned replies for offline play and tests. Replies are consumed in order
 * and the last one repeats.
 */

import type { GenerateOptions, TextGenerator } from '../types/index.js';

export const DEFAULT_MOCK_REPLY = "I'd rather not say.";

export class MockProvider implements TextGenerator {
  readonly name = 'mock';
  readonly prompts: string[] = [];
  private replies: string[];
  private cursor = 0;

  constructor(replies: readonly string[] = [DEFAULT_MOCK_REPLY]) {
    this.replies = replies.length > 0 ? [...replies] : [DEFAULT_MOCK_REPLY];
  }

  async generate(prompt: string, _options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    const index = Math.min(this.cursor, this.replies.length - 1);
    this.cursor++;
    return this.replies[index] ?? DEFAULT_MOCK_REPLY;
  }

  /**
   * Replace the replies not yet served; the next call returns the first
   * queued one even after the last reply has been repeating
   */
  queue(...replies: string[]): void {
    const served = this.replies.slice(0, Math.min(this.cursor, this.replies.length));
    this.replies = [...served, ...replies];
    this.cursor = served.length;
  }
}
