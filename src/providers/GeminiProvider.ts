/**
 * Testimony Engine - Gemini Provider
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { DEFAULT_GEMINI_MODEL } from '../config/constants.js';
import { GeminiError, getErrorMessage } from '../core/errors.js';
import type { GenerateOptions, TextGenerator } from '../types/index.js';

export class GeminiProvider implements TextGenerator {
  readonly name = 'gemini';
  readonly model: string;
  private client: GoogleGenerativeAI;

  constructor(apiKey: string, model: string = DEFAULT_GEMINI_MODEL) {
    if (apiKey.length === 0) {
      throw new GeminiError('Gemini API key is required', { recoverable: false });
    }
    this.client = new GoogleGenerativeAI(apiKey);
    this.model = model;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: options.systemInstruction,
      generationConfig: {
        maxOutputTokens: options.maxTokens,
        temperature: options.temperature,
      },
    });

    try {
      const result = await model.generateContent(prompt);
      return result.response.text().trim();
    } catch (error: unknown) {
      const msg = getErrorMessage(error);
      const rateLimited =
        msg.includes('429') || msg.includes('rate limit') || msg.includes('RESOURCE_EXHAUSTED');
      throw new GeminiError(`Gemini API Error (${this.model}): ${msg}`, {
        code: rateLimited ? 'RATE_LIMIT_ERROR' : undefined,
        cause: error instanceof Error ? error : undefined,
        context: { model: this.model },
      });
    }
  }
}
