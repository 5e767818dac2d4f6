/**
 * Testimony Engine - Provider Module Exports
 */

import { ConfigurationError } from '../core/errors.js';
import { GeminiProvider } from './GeminiProvider.js';
import { MockProvider } from './MockProvider.js';
import type { ProviderConfig, TextGenerator } from '../types/index.js';

export { GeminiProvider } from './GeminiProvider.js';
export { MockProvider, DEFAULT_MOCK_REPLY } from './MockProvider.js';

/**
 * Build the text generator named by the provider config
 */
export function createTextGenerator(config: ProviderConfig): TextGenerator {
  switch (config.type) {
    case 'gemini':
      if (!config.apiKey) {
        throw new ConfigurationError('GEMINI_API_KEY is required for the gemini provider', {
          context: { provider: 'gemini' },
        });
      }
      return new GeminiProvider(config.apiKey, config.model);
    case 'mock':
      return new MockProvider();
  }
}
