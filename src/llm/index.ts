/**
 * Model abstraction module.
 * Provider-agnostic interface the agents call through.
 * Only module allowed to make model API calls.
 */

import type { ModelClient, LLMConfig } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';
import { ConfigurationError } from '../core/errors.js';

export * from './client.js';
export { InvocationError, classifyStatus } from './errors.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockResponse, MockResponder } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

export function createModelClient(config: LLMConfig): ModelClient {
  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) {
        throw new ConfigurationError(
          'ANTHROPIC_API_KEY is required when using the anthropic provider',
        );
      }
      return createAnthropicClient(config.apiKey, config.model);
    }
    case 'openai': {
      if (!config.apiKey) {
        throw new ConfigurationError(
          'OPENAI_API_KEY is required when using the openai provider',
        );
      }
      return createOpenAIClient(config.apiKey, config.model);
    }
    case 'mock':
      return createMockClient();
  }
}
