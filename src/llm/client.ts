import { z } from 'zod';

import type { ModelTurn, ToolRound, ToolSpec } from '../schema/model.js';
import { ConfigurationError } from '../core/errors.js';

// ── ModelClient interface ───────────────────────────────────

export interface ModelRequest {
  /** Name of the agent making the call, for logs and mocks. */
  agent: string;
  model?: string | undefined;
  /** The rendered instruction, sent as the system prompt. */
  instruction: string;
  input: string;
  tools: readonly ToolSpec[];
  history: readonly ToolRound[];
}

export interface ModelClient {
  invoke(request: ModelRequest): Promise<ModelTurn>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  const provider = env['LLM_PROVIDER'] ?? 'anthropic';
  if (!llmProviderSchema.safeParse(provider).success) {
    throw new ConfigurationError(
      `Unknown LLM provider "${provider}": expected ${llmProviderSchema.options.join(', ')}`,
    );
  }

  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : env['OPENAI_API_KEY'];

  const model = env['AGENTWIRE_MODEL'] ?? env['LLM_MODEL'];

  return llmConfigSchema.parse({
    provider,
    apiKey,
    model,
  });
}

// ── Tool argument schema ─────────────────────────────────────
// Every tool takes a single free-text `input` argument.

export const TOOL_INPUT_DESCRIPTION = 'The request or query to pass to the tool.';

export const toolArgumentsSchema = z.object({
  input: z.string(),
});
