import Anthropic from '@anthropic-ai/sdk';

import type { ModelTurn, ToolCall, ToolRound, ToolSpec } from '../schema/model.js';
import { LIMITS } from '../config/defaults.js';
import type { ModelClient, ModelRequest } from './client.js';
import { TOOL_INPUT_DESCRIPTION, toolArgumentsSchema } from './client.js';
import { InvocationError, classifyStatus } from './errors.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

// ── Request mapping ──────────────────────────────────────────

function toAnthropicTool(tool: ToolSpec): Anthropic.Tool {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: 'object',
      properties: {
        input: { type: 'string', description: TOOL_INPUT_DESCRIPTION },
      },
      required: ['input'],
    },
  };
}

function toMessages(input: string, history: readonly ToolRound[]): Anthropic.MessageParam[] {
  const messages: Anthropic.MessageParam[] = [{ role: 'user', content: input }];

  for (const round of history) {
    messages.push({
      role: 'assistant',
      content: round.exchanges.map(({ call }) => ({
        type: 'tool_use' as const,
        id: call.id,
        name: call.name,
        input: { input: call.input },
      })),
    });
    messages.push({
      role: 'user',
      content: round.exchanges.map(({ call, output }) => ({
        type: 'tool_result' as const,
        tool_use_id: call.id,
        content: output,
      })),
    });
  }

  return messages;
}

// ── Response mapping ─────────────────────────────────────────

function toolInputText(raw: unknown): string {
  const parsed = toolArgumentsSchema.safeParse(raw);
  if (parsed.success) return parsed.data.input;
  return typeof raw === 'string' ? raw : JSON.stringify(raw);
}

function toModelTurn(content: readonly Anthropic.ContentBlock[]): ModelTurn {
  const calls: ToolCall[] = [];
  const text: string[] = [];

  for (const block of content) {
    if (block.type === 'tool_use') {
      calls.push({ id: block.id, name: block.name, input: toolInputText(block.input) });
    } else if (block.type === 'text') {
      text.push(block.text);
    }
  }

  const [first, ...rest] = calls;
  if (first) return { type: 'tool_call', calls: [first, ...rest] };

  if (text.length === 0) {
    throw new InvocationError('Anthropic API returned no text content', 'other');
  }
  return { type: 'final', text: text.join('\n') };
}

// ── Error mapping ────────────────────────────────────────────

function toInvocationError(err: unknown): unknown {
  if (err instanceof Anthropic.APIError) {
    return new InvocationError(
      `Anthropic API error (${String(err.status ?? 'no status')}): ${err.message}`,
      classifyStatus(err.status),
      { status: err.status, cause: err },
    );
  }
  return err;
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): ModelClient {
  const defaultModel = model ?? DEFAULT_MODEL;
  // Retries belong to the workflow's retry policy, not the SDK.
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  return {
    async invoke(request: ModelRequest): Promise<ModelTurn> {
      const tools = request.tools.map(toAnthropicTool);
      const modelName = request.model ?? defaultModel;
      log.llm(`${request.agent} → ${modelName} (round ${String(request.history.length + 1)})`);

      try {
        const response = await client.messages.create({
          model: modelName,
          max_tokens: LIMITS.MAX_MODEL_TOKENS,
          system: request.instruction,
          messages: toMessages(request.input, request.history),
          ...(tools.length > 0 ? { tools } : {}),
        });
        return toModelTurn(response.content);
      } catch (err) {
        throw toInvocationError(err);
      }
    },
  };
}
