import { z } from 'zod';

import type { ModelTurn, ToolCall, ToolRound, ToolSpec } from '../schema/model.js';
import type { ModelClient, ModelRequest } from './client.js';
import { TOOL_INPUT_DESCRIPTION, toolArgumentsSchema } from './client.js';
import { InvocationError } from './errors.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
          tool_calls: z.array(toolCallSchema).optional(),
        }),
      }),
    )
    .nonempty(),
});

// ── Request mapping ──────────────────────────────────────────

type ChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: null; tool_calls: z.infer<typeof toolCallSchema>[] }
  | { role: 'tool'; tool_call_id: string; content: string };

function toOpenAITool(tool: ToolSpec): object {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: {
          input: { type: 'string', description: TOOL_INPUT_DESCRIPTION },
        },
        required: ['input'],
      },
    },
  };
}

function toMessages(request: ModelRequest): ChatMessage[] {
  const messages: ChatMessage[] = [
    { role: 'system', content: request.instruction },
    { role: 'user', content: request.input },
  ];

  for (const round of request.history) {
    messages.push({
      role: 'assistant',
      content: null,
      tool_calls: round.exchanges.map(({ call }) => ({
        id: call.id,
        type: 'function' as const,
        function: { name: call.name, arguments: JSON.stringify({ input: call.input }) },
      })),
    });
    for (const { call, output } of round.exchanges) {
      messages.push({ role: 'tool', tool_call_id: call.id, content: output });
    }
  }

  return messages;
}

// ── Response mapping ─────────────────────────────────────────

function parseArguments(raw: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    // Not JSON: the model sent the argument as bare text.
    return raw;
  }
  const args = toolArgumentsSchema.safeParse(parsed);
  return args.success ? args.data.input : raw;
}

function toModelTurn(body: z.infer<typeof chatResponseSchema>): ModelTurn {
  const message = body.choices[0].message;

  const calls: ToolCall[] = (message.tool_calls ?? []).map((tc) => ({
    id: tc.id,
    name: tc.function.name,
    input: parseArguments(tc.function.arguments),
  }));

  const [first, ...rest] = calls;
  if (first) return { type: 'tool_call', calls: [first, ...rest] };

  if (message.content === null) {
    throw new InvocationError('OpenAI API returned no content', 'other');
  }
  return { type: 'final', text: message.content };
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
): ModelClient {
  const defaultModel = model ?? DEFAULT_MODEL;

  return {
    async invoke(request: ModelRequest): Promise<ModelTurn> {
      const tools = request.tools.map(toOpenAITool);
      const modelName = request.model ?? defaultModel;
      log.llm(`${request.agent} → ${modelName} (round ${String(request.history.length + 1)})`);

      let response: Response;
      try {
        response = await fetch(COMPLETIONS_URL, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify({
            model: modelName,
            messages: toMessages(request),
            ...(tools.length > 0 ? { tools } : {}),
          }),
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new InvocationError(`OpenAI API request failed: ${message}`, 'other', { cause: err });
      }

      const raw = await response.text();
      if (!response.ok) {
        throw InvocationError.fromStatus(
          `OpenAI API error (${String(response.status)}): ${raw}`,
          response.status,
        );
      }

      let body: unknown;
      try {
        body = JSON.parse(raw);
      } catch {
        throw new InvocationError(`OpenAI API returned a non-JSON body: ${raw.slice(0, 200)}`, 'other');
      }
      const parsed = chatResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new InvocationError(`OpenAI API returned an unexpected body: ${parsed.error.message}`, 'other');
      }

      return toModelTurn(parsed.data);
    },
  };
}
