import { z } from 'zod';

// ── Tool call request ───────────────────────────────────────

export const toolCallSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  input: z.string(),
});

export type ToolCall = z.infer<typeof toolCallSchema>;

// ── Model turn (final answer OR tool calls) ─────────────────

const finalTurnSchema = z.object({
  type: z.literal('final'),
  text: z.string(),
});

const toolCallTurnSchema = z.object({
  type: z.literal('tool_call'),
  calls: z.array(toolCallSchema).nonempty(),
});

export const modelTurnSchema = z.discriminatedUnion('type', [
  finalTurnSchema,
  toolCallTurnSchema,
]);

export type ModelTurn = z.infer<typeof modelTurnSchema>;
export type FinalTurn = z.infer<typeof finalTurnSchema>;
export type ToolCallTurn = z.infer<typeof toolCallTurnSchema>;

// ── Conversation history ────────────────────────────────────

export interface ToolExchange {
  call: ToolCall;
  output: string;
}

/** One model turn that requested tools, paired with what each tool returned. */
export interface ToolRound {
  exchanges: readonly ToolExchange[];
}

// ── Tool exposure ───────────────────────────────────────────

export interface ToolSpec {
  name: string;
  description: string;
}
