import { z } from 'zod';

// ── Failure classes ─────────────────────────────────────────

export const failureClassSchema = z.enum([
  'rate-limited',
  'server-error',
  'service-unavailable',
  'gateway-timeout',
  'other',
]);

export type FailureClass = z.infer<typeof failureClassSchema>;

export const TRANSIENT_FAILURES: readonly FailureClass[] = [
  'rate-limited',
  'server-error',
  'service-unavailable',
  'gateway-timeout',
];

// ── Retry policy block ──────────────────────────────────────

export const retryPolicyConfigSchema = z.object({
  attempts: z.number().int().positive().optional().default(5),
  expBase: z.number().positive().optional().default(7),
  initialDelay: z.number().nonnegative().optional().default(1),
  retryOn: z
    .array(failureClassSchema)
    .optional()
    .default([...TRANSIENT_FAILURES]),
});

export type RetryPolicyConfig = z.infer<typeof retryPolicyConfigSchema>;

// ── Tool reference ──────────────────────────────────────────

const agentToolRefSchema = z.object({
  agent: z.string().min(1),
  description: z.string().min(1).optional(),
});

const externalToolRefSchema = z.object({
  external: z.string().min(1),
});

export const toolRefSchema = z.union([agentToolRefSchema, externalToolRefSchema]);

export type ToolRef = z.infer<typeof toolRefSchema>;

// ── Agent entry ─────────────────────────────────────────────

export const agentEntrySchema = z.object({
  name: z.string().min(1),
  instruction: z.string().min(1),
  description: z.string().min(1).optional(),
  outputKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  retryPolicy: z.string().min(1).optional(),
  maxToolIterations: z.number().int().positive().optional(),
  tools: z.array(toolRefSchema).optional().default([]),
});

export type AgentEntry = z.infer<typeof agentEntrySchema>;

// ── Composite entry ─────────────────────────────────────────

export const compositeEntrySchema = z.object({
  name: z.string().min(1),
  type: z.enum(['sequential', 'parallel']),
  children: z.array(z.string().min(1)).min(1),
});

export type CompositeEntry = z.infer<typeof compositeEntrySchema>;

// ── Full workflow file ──────────────────────────────────────

export const workflowFileSchema = z.object({
  name: z.string().min(1),
  maxToolIterations: z.number().int().positive().optional(),
  retryPolicies: z.record(retryPolicyConfigSchema).optional().default({}),
  agents: z.array(agentEntrySchema).min(1),
  composites: z.array(compositeEntrySchema).optional().default([]),
  root: z.string().min(1),
});

export type WorkflowFile = z.infer<typeof workflowFileSchema>;
