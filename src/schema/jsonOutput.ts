import { z } from 'zod';

import {
  componentOutputSchema,
  mergeCollisionSchema,
  runFailureSchema,
  runStatusSchema,
} from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Full output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  workflow: z.string().min(1),
  input: z.string(),
  status: runStatusSchema,
  exitCode: z.number().int().nonnegative(),
  output: componentOutputSchema.nullable(),
  state: z.record(z.unknown()),
  warnings: z.array(mergeCollisionSchema),
  failure: runFailureSchema.nullable(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
