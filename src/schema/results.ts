import { z } from 'zod';

// ── Component output ────────────────────────────────────────

export type ComponentOutput = string | { [name: string]: ComponentOutput };

export const componentOutputSchema: z.ZodType<ComponentOutput> = z.lazy(() =>
  z.union([z.string(), z.record(componentOutputSchema)]),
);

// ── Merge collision ─────────────────────────────────────────

export const mergeCollisionSchema = z.object({
  key: z.string().min(1),
  sources: z.array(z.string()).min(2),
});

export type MergeCollision = z.infer<typeof mergeCollisionSchema>;

// ── Run failure ─────────────────────────────────────────────

export const runFailureSchema = z.object({
  name: z.string().min(1),
  message: z.string(),
  path: z.array(z.string()),
  exitCode: z.number().int(),
});

export type RunFailure = z.infer<typeof runFailureSchema>;

// ── RunSummary ──────────────────────────────────────────────

export const runStatusSchema = z.enum(['completed', 'failed']);

export type RunStatus = z.infer<typeof runStatusSchema>;

export const runSummarySchema = z.object({
  runId: z.string().min(1),
  workflow: z.string().min(1),
  input: z.string(),
  status: runStatusSchema,
  output: componentOutputSchema.optional(),
  state: z.record(z.unknown()),
  warnings: z.array(mergeCollisionSchema),
  failure: runFailureSchema.optional(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type RunSummary = z.infer<typeof runSummarySchema>;

// ── Validators ──────────────────────────────────────────────

export function parseRunSummary(data: unknown): RunSummary {
  return runSummarySchema.parse(data);
}
