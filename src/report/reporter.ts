import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ComponentOutput, RunSummary } from '../schema/index.js';
import { parseRunSummary } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput } from '../schema/jsonOutput.js';
import type { RunResult } from '../core/runner.js';
import type { WorkflowError } from '../core/errors.js';
import { formatFailure } from '../core/errors.js';

// Re-export contract types for consumers
export type { JsonOutput };

// ── Summaries ────────────────────────────────────────────────

export function summarizeRun(workflow: string, input: string, result: RunResult): RunSummary {
  return parseRunSummary({
    runId: result.sessionId,
    workflow,
    input,
    status: 'completed',
    output: result.output,
    state: result.state.snapshot(),
    warnings: result.warnings,
    startedAt: result.startedAt.toISOString(),
    finishedAt: new Date(result.startedAt.getTime() + result.durationMs).toISOString(),
    durationMs: result.durationMs,
  });
}

export function summarizeFailure(
  workflow: string,
  input: string,
  err: WorkflowError,
  startedAt: Date,
  finishedAt: Date = new Date(),
): RunSummary {
  return parseRunSummary({
    runId: randomUUID(),
    workflow,
    input,
    status: 'failed',
    state: {},
    warnings: [],
    failure: {
      name: err.name,
      message: formatFailure(err),
      path: err.path,
      exitCode: err.exitCode,
    },
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
  });
}

export function exitCodeOf(run: RunSummary): number {
  return run.failure?.exitCode ?? 0;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: RunSummary): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: run.runId,
    workflow: run.workflow,
    input: run.input,
    status: run.status,
    exitCode: exitCodeOf(run),
    output: run.output ?? null,
    state: run.state,
    warnings: run.warnings,
    failure: run.failure ?? null,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    durationMs: run.durationMs,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: RunSummary): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# agentwire Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Workflow** | ${escapeMarkdownCell(run.workflow)} |`);
  lines.push(`| **Input** | ${escapeMarkdownCell(run.input)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Status** | **${run.status}** ${statusIcon(run)} |`);
  lines.push('');

  if (run.output !== undefined) {
    lines.push(`## Output`);
    lines.push('');
    pushOutput(lines, run.output, 3);
  }

  const keys = Object.keys(run.state).sort();
  if (keys.length > 0) {
    lines.push(`## State`);
    lines.push('');
    for (const key of keys) {
      const value = run.state[key];
      lines.push(`### \`${key}\``);
      lines.push('');
      lines.push(typeof value === 'string' ? value : JSON.stringify(value, null, 2));
      lines.push('');
    }
  }

  if (run.warnings.length > 0) {
    lines.push(`## Warnings`);
    lines.push('');
    for (const w of run.warnings) {
      lines.push(`- \`${w.key}\` written by ${w.sources.join(', ')} (kept ${w.sources.at(-1) ?? ''})`);
    }
    lines.push('');
  }

  if (run.failure) {
    lines.push(`## Failure`);
    lines.push('');
    lines.push('```');
    lines.push(run.failure.message);
    lines.push('```');
    lines.push('');
  }

  return lines.join('\n');
}

// ── Artifact writing ─────────────────────────────────────────

/**
 * Write `report.md` and `result.json` into a fresh
 * `<workflow>_<YYYYMMDD_HHMMSS>` directory under `outputDir`.
 */
export async function writeRunArtifacts(outputDir: string, run: RunSummary): Promise<string> {
  const runDir = path.join(outputDir, `${slugify(run.workflow)}_${formatTimestamp(run.startedAt)}`);
  await mkdir(runDir, { recursive: true });

  await writeFile(path.join(runDir, 'report.md'), generateMarkdown(run), 'utf-8');
  await writeFile(
    path.join(runDir, 'result.json'),
    serializeJSON(generateJSON(run)) + '\n',
    'utf-8',
  );

  return runDir;
}

// ── Helpers ──────────────────────────────────────────────────

function pushOutput(lines: string[], output: ComponentOutput, level: number): void {
  if (typeof output === 'string') {
    lines.push(output);
    lines.push('');
    return;
  }
  for (const [name, value] of Object.entries(output)) {
    lines.push(`${'#'.repeat(Math.min(level, 6))} ${name}`);
    lines.push('');
    pushOutput(lines, value, level + 1);
  }
}

function statusIcon(run: RunSummary): string {
  switch (run.status) {
    case 'completed':
      return '[OK]';
    case 'failed':
      return '[FAIL]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function formatTimestamp(iso: string): string {
  // 2025-01-31T14:05:09.123Z → 20250131_140509
  const digits = iso.replace(/\D/g, '');
  return `${digits.slice(0, 8)}_${digits.slice(8, 14)}`;
}

function slugify(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '') || 'workflow';
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
