import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { workflowFileSchema } from '../schema/workflow.js';
import type { WorkflowFile } from '../schema/workflow.js';
import { ConfigurationError } from '../core/errors.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a workflow file (YAML, or JSON by extension).
 * Throws a `ConfigurationError` if the file is missing or invalid.
 */
export async function loadWorkflowFile(filePath: string): Promise<WorkflowFile> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read workflow file ${filePath}: ${message}`);
  }

  return parseWorkflowFile(raw, filePath.endsWith('.json') ? 'json' : 'yaml');
}

export function parseWorkflowFile(raw: string, format: 'json' | 'yaml'): WorkflowFile {
  let parsed: unknown;
  try {
    parsed = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid ${format.toUpperCase()}: ${message}`);
  }

  const result = workflowFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Invalid workflow file: ${formatIssues(result.error)}`);
  }

  return result.data;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
