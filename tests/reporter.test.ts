import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, describe, it, expect } from 'vitest';
import { z } from 'zod';

import {
  exitCodeOf,
  generateJSON,
  generateMarkdown,
  serializeJSON,
  summarizeFailure,
  summarizeRun,
  writeRunArtifacts,
} from '../src/report/reporter.js';
import type { RunResult } from '../src/core/runner.js';
import { StateStore } from '../src/core/state.js';
import { ConfigurationError, MissingVariableError } from '../src/core/errors.js';
import type { ComponentOutput } from '../src/schema/results.js';
import { jsonOutputSchema } from '../src/schema/jsonOutput.js';

const STARTED = new Date('2025-01-31T14:05:09.000Z');

function completedRun(output: ComponentOutput = 'final text'): RunResult {
  return {
    sessionId: 'run-1',
    output,
    state: new StateStore({ user_input: 'bees', final_blog: 'final text' }).view(),
    warnings: [],
    startedAt: STARTED,
    durationMs: 1500,
  };
}

describe('summarizeRun', () => {
  it('should derive the finish time from the start and duration', () => {
    const summary = summarizeRun('blog', 'bees', completedRun());

    expect(summary.runId).toBe('run-1');
    expect(summary.status).toBe('completed');
    expect(summary.startedAt).toBe('2025-01-31T14:05:09.000Z');
    expect(summary.finishedAt).toBe('2025-01-31T14:05:10.500Z');
    expect(summary.state).toEqual({ user_input: 'bees', final_blog: 'final text' });
    expect(exitCodeOf(summary)).toBe(0);
  });
});

describe('summarizeFailure', () => {
  it('should carry the exit code and component path of the failure', () => {
    const err = new MissingVariableError('topic');
    err.path.unshift('Writer');
    err.path.unshift('Pipeline');

    const summary = summarizeFailure('blog', 'bees', err, STARTED, new Date('2025-01-31T14:05:10.000Z'));

    expect(summary.status).toBe('failed');
    expect(summary.durationMs).toBe(1000);
    expect(summary.failure).toEqual({
      name: 'MissingVariableError',
      message:
        'MissingVariableError: Pipeline → Writer: Missing template variable "{topic}": no value in session state',
      path: ['Pipeline', 'Writer'],
      exitCode: 2,
    });
    expect(exitCodeOf(summary)).toBe(2);
  });
});

describe('generateMarkdown', () => {
  it('should render the metadata table, output and state', () => {
    const lines = generateMarkdown(summarizeRun('blog', 'bees', completedRun())).split('\n');

    expect(lines[0]).toBe('# agentwire Report');
    expect(lines).toContain('| **Workflow** | blog |');
    expect(lines).toContain('| **Run ID** | `run-1` |');
    expect(lines).toContain('| **Duration** | 1.5s |');
    expect(lines).toContain('| **Status** | **completed** [OK] |');
    expect(lines.slice(lines.indexOf('## Output'))).toEqual([
      '## Output',
      '',
      'final text',
      '',
      '## State',
      '',
      '### `final_blog`',
      '',
      'final text',
      '',
      '### `user_input`',
      '',
      'bees',
      '',
    ]);
  });

  it('should give each parallel branch its own heading', () => {
    const markdown = generateMarkdown(
      summarizeRun('brief', 'today', completedRun({ Tech: 'ai news', Health: 'med news' })),
    );

    expect(markdown).toContain('## Output\n\n### Tech\n\nai news\n\n### Health\n\nmed news\n');
  });

  it('should list merge warnings and the failure', () => {
    const run = summarizeRun('brief', 'today', {
      ...completedRun(),
      warnings: [{ key: 'shared', sources: ['P1', 'P2'] }],
    });
    const failed = summarizeFailure('brief', 'to|day', new ConfigurationError('Unknown component "X"'), STARTED);

    expect(generateMarkdown(run)).toContain('## Warnings\n\n- `shared` written by P1, P2 (kept P2)\n');
    const failedMarkdown = generateMarkdown(failed);
    expect(failedMarkdown).toContain('| **Input** | to\\|day |');
    expect(failedMarkdown).toContain('## Failure\n\n```\nConfigurationError: Unknown component "X"\n```\n');
    expect(failedMarkdown).toContain('| **Status** | **failed** [FAIL] |');
  });
});

describe('serializeJSON', () => {
  it('should emit a valid contract with sorted keys', () => {
    const output = generateJSON(summarizeRun('blog', 'bees', completedRun()));
    const parsed: unknown = JSON.parse(serializeJSON(output));

    expect(jsonOutputSchema.parse(parsed)).toEqual(output);
    expect(Object.keys(z.record(z.unknown()).parse(parsed))).toEqual([
      'durationMs',
      'exitCode',
      'failure',
      'finishedAt',
      'input',
      'output',
      'runId',
      'startedAt',
      'state',
      'status',
      'version',
      'warnings',
      'workflow',
    ]);
    expect(output.failure).toBeNull();
  });
});

describe('writeRunArtifacts', () => {
  let outputDir: string | undefined;

  afterEach(async () => {
    if (outputDir !== undefined) await rm(outputDir, { recursive: true, force: true });
    outputDir = undefined;
  });

  it('should write the report and JSON into a timestamped directory', async () => {
    outputDir = await mkdtemp(path.join(tmpdir(), 'agentwire-report-'));
    const summary = summarizeRun('Blog Pipeline', 'bees', completedRun());

    const runDir = await writeRunArtifacts(outputDir, summary);

    expect(path.basename(runDir)).toBe('blog-pipeline_20250131_140509');
    const report = await readFile(path.join(runDir, 'report.md'), 'utf-8');
    expect(report.startsWith('# agentwire Report\n')).toBe(true);
    const json: unknown = JSON.parse(await readFile(path.join(runDir, 'result.json'), 'utf-8'));
    expect(jsonOutputSchema.parse(json).exitCode).toBe(0);
  });
});
