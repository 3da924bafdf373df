import path from 'node:path';

import type { Command } from 'commander';

import { createModelClient, loadLLMConfig } from '../llm/index.js';
import { loadWorkflowFile } from '../config/loader.js';
import { TIMEOUTS } from '../config/defaults.js';
import { buildWorkflow } from '../core/workflow.js';
import type { Workflow } from '../core/workflow.js';
import type { Component } from '../core/components.js';
import { Runner } from '../core/runner.js';
import { WorkflowError, formatFailure } from '../core/errors.js';
import { listPlaceholders } from '../core/template.js';
import { createToolRegistry } from '../tools/index.js';
import {
  exitCodeOf,
  generateJSON,
  serializeJSON,
  summarizeFailure,
  summarizeRun,
  writeRunArtifacts,
} from '../report/reporter.js';
import type { RunSummary } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

const EXIT_UNEXPECTED = 4;

// ── Stderr summary ───────────────────────────────────────────

function printSummary(summary: RunSummary, artifactDir: string): void {
  process.stderr.write(`\n--- agentwire Result ---\n`);
  process.stderr.write(`Workflow: ${summary.workflow}\n`);
  process.stderr.write(`Input:    ${summary.input}\n`);
  process.stderr.write(`Status:   ${summary.status}\n`);
  process.stderr.write(`State:    ${Object.keys(summary.state).join(', ') || '(empty)'}\n`);
  process.stderr.write(`Warnings: ${String(summary.warnings.length)}\n`);
  process.stderr.write(
    `Time:     ${(summary.durationMs / 1000).toFixed(1)}s\n`,
  );
  process.stderr.write(`Report:   ${artifactDir}\n`);
  process.stderr.write(`Run ID:   ${summary.runId}\n\n`);
}

// ── Component tree ───────────────────────────────────────────

function describeTree(component: Component, depth = 0): string[] {
  const pad = '  '.repeat(depth);

  if (component.kind !== 'agent') {
    return [
      `${pad}${component.name} [${component.kind}]`,
      ...component.children.flatMap((child) => describeTree(child, depth + 1)),
    ];
  }

  const reads = listPlaceholders(component.instruction)
    .map((p) => (p.optional ? `${p.key}?` : p.key));
  const lines = [`${pad}${component.name} [agent]`];
  if (reads.length > 0) lines.push(`${pad}  reads:  ${reads.join(', ')}`);
  if (component.outputKey !== undefined) lines.push(`${pad}  writes: ${component.outputKey}`);
  for (const tool of component.tools) {
    lines.push(`${pad}  tool:   ${tool.name} (${tool.kind})`);
  }
  return lines;
}

// ── Shared loading ───────────────────────────────────────────

async function loadWorkflow(workflowPath: string): Promise<Workflow> {
  const file = await loadWorkflowFile(workflowPath);
  return buildWorkflow(file, { tools: createToolRegistry() });
}

function reportError(err: unknown): void {
  if (err instanceof WorkflowError) {
    log.error(formatFailure(err));
    process.exitCode = err.exitCode;
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = EXIT_UNEXPECTED;
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a workflow file against an input')
    .argument('<workflow>', 'Path to a workflow file (.yaml or .json)')
    .argument('<input>', 'Input text for the session')
    .option('--json', 'Output JSON to stdout')
    .option(
      '--report-path <dir>',
      'Artifact directory',
      '.artifacts',
    )
    .option(
      '--timeout <seconds>',
      'Total run timeout in seconds',
      String(TIMEOUTS.TOTAL_RUN_TIMEOUT / 1000),
    )
    .option('--provider <name>', 'Model provider (anthropic, openai, mock)')
    .option('--model <name>', 'Default model for agents that set none')
    .action(
      async (
        workflowPath: string,
        input: string,
        opts: {
          json?: true;
          reportPath: string;
          timeout: string;
          provider?: string;
          model?: string;
        },
      ) => {
        let workflow: Workflow;
        let runner: Runner;
        try {
          // 1. Load + validate the workflow before any model call
          workflow = await loadWorkflow(workflowPath);
          log.info(`Loaded ${workflow.name} from ${workflowPath}`);

          // 2. Build the model client; CLI flags override env
          const llmConfig = loadLLMConfig({
            ...process.env,
            ...(opts.provider !== undefined ? { LLM_PROVIDER: opts.provider } : {}),
            ...(opts.model !== undefined ? { AGENTWIRE_MODEL: opts.model } : {}),
          });
          runner = new Runner({ client: createModelClient(llmConfig) });
          log.detail(`Provider: ${llmConfig.provider}${llmConfig.model !== undefined ? ` (${llmConfig.model})` : ''}`);
        } catch (err) {
          reportError(err);
          return;
        }

        // 3. Run
        const startedAt = new Date();
        let summary: RunSummary;
        try {
          const timeoutSec = Number(opts.timeout) || TIMEOUTS.TOTAL_RUN_TIMEOUT / 1000;
          const result = await runner.run(workflow, input, { timeoutMs: timeoutSec * 1000 });
          summary = summarizeRun(workflow.name, input, result);
        } catch (err) {
          if (!(err instanceof WorkflowError)) {
            reportError(err);
            return;
          }
          log.error(formatFailure(err));
          summary = summarizeFailure(workflow.name, input, err, startedAt);
        }

        try {
          // 4. Artifacts
          const artifactDir = await writeRunArtifacts(path.resolve(opts.reportPath), summary);

          // 5. JSON to stdout if --json, else the final output
          if (opts.json) {
            process.stdout.write(serializeJSON(generateJSON(summary)) + '\n');
          } else if (typeof summary.output === 'string') {
            process.stdout.write(summary.output + '\n');
          } else if (summary.output !== undefined) {
            process.stdout.write(JSON.stringify(summary.output, null, 2) + '\n');
          }

          // 6. Summary to stderr always
          printSummary(summary, artifactDir);

          // 7. Exit code
          process.exitCode = exitCodeOf(summary);
        } catch (err) {
          reportError(err);
        }
      },
    );
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate a workflow file and print its component tree')
    .argument('<workflow>', 'Path to a workflow file (.yaml or .json)')
    .action(async (workflowPath: string) => {
      try {
        const workflow = await loadWorkflow(workflowPath);
        process.stdout.write(`${workflow.name}: OK\n`);
        process.stdout.write(describeTree(workflow.root).join('\n') + '\n');
      } catch (err) {
        reportError(err);
      }
    });
}
