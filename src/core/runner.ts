import { randomUUID } from 'node:crypto';

import type { ModelClient } from '../llm/client.js';
import type { ComponentOutput, MergeCollision } from '../schema/results.js';
import { USER_INPUT_KEY } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { Sleep } from './retry.js';
import { defaultSleep } from './retry.js';
import type { Session } from './session.js';
import { StateStore } from './state.js';
import type { ReadableState } from './state.js';
import type { Workflow } from './workflow.js';
import { runComponent } from './composite.js';
import { RunTimeoutError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

/** Loaded once at startup and only read afterwards. */
export interface RunnerConfig {
  readonly client: ModelClient;
  /** Backoff sleep; tests pass a fake. */
  readonly sleep?: Sleep | undefined;
}

export interface RunOptions {
  /** Stop waiting after this long. In-flight work is discarded, not killed. */
  timeoutMs?: number | undefined;
}

export interface RunResult {
  sessionId: string;
  output: ComponentOutput;
  /** Terminal store; consumers may read it but not write to it. */
  state: ReadableState;
  warnings: readonly MergeCollision[];
  startedAt: Date;
  durationMs: number;
}

// ── Runner ───────────────────────────────────────────────────

export class Runner {
  private readonly config: RunnerConfig;

  constructor(config: RunnerConfig) {
    this.config = Object.freeze({ ...config });
  }

  /**
   * Run a workflow in a fresh session seeded with `input` under
   * `user_input`. Resolves with the root's output and the final state, or
   * rejects with the root's failure.
   */
  async run(workflow: Workflow, input: string, options: RunOptions = {}): Promise<RunResult> {
    const session: Session = {
      id: randomUUID(),
      client: this.config.client,
      sleep: this.config.sleep ?? defaultSleep,
      maxToolIterations: workflow.maxToolIterations,
      warnings: [],
    };
    const state = new StateStore({ [USER_INPUT_KEY]: input });
    const startedAt = new Date();

    log.section(`${workflow.name} (session ${session.id})`);

    const execution = runComponent(workflow.root, { session, state, depth: 0 }, input);
    const output = options.timeoutMs !== undefined
      ? await withDeadline(execution, options.timeoutMs)
      : await execution;

    return {
      sessionId: session.id,
      output,
      state: state.view(),
      warnings: [...session.warnings],
      startedAt,
      durationMs: Date.now() - startedAt.getTime(),
    };
  }
}

// ── Deadline ─────────────────────────────────────────────────

async function withDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new RunTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
