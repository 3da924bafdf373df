import { vi } from 'vitest';

import type { ModelClient } from '../src/llm/client.js';
import type { ExecutionContext } from '../src/core/session.js';
import { StateStore } from '../src/core/state.js';

export function fakeSleep() {
  return vi.fn(async (_ms: number): Promise<void> => {});
}

export function context(
  client: ModelClient,
  state: StateStore = new StateStore(),
  maxToolIterations = 10,
): ExecutionContext {
  return {
    session: {
      id: 'test-session',
      client,
      sleep: fakeSleep(),
      maxToolIterations,
      warnings: [],
    },
    state,
    depth: 0,
  };
}

/** Resolve with whatever the promise rejects with; fail if it resolves. */
export async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected the promise to reject');
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
