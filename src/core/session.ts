import type { ModelClient } from '../llm/client.js';
import type { MergeCollision } from '../schema/results.js';
import type { Sleep } from './retry.js';
import type { StateStore } from './state.js';

/** One Runner invocation. Lives exactly as long as the `run()` call. */
export interface Session {
  readonly id: string;
  readonly client: ModelClient;
  readonly sleep: Sleep;
  readonly maxToolIterations: number;
  /** Parallel merge collisions seen so far. */
  readonly warnings: MergeCollision[];
}

/** What a component runs against: its session and the state it may see. */
export interface ExecutionContext {
  readonly session: Session;
  readonly state: StateStore;
  /** Nesting depth, for log indentation. */
  readonly depth: number;
}

export function nested(ctx: ExecutionContext, state: StateStore = ctx.state): ExecutionContext {
  return { session: ctx.session, state, depth: ctx.depth + 1 };
}
