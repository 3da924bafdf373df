import type { MergeCollision } from '../schema/results.js';

// ── Values ───────────────────────────────────────────────────

export type Json = string | number | boolean | null | Json[] | { [k: string]: Json };

export type StateValue = Json;

export type StateSnapshot = Readonly<Record<string, StateValue>>;

/** Read-only access to a store, handed to templating and to output consumers. */
export interface ReadableState {
  get(key: string): StateValue | undefined;
  has(key: string): boolean;
  keys(): string[];
  snapshot(): StateSnapshot;
}

export interface StateDelta {
  /** Name of the branch that produced the writes. */
  source: string;
  writes: StateSnapshot;
}

// ── Store ────────────────────────────────────────────────────

/**
 * Session-scoped key/value store agents publish their outputs to.
 *
 * A fork starts from a frozen snapshot of its parent and records its own
 * writes, so parallel branches never see each other until the parent merges
 * those writes back.
 */
export class StateStore implements ReadableState {
  private readonly entries: Map<string, StateValue>;
  private readonly recorded = new Map<string, StateValue>();

  constructor(initial: StateSnapshot = {}) {
    this.entries = new Map(Object.entries(initial));
  }

  get(key: string): StateValue | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  set(key: string, value: StateValue): void {
    this.entries.set(key, value);
    this.recorded.set(key, value);
  }

  snapshot(): StateSnapshot {
    return Object.freeze(Object.fromEntries(this.entries));
  }

  fork(): StateStore {
    return new StateStore(this.snapshot());
  }

  /** Writes made through `set` since this store was created. */
  writes(): StateSnapshot {
    return Object.freeze(Object.fromEntries(this.recorded));
  }

  /**
   * Apply deltas in order; a later delta wins a key collision. Every
   * collision is returned so the caller can surface it.
   */
  merge(deltas: readonly StateDelta[]): MergeCollision[] {
    const writers = new Map<string, string[]>();

    for (const delta of deltas) {
      for (const [key, value] of Object.entries(delta.writes)) {
        this.set(key, value);
        const sources = writers.get(key) ?? [];
        sources.push(delta.source);
        writers.set(key, sources);
      }
    }

    return Array.from(writers.entries())
      .filter(([, sources]) => sources.length > 1)
      .map(([key, sources]) => ({ key, sources }));
  }

  view(): ReadableState {
    return {
      get: (key) => this.get(key),
      has: (key) => this.has(key),
      keys: () => this.keys(),
      snapshot: () => this.snapshot(),
    };
  }
}
