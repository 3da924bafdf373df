import type { RetryPolicy } from './retry.js';
import { DEFAULT_RETRY_POLICY } from './retry.js';
import type { ToolDescriptor } from './tools.js';

// ── Descriptors ─────────────────────────────────────────────

export interface AgentDescriptor {
  readonly kind: 'agent';
  readonly name: string;
  /** Template with `{key}` placeholders, rendered right before the agent runs. */
  readonly instruction: string;
  /** Shown to a calling model when the agent is exposed as a tool. */
  readonly description?: string | undefined;
  /** State key the result is published under; absent = caller only. */
  readonly outputKey?: string | undefined;
  readonly model?: string | undefined;
  readonly tools: readonly ToolDescriptor[];
  readonly retryPolicy: RetryPolicy;
  /** Overrides the workflow's tool-round bound for this agent. */
  readonly maxToolIterations?: number | undefined;
}

export interface SequentialDescriptor {
  readonly kind: 'sequential';
  readonly name: string;
  readonly children: readonly Component[];
}

export interface ParallelDescriptor {
  readonly kind: 'parallel';
  readonly name: string;
  readonly children: readonly Component[];
}

export type CompositeDescriptor = SequentialDescriptor | ParallelDescriptor;

export type Component = AgentDescriptor | CompositeDescriptor;

// ── Factories ────────────────────────────────────────────────

export interface AgentOptions {
  name: string;
  instruction: string;
  description?: string | undefined;
  outputKey?: string | undefined;
  model?: string | undefined;
  tools?: readonly ToolDescriptor[] | undefined;
  retryPolicy?: RetryPolicy | undefined;
  maxToolIterations?: number | undefined;
}

export function defineAgent(options: AgentOptions): AgentDescriptor {
  return Object.freeze({
    kind: 'agent',
    name: options.name,
    instruction: options.instruction,
    description: options.description,
    outputKey: options.outputKey,
    model: options.model,
    tools: Object.freeze([...(options.tools ?? [])]),
    retryPolicy: options.retryPolicy ?? DEFAULT_RETRY_POLICY,
    maxToolIterations: options.maxToolIterations,
  });
}

export function sequential(name: string, children: readonly Component[]): SequentialDescriptor {
  return Object.freeze({ kind: 'sequential', name, children: Object.freeze([...children]) });
}

export function parallel(name: string, children: readonly Component[]): ParallelDescriptor {
  return Object.freeze({ kind: 'parallel', name, children: Object.freeze([...children]) });
}
