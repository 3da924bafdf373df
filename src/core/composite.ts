import type { ComponentOutput } from '../schema/results.js';
import * as log from '../utils/logger.js';
import type { Component, ParallelDescriptor, SequentialDescriptor } from './components.js';
import type { ExecutionContext } from './session.js';
import { nested } from './session.js';
import type { StateDelta } from './state.js';
import { runAgent } from './agent.js';
import { AggregateFailureError, toWorkflowError, withComponent } from './errors.js';
import type { ChildFailure } from './errors.js';

// ── Dispatch ────────────────────────────────────────────────

export async function runComponent(
  component: Component,
  ctx: ExecutionContext,
  input: string,
): Promise<ComponentOutput> {
  switch (component.kind) {
    case 'agent':
      return runAgent(component, ctx, input);
    case 'sequential':
      return runSequential(component, ctx, input);
    case 'parallel':
      return runParallel(component, ctx, input);
  }
}

// ── Sequential ──────────────────────────────────────────────

/**
 * Run children in declared order against one store. The first failure
 * stops the chain. Returns the last child's output.
 */
export async function runSequential(
  composite: SequentialDescriptor,
  ctx: ExecutionContext,
  input: string,
): Promise<ComponentOutput> {
  log.composite(ctx.depth, composite.kind, composite.name, composite.children.length);

  let output: ComponentOutput = '';
  try {
    for (const child of composite.children) {
      output = await runComponent(child, nested(ctx), input);
    }
  } catch (err) {
    throw withComponent(err, composite.name);
  }
  return output;
}

// ── Parallel ────────────────────────────────────────────────

/**
 * Fan out every child onto its own fork of the current state, wait for all
 * of them, then merge. Any failed branch fails the whole group and nothing
 * is merged.
 */
export async function runParallel(
  composite: ParallelDescriptor,
  ctx: ExecutionContext,
  input: string,
): Promise<ComponentOutput> {
  log.composite(ctx.depth, composite.kind, composite.name, composite.children.length);

  const branches = composite.children.map((child) => ({
    child,
    state: ctx.state.fork(),
  }));

  const settled = await Promise.allSettled(
    branches.map(({ child, state }) => runComponent(child, nested(ctx, state), input)),
  );

  const failures: ChildFailure[] = [];
  const outputs: Record<string, ComponentOutput> = {};
  const deltas: StateDelta[] = [];

  settled.forEach((result, i) => {
    const branch = branches[i];
    if (!branch) return;
    if (result.status === 'rejected') {
      failures.push({ child: branch.child.name, error: toWorkflowError(result.reason) });
      return;
    }
    outputs[branch.child.name] = result.value;
    deltas.push({ source: branch.child.name, writes: branch.state.writes() });
  });

  if (failures.length > 0) {
    throw withComponent(new AggregateFailureError(composite.name, failures), composite.name);
  }

  const collisions = ctx.state.merge(deltas);
  for (const collision of collisions) {
    log.warn(
      `${composite.name}: branches ${collision.sources.join(', ')} all wrote "${collision.key}"; keeping ${collision.sources.at(-1) ?? ''}`,
    );
    ctx.session.warnings.push(collision);
  }

  return outputs;
}
