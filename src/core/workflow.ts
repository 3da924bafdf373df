import type { ToolRef, WorkflowFile } from '../schema/workflow.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { AgentDescriptor, Component } from './components.js';
import { defineAgent, parallel, sequential } from './components.js';
import type { RetryPolicy } from './retry.js';
import { DEFAULT_RETRY_POLICY, createRetryPolicy } from './retry.js';
import type { ToolDescriptor, ToolRegistry } from './tools.js';
import { agentTool } from './tools.js';
import { ConfigurationError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface Workflow {
  readonly name: string;
  readonly root: Component;
  /** Default tool-round bound for agents that set none. */
  readonly maxToolIterations: number;
  /** Every component by name, including agents reachable only as tools. */
  readonly components: ReadonlyMap<string, Component>;
}

export interface WorkflowOptions {
  name?: string | undefined;
  maxToolIterations?: number | undefined;
}

// ── Validation ──────────────────────────────────────────────

function collectComponents(root: Component): Map<string, Component> {
  const components = new Map<string, Component>();
  const nesting: Component[] = [];

  const register = (component: Component): boolean => {
    if (component.name.trim().length === 0) {
      throw new ConfigurationError('Component names must not be empty');
    }
    const existing = components.get(component.name);
    if (existing !== undefined && existing !== component) {
      throw new ConfigurationError(`Duplicate component name "${component.name}"`);
    }
    components.set(component.name, component);
    return existing === undefined;
  };

  const visit = (component: Component): void => {
    if (nesting.includes(component)) {
      const trail = [...nesting, component].map((c) => c.name).join(' → ');
      throw new ConfigurationError(`Composite nesting cycle: ${trail}`);
    }
    const isNew = register(component);

    nesting.push(component);
    if (component.kind === 'agent') {
      if (isNew) visitTools(component);
    } else {
      if (component.children.length === 0) {
        throw new ConfigurationError(`Composite "${component.name}" has no children`);
      }
      const seen = new Set<string>();
      for (const child of component.children) {
        if (seen.has(child.name)) {
          throw new ConfigurationError(`Composite "${component.name}" lists "${child.name}" twice`);
        }
        seen.add(child.name);
        visit(child);
      }
    }
    nesting.pop();
  };

  const visitTools = (agent: AgentDescriptor): void => {
    const names = new Set<string>();
    for (const tool of agent.tools) {
      if (names.has(tool.name)) {
        throw new ConfigurationError(`Agent "${agent.name}" declares tool "${tool.name}" twice`);
      }
      names.add(tool.name);
      if (tool.kind === 'agent' && register(tool.agent)) {
        visitTools(tool.agent);
      }
    }
  };

  visit(root);
  return components;
}

/** Depth-first search over the agent-as-tool graph. */
function assertNoToolCycles(components: ReadonlyMap<string, Component>): void {
  const done = new Set<AgentDescriptor>();
  const trail: AgentDescriptor[] = [];

  const visit = (agent: AgentDescriptor): void => {
    if (done.has(agent)) return;
    if (trail.includes(agent)) {
      const cycle = [...trail.slice(trail.indexOf(agent)), agent].map((a) => a.name).join(' → ');
      throw new ConfigurationError(`Agent-as-tool cycle: ${cycle}`);
    }
    trail.push(agent);
    for (const tool of agent.tools) {
      if (tool.kind === 'agent') visit(tool.agent);
    }
    trail.pop();
    done.add(agent);
  };

  for (const component of components.values()) {
    if (component.kind === 'agent') visit(component);
  }
}

// ── Construction ────────────────────────────────────────────

/**
 * Validate a component tree before anything runs. Rejects duplicate names,
 * empty composites, nesting cycles and agent-as-tool cycles with a
 * `ConfigurationError`.
 */
export function defineWorkflow(root: Component, options: WorkflowOptions = {}): Workflow {
  const components = collectComponents(root);
  assertNoToolCycles(components);

  return Object.freeze({
    name: options.name ?? root.name,
    root,
    maxToolIterations: options.maxToolIterations ?? LIMITS.MAX_TOOL_ITERATIONS,
    components,
  });
}

// ── Building from a workflow file ───────────────────────────

export interface BuildOptions {
  tools?: ToolRegistry | undefined;
}

/**
 * Turn a parsed workflow file into a validated workflow. Names are resolved
 * eagerly, so unknown references and cycles fail here.
 */
export function buildWorkflow(file: WorkflowFile, options: BuildOptions = {}): Workflow {
  const policies = new Map<string, RetryPolicy>([['default', DEFAULT_RETRY_POLICY]]);
  for (const [name, config] of Object.entries(file.retryPolicies)) {
    policies.set(name, createRetryPolicy(config));
  }

  const agentEntries = new Map(file.agents.map((a) => [a.name, a]));
  const compositeEntries = new Map(file.composites.map((c) => [c.name, c]));

  const declared = new Set<string>();
  for (const name of [...file.agents.map((a) => a.name), ...file.composites.map((c) => c.name)]) {
    if (declared.has(name)) {
      throw new ConfigurationError(`Duplicate component name "${name}"`);
    }
    declared.add(name);
  }

  const built = new Map<string, Component>();
  const resolving: string[] = [];

  const enter = (name: string, kind: string): void => {
    if (resolving.includes(name)) {
      const cycle = [...resolving.slice(resolving.indexOf(name)), name].join(' → ');
      throw new ConfigurationError(`${kind} cycle: ${cycle}`);
    }
    resolving.push(name);
  };

  const resolveTool = (owner: string, ref: ToolRef): ToolDescriptor => {
    if ('external' in ref) {
      const tool = options.tools?.get(ref.external);
      if (!tool) {
        throw new ConfigurationError(`Agent "${owner}" uses unknown external tool "${ref.external}"`);
      }
      return tool;
    }
    if (!agentEntries.has(ref.agent)) {
      throw new ConfigurationError(`Agent "${owner}" uses unknown agent tool "${ref.agent}"`);
    }
    return agentTool(resolveAgent(ref.agent), ref.description);
  };

  const resolveAgent = (name: string): AgentDescriptor => {
    const cached = built.get(name);
    if (cached?.kind === 'agent') return cached;

    const entry = agentEntries.get(name);
    if (!entry) throw new ConfigurationError(`Unknown agent "${name}"`);

    enter(name, 'Agent-as-tool');
    const retryPolicy = policies.get(entry.retryPolicy ?? 'default');
    if (!retryPolicy) {
      throw new ConfigurationError(`Agent "${name}" uses unknown retry policy "${entry.retryPolicy ?? ''}"`);
    }
    const agent = defineAgent({
      name,
      instruction: entry.instruction,
      description: entry.description,
      outputKey: entry.outputKey,
      model: entry.model,
      tools: entry.tools.map((ref) => resolveTool(name, ref)),
      retryPolicy,
      maxToolIterations: entry.maxToolIterations,
    });
    resolving.pop();

    built.set(name, agent);
    return agent;
  };

  const resolve = (name: string): Component => {
    if (agentEntries.has(name)) return resolveAgent(name);

    const cached = built.get(name);
    if (cached) return cached;

    const entry = compositeEntries.get(name);
    if (!entry) throw new ConfigurationError(`Unknown component "${name}"`);

    enter(name, 'Composite nesting');
    const children = entry.children.map(resolve);
    resolving.pop();

    const composite = entry.type === 'sequential'
      ? sequential(name, children)
      : parallel(name, children);
    built.set(name, composite);
    return composite;
  };

  const root = resolve(file.root);

  for (const name of declared) {
    if (!built.has(name)) log.warn(`Workflow "${file.name}": "${name}" is declared but never used`);
  }

  return defineWorkflow(root, {
    name: file.name,
    maxToolIterations: file.maxToolIterations,
  });
}
