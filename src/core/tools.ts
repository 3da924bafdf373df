import type { AgentDescriptor } from './components.js';

// ── Descriptors ─────────────────────────────────────────────

/** A capability outside the core, e.g. web search. Opaque: called and awaited. */
export interface ExternalTool {
  readonly kind: 'external';
  readonly name: string;
  readonly description: string;
  invoke(input: string): Promise<string>;
}

/** Exposes an agent to another agent's tool loop. */
export interface AgentTool {
  readonly kind: 'agent';
  readonly name: string;
  readonly description: string;
  readonly agent: AgentDescriptor;
}

export type ToolDescriptor = ExternalTool | AgentTool;

// ── Factories ────────────────────────────────────────────────

export function agentTool(agent: AgentDescriptor, description?: string): AgentTool {
  return Object.freeze({
    kind: 'agent',
    name: agent.name,
    description: description ?? agent.description ?? `Delegate a request to the ${agent.name} agent and return its answer.`,
    agent,
  });
}

export function externalTool(
  name: string,
  description: string,
  invoke: (input: string) => Promise<string>,
): ExternalTool {
  return Object.freeze({ kind: 'external', name, description, invoke });
}

// ── Registry ─────────────────────────────────────────────────

/**
 * Registry for external tools
 *
 * Workflow files refer to external tools by name; the registry supplies the
 * implementations when the file is built into a workflow.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ExternalTool>();

  register(tool: ExternalTool): this {
    this.tools.set(tool.name, tool);
    return this;
  }

  registerAll(tools: readonly ExternalTool[]): this {
    for (const tool of tools) {
      this.register(tool);
    }
    return this;
  }

  get(name: string): ExternalTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }
}
