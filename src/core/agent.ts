import type { ToolCall, ToolExchange, ToolRound, ToolSpec } from '../schema/model.js';
import * as log from '../utils/logger.js';
import type { AgentDescriptor } from './components.js';
import type { ExecutionContext } from './session.js';
import { nested } from './session.js';
import type { ToolDescriptor } from './tools.js';
import { invokeWithRetry } from './retry.js';
import { render } from './template.js';
import { ToolLoopExceededError, UnknownToolError, withComponent } from './errors.js';
import { InvocationError } from '../llm/errors.js';

// ── Boundary ────────────────────────────────────────────────

async function atBoundary<T>(work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (err) {
    throw err instanceof InvocationError ? err.reissue() : err;
  }
}

// ── Tool dispatch ───────────────────────────────────────────

function toToolSpec(tool: ToolDescriptor): ToolSpec {
  return { name: tool.name, description: tool.description };
}

async function dispatchTool(
  agent: AgentDescriptor,
  tool: ToolDescriptor,
  call: ToolCall,
  ctx: ExecutionContext,
): Promise<string> {
  log.tool(ctx.depth + 1, agent.name, tool.name);

  switch (tool.kind) {
    case 'external':
      return invokeWithRetry(() => atBoundary(tool.invoke(call.input)), agent.retryPolicy, {
        sleep: ctx.session.sleep,
        label: `${agent.name} → ${tool.name}`,
      });
    case 'agent':
      // The wrapped agent retries its own model calls under its own policy.
      return runAgent(tool.agent, nested(ctx), call.input);
  }
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Execute one agent: render its instruction, loop over tool calls until the
 * model gives a final answer, then publish the answer under the agent's
 * output key.
 */
export async function runAgent(
  agent: AgentDescriptor,
  ctx: ExecutionContext,
  input: string,
): Promise<string> {
  log.agent(ctx.depth, agent.name);

  try {
    const result = await execute(agent, ctx, input);
    if (agent.outputKey !== undefined) {
      ctx.state.set(agent.outputKey, result);
    }
    log.agentResult(ctx.depth, agent.name, true, agent.outputKey);
    return result;
  } catch (err) {
    log.agentResult(ctx.depth, agent.name, false);
    throw withComponent(err, agent.name);
  }
}

async function execute(
  agent: AgentDescriptor,
  ctx: ExecutionContext,
  input: string,
): Promise<string> {
  const instruction = render(agent.instruction, ctx.state);
  const tools = new Map(agent.tools.map((t) => [t.name, t]));
  const toolSpecs = agent.tools.map(toToolSpec);
  const maxRounds = agent.maxToolIterations ?? ctx.session.maxToolIterations;
  const history: ToolRound[] = [];

  for (;;) {
    const turn = await invokeWithRetry(
      () =>
        atBoundary(
          ctx.session.client.invoke({
            agent: agent.name,
            model: agent.model,
            instruction,
            input,
            tools: toolSpecs,
            history: [...history],
          }),
        ),
      agent.retryPolicy,
      { sleep: ctx.session.sleep, label: agent.name },
    );

    if (turn.type === 'final') return turn.text;

    if (history.length >= maxRounds) {
      throw new ToolLoopExceededError(agent.name, maxRounds);
    }

    const exchanges: ToolExchange[] = [];
    for (const call of turn.calls) {
      const tool = tools.get(call.name);
      if (!tool) throw new UnknownToolError(agent.name, call.name);
      const output = await dispatchTool(agent, tool, call, ctx);
      exchanges.push({ call, output });
    }
    history.push({ exchanges });
  }
}
