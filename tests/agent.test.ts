import { describe, it, expect, vi } from 'vitest';

import { runAgent } from '../src/core/agent.js';
import { defineAgent } from '../src/core/components.js';
import { agentTool, externalTool } from '../src/core/tools.js';
import { StateStore } from '../src/core/state.js';
import {
  MissingVariableError,
  ToolLoopExceededError,
  UnknownToolError,
} from '../src/core/errors.js';
import { createMockClient } from '../src/llm/mock.js';
import type { ModelRequest } from '../src/llm/client.js';
import { InvocationError } from '../src/llm/errors.js';
import { context, failureOf } from './helpers.js';

describe('runAgent', () => {
  it('should render its instruction and publish the result under its output key', async () => {
    const requests: ModelRequest[] = [];
    const client = createMockClient((req) => {
      requests.push(req);
      return 'an essay';
    });
    const state = new StateStore({ topic: 'bees' });
    const agent = defineAgent({ name: 'Writer', instruction: 'Write about {topic}', outputKey: 'essay' });

    const result = await runAgent(agent, context(client, state), 'go');

    expect(result).toBe('an essay');
    expect(state.get('essay')).toBe('an essay');
    expect(requests[0]?.instruction).toBe('Write about bees');
    expect(requests[0]?.input).toBe('go');
    expect(requests[0]?.tools).toEqual([]);
  });

  it('should leave the store untouched without an output key', async () => {
    const state = new StateStore({ topic: 'bees' });
    const agent = defineAgent({ name: 'Quiet', instruction: 'hi' });

    await runAgent(agent, context(createMockClient(['ok']), state), 'go');

    expect(state.keys()).toEqual(['topic']);
  });

  it('should call an external tool and feed its output back to the model', async () => {
    const search = vi.fn(async (query: string) => `results for ${query}`);
    const requests: ModelRequest[] = [];
    const client = createMockClient((req, i) => {
      requests.push(req);
      if (i === 0) {
        return { type: 'tool_call', calls: [{ id: 'c1', name: 'web_search', input: 'bees' }] };
      }
      return 'final answer';
    });
    const agent = defineAgent({
      name: 'Researcher',
      instruction: 'Research.',
      tools: [externalTool('web_search', 'Search the web', search)],
    });

    const result = await runAgent(agent, context(client), 'bees please');

    expect(result).toBe('final answer');
    expect(search).toHaveBeenCalledWith('bees');
    expect(requests[0]?.tools).toEqual([{ name: 'web_search', description: 'Search the web' }]);
    expect(requests[0]?.history).toEqual([]);
    expect(requests[1]?.history).toEqual([
      {
        exchanges: [
          { call: { id: 'c1', name: 'web_search', input: 'bees' }, output: 'results for bees' },
        ],
      },
    ]);
  });

  it('should retry a transiently failing external tool under the agent policy', async () => {
    const search = vi
      .fn<(input: string) => Promise<string>>()
      .mockRejectedValueOnce(new InvocationError('busy', 'rate-limited', { status: 429 }))
      .mockResolvedValue('found it');
    const client = createMockClient([
      { type: 'tool_call', calls: [{ id: 'c1', name: 'web_search', input: 'q' }] },
      'done',
    ]);
    const agent = defineAgent({
      name: 'Researcher',
      instruction: 'Research.',
      tools: [externalTool('web_search', 'Search the web', search)],
    });
    const ctx = context(client);

    await expect(runAgent(agent, ctx, 'q')).resolves.toBe('done');
    expect(search).toHaveBeenCalledTimes(2);
    expect(ctx.session.sleep).toHaveBeenCalledWith(1_000);
  });

  it('should run a wrapped agent as a tool against the caller store', async () => {
    const client = createMockClient((req) => {
      if (req.agent === 'Sub') return `sub result: ${req.input}`;
      if (req.history.length === 0) {
        return { type: 'tool_call', calls: [{ id: 't1', name: 'Sub', input: 'dig' }] };
      }
      return `parent saw ${req.history[0]?.exchanges[0]?.output ?? ''}`;
    });
    const sub = defineAgent({ name: 'Sub', instruction: 'Dig.', outputKey: 'findings' });
    const parent = defineAgent({ name: 'Parent', instruction: 'Lead.', tools: [agentTool(sub)] });
    const state = new StateStore();

    const result = await runAgent(parent, context(client, state), 'start');

    expect(result).toBe('parent saw sub result: dig');
    expect(state.get('findings')).toBe('sub result: dig');
  });

  it('should describe a wrapped agent with its description', () => {
    const sub = defineAgent({ name: 'Sub', instruction: 'x', description: 'Digs deep.' });

    expect(agentTool(sub).description).toBe('Digs deep.');
    expect(agentTool(sub, 'Override').description).toBe('Override');
  });

  it('should fail with ToolLoopExceeded after the configured number of rounds', async () => {
    const echo = vi.fn(async (input: string) => input);
    const client = createMockClient(() => ({
      type: 'tool_call',
      calls: [{ id: 'loop', name: 'echo', input: 'again' }],
    }));
    const invoke = vi.spyOn(client, 'invoke');
    const agent = defineAgent({
      name: 'Looper',
      instruction: 'Loop.',
      tools: [externalTool('echo', 'Echo', echo)],
      maxToolIterations: 2,
    });

    const err = await failureOf(runAgent(agent, context(client), 'go'));

    expect(err).toBeInstanceOf(ToolLoopExceededError);
    expect(err).toHaveProperty('path', ['Looper']);
    expect(echo).toHaveBeenCalledTimes(2);
    expect(invoke).toHaveBeenCalledTimes(3);
  });

  it('should fall back to the session bound when the agent sets none', async () => {
    const client = createMockClient(() => ({
      type: 'tool_call',
      calls: [{ id: 'loop', name: 'echo', input: 'again' }],
    }));
    const echo = vi.fn(async (input: string) => input);
    const agent = defineAgent({
      name: 'Looper',
      instruction: 'Loop.',
      tools: [externalTool('echo', 'Echo', echo)],
    });

    const err = await failureOf(runAgent(agent, context(client, new StateStore(), 1), 'go'));

    expect(err).toBeInstanceOf(ToolLoopExceededError);
    expect(echo).toHaveBeenCalledTimes(1);
  });

  it('should reject a call to an undeclared tool', async () => {
    const client = createMockClient([
      { type: 'tool_call', calls: [{ id: 'x', name: 'rm_rf', input: '/' }] },
    ]);
    const agent = defineAgent({ name: 'Agent', instruction: 'Work.' });

    const err = await failureOf(runAgent(agent, context(client), 'go'));

    expect(err).toBeInstanceOf(UnknownToolError);
    expect(err).toHaveProperty('tool', 'rm_rf');
  });

  it('should fail before calling the model when a variable is missing', async () => {
    const client = createMockClient();
    const invoke = vi.spyOn(client, 'invoke');
    const agent = defineAgent({ name: 'Editor', instruction: 'Edit this draft: {blog_draft}' });

    const err = await failureOf(runAgent(agent, context(client), 'go'));

    expect(err).toBeInstanceOf(MissingVariableError);
    expect(err).toHaveProperty('path', ['Editor']);
    expect(invoke).not.toHaveBeenCalled();
  });

  it('should retry a transient model failure and then succeed', async () => {
    const client = createMockClient([
      new InvocationError('rate limited', 'rate-limited', { status: 429 }),
      'ok',
    ]);
    const agent = defineAgent({ name: 'Agent', instruction: 'Work.', outputKey: 'out' });
    const state = new StateStore();
    const ctx = context(client, state);

    await expect(runAgent(agent, ctx, 'go')).resolves.toBe('ok');
    expect(ctx.session.sleep).toHaveBeenCalledTimes(1);
    expect(state.get('out')).toBe('ok');
  });

  it('should not write its output key when it fails', async () => {
    const failure = new InvocationError('bad request', 'other', { status: 400 });
    const client = createMockClient([failure]);
    const agent = defineAgent({ name: 'Agent', instruction: 'Work.', outputKey: 'out' });
    const state = new StateStore();

    const err = await failureOf(runAgent(agent, context(client, state), 'go'));

    expect(err).toBeInstanceOf(InvocationError);
    if (!(err instanceof InvocationError)) return;
    expect(err.path).toEqual(['Agent']);
    expect(err.status).toBe(400);
    expect(failure.path).toEqual([]);
    expect(state.has('out')).toBe(false);
  });
});
