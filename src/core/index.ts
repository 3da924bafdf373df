/**
 * Core orchestration module.
 * State, templating, retries, agents, composites and the Runner.
 * Pure logic: model and tool IO go through the interfaces they are handed.
 */

export { StateStore } from './state.js';
export type { Json, StateValue, StateSnapshot, ReadableState, StateDelta } from './state.js';
export { render, listPlaceholders } from './template.js';
export type { Placeholder } from './template.js';
export {
  createRetryPolicy,
  invokeWithRetry,
  backoffDelayMs,
  classifyFailure,
  defaultSleep,
  DEFAULT_RETRY_POLICY,
} from './retry.js';
export type { RetryPolicy, RetryOptions, Sleep } from './retry.js';
export { defineAgent, sequential, parallel } from './components.js';
export type {
  AgentDescriptor,
  AgentOptions,
  SequentialDescriptor,
  ParallelDescriptor,
  CompositeDescriptor,
  Component,
} from './components.js';
export { agentTool, externalTool, ToolRegistry } from './tools.js';
export type { ExternalTool, AgentTool, ToolDescriptor } from './tools.js';
export { runAgent } from './agent.js';
export { runComponent, runSequential, runParallel } from './composite.js';
export { defineWorkflow, buildWorkflow } from './workflow.js';
export type { Workflow, WorkflowOptions, BuildOptions } from './workflow.js';
export { Runner } from './runner.js';
export type { RunnerConfig, RunOptions, RunResult } from './runner.js';
export type { Session, ExecutionContext } from './session.js';
export * from './errors.js';
