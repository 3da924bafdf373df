/**
 * agentwire: compose LLM agents into workflows.
 *
 * - Sequential pipelines and parallel fan-out over a session-scoped state store
 * - `{key}` instruction templates resolved right before each agent runs
 * - Bounded exponential backoff on transient model and tool failures
 * - Agents exposed to other agents as tools, with a bounded tool-call loop
 */

export * from './core/index.js';
export * from './schema/index.js';
export {
  createModelClient,
  createAnthropicClient,
  createOpenAIClient,
  createMockClient,
  loadLLMConfig,
  InvocationError,
  classifyStatus,
} from './llm/index.js';
export type { ModelClient, ModelRequest, LLMConfig, LLMProvider, MockResponse, MockResponder } from './llm/index.js';
export { loadWorkflowFile, parseWorkflowFile, LIMITS, RETRY_DEFAULTS, TIMEOUTS, USER_INPUT_KEY } from './config/index.js';
export { createToolRegistry, createWebSearchTool, WEB_SEARCH_TOOL } from './tools/index.js';
export type { WebSearchConfig } from './tools/index.js';
export {
  summarizeRun,
  summarizeFailure,
  generateMarkdown,
  generateJSON,
  serializeJSON,
  writeRunArtifacts,
} from './report/index.js';
