/**
 * External tools shipped with agentwire.
 * Each one is opaque to the core: invoked with text, resolves with text.
 */

import { ToolRegistry } from '../core/tools.js';
import { createWebSearchTool } from './webSearch.js';

export { createWebSearchTool, WEB_SEARCH_TOOL } from './webSearch.js';
export type { WebSearchConfig } from './webSearch.js';

// ── Registry from environment ───────────────────────────────

export function createToolRegistry(env: NodeJS.ProcessEnv = process.env): ToolRegistry {
  const registry = new ToolRegistry();

  const endpoint = env['SEARCH_API_URL'];
  if (endpoint) {
    registry.register(createWebSearchTool({ endpoint, apiKey: env['SEARCH_API_KEY'] }));
  }

  return registry;
}
