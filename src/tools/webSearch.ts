import type { ExternalTool } from '../core/tools.js';
import { externalTool } from '../core/tools.js';
import { LIMITS } from '../config/defaults.js';
import { InvocationError } from '../llm/errors.js';

// ── Constants ────────────────────────────────────────────────

export const WEB_SEARCH_TOOL = 'web_search';

const DESCRIPTION =
  'Search the web. Pass a search query; returns the matching results as text, with their sources.';

// ── Tool factory ─────────────────────────────────────────────

export interface WebSearchConfig {
  /** Search endpoint; the query is sent as the `q` parameter. */
  endpoint: string;
  apiKey?: string | undefined;
  maxChars?: number | undefined;
}

/**
 * `web_search` backed by an HTTP search endpoint. Non-2xx answers become
 * classified `InvocationError`s so the agent's retry policy applies.
 */
export function createWebSearchTool(config: WebSearchConfig): ExternalTool {
  const maxChars = config.maxChars ?? LIMITS.MAX_TOOL_OUTPUT_CHARS;

  return externalTool(WEB_SEARCH_TOOL, DESCRIPTION, async (query: string): Promise<string> => {
    const url = new URL(config.endpoint);
    url.searchParams.set('q', query);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: config.apiKey !== undefined
          ? { Authorization: `Bearer ${config.apiKey}` }
          : {},
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new InvocationError(`Search request failed: ${message}`, 'other', { cause: err });
    }

    const body = await response.text();
    if (!response.ok) {
      throw InvocationError.fromStatus(
        `Search API error (${String(response.status)}): ${body.slice(0, 200)}`,
        response.status,
      );
    }

    return body.length > maxChars ? body.slice(0, maxChars) : body;
  });
}
