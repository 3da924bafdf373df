import type { ReadableState, StateValue } from './state.js';
import { MissingVariableError } from './errors.js';

// `{key}` or `{key?}`; anything else in braces is left alone.
const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)(\?)?\}/g;

function stringify(value: StateValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Resolve `{key}` placeholders against the visible state.
 * Throws `MissingVariableError` for a required key that is not set;
 * `{key?}` renders as empty text instead.
 */
export function render(template: string, state: ReadableState): string {
  return template.replace(PLACEHOLDER, (_match, key: string, optional: string | undefined) => {
    const value = state.get(key);
    if (value === undefined) {
      if (optional !== undefined) return '';
      throw new MissingVariableError(key);
    }
    return stringify(value);
  });
}

export interface Placeholder {
  key: string;
  optional: boolean;
}

/** Keys a template reads, in first-seen order. */
export function listPlaceholders(template: string): Placeholder[] {
  const seen = new Map<string, Placeholder>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    const key = match[1];
    if (key === undefined || seen.has(key)) continue;
    seen.set(key, { key, optional: match[2] !== undefined });
  }
  return Array.from(seen.values());
}
