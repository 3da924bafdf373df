/**
 * Default configuration values.
 * Workflow files and CLI flags override these.
 */

export const TIMEOUTS = {
  TOTAL_RUN_TIMEOUT: 600_000,
} as const;

export const LIMITS = {
  MAX_TOOL_ITERATIONS: 10,
  MAX_TOOL_OUTPUT_CHARS: 8_000,
  MAX_MODEL_TOKENS: 4_096,
} as const;

export const RETRY_DEFAULTS = {
  ATTEMPTS: 5,
  EXP_BASE: 7,
  INITIAL_DELAY: 1,
} as const;

/** State key the Runner seeds with the caller's input. */
export const USER_INPUT_KEY = 'user_input';
