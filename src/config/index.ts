/**
 * Configuration module.
 * Loads and validates workflow files. Zod-validated.
 * Runtime settings are passed explicitly; nothing here is mutable.
 */

export { TIMEOUTS, LIMITS, RETRY_DEFAULTS, USER_INPUT_KEY } from './defaults.js';
export { loadWorkflowFile, parseWorkflowFile } from './loader.js';
