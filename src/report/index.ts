/**
 * Report generation module.
 * Deterministic, no model calls.
 * Reads the Runner's result and terminal state; writes markdown + JSON artifacts.
 */

export {
  summarizeRun,
  summarizeFailure,
  exitCodeOf,
  generateMarkdown,
  generateJSON,
  serializeJSON,
  writeRunArtifacts,
} from './reporter.js';
export type { JsonOutput } from './reporter.js';
