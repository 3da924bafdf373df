// ── Base ─────────────────────────────────────────────────────

/**
 * Base class for every failure the orchestration core raises.
 *
 * `path` lists the components the failure passed through, outermost first.
 * Components prepend their own name while the error unwinds, so the same
 * instance reaches the Runner's caller.
 */
export class WorkflowError extends Error {
  readonly exitCode: number = 3;
  readonly path: string[] = [];

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkflowError';
  }

  /** `"Outer → Inner: message"` */
  describe(): string {
    return this.path.length > 0
      ? `${this.path.join(' → ')}: ${this.message}`
      : this.message;
  }
}

// ── Configuration ───────────────────────────────────────────

export class ConfigurationError extends WorkflowError {
  override readonly exitCode: number = 2;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MissingVariableError extends ConfigurationError {
  readonly key: string;

  constructor(key: string) {
    super(`Missing template variable "{${key}}": no value in session state`);
    this.name = 'MissingVariableError';
    this.key = key;
  }
}

// ── Execution ───────────────────────────────────────────────

export class RetryExhaustedError extends WorkflowError {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${label} failed after ${String(attempts)} attempts: ${reason}`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export class ToolLoopExceededError extends WorkflowError {
  readonly limit: number;

  constructor(agent: string, limit: number) {
    super(`${agent} kept requesting tools after ${String(limit)} tool rounds`);
    this.name = 'ToolLoopExceededError';
    this.limit = limit;
  }
}

export class UnknownToolError extends WorkflowError {
  readonly tool: string;

  constructor(agent: string, tool: string) {
    super(`${agent} requested undeclared tool "${tool}"`);
    this.name = 'UnknownToolError';
    this.tool = tool;
  }
}

export interface ChildFailure {
  child: string;
  error: WorkflowError;
}

export class AggregateFailureError extends WorkflowError {
  readonly failures: readonly ChildFailure[];

  constructor(composite: string, failures: readonly ChildFailure[]) {
    const names = failures.map((f) => f.child).join(', ');
    super(`${String(failures.length)} of the branches of ${composite} failed: ${names}`);
    this.name = 'AggregateFailureError';
    this.failures = failures;
  }
}

/** Wraps a non-workflow error thrown from inside a component. */
export class ComponentError extends WorkflowError {
  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'ComponentError';
  }
}

export class RunTimeoutError extends WorkflowError {
  constructor(timeoutMs: number) {
    super(`Run exceeded its ${String(timeoutMs)}ms deadline`);
    this.name = 'RunTimeoutError';
  }
}

// ── Helpers ─────────────────────────────────────────────────

export function toWorkflowError(err: unknown): WorkflowError {
  return err instanceof WorkflowError ? err : new ComponentError(err);
}

/** Prepend `component` to the failure's path, wrapping foreign errors first. */
export function withComponent(err: unknown, component: string): WorkflowError {
  const failure = toWorkflowError(err);
  failure.path.unshift(component);
  return failure;
}

/** Multi-line rendering of a failure, expanding aggregate branches. */
export function formatFailure(err: WorkflowError, depth = 0): string {
  const pad = '  '.repeat(depth);
  const lines = [`${pad}${err.name}: ${err.describe()}`];

  if (err instanceof AggregateFailureError) {
    for (const failure of err.failures) {
      lines.push(formatFailure(failure.error, depth + 1));
    }
  } else if (err.cause instanceof Error) {
    lines.push(`${pad}  caused by ${err.cause.name}: ${err.cause.message}`);
  }

  return lines.join('\n');
}
