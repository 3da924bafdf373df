import type { FailureClass } from '../schema/workflow.js';
import { WorkflowError } from '../core/errors.js';

// ── Status classification ───────────────────────────────────

export function classifyStatus(status: number | undefined): FailureClass {
  switch (status) {
    case 429:
      return 'rate-limited';
    case 500:
      return 'server-error';
    case 503:
      return 'service-unavailable';
    case 504:
      return 'gateway-timeout';
    default:
      return 'other';
  }
}

// ── Error ────────────────────────────────────────────────────

/**
 * A failed call across the model or tool boundary, tagged with the
 * failure class the retry policy consumes.
 */
export class InvocationError extends WorkflowError {
  readonly classification: FailureClass;
  readonly status: number | undefined;

  constructor(
    message: string,
    classification: FailureClass,
    options: { status?: number | undefined; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'InvocationError';
    this.classification = classification;
    this.status = options.status;
  }

  /**
   * A fresh copy with an empty path. Clients and tools may throw the same
   * instance more than once; each propagation needs its own path.
   */
  reissue(): InvocationError {
    return new InvocationError(this.message, this.classification, {
      status: this.status,
      cause: this.cause,
    });
  }

  static fromStatus(message: string, status: number, cause?: unknown): InvocationError {
    return new InvocationError(message, classifyStatus(status), { status, cause });
  }
}
