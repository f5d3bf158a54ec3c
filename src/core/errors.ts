/**
 * @fileoverview citegate error hierarchy
 *
 * Only infrastructure and programming failures are thrown. Grounding and
 * quality problems are reported as data (warnings and FailReasons).
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class CitegateError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// EVIDENCE STORE ERRORS
// ============================================================================

export type EvidenceStoreOperation = 'add' | 'read' | 'archive';

export class EvidenceStoreError extends CitegateError {
  readonly code = 'EVIDENCE_STORE_ERROR';
  readonly retryable = false;

  constructor(
    readonly operation: EvidenceStoreOperation,
    message: string,
    readonly chunkId?: string,
  ) {
    super(`Evidence store ${operation} failed: ${message}`);
    this.name = 'EvidenceStoreError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        chunkId: this.chunkId,
      },
    };
  }
}

// ============================================================================
// COLLABORATOR ERRORS
// ============================================================================

export class RouterError extends CitegateError {
  readonly code = 'ROUTER_ERROR';
  readonly retryable = true;

  constructor(
    readonly taskId: string,
    readonly attempt: number,
    cause?: Error,
  ) {
    super(`Router failed for task ${taskId} on attempt ${attempt}: ${cause?.message ?? 'unknown error'}`, { cause });
    this.name = 'RouterError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        taskId: this.taskId,
        attempt: this.attempt,
        cause: this.cause === undefined ? undefined : getErrorMessage(this.cause),
      },
    };
  }
}

export class PlannerError extends CitegateError {
  readonly code = 'PLANNER_ERROR';
  readonly retryable = false;

  constructor(
    readonly taskId: string,
    cause?: Error,
  ) {
    super(`Planner failed for task ${taskId}: ${cause?.message ?? 'unknown error'}`, { cause });
    this.name = 'PlannerError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        taskId: this.taskId,
        cause: this.cause === undefined ? undefined : getErrorMessage(this.cause),
      },
    };
  }
}

// ============================================================================
// TASK STATE ERRORS
// ============================================================================

export class TaskStateError extends CitegateError {
  readonly code = 'TASK_STATE_ERROR';
  readonly retryable = false;

  constructor(
    readonly taskId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Illegal status transition for task ${taskId}: ${from} -> ${to}`);
    this.name = 'TaskStateError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        taskId: this.taskId,
        from: this.from,
        to: this.to,
      },
    };
  }
}

// ============================================================================
// ENGINE ERRORS
// ============================================================================

export type ExecutionErrorReason = 'engine_busy' | 'empty_plan';

export class ExecutionError extends CitegateError {
  readonly code = 'EXECUTION_ERROR';
  readonly retryable = false;

  constructor(
    readonly reason: ExecutionErrorReason,
    message: string,
  ) {
    super(`Execution ${reason}: ${message}`);
    this.name = 'ExecutionError';
  }
}

// ============================================================================
// VALIDATION / CONFIGURATION ERRORS
// ============================================================================

export class ValidationError extends CitegateError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

export class ConfigurationError extends CitegateError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: string[] = [],
    readonly source?: string,
  ) {
    super(source ? `Invalid configuration in ${source}: ${message}` : `Invalid configuration: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        issues: this.issues,
        source: this.source,
      },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isCitegateError(error: unknown): error is CitegateError {
  return error instanceof CitegateError;
}

/**
 * Extract error message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
