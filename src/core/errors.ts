/**
 * Base error class for all txn-timer errors.
 * Extends Error with a machine-readable code and structured context.
 */
export class TimerError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    cause?: unknown;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'TimerError';
    this.code = params.code;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown synchronously when a schedule or cancel call is missing a required argument. */
export class InvalidArgumentError extends TimerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'INVALID_ARGUMENT',
      context,
    });
    this.name = 'InvalidArgumentError';
  }
}

/** Wraps a failure raised by a task's effect during a scan pass. Never propagated. */
export class ObligationExecutionError extends TimerError {
  constructor(taskDescription: string, cause: unknown) {
    super({
      message: `Error running ${taskDescription}: ${cause instanceof Error ? cause.message : String(cause)}`,
      code: 'OBLIGATION_EXECUTION_FAILED',
      cause,
      context: { task: taskDescription },
    });
    this.name = 'ObligationExecutionError';
  }
}

/** The worker loop did not exit within the grace duration. Logged, never thrown. */
export class ShutdownTimeoutError extends TimerError {
  constructor(graceDurationMs: number) {
    super({
      message: `Could not stop the task scheduler within ${graceDurationMs}ms`,
      code: 'SHUTDOWN_TIMEOUT',
      context: { graceDurationMs },
    });
    this.name = 'ShutdownTimeoutError';
  }
}
