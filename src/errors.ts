/**
 * Error types raised by the pipeline
 */

/**
 * Resolved configuration is unusable; the pipeline aborts before any job runs
 */
export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * A gate could not be evaluated (unrecognized trigger). Resolved by skipping.
 */
export class GateEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GateEvaluationError';
  }
}

/**
 * The step's process could not be started
 */
export class StepExecutionError extends Error {
  constructor(
    readonly step: string,
    message: string
  ) {
    super(message);
    this.name = 'StepExecutionError';
  }
}

/**
 * The step's process exceeded its time budget and was killed
 */
export class StepTimeoutError extends Error {
  constructor(
    readonly step: string,
    readonly timeoutMs: number
  ) {
    super(`Step ${step} timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'StepTimeoutError';
  }
}

/**
 * Formats an unknown thrown value for log output
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
