/**
 * Error taxonomy
 *
 * Setup-time problems (configuration, worker construction) are thrown.
 * Per-subtask problems are recorded on the subtask result and never abort a run.
 */

export class ManifoldError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ManifoldError';
  }
}

export interface ConfigViolation {
  /** Dotted path of the offending setting, e.g. `orchestrator.parallel_agents` */
  path: string;
  message: string;
  value?: unknown;
}

function formatViolation(violation: ConfigViolation): string {
  const location = violation.path || '(root)';
  if (violation.value === undefined) {
    return `${location}: ${violation.message}`;
  }
  return `${location}: ${violation.message} (got ${JSON.stringify(violation.value)})`;
}

/**
 * Invalid configuration. Lists every violation found, not just the first.
 */
export class ConfigError extends ManifoldError {
  constructor(
    public readonly source: string,
    public readonly violations: ConfigViolation[],
    options?: { cause?: unknown }
  ) {
    super(
      `Configuration validation failed for ${source}:\n` +
        violations.map((v) => `  - ${formatViolation(v)}`).join('\n'),
      options
    );
    this.name = 'ConfigError';
  }
}

/** Planner output could not be used. Recovered inside the orchestrator. */
export class PlanningError extends ManifoldError {
  constructor(
    message: string,
    public readonly rawOutput?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PlanningError';
  }
}

/** A worker finished without usable output. */
export class SubtaskFailure extends ManifoldError {
  constructor(
    public readonly agentId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${agentId}: ${message}`, options);
    this.name = 'SubtaskFailure';
  }
}

/** Abort reason handed to a worker whose call exceeded its timeout. */
export class SubtaskTimeout extends ManifoldError {
  constructor(
    public readonly agentId: string,
    public readonly timeoutMs: number,
    public readonly elapsedMs: number
  ) {
    super(`${agentId} timed out after ${timeoutMs / 1000}s`);
    this.name = 'SubtaskTimeout';
  }
}

export class SynthesisFailure extends ManifoldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SynthesisFailure';
  }
}

export class PoolConstructionError extends ManifoldError {
  constructor(
    public readonly agentId: string,
    public readonly provider: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
    super(`Failed to construct ${provider} worker for ${agentId}: ${reason}`, options);
    this.name = 'PoolConstructionError';
  }
}

export class RunCancelledError extends ManifoldError {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'RunCancelledError';
  }
}

/**
 * Plain-data description of an error, safe to keep on results and to log.
 */
export interface ErrorDiagnostic {
  errorType: string;
  message: string;
  stack?: string;
  cause?: ErrorDiagnostic;
}

export function describeError(error: unknown): ErrorDiagnostic {
  if (error instanceof Error) {
    const diagnostic: ErrorDiagnostic = {
      errorType: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    };
    if (error.cause !== undefined) {
      diagnostic.cause = describeError(error.cause);
    }
    return diagnostic;
  }
  return { errorType: typeof error, message: String(error) };
}
