// ---------------------------------------------------------------------------
// Error taxonomy for controller inputs, environment failures and empty runs
// ---------------------------------------------------------------------------

/** A value outside its allowed domain reached a controller, config or parser. */
export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    message: string,
  ) {
    super(`Invalid ${field}: ${message}`);
    this.name = 'ValidationError';
  }
}

/** Which environment call failed. */
export type EnvironmentPhase = 'reset' | 'step';

/** The environment collaborator failed during `reset` or `step`. */
export class EnvironmentError extends Error {
  constructor(
    public readonly phase: EnvironmentPhase,
    /** Loop index of the failing step, or -1 for `reset`. */
    public readonly stepIndex: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EnvironmentError';
  }
}

/** A run recorded zero steps, so no statistics exist. */
export class EmptyResultError extends Error {
  constructor(public readonly maxSteps: number) {
    super(`Simulation recorded no steps (maxSteps = ${maxSteps}); summary statistics are undefined`);
    this.name = 'EmptyResultError';
  }
}
