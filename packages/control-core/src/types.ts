// ---------------------------------------------------------------------------
// @glucoloop/control-core — Closed-Loop Dosing Types
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Per-step values
// ---------------------------------------------------------------------------

/** Sensed measurement for one step. */
export interface Observation {
  /** Sensor glucose reading (mg/dL). */
  readonly glucose: number;
}

/** Exogenous input for one step: carbohydrate intake in grams, >= 0. */
export type Disturbance = number;

/** Actuator command for one step. Both fields are >= 0. */
export interface Action {
  /** Continuous basal rate (U/min). */
  readonly basal: number;
  /** Discrete bolus amount (U). */
  readonly bolus: number;
}

/** Step label reported by the environment: a step index or a simulated clock time. */
export type StepTime = number | Date;

// ---------------------------------------------------------------------------
// Environment collaborator
// ---------------------------------------------------------------------------

/** Per-step metadata. Both fields are optional; absent meal means no disturbance. */
export interface StepMetadata {
  readonly meal?: number;
  readonly time?: StepTime;
}

/** Result of `reset` / `step`. `reward` is carried but never read by the driver. */
export interface EnvironmentStep {
  readonly observation: Observation;
  readonly reward: number;
  readonly done: boolean;
  readonly metadata: StepMetadata;
}

/**
 * Stepped process simulation. Owned exclusively by one driver run; both calls
 * are synchronous and may throw.
 */
export interface Environment {
  reset(): EnvironmentStep;
  step(action: Action): EnvironmentStep;
}

// ---------------------------------------------------------------------------
// Controller contract
// ---------------------------------------------------------------------------

/** Operating mode of a safety-gated policy, recomputed every step. */
export type DosingMode = 'DOSING' | 'SUSPENDED';

/** Notification raised by a policy. The driver routes these to its logger. */
export type PolicyEvent =
  | { readonly kind: 'bolus'; readonly meal: number; readonly bolus: number }
  | { readonly kind: 'suspend'; readonly glucose: number; readonly threshold: number };

/** Everything a controller returns for one step. */
export interface ControllerDecision<S> {
  readonly action: Action;
  /** Controller state to pass to the next `decide` call. */
  readonly state: S;
  readonly mode: DosingMode;
  /** Human-readable summary of why the action was chosen. */
  readonly reason: string;
  readonly events: readonly PolicyEvent[];
}

/**
 * A dosing policy. `decide` must be free of I/O; stateful policies thread
 * their memory through `state` rather than through instance fields.
 */
export interface Controller<S> {
  /** Placeholder or seed state handed to the first `decide` call. */
  readonly initialState: S;
  decide(observation: Observation, disturbance: Disturbance, state: S): ControllerDecision<S>;
}

/** Tunables of the reference safety-gated policy. */
export interface SafetyGatedPolicyConfig {
  /** Basal rate while dosing (U/min). */
  basalRate: number;
  /** Fixed bolus emitted on any step with a meal (U). */
  correctionBolus: number;
  /** Glucose below this value suspends basal delivery (mg/dL). */
  lowThreshold: number;
}

// ---------------------------------------------------------------------------
// Recorded results
// ---------------------------------------------------------------------------

/** One row of the time series. Uses the pre-action observation and meal. */
export interface StepRecord {
  readonly time: StepTime | string;
  readonly glucose: number;
  readonly meal: number;
  readonly basal: number;
  readonly bolus: number;
}

/** Glucose band used for time-in-range fractions (mg/dL, inclusive). */
export interface TargetRange {
  low: number;
  high: number;
}

/** Aggregate statistics over the glucose column. */
export interface SummaryStatistics {
  mean: number;
  min: number;
  max: number;
  /** Fraction of steps below `TargetRange.low`. */
  lowFraction: number;
  /** Fraction of steps within `[low, high]`. */
  inRangeFraction: number;
  /** Fraction of steps above `TargetRange.high`. */
  highFraction: number;
}

/** Output of one driver run. */
export interface SimulationResult {
  readonly subject: string;
  readonly records: readonly StepRecord[];
  readonly statistics: SummaryStatistics;
  /** Path the CSV table was written to. */
  readonly outputPath: string;
}
