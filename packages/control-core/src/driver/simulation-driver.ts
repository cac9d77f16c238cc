// ---------------------------------------------------------------------------
// Simulation Driver -- steps environment and controller, records, reports
// ---------------------------------------------------------------------------

import { EmptyResultError, EnvironmentError, ValidationError, type EnvironmentPhase } from '../errors.js';
import { createLogger, type Logger } from '../logging.js';
import { DEFAULT_OUTPUT_PATH, writeResultsCsv } from '../output/csv.js';
import type {
  Controller,
  ControllerDecision,
  Environment,
  EnvironmentStep,
  SimulationResult,
  StepRecord,
  TargetRange,
} from '../types.js';
import { validateAction, validateDisturbance, validateObservation, validateStepTime } from '../validation.js';
import { DEFAULT_TARGET_RANGE, computeStatistics, formatReport } from './statistics.js';

export interface SimulationDriverOptions {
  /** Name of the simulated subject, shown in the start banner. */
  subject?: string;
  /** CSV destination; overwritten at the end of every successful run. */
  outputPath?: string;
  logger?: Logger;
  targetRange?: TargetRange;
}

/**
 * Runs one closed loop at a time:
 *
 *  reset -> [ decide -> step -> record ]* -> statistics -> CSV -> report
 *
 * The loop stops after `maxSteps` iterations or on the first `done` flag,
 * whichever comes first. Any error (invalid controller input or output,
 * environment failure, empty run) aborts before the CSV write and the report.
 */
export class SimulationDriver {
  private readonly subject: string;
  private readonly outputPath: string;
  private readonly logger: Logger;
  private readonly targetRange: TargetRange;

  constructor(options: SimulationDriverOptions = {}) {
    this.subject = options.subject ?? 'unnamed subject';
    this.outputPath = options.outputPath ?? DEFAULT_OUTPUT_PATH;
    this.logger = options.logger ?? createLogger('simulation-driver');
    this.targetRange = options.targetRange ?? DEFAULT_TARGET_RANGE;
  }

  /**
   * @throws ValidationError   `maxSteps` is not a non-negative integer, or an
   *                           observation / meal / action / time is out of domain.
   * @throws EnvironmentError  `reset` or `step` threw.
   * @throws EmptyResultError  zero steps were recorded.
   */
  run<S>(environment: Environment, controller: Controller<S>, maxSteps: number): SimulationResult {
    if (!Number.isInteger(maxSteps) || maxSteps < 0) {
      throw new ValidationError('maxSteps', maxSteps, 'must be a non-negative integer');
    }

    this.logger.info({ subject: this.subject, maxSteps }, `Starting simulation for ${this.subject}...`);

    let current = callEnvironment('reset', -1, () => environment.reset());
    let state = controller.initialState;
    const records: StepRecord[] = [];

    for (let i = 0; i < maxSteps && !current.done; i++) {
      const observation = validateObservation(current.observation);
      const meal = validateDisturbance(current.metadata.meal ?? 0);

      const decision = controller.decide(observation, meal, state);
      const action = validateAction(decision.action);
      this.logDecision(i, decision);

      const next = callEnvironment('step', i, () => environment.step(action));
      // Rows carry the label the environment reports after the step.
      const time = validateStepTime(next.metadata.time ?? i);

      records.push(
        Object.freeze({
          time,
          glucose: observation.glucose,
          meal,
          basal: action.basal,
          bolus: action.bolus,
        }),
      );

      state = decision.state;
      current = next;
    }

    if (records.length === 0) {
      throw new EmptyResultError(maxSteps);
    }

    const statistics = computeStatistics(records, this.targetRange);
    writeResultsCsv(this.outputPath, records);

    for (const line of formatReport(statistics)) {
      this.logger.info(line);
    }
    this.logger.info({ outputPath: this.outputPath, rows: records.length }, `Results saved to '${this.outputPath}'`);

    return {
      subject: this.subject,
      records: Object.freeze(records),
      statistics,
      outputPath: this.outputPath,
    };
  }

  private logDecision<S>(step: number, decision: ControllerDecision<S>): void {
    for (const event of decision.events) {
      switch (event.kind) {
        case 'bolus':
          this.logger.info(
            { step, meal: event.meal, bolus: event.bolus },
            `Meal detected: ${event.meal}g. Bolusing ${event.bolus}U`,
          );
          break;
        case 'suspend':
          this.logger.warn(
            { step, glucose: event.glucose, threshold: event.threshold },
            `Low glucose (${event.glucose} mg/dL). Basal suspended for this step.`,
          );
          break;
      }
    }
    this.logger.debug(
      { step, mode: decision.mode, basal: decision.action.basal, bolus: decision.action.bolus },
      decision.reason,
    );
  }
}

/** Invoke an environment call, wrapping foreign errors in {@link EnvironmentError}. */
function callEnvironment(
  phase: EnvironmentPhase,
  stepIndex: number,
  call: () => EnvironmentStep,
): EnvironmentStep {
  try {
    return call();
  } catch (err) {
    if (err instanceof EnvironmentError) throw err;
    const detail = err instanceof Error ? err.message : String(err);
    const where = phase === 'reset' ? 'reset' : `step ${stepIndex}`;
    throw new EnvironmentError(phase, stepIndex, `Environment failed during ${where}: ${detail}`, { cause: err });
  }
}
