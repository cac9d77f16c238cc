// ---------------------------------------------------------------------------
// Trace-replay environment: plays back a recorded glucose / meal series
// ---------------------------------------------------------------------------

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { EnvironmentError, ValidationError } from '../errors.js';
import type { Action, Environment, EnvironmentStep, StepTime } from '../types.js';
import { parseOrThrow } from '../validation.js';

export const traceSampleSchema = z.object({
  glucose: z.number().finite(),
  meal: z.number().finite().min(0).optional(),
});

export const traceSchema = z.object({
  /** ISO-8601 clock time of sample 0. Without it, steps are labelled by index. */
  startTime: z.string().datetime().optional(),
  /** Minutes between samples. */
  stepMinutes: z.number().positive().default(1),
  samples: z.array(traceSampleSchema).min(1, 'trace needs at least one sample'),
});

export type TraceSample = z.infer<typeof traceSampleSchema>;
export type Trace = z.infer<typeof traceSchema>;
export type TraceInput = z.input<typeof traceSchema>;

/** Validate a trace object. */
export function parseTrace(input: unknown): Trace {
  return parseOrThrow(traceSchema, input, 'trace');
}

/** Read and validate a JSON trace file. */
export function loadTrace(path: string): Trace {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ValidationError('trace', path, `not valid JSON: ${err.message}`);
    }
    throw err;
  }
  return parseTrace(raw);
}

/**
 * Replays a trace. `reset` yields sample 0; each `step` advances one sample
 * and reports `done` on the last one, so an n-sample trace allows n - 1
 * steps. Actions are recorded but do not influence the replayed readings.
 */
export class TraceEnvironment implements Environment {
  private readonly trace: Trace;
  private readonly startMs: number | undefined;
  private cursor = -1;
  private readonly applied: Action[] = [];

  constructor(trace: TraceInput) {
    this.trace = parseTrace(trace);
    this.startMs = this.trace.startTime === undefined ? undefined : Date.parse(this.trace.startTime);
  }

  /** Actions passed to `step` since the last `reset`, in order. */
  get appliedActions(): readonly Action[] {
    return this.applied;
  }

  reset(): EnvironmentStep {
    this.cursor = 0;
    this.applied.length = 0;
    return this.sampleAt(0);
  }

  step(action: Action): EnvironmentStep {
    if (this.cursor < 0) {
      throw new EnvironmentError('step', 0, 'step called before reset');
    }
    if (this.cursor >= this.trace.samples.length - 1) {
      throw new EnvironmentError('step', this.cursor, 'step called after the trace ended');
    }
    this.applied.push(action);
    this.cursor++;
    return this.sampleAt(this.cursor);
  }

  private timeAt(index: number): StepTime {
    if (this.startMs === undefined) return index;
    return new Date(this.startMs + index * this.trace.stepMinutes * 60_000);
  }

  private sampleAt(index: number): EnvironmentStep {
    const sample = this.trace.samples[index];
    if (sample === undefined) {
      throw new EnvironmentError('step', index, `no sample at index ${index}`);
    }
    return {
      observation: { glucose: sample.glucose },
      reward: 0,
      done: index === this.trace.samples.length - 1,
      metadata: { meal: sample.meal, time: this.timeAt(index) },
    };
  }
}
