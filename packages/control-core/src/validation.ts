// ---------------------------------------------------------------------------
// Domain checks for controller inputs and outputs
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { Action, Disturbance, Observation, StepTime } from './types.js';

export const observationSchema = z.object({
  glucose: z.number().finite(),
});

export const disturbanceSchema = z.number().finite().min(0, 'must be >= 0');

export const actionSchema = z.object({
  basal: z.number().finite().min(0, 'must be >= 0'),
  bolus: z.number().finite().min(0, 'must be >= 0'),
});

/** A step label: a finite index or a valid clock time (`z.date()` rejects `Invalid Date`). */
export const stepTimeSchema = z.union([z.number().finite(), z.date()]);

/**
 * Parse `value` with `schema`, throwing a {@link ValidationError} that names
 * `field` and lists every failing path.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  field: string,
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(field, value, detail);
  }
  return result.data;
}

export function validateObservation(observation: unknown): Observation {
  return parseOrThrow(observationSchema, observation, 'observation');
}

export function validateDisturbance(disturbance: unknown): Disturbance {
  return parseOrThrow(disturbanceSchema, disturbance, 'disturbance');
}

export function validateAction(action: unknown): Action {
  return parseOrThrow(actionSchema, action, 'action');
}

export function validateStepTime(time: unknown): StepTime {
  return parseOrThrow(stepTimeSchema, time, 'time');
}
