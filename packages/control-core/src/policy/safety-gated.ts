// ---------------------------------------------------------------------------
// Safety-Gated Dosing Policy
// ---------------------------------------------------------------------------

import { z } from 'zod';
import type {
  Controller,
  ControllerDecision,
  Disturbance,
  DosingMode,
  Observation,
  PolicyEvent,
  SafetyGatedPolicyConfig,
} from '../types.js';
import { parseOrThrow, validateDisturbance, validateObservation } from '../validation.js';

/** Reference tunables: 0.05 U/min basal, 1 U correction bolus, 70 mg/dL low threshold. */
export const DEFAULT_SAFETY_GATED_CONFIG: Readonly<SafetyGatedPolicyConfig> = {
  basalRate: 0.05,
  correctionBolus: 1.0,
  lowThreshold: 70,
};

export const safetyGatedConfigSchema = z.object({
  /** Basal rate while dosing (U/min). */
  basalRate: z.number().finite().min(0),
  /** Bolus emitted on any step with a meal (U). */
  correctionBolus: z.number().finite().min(0),
  /** Glucose below this suspends basal (mg/dL). */
  lowThreshold: z.number().finite(),
});

/** The reference policy keeps no memory; its state is this placeholder. */
export type SafetyGatedState = number;

/**
 * Mode for a single reading. No latch or hysteresis: the mode may flip
 * every step as glucose crosses the threshold.
 */
export function dosingMode(glucose: number, lowThreshold: number): DosingMode {
  return glucose < lowThreshold ? 'SUSPENDED' : 'DOSING';
}

/**
 * Create the reference controller.
 *
 *  - **DOSING** -- basal = `basalRate`; bolus = `correctionBolus` on any step
 *    whose meal is > 0, otherwise 0.
 *  - **SUSPENDED** -- glucose < `lowThreshold` forces basal to 0. The bolus is
 *    left as computed in dosing mode.
 *
 * The returned decision depends only on the current (observation, meal)
 * pair; the incoming state is handed back unchanged.
 *
 * @throws ValidationError when the config, observation or meal is out of domain.
 */
export function createSafetyGatedPolicy(
  config: Partial<SafetyGatedPolicyConfig> = {},
): Controller<SafetyGatedState> {
  const { basalRate, correctionBolus, lowThreshold } = parseOrThrow(
    safetyGatedConfigSchema,
    { ...DEFAULT_SAFETY_GATED_CONFIG, ...config },
    'policy config',
  );

  return {
    initialState: 0,
    decide(
      observation: Observation,
      disturbance: Disturbance,
      state: SafetyGatedState,
    ): ControllerDecision<SafetyGatedState> {
      const { glucose } = validateObservation(observation);
      const meal = validateDisturbance(disturbance);

      const events: PolicyEvent[] = [];
      const reasons: string[] = [];

      let basal = basalRate;
      let bolus = 0;

      if (meal > 0) {
        bolus = correctionBolus;
        events.push({ kind: 'bolus', meal, bolus });
        reasons.push(`meal ${meal}g, bolus ${bolus}U`);
      }

      const mode = dosingMode(glucose, lowThreshold);
      if (mode === 'SUSPENDED') {
        basal = 0;
        events.push({ kind: 'suspend', glucose, threshold: lowThreshold });
        reasons.push(`glucose ${glucose} < ${lowThreshold}, basal suspended`);
      } else {
        reasons.push(`basal ${basal}U/min`);
      }

      return {
        action: { basal, bolus },
        state,
        mode,
        reason: reasons.join('; '),
        events,
      };
    },
  };
}
