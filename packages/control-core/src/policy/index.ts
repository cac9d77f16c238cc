// ---------------------------------------------------------------------------
// Dosing policies -- Barrel Re-exports
// ---------------------------------------------------------------------------

export {
  createSafetyGatedPolicy,
  dosingMode,
  DEFAULT_SAFETY_GATED_CONFIG,
  safetyGatedConfigSchema,
  type SafetyGatedState,
} from './safety-gated.js';
