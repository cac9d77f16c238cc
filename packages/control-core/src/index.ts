// ---------------------------------------------------------------------------
// @glucoloop/control-core — Closed-Loop Dosing Simulation
// ---------------------------------------------------------------------------

// Data model and controller / environment contracts
export * from './types.js';
export * from './errors.js';
export * from './validation.js';
export * from './logging.js';

// Reference safety-gated policy
export * from './policy/index.js';

// Step loop, statistics, report
export * from './driver/index.js';

// CSV results table
export * from './output/index.js';

// Trace-replay environment
export * from './environment/index.js';
