// ---------------------------------------------------------------------------
// Simulation driver -- Barrel Re-exports
// ---------------------------------------------------------------------------

export { SimulationDriver, type SimulationDriverOptions } from './simulation-driver.js';
export { computeStatistics, formatReport, DEFAULT_TARGET_RANGE } from './statistics.js';
