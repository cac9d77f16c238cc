// Shared configuration: simulation defaults, schema validation and overrides.

export {
  simulationConfigSchema,
  policyConfigSchema,
  targetRangeSchema,
  resolveSimulationConfig,
  ConfigError,
  DEFAULT_SIMULATION_CONFIG,
  LOG_LEVELS,
  type SimulationConfig,
  type SimulationConfigOverrides,
  type PolicyConfig,
  type LogLevelName,
} from './simulation.js'
