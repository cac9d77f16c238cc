/**
 * Headless simulation run: resolve config, replay a recorded trace through the
 * safety-gated policy, write the CSV table and log the summary report.
 */

import { fileURLToPath } from 'node:url'
import {
  SimulationDriver,
  TraceEnvironment,
  createLogger,
  createSafetyGatedPolicy,
  loadTrace,
  type LogDestination,
  type SimulationResult,
} from '@glucoloop/control-core'
import { resolveSimulationConfig, type SimulationConfigOverrides } from '@glucoloop/config'

/** Bundled 24-hour trace sampled every 5 minutes. */
export const DEFAULT_TRACE_PATH = fileURLToPath(new URL('../fixtures/trace.json', import.meta.url))

export interface RunnerOptions {
  config?: SimulationConfigOverrides
  tracePath?: string
  /** Log sink; stdout when omitted. */
  destination?: LogDestination
}

export function runHeadlessSimulation(options: RunnerOptions = {}): SimulationResult {
  const config = resolveSimulationConfig(options.config)
  const logger = createLogger('runner', { level: config.logLevel, destination: options.destination })

  const trace = loadTrace(options.tracePath ?? DEFAULT_TRACE_PATH)
  // Traces without their own clock start at the configured scenario time.
  const environment = new TraceEnvironment({ ...trace, startTime: trace.startTime ?? config.startTime })
  const controller = createSafetyGatedPolicy(config.policy)

  const driver = new SimulationDriver({
    subject: config.subject,
    outputPath: config.outputPath,
    targetRange: config.targetRange,
    logger,
  })
  return driver.run(environment, controller, config.maxSteps)
}
