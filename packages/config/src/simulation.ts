import { z } from 'zod'
import { DEFAULT_SAFETY_GATED_CONFIG, safetyGatedConfigSchema } from '@glucoloop/control-core'

/** Log levels accepted by the runner's logger. */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

/** The policy's own schema, so config and policy construction accept the same tunables. */
export const policyConfigSchema = safetyGatedConfigSchema

export const targetRangeSchema = z
  .object({
    low: z.number().finite(),
    high: z.number().finite(),
  })
  .refine((r) => r.low <= r.high, { message: 'low must not exceed high' })

export const simulationConfigSchema = z.object({
  subject: z.string().min(1),
  maxSteps: z.number().int().min(0),
  /** ISO-8601 start of the simulated scenario. */
  startTime: z.string().datetime(),
  outputPath: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  policy: policyConfigSchema,
  targetRange: targetRangeSchema,
})

export type SimulationConfig = z.infer<typeof simulationConfigSchema>
export type PolicyConfig = z.infer<typeof policyConfigSchema>
export type LogLevelName = (typeof LOG_LEVELS)[number]

/** Overrides: any top-level field, with `policy` and `targetRange` merged field by field. */
export type SimulationConfigOverrides = Partial<Omit<SimulationConfig, 'policy' | 'targetRange'>> & {
  policy?: Partial<PolicyConfig>
  targetRange?: Partial<SimulationConfig['targetRange']>
}

/** 24 simulated hours at one step per minute for one adolescent subject. */
export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  subject: 'adolescent#003',
  maxSteps: 1440,
  startTime: '2024-01-01T00:00:00.000Z',
  outputPath: 'sim_results_summary.csv',
  logLevel: 'info',
  policy: { ...DEFAULT_SAFETY_GATED_CONFIG },
  targetRange: {
    low: 70,
    high: 180,
  },
}

/** Invalid configuration. `fields` maps each failing path to its messages. */
export class ConfigError extends Error {
  constructor(public readonly fields: Record<string, string[]>) {
    super(
      `Invalid simulation config: ${Object.entries(fields)
        .map(([path, messages]) => `${path} (${messages.join(', ')})`)
        .join('; ')}`,
    )
    this.name = 'ConfigError'
  }
}

/** Merge overrides onto the defaults and validate the result. */
export function resolveSimulationConfig(overrides: SimulationConfigOverrides = {}): SimulationConfig {
  const merged = {
    ...DEFAULT_SIMULATION_CONFIG,
    ...overrides,
    policy: { ...DEFAULT_SIMULATION_CONFIG.policy, ...overrides.policy },
    targetRange: { ...DEFAULT_SIMULATION_CONFIG.targetRange, ...overrides.targetRange },
  }

  const result = simulationConfigSchema.safeParse(merged)
  if (!result.success) {
    const fields: Record<string, string[]> = {}
    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      const messages = fields[path] ?? []
      messages.push(issue.message)
      fields[path] = messages
    }
    throw new ConfigError(fields)
  }
  return result.data
}
