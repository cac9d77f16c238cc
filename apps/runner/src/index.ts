import { runHeadlessSimulation } from './run.js'

try {
  runHeadlessSimulation()
} catch (err) {
  process.stderr.write(JSON.stringify({
    ts: new Date().toISOString(),
    level: 'error',
    error: err instanceof Error ? err.name : 'Error',
    message: err instanceof Error ? err.message : String(err),
  }) + '\n')
  process.exitCode = 1
}
