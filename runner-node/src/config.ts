/**
 * Runner configuration from environment variables.
 *
 * - TESTWIRE_ENGINE_ID: engine ID for diagnostics (default: runner-<random>)
 * - TESTWIRE_DIAGNOSTICS: off | 0 | debug | info | warn | error (default: off)
 *
 * @module
 */
import { randomUUID } from 'node:crypto'
import { isLogLevel, type LogLevel } from '@testwire/protocol'

/**
 * Error thrown when an environment variable holds an invalid value.
 */
export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    reason: string
  ) {
    super(`${variable}: ${reason}`)
    this.name = 'ConfigError'
  }
}

export interface RunnerConfig {
  readonly engineId: string
  /** Minimum diagnostic level written to stderr, or 'off'. */
  readonly diagnostics: LogLevel | 'off'
}

/**
 * Read runner configuration from an environment map.
 * @throws ConfigError if a variable holds an invalid value
 */
export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const engineId = env.TESTWIRE_ENGINE_ID?.trim() || `runner-${randomUUID().slice(0, 8)}`

  const rawDiagnostics = env.TESTWIRE_DIAGNOSTICS?.trim().toLowerCase() ?? ''
  let diagnostics: LogLevel | 'off'
  if (rawDiagnostics === '' || rawDiagnostics === 'off' || rawDiagnostics === '0') {
    diagnostics = 'off'
  } else if (isLogLevel(rawDiagnostics)) {
    diagnostics = rawDiagnostics
  } else {
    throw new ConfigError(
      'TESTWIRE_DIAGNOSTICS',
      `must be one of: off, debug, info, warn, error (got "${rawDiagnostics}")`
    )
  }

  return { engineId, diagnostics }
}
