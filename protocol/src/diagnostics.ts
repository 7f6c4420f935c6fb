/**
 * Diagnostic message types. Engines report state transitions, protocol
 * violations, and I/O failures through a DiagnosticSink instead of throwing.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Ordered from most to least verbose. */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * True if `level` is at or above `minLevel`.
 */
export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel)
}

export interface Diagnostic {
  readonly level: LogLevel
  readonly message: string
}

export interface DiagnosticSink {
  onDiagnostic(diagnostic: Diagnostic): void
}
