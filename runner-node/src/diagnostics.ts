/**
 * Diagnostic sinks for engine output.
 *
 * Diagnostics go to stderr; stdout is reserved for the CLI's own output
 * (port line and message JSON lines).
 *
 * @module
 */
import type { Writable } from 'node:stream'
import { type Diagnostic, type DiagnosticSink, isLevelEnabled, type LogLevel } from '@testwire/protocol'

export interface StderrDiagnosticSinkOptions {
  /** Diagnostics below this level are dropped. */
  readonly minLevel: LogLevel
  /** Defaults to process.stderr. */
  readonly stream?: Writable
}

export function createStderrDiagnosticSink(options: StderrDiagnosticSinkOptions): DiagnosticSink {
  const stream = options.stream ?? process.stderr
  return {
    onDiagnostic(diagnostic: Diagnostic): void {
      if (!isLevelEnabled(diagnostic.level, options.minLevel)) return
      stream.write(`[testwire] ${diagnostic.level}: ${diagnostic.message}\n`)
    }
  }
}

/** Drops every diagnostic. */
export const nullDiagnosticSink: DiagnosticSink = {
  onDiagnostic(): void {}
}
