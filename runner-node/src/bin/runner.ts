#!/usr/bin/env node
/**
 * CLI entrypoint for the testwire runner.
 *
 * Usage:
 *   testwire-runner
 *
 * Starts a runner engine on a loopback port and prints the port as the first
 * line of stdout. The execution engine is started separately and given the
 * port. Every message from the execution engine is printed to stdout as one
 * JSON line: {"operation_id": "...", "message": {...}}.
 *
 * Commands are read from stdin, one per line:
 *   find <operation-id>
 *   run <operation-id>
 *   cancel <operation-id>
 *   quit
 *
 * Stdin EOF, SIGINT, or SIGTERM disposes the engine (sending QUIT if needed).
 * Stderr carries diagnostics, enabled with TESTWIRE_DIAGNOSTICS.
 *
 * Exit codes:
 * - 0: Engine disposed normally
 * - 2: Unexpected error
 * - 3: Invalid configuration
 *
 * @module
 */
import { createInterface } from 'node:readline'
import { errorMessage, type RunnerMessage } from '@testwire/protocol'
import { type RunnerConfig, loadRunnerConfig } from '../config.js'
import { parseConsoleCommand } from '../console-command.js'
import { createStderrDiagnosticSink, nullDiagnosticSink } from '../diagnostics.js'
import { type DispatchResult, TcpRunnerEngine } from '../tcp-runner-engine.js'

/**
 * Write an error message to stderr and exit with code 3 (invalid input).
 */
function fatalError(message: string): never {
  process.stderr.write(`Error: ${message}\n`)
  process.exit(3)
}

function printMessage(operationId: string, message: RunnerMessage): DispatchResult {
  process.stdout.write(`${JSON.stringify({ operation_id: operationId, message })}\n`)
  return 'continue'
}

/**
 * Run one stdin command against the engine.
 */
async function handleLine(engine: TcpRunnerEngine, line: string): Promise<void> {
  const command = parseConsoleCommand(line)
  switch (command.type) {
    case 'find':
      return engine.sendFind(command.operationId)
    case 'run':
      return engine.sendRun(command.operationId)
    case 'cancel':
      return engine.sendCancel(command.operationId)
    case 'quit':
      return engine.sendQuit()
    case 'empty':
      return
    case 'invalid':
      process.stderr.write(`Error: ${command.reason}\n`)
      return
    default: {
      // Exhaustiveness check
      const _exhaustive: never = command
      return _exhaustive
    }
  }
}

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  let config: RunnerConfig
  try {
    config = loadRunnerConfig(process.env)
  } catch (err) {
    fatalError(`reading configuration: ${errorMessage(err)}`)
  }

  const diagnostics =
    config.diagnostics === 'off'
      ? nullDiagnosticSink
      : createStderrDiagnosticSink({ minLevel: config.diagnostics })

  const engine = new TcpRunnerEngine(config.engineId, printMessage, diagnostics)
  const port = await engine.start()
  process.stdout.write(`${port}\n`)

  const lines = createInterface({ input: process.stdin })

  // Closing the reader ends the command loop below, which disposes the engine
  process.on('SIGINT', () => lines.close())
  process.on('SIGTERM', () => lines.close())

  for await (const line of lines) {
    try {
      await handleLine(engine, line)
    } catch (err) {
      process.stderr.write(`Error: ${errorMessage(err)}\n`)
    }
  }

  await engine.dispose()
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    process.stderr.write(`Unexpected error: ${errorMessage(err)}\n`)
    process.exit(2)
  }
)
