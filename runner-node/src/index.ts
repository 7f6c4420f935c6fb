/**
 * testwire runner (Node.js)
 *
 * TCP engines for driving an execution engine process from a runner over a
 * loopback connection.
 *
 * @packageDocumentation
 */

// Engines
export { type CommandHandler, TcpEngine } from './tcp-engine.js'
export { type DispatchResult, type MessageDispatcher, TcpRunnerEngine } from './tcp-runner-engine.js'
export { type ExecutionCommandHandlers, TcpExecutionEngine } from './tcp-execution-engine.js'
export { canTransition, ENGINE_STATE_ORDER, type EngineState, isTearingDown } from './engine-state.js'

// Teardown
export { type CleanupAction, DisposalTracker } from './disposal-tracker.js'

// Diagnostics + configuration
export {
  createStderrDiagnosticSink,
  nullDiagnosticSink,
  type StderrDiagnosticSinkOptions
} from './diagnostics.js'
export { ConfigError, loadRunnerConfig, type RunnerConfig } from './config.js'
export { type ConsoleCommand, parseConsoleCommand } from './console-command.js'

// IPC (re-export for advanced usage)
export {
  BufferedSocket,
  type BufferedSocketOptions,
  closeSocket,
  SocketClosedError
} from './ipc/index.js'
