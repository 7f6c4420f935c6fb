// Diagnostics
export type { Diagnostic, DiagnosticSink, LogLevel } from './diagnostics.js'
export { isLevelEnabled, isLogLevel, LOG_LEVELS } from './diagnostics.js'
// Negotiated-info records
export type { ExecutionEngineInfoJson, ProtocolVersion, RunnerEngineInfoJson } from './engine-info.js'
export {
  ExecutionEngineInfo,
  isSupportedProtocolVersion,
  PROTOCOL_VERSIONS,
  RunnerEngineInfo,
  SUPPORTED_PROTOCOL_VERSIONS
} from './engine-info.js'
// Errors
export {
  ArgumentError,
  DisposedError,
  EngineDisposedError,
  errorMessage,
  InvalidStateError,
  MessageParseError,
  UnsetPropertyError
} from './errors.js'
export { parseJsonObject } from './json.js'
// Application messages
export type { ErrorMessage, RunnerMessage } from './messages.js'
export {
  BROADCAST_OPERATION_ID,
  errorMessageFromException,
  isErrorMessage,
  parseRunnerMessage,
  serializeRunnerMessage
} from './messages.js'
// Wire format
export type { Command, ExecutionCommand, RunnerCommand, SplitResult } from './wire.js'
export {
  decodeText,
  END_OF_FRAME,
  EXECUTION_COMMANDS,
  encodeFrame,
  encodeMessageFrame,
  RUNNER_COMMANDS,
  SEPARATOR,
  splitOnSeparator,
  validateOperationId
} from './wire.js'
