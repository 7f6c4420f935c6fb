/**
 * Frame encoding for the runner/execution-engine TCP protocol.
 *
 * Frame structure:
 * - command tag (ASCII)
 * - optional: separator byte (0x1F) followed by the payload
 * - end-of-frame byte (0x00)
 *
 * Payloads by command:
 * - `INFO`: UTF-8 JSON negotiated-info object
 * - `MSG`: operation ID, separator, UTF-8 JSON application message
 * - `FIND` / `RUN` / `CANCEL`: operation ID
 * - `QUIT`: none
 *
 * JSON text never contains raw control bytes, so neither marker can appear
 * inside a JSON payload. Operation IDs are validated to exclude both.
 *
 * @module
 */

import { ArgumentError } from './errors.js'

/** Separates the command tag from its payload (ASCII unit separator). */
export const SEPARATOR = 0x1f

/** Terminates every frame. */
export const END_OF_FRAME = 0x00

/**
 * Commands sent by the runner to the execution engine.
 */
export const RUNNER_COMMANDS = {
  cancel: 'CANCEL',
  find: 'FIND',
  info: 'INFO',
  quit: 'QUIT',
  run: 'RUN'
} as const

/**
 * Commands sent by the execution engine to the runner.
 */
export const EXECUTION_COMMANDS = {
  info: 'INFO',
  message: 'MSG'
} as const

export type RunnerCommand = (typeof RUNNER_COMMANDS)[keyof typeof RUNNER_COMMANDS]
export type ExecutionCommand = (typeof EXECUTION_COMMANDS)[keyof typeof EXECUTION_COMMANDS]
export type Command = RunnerCommand | ExecutionCommand

/**
 * Result of splitting bytes at the first separator.
 */
export interface SplitResult {
  readonly head: Buffer
  /** Bytes after the separator; undefined when no separator was present. */
  readonly rest: Buffer | undefined
}

/**
 * Split bytes at the first separator.
 *
 * A trailing separator yields an empty `rest`, which is distinct from
 * no separator at all.
 */
export function splitOnSeparator(data: Uint8Array): SplitResult {
  const bytes = Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength)
  const index = bytes.indexOf(SEPARATOR)
  if (index < 0) {
    return { head: bytes, rest: undefined }
  }
  return { head: bytes.subarray(0, index), rest: bytes.subarray(index + 1) }
}

/**
 * Encode a complete frame into a single buffer.
 *
 * @param command - The command tag
 * @param payload - Optional payload; text is UTF-8 encoded
 * @returns Buffer containing command, optional separator + payload, and end-of-frame
 */
export function encodeFrame(command: Command, payload?: string | Uint8Array): Buffer {
  const parts: Buffer[] = [Buffer.from(command, 'ascii')]
  if (payload !== undefined) {
    parts.push(Buffer.of(SEPARATOR))
    parts.push(typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : Buffer.from(payload))
  }
  parts.push(Buffer.of(END_OF_FRAME))
  return Buffer.concat(parts)
}

/**
 * Encode a MSG frame: `MSG SEP operationId SEP json EOF`.
 */
export function encodeMessageFrame(operationId: string, json: string): Buffer {
  validateOperationId(operationId)
  return encodeFrame(EXECUTION_COMMANDS.message, `${operationId}${String.fromCharCode(SEPARATOR)}${json}`)
}

/**
 * Validate an operation identifier.
 *
 * @throws ArgumentError if the identifier is empty or contains a reserved byte
 */
export function validateOperationId(operationId: string): string {
  if (typeof operationId !== 'string' || operationId === '') {
    throw new ArgumentError('operationId', 'must be a non-empty string')
  }
  if (
    operationId.includes(String.fromCharCode(SEPARATOR)) ||
    operationId.includes(String.fromCharCode(END_OF_FRAME))
  ) {
    throw new ArgumentError('operationId', 'must not contain separator or end-of-frame bytes')
  }
  return operationId
}

/**
 * Decode UTF-8 bytes to text.
 */
export function decodeText(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('utf-8')
}
