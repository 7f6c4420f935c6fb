/**
 * Application message envelope carried in MSG frames.
 *
 * The core only relies on the `type` discriminant; every other field
 * belongs to the application and is passed through untouched.
 *
 * @module
 */

import { errorMessage, MessageParseError } from './errors.js'
import { parseJsonObject } from './json.js'

/**
 * Operation ID for messages that are not tied to a FIND or RUN request.
 */
export const BROADCAST_OPERATION_ID = '::BROADCAST::'

/**
 * A decoded application message.
 */
export interface RunnerMessage {
  readonly type: string
  readonly [field: string]: unknown
}

/**
 * Message describing an error outside the normal request flow,
 * such as abnormal termination of the connection.
 */
export interface ErrorMessage extends RunnerMessage {
  readonly type: 'error'
  readonly error_type: string
  readonly message: string
  readonly stack?: string
}

/**
 * Decode a MSG payload's JSON into a RunnerMessage.
 *
 * @throws MessageParseError if the JSON is malformed, not an object, or lacks a string `type`
 */
export function parseRunnerMessage(json: string | Uint8Array): RunnerMessage {
  const obj = parseJsonObject(json, 'message')
  const type = obj.type
  if (typeof type !== 'string' || type === '') {
    throw new MessageParseError('message "type" must be a non-empty string')
  }
  return { ...obj, type }
}

export function serializeRunnerMessage(message: RunnerMessage): string {
  return JSON.stringify(message)
}

/**
 * Build an error message from a thrown value.
 */
export function errorMessageFromException(err: unknown): ErrorMessage {
  if (err instanceof Error) {
    return {
      type: 'error',
      error_type: err.name,
      message: err.message,
      ...(err.stack !== undefined && { stack: err.stack })
    }
  }
  return { type: 'error', error_type: 'unknown', message: errorMessage(err) }
}

/**
 * Narrow a message to ErrorMessage.
 */
export function isErrorMessage(message: RunnerMessage): message is ErrorMessage {
  return (
    message.type === 'error' &&
    typeof message.error_type === 'string' &&
    typeof message.message === 'string'
  )
}
