import { MessageParseError } from './errors.js'
import { decodeText } from './wire.js'

/**
 * Check if a value is a plain object (not null, array, or primitive).
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse UTF-8 JSON bytes or text that must hold a single object.
 *
 * @throws MessageParseError if the input is not valid JSON or not an object
 */
export function parseJsonObject(json: string | Uint8Array, what: string): Record<string, unknown> {
  const text = typeof json === 'string' ? json : decodeText(json)

  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (err) {
    throw new MessageParseError(`${what} is not valid JSON`, err)
  }

  if (!isPlainObject(value)) {
    throw new MessageParseError(`${what} must be a JSON object`)
  }
  return value
}
