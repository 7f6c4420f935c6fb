/**
 * Error classes shared by both engine roles.
 *
 * Contract violations (misuse by the caller) and validation failures are
 * thrown; protocol violations never surface as errors and are reported
 * through diagnostics instead.
 *
 * @module
 */

/**
 * Error thrown when a required value is empty, absent, or malformed.
 * Raised at assignment time, never deferred.
 */
export class ArgumentError extends Error {
  constructor(
    public readonly argumentName: string,
    reason: string
  ) {
    super(`Invalid argument "${argumentName}": ${reason}`)
    this.name = 'ArgumentError'
  }
}

/**
 * Error thrown when an operation is not valid in the current state.
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidStateError'
  }
}

/**
 * Error thrown when reading a required property that was never assigned.
 */
export class UnsetPropertyError extends InvalidStateError {
  constructor(
    public readonly propertyName: string,
    public readonly typeName: string
  ) {
    super(`Attempted to read unset property "${propertyName}" on ${typeName}`)
    this.name = 'UnsetPropertyError'
  }
}

/**
 * Error thrown when an object is used or disposed after disposal.
 */
export class DisposedError extends Error {
  constructor(public readonly objectName: string) {
    super(`Cannot access a disposed object: ${objectName}`)
    this.name = 'DisposedError'
  }
}

/**
 * Error thrown when disposing an engine that is already disconnecting or disconnected.
 */
export class EngineDisposedError extends DisposedError {
  constructor(displayName: string) {
    super(displayName)
    this.name = 'EngineDisposedError'
  }
}

/**
 * Error thrown when an application message cannot be decoded.
 */
export class MessageParseError extends Error {
  constructor(reason: string, cause?: unknown) {
    super(`Invalid message: ${reason}`)
    this.name = 'MessageParseError'
    if (cause !== undefined) {
      this.cause = cause
    }
  }
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
