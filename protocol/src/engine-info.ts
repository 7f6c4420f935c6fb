/**
 * Negotiated-info records exchanged in INFO frames during the handshake.
 *
 * Both records validate on assignment: an empty or absent value is rejected
 * immediately with ArgumentError. Required fields that were never assigned
 * throw UnsetPropertyError when read. An engine seals the record it accepts
 * from its peer, after which every setter throws InvalidStateError.
 *
 * @module
 */

import { ArgumentError, InvalidStateError, UnsetPropertyError } from './errors.js'
import { parseJsonObject } from './json.js'

/**
 * Known protocol versions.
 */
export const PROTOCOL_VERSIONS = {
  v1_0: '1.0'
} as const

export type ProtocolVersion = (typeof PROTOCOL_VERSIONS)[keyof typeof PROTOCOL_VERSIONS]

/** Versions this implementation can speak, lowest first. */
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [PROTOCOL_VERSIONS.v1_0]

export function isSupportedProtocolVersion(version: string): boolean {
  return SUPPORTED_PROTOCOL_VERSIONS.includes(version)
}

function requireNonEmpty(value: unknown, name: string): string {
  if (typeof value !== 'string') {
    throw new ArgumentError(name, 'must be a string')
  }
  if (value === '') {
    throw new ArgumentError(name, 'must not be empty')
  }
  return value
}

function rejectSealed(property: string, typeName: string): never {
  throw new InvalidStateError(`Cannot assign "${property}" on a sealed ${typeName}`)
}

/** JSON form of RunnerEngineInfo. */
export interface RunnerEngineInfoJson {
  readonly protocolVersion: string
}

/** JSON form of ExecutionEngineInfo; unset fields are omitted. */
export interface ExecutionEngineInfoJson {
  readonly protocolVersion: string
  readonly testAssemblyUniqueID?: string
  readonly testFrameworkDisplayName?: string
}

/**
 * Information about the runner, sent as the runner's INFO payload.
 */
export class RunnerEngineInfo {
  private version: string = PROTOCOL_VERSIONS.v1_0
  private sealed = false

  /** Protocol version the runner speaks. First supported: 1.0. */
  get protocolVersion(): string {
    return this.version
  }

  set protocolVersion(value: string) {
    if (this.sealed) rejectSealed('protocolVersion', 'RunnerEngineInfo')
    this.version = requireNonEmpty(value, 'protocolVersion')
  }

  get isSealed(): boolean {
    return this.sealed
  }

  /** Refuse all further assignments. */
  seal(): this {
    this.sealed = true
    return this
  }

  toJSON(): RunnerEngineInfoJson {
    return { protocolVersion: this.version }
  }

  /**
   * Decode an INFO payload. Unknown fields are ignored.
   * @throws MessageParseError if the payload is not a JSON object
   * @throws ArgumentError if a present field is empty or not a string
   */
  static parse(json: string | Uint8Array): RunnerEngineInfo {
    const obj = parseJsonObject(json, 'runner INFO payload')
    const info = new RunnerEngineInfo()
    if (obj.protocolVersion !== undefined && obj.protocolVersion !== null) {
      info.protocolVersion = requireNonEmpty(obj.protocolVersion, 'protocolVersion')
    }
    return info
  }
}

/**
 * Information about the execution engine, sent as its INFO payload.
 */
export class ExecutionEngineInfo {
  private version: string = PROTOCOL_VERSIONS.v1_0
  private assemblyUniqueID: string | undefined
  private frameworkDisplayName: string | undefined
  private sealed = false

  /** Protocol version the execution engine speaks. First supported: 1.0. */
  get protocolVersion(): string {
    return this.version
  }

  set protocolVersion(value: string) {
    if (this.sealed) rejectSealed('protocolVersion', 'ExecutionEngineInfo')
    this.version = requireNonEmpty(value, 'protocolVersion')
  }

  /** Unique ID of the test assembly hosted by the execution engine. */
  get testAssemblyUniqueID(): string {
    if (this.assemblyUniqueID === undefined) {
      throw new UnsetPropertyError('testAssemblyUniqueID', 'ExecutionEngineInfo')
    }
    return this.assemblyUniqueID
  }

  set testAssemblyUniqueID(value: string) {
    if (this.sealed) rejectSealed('testAssemblyUniqueID', 'ExecutionEngineInfo')
    this.assemblyUniqueID = requireNonEmpty(value, 'testAssemblyUniqueID')
  }

  /** Display name of the test framework. */
  get testFrameworkDisplayName(): string {
    if (this.frameworkDisplayName === undefined) {
      throw new UnsetPropertyError('testFrameworkDisplayName', 'ExecutionEngineInfo')
    }
    return this.frameworkDisplayName
  }

  set testFrameworkDisplayName(value: string) {
    if (this.sealed) rejectSealed('testFrameworkDisplayName', 'ExecutionEngineInfo')
    this.frameworkDisplayName = requireNonEmpty(value, 'testFrameworkDisplayName')
  }

  get isSealed(): boolean {
    return this.sealed
  }

  /** Refuse all further assignments. */
  seal(): this {
    this.sealed = true
    return this
  }

  toJSON(): ExecutionEngineInfoJson {
    return {
      protocolVersion: this.version,
      ...(this.assemblyUniqueID !== undefined && { testAssemblyUniqueID: this.assemblyUniqueID }),
      ...(this.frameworkDisplayName !== undefined && {
        testFrameworkDisplayName: this.frameworkDisplayName
      })
    }
  }

  /**
   * Build a fully populated record.
   * @throws ArgumentError if any value is empty
   */
  static create(fields: {
    testAssemblyUniqueID: string
    testFrameworkDisplayName: string
    protocolVersion?: string
  }): ExecutionEngineInfo {
    const info = new ExecutionEngineInfo()
    if (fields.protocolVersion !== undefined) {
      info.protocolVersion = fields.protocolVersion
    }
    info.testAssemblyUniqueID = fields.testAssemblyUniqueID
    info.testFrameworkDisplayName = fields.testFrameworkDisplayName
    return info
  }

  /**
   * Decode an INFO payload.
   *
   * Unknown fields are ignored. Missing fields stay unset and fail on first
   * read rather than here.
   *
   * @throws MessageParseError if the payload is not a JSON object
   * @throws ArgumentError if a present field is empty or not a string
   */
  static parse(json: string | Uint8Array): ExecutionEngineInfo {
    const obj = parseJsonObject(json, 'execution engine INFO payload')
    const info = new ExecutionEngineInfo()

    if (obj.protocolVersion !== undefined && obj.protocolVersion !== null) {
      info.protocolVersion = requireNonEmpty(obj.protocolVersion, 'protocolVersion')
    }
    if (obj.testAssemblyUniqueID !== undefined && obj.testAssemblyUniqueID !== null) {
      info.testAssemblyUniqueID = requireNonEmpty(obj.testAssemblyUniqueID, 'testAssemblyUniqueID')
    }
    if (obj.testFrameworkDisplayName !== undefined && obj.testFrameworkDisplayName !== null) {
      info.testFrameworkDisplayName = requireNonEmpty(
        obj.testFrameworkDisplayName,
        'testFrameworkDisplayName'
      )
    }

    return info
  }
}
