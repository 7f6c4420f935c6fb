/**
 * TcpEngine: shared base for the runner and execution engine roles.
 *
 * Responsibilities:
 * - Engine identity and display name for diagnostics
 * - Connection state machine with a single transition point
 * - Ordered command handler registry and frame dispatch
 * - Teardown through a DisposalTracker
 *
 * Every state change goes through transitionState(). Guard checks and the
 * transitions they protect run in the same synchronous block, so no other
 * callback can observe or change state between them.
 *
 * @module
 */
import {
  ArgumentError,
  type Diagnostic,
  type DiagnosticSink,
  decodeText,
  EngineDisposedError,
  errorMessage,
  InvalidStateError,
  type LogLevel,
  splitOnSeparator
} from '@testwire/protocol'
import { DisposalTracker } from './disposal-tracker.js'
import { canTransition, type EngineState, isTearingDown } from './engine-state.js'

/**
 * Handler for one command. Receives the bytes after the first separator,
 * or undefined when the frame had no separator.
 */
export type CommandHandler = (payload: Buffer | undefined) => void

interface CommandBinding {
  readonly tag: Buffer
  readonly handler: CommandHandler
}

export abstract class TcpEngine {
  private readonly bindings: CommandBinding[] = []
  private currentState: EngineState = 'unknown'

  /** Cleanup actions run by dispose(), last registered first. */
  protected readonly disposalTracker: DisposalTracker

  readonly engineId: string
  readonly displayName: string

  /**
   * @param engineId - Engine ID, used in diagnostics
   * @param diagnostics - Receives diagnostics; optional
   */
  constructor(
    engineId: string,
    protected readonly diagnostics?: DiagnosticSink
  ) {
    if (typeof engineId !== 'string' || engineId === '') {
      throw new ArgumentError('engineId', 'must be a non-empty string')
    }
    this.engineId = engineId
    this.displayName = `${new.target.name}(${engineId})`
    this.disposalTracker = new DisposalTracker((err) =>
      this.report('error', `Error during disposal: ${errorMessage(err)}`)
    )
  }

  /**
   * Current connection state. Reads are advisory; code that acts on the
   * state re-checks it in the same synchronous block as the action.
   */
  get state(): EngineState {
    return this.currentState
  }

  /**
   * Move to a new state, reporting the transition.
   * @throws InvalidStateError if `next` is not ahead of the current state
   */
  protected transitionState(next: EngineState): void {
    const previous = this.currentState
    if (!canTransition(previous, next)) {
      throw new InvalidStateError(
        `${this.displayName}: Illegal engine state transition from ${previous} to ${next}`
      )
    }
    this.report('debug', `Engine state transition from ${previous} to ${next}`)
    this.currentState = next
  }

  /**
   * Register a command handler. Must be called before frames arrive.
   * When two handlers share a tag, only the first registered is invoked.
   */
  protected registerHandler(tag: string | Uint8Array, handler: CommandHandler): void {
    this.bindings.push({
      tag: typeof tag === 'string' ? Buffer.from(tag, 'ascii') : Buffer.from(tag),
      handler
    })
  }

  /**
   * Dispatch one frame to the first handler whose tag equals the frame's
   * command. Handler errors and unknown commands are reported, never thrown.
   */
  protected dispatch(frame: Buffer): void {
    const { head: command, rest: payload } = splitOnSeparator(frame)

    const binding = this.bindings.find((b) => b.tag.equals(command))
    if (binding === undefined) {
      this.report('error', `Received unknown command '${decodeText(frame)}'`)
      return
    }

    try {
      binding.handler(payload)
    } catch (err) {
      this.report(
        'error',
        `Error during message processing '${decodeText(frame)}': ${errorMessage(err)}`
      )
    }
  }

  /**
   * Tear down the engine: disconnecting → cleanup actions → disconnected.
   *
   * Cleanup failures are reported and do not stop the remaining actions.
   *
   * @throws EngineDisposedError if already disconnecting or disconnected
   */
  async dispose(): Promise<void> {
    if (isTearingDown(this.currentState)) {
      throw new EngineDisposedError(this.displayName)
    }
    this.transitionState('disconnecting')

    try {
      await this.disposalTracker.dispose()
    } catch (err) {
      this.report('error', `Error during disposal: ${errorMessage(err)}`)
    }

    this.transitionState('disconnected')
  }

  /**
   * Send a diagnostic, prefixed with the display name. A throwing sink is
   * ignored so diagnostics never break dispatch or teardown.
   */
  protected report(level: LogLevel, message: string): void {
    if (this.diagnostics === undefined) return
    const diagnostic: Diagnostic = { level, message: `${this.displayName}: ${message}` }
    try {
      this.diagnostics.onDiagnostic(diagnostic)
    } catch {
      // Diagnostics are best-effort
    }
  }
}
