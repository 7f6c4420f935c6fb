/**
 * DisposalTracker: ordered cleanup of resources acquired over an engine's life.
 *
 * Invariants:
 * - Actions run in strict reverse registration order
 * - Each action runs at most once
 * - A failing action is reported and does not stop the remaining actions
 * - dispose() and add() after disposal throw DisposedError
 *
 * @module
 */
import { DisposedError } from '@testwire/protocol'

export type CleanupAction = () => void | Promise<void>

export class DisposalTracker {
  private readonly actions: CleanupAction[] = []
  private disposed = false

  /**
   * @param onError - Receives each failure from a cleanup action
   */
  constructor(private readonly onError: (err: unknown) => void) {}

  /** True once dispose() has been called. */
  get isDisposed(): boolean {
    return this.disposed
  }

  /** Number of actions still waiting to run. */
  get size(): number {
    return this.actions.length
  }

  /**
   * Register a cleanup action.
   * @throws DisposedError if the tracker has already been disposed
   */
  add(action: CleanupAction): void {
    if (this.disposed) {
      throw new DisposedError('DisposalTracker')
    }
    this.actions.push(action)
  }

  /**
   * Run every registered action, last registered first.
   * @throws DisposedError if called more than once
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      throw new DisposedError('DisposalTracker')
    }
    this.disposed = true

    while (this.actions.length > 0) {
      const action = this.actions.pop()
      if (action === undefined) break
      try {
        await action()
      } catch (err) {
        this.onError(err)
      }
    }
  }
}
