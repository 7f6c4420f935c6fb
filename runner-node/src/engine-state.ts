/**
 * Connection state for a TCP engine, in order of expected progression.
 *
 * Runner role:
 *   initialized → listening → negotiating → connected → disconnecting → disconnected
 * Execution role skips `listening`.
 *
 * `disconnecting` and `disconnected` may be entered from any state.
 */
export type EngineState =
  | 'unknown'
  | 'initialized'
  | 'listening'
  | 'negotiating'
  | 'connected'
  | 'disconnecting'
  | 'disconnected'

export const ENGINE_STATE_ORDER: readonly EngineState[] = [
  'unknown',
  'initialized',
  'listening',
  'negotiating',
  'connected',
  'disconnecting',
  'disconnected'
]

/** True once teardown has started. */
export function isTearingDown(state: EngineState): boolean {
  return state === 'disconnecting' || state === 'disconnected'
}

/**
 * Pure check of whether `from → to` is a legal transition. Teardown states
 * sit last in the order, so any state may move to them.
 */
export function canTransition(from: EngineState, to: EngineState): boolean {
  return ENGINE_STATE_ORDER.indexOf(to) > ENGINE_STATE_ORDER.indexOf(from)
}
