/**
 * IPC module: framing over the runner/execution-engine TCP socket.
 *
 * @module
 */

export {
  BufferedSocket,
  type BufferedSocketOptions,
  closeSocket,
  SocketClosedError
} from './buffered-socket.js'
