/**
 * BufferedSocket: frame reassembly and serialized sends over a TCP socket.
 *
 * Inbound bytes are buffered and split on the end-of-frame byte; each
 * complete frame (marker stripped, possibly empty) is delivered to `onFrame`
 * in arrival order. Outbound sends go through a single promise chain, so the
 * bytes of one frame are never interleaved with another's, and a frame is
 * written only after the previous one has been flushed.
 *
 * Lifecycle:
 * 1. Construct with a connected socket
 * 2. Call start() to begin reading
 * 3. send() frames at any time
 * 4. dispose() waits for queued sends, then stops reading. Closing the
 *    socket is left to the owner.
 *
 * @module
 */
import type { Socket } from 'node:net'
import { type DiagnosticSink, END_OF_FRAME, errorMessage } from '@testwire/protocol'

/**
 * Error thrown when sending after dispose() or once the socket stopped
 * accepting writes.
 */
export class SocketClosedError extends Error {
  constructor(reason: 'destroyed' | 'ended' | 'disposed') {
    super(`Socket unavailable: ${reason}`)
    this.name = 'SocketClosedError'
  }
}

export interface BufferedSocketOptions {
  /** Used as a prefix for diagnostics. */
  readonly id: string
  readonly socket: Socket
  /** Receives each complete frame without its end-of-frame byte. */
  readonly onFrame: (frame: Buffer) => void
  /** Called once if the socket fails before dispose(). */
  readonly onAbnormalTermination?: (err: Error) => void
  readonly diagnostics?: DiagnosticSink
}

/**
 * Write one frame and wait until the socket has flushed it.
 *
 * The write callback fires once the bytes leave the socket's buffer, or with
 * the error that stopped them, so the next frame in the chain never starts
 * while this one is still queued.
 */
function flushFrame(socket: Socket, frame: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(frame, (err) => (err ? reject(err) : resolve()))
  })
}

/**
 * End the socket, then destroy it once pending writes are flushed.
 * Resolves on 'close'.
 */
export function closeSocket(socket: Socket): Promise<void> {
  return new Promise((resolve) => {
    if (socket.destroyed) {
      resolve()
      return
    }
    socket.once('close', () => resolve())
    socket.end(() => socket.destroy())
  })
}

export class BufferedSocket {
  private buffer: Buffer = Buffer.alloc(0)
  private chain: Promise<void> = Promise.resolve()
  private started = false
  private disposed = false
  private terminated = false

  constructor(private readonly options: BufferedSocketOptions) {}

  get id(): string {
    return this.options.id
  }

  /** True after dispose() has been called. */
  get isDisposed(): boolean {
    return this.disposed
  }

  /**
   * Start reading frames from the socket.
   */
  start(): void {
    if (this.started) return
    this.started = true
    const { socket } = this.options
    socket.on('data', this.onData)
    socket.on('end', this.onEnd)
    socket.on('error', this.onError)
  }

  /**
   * Queue bytes for sending. Text is UTF-8 encoded.
   *
   * Sends resolve in the order they were queued. A send queued before
   * dispose() still goes out.
   *
   * @throws SocketClosedError if disposed or the socket is no longer writable
   */
  send(data: Uint8Array | string): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new SocketClosedError('disposed'))
    }

    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data)
    const result = this.chain.then(() => this.write(bytes))
    // Chain continues regardless to maintain serialization
    this.chain = result.then(
      () => {},
      () => {}
    )
    return result
  }

  /**
   * Wait for queued sends, then stop reading. Idempotent.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return
    this.disposed = true

    await this.chain

    const { socket } = this.options
    socket.off('data', this.onData)
    socket.off('end', this.onEnd)
    // The error listener stays attached so late socket errors are reported, not thrown
    this.buffer = Buffer.alloc(0)
  }

  /** Runs on the chain, so the socket state is the one this frame meets. */
  private write(frame: Buffer): Promise<void> {
    const { socket } = this.options
    if (socket.destroyed) {
      return Promise.reject(new SocketClosedError('destroyed'))
    }
    if (socket.writableEnded) {
      return Promise.reject(new SocketClosedError('ended'))
    }
    return flushFrame(socket, frame)
  }

  private readonly onData = (chunk: Buffer): void => {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk])
    this.drainBuffer()
  }

  private readonly onEnd = (): void => {
    this.report('info', 'peer closed the connection')
    if (this.buffer.length > 0) {
      this.report('error', `discarding ${this.buffer.length} bytes of incomplete frame`)
      this.buffer = Buffer.alloc(0)
    }
  }

  private readonly onError = (err: Error): void => {
    if (this.disposed || this.terminated) {
      this.report('error', `socket error after shutdown: ${err.message}`)
      return
    }
    this.terminated = true
    this.report('error', `socket terminated abnormally: ${err.message}`)
    this.options.onAbnormalTermination?.(err)
  }

  /** Consume complete frames from the internal buffer. */
  private drainBuffer(): void {
    while (this.buffer.length > 0) {
      const end = this.buffer.indexOf(END_OF_FRAME)
      if (end < 0) {
        // Incomplete frame, wait for more data
        return
      }

      const frame = this.buffer.subarray(0, end)
      this.buffer = this.buffer.subarray(end + 1)

      try {
        this.options.onFrame(frame)
      } catch (err) {
        this.report('error', `frame handler failed: ${errorMessage(err)}`)
      }
    }
  }

  private report(level: 'info' | 'error', message: string): void {
    try {
      this.options.diagnostics?.onDiagnostic({ level, message: `${this.options.id}: ${message}` })
    } catch {
      // A failing sink must not break frame delivery
    }
  }
}
