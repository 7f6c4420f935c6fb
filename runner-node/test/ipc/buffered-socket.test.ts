import type { Socket } from 'node:net'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { BufferedSocket, closeSocket, SocketClosedError } from '../../src/ipc/buffered-socket.js'
import { CollectingDiagnosticSink, RawPeer, socketPair, waitFor } from '../_harness/index.js'

const sockets: Socket[] = []

afterEach(() => {
  for (const socket of sockets.splice(0)) {
    socket.destroy()
  }
})

/** A BufferedSocket on one end of a loopback pair and a RawPeer on the other. */
async function setup(overrides: { onAbnormalTermination?: (err: Error) => void } = {}) {
  const { left, right } = await socketPair()
  sockets.push(left, right)
  const frames: string[] = []
  const sink = new CollectingDiagnosticSink()
  const buffered = new BufferedSocket({
    id: 'test::conn',
    socket: left,
    onFrame: (frame) => frames.push(frame.toString('utf-8')),
    diagnostics: sink,
    ...overrides
  })
  buffered.start()
  return { buffered, frames, sink, peer: new RawPeer(right), socket: left }
}

describe('BufferedSocket', () => {
  describe('receiving', () => {
    it('delivers complete frames without the end-of-frame byte', async () => {
      const { frames, peer } = await setup()

      await peer.write('FIND\x1fop-1\0QUIT\0')
      await waitFor(() => frames.length === 2)

      expect(frames).toEqual(['FIND\x1fop-1', 'QUIT'])
    })

    it('reassembles a frame split across chunks', async () => {
      const { frames, peer } = await setup()

      await peer.write('RU')
      await peer.write('N\x1fop')
      await peer.write('-9\0')
      await waitFor(() => frames.length === 1)

      expect(frames).toEqual(['RUN\x1fop-9'])
    })

    it('delivers empty frames as they arrive', async () => {
      const { frames, peer } = await setup()

      await peer.write('\0QUIT\0\0')
      await waitFor(() => frames.length === 3)

      expect(frames).toEqual(['', 'QUIT', ''])
    })

    it('reports a throwing frame handler and keeps delivering', async () => {
      const { left, right } = await socketPair()
      sockets.push(left, right)
      const sink = new CollectingDiagnosticSink()
      const onFrame = vi.fn((frame: Buffer) => {
        if (frame.toString() === 'BAD') throw new Error('bad frame')
      })
      new BufferedSocket({ id: 'test::conn', socket: left, onFrame, diagnostics: sink }).start()

      await new RawPeer(right).write('BAD\0GOOD\0')
      await waitFor(() => onFrame.mock.calls.length === 2)

      expect(sink.messages('error')).toEqual(['test::conn: frame handler failed: bad frame'])
    })

    it('reports an incomplete frame left when the peer closes', async () => {
      const { sink, peer } = await setup()

      await peer.write('RUN\x1fop')
      peer.socket.end()
      await waitFor(() => sink.messages('error').length === 1)

      expect(sink.messages()).toEqual([
        'test::conn: peer closed the connection',
        'test::conn: discarding 6 bytes of incomplete frame'
      ])
    })

    it('stops delivering after dispose', async () => {
      const { buffered, frames, peer } = await setup()

      await buffered.dispose()
      await peer.write('QUIT\0')
      await new Promise((resolve) => setTimeout(resolve, 20))

      expect(frames).toEqual([])
    })
  })

  describe('sending', () => {
    it('writes frames in the order they were queued', async () => {
      const { buffered, peer } = await setup()

      const frames = Array.from({ length: 100 }, (_, i) => `RUN\x1fop-${i}`)
      await Promise.all(frames.map((frame) => buffered.send(`${frame}\0`)))
      await waitFor(() => peer.frames.length === 100)

      expect(peer.frames).toEqual(frames)
    })

    it('keeps a large frame whole under backpressure', async () => {
      const { buffered, peer } = await setup()
      const large = `MSG\x1fop-1\x1f${JSON.stringify({ type: 'output', text: 'x'.repeat(1024 * 1024) })}`

      await Promise.all([buffered.send(`${large}\0`), buffered.send('QUIT\0')])
      await waitFor(() => peer.frames.length === 2, 5000)

      expect(peer.frames[0]).toBe(large)
      expect(peer.frames[1]).toBe('QUIT')
    })

    it('flushes sends queued before dispose', async () => {
      const { buffered, peer } = await setup()

      const sent = buffered.send('QUIT\0')
      await buffered.dispose()
      await sent
      await waitFor(() => peer.frames.length === 1)

      expect(peer.frames).toEqual(['QUIT'])
    })

    it('rejects sends after dispose', async () => {
      const { buffered } = await setup()

      await buffered.dispose()

      expect(buffered.isDisposed).toBe(true)
      await expect(buffered.send('QUIT\0')).rejects.toThrow('Socket unavailable: disposed')
    })

    it('rejects sends on a destroyed socket and keeps the queue going', async () => {
      const { buffered, socket } = await setup()

      socket.destroy()

      await expect(buffered.send('QUIT\0')).rejects.toBeInstanceOf(SocketClosedError)
      await expect(buffered.send('QUIT\0')).rejects.toThrow('Socket unavailable: destroyed')
    })

    it('rejects sends after the socket was ended', async () => {
      const { buffered, socket } = await setup()

      socket.end()

      await expect(buffered.send('QUIT\0')).rejects.toThrow('Socket unavailable: ended')
    })

    it('accepts byte payloads', async () => {
      const { buffered, peer } = await setup()

      await buffered.send(Uint8Array.of(0x51, 0x55, 0x49, 0x54, 0x00))
      await waitFor(() => peer.frames.length === 1)

      expect(peer.frames).toEqual(['QUIT'])
    })
  })

  describe('termination', () => {
    it('reports abnormal termination once', async () => {
      const onAbnormalTermination = vi.fn<(err: Error) => void>()
      const { sink, peer } = await setup({ onAbnormalTermination })

      peer.socket.resetAndDestroy()
      await waitFor(() => onAbnormalTermination.mock.calls.length === 1)

      expect(onAbnormalTermination.mock.calls[0][0].message).toContain('ECONNRESET')
      expect(sink.messages('error')[0]).toMatch(/^test::conn: socket terminated abnormally: /)
    })

    it('does not report abnormal termination after dispose', async () => {
      const onAbnormalTermination = vi.fn<(err: Error) => void>()
      const { buffered, socket } = await setup({ onAbnormalTermination })

      await buffered.dispose()
      socket.emit('error', new Error('late failure'))

      expect(onAbnormalTermination).not.toHaveBeenCalled()
    })
  })
})

describe('closeSocket', () => {
  it('flushes pending writes and closes both ends', async () => {
    const { left, right } = await socketPair()
    sockets.push(left, right)
    const peer = new RawPeer(right)

    left.write('QUIT\0')
    await closeSocket(left)
    await waitFor(() => peer.isClosed)

    expect(left.destroyed).toBe(true)
    expect(peer.frames).toEqual(['QUIT'])
  })

  it('resolves at once for a destroyed socket', async () => {
    const { left, right } = await socketPair()
    sockets.push(left, right)
    left.destroy()

    await expect(closeSocket(left)).resolves.toBeUndefined()
  })
})
