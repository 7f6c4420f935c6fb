import { createServer, type Server } from 'node:net'
import { ArgumentError, ExecutionEngineInfo, InvalidStateError } from '@testwire/protocol'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { isTearingDown } from '../src/engine-state.js'
import { type ExecutionCommandHandlers, TcpExecutionEngine } from '../src/tcp-execution-engine.js'
import { type MessageDispatcher, TcpRunnerEngine } from '../src/tcp-runner-engine.js'
import { CollectingDiagnosticSink, RawPeer, waitFor } from './_harness/index.js'

const EXECUTION_INFO_FRAME =
  'INFO\x1f{"protocolVersion":"1.0","testAssemblyUniqueID":"asm-1","testFrameworkDisplayName":"demo"}'

const engines: (TcpRunnerEngine | TcpExecutionEngine)[] = []
const peers: RawPeer[] = []
const servers: Server[] = []

afterEach(async () => {
  for (const engine of engines.splice(0)) {
    if (!isTearingDown(engine.state)) {
      await engine.dispose()
    }
  }
  for (const peer of peers.splice(0)) {
    await peer.close()
  }
  for (const server of servers.splice(0)) {
    server.close()
  }
})

function createHandlers() {
  return {
    find: vi.fn<ExecutionCommandHandlers['find']>(),
    run: vi.fn<ExecutionCommandHandlers['run']>(),
    cancel: vi.fn<ExecutionCommandHandlers['cancel']>(),
    quit: vi.fn<ExecutionCommandHandlers['quit']>()
  }
}

function createExecution() {
  const sink = new CollectingDiagnosticSink()
  const handlers = createHandlers()
  const info = ExecutionEngineInfo.create({ testAssemblyUniqueID: 'asm-1', testFrameworkDisplayName: 'demo' })
  const engine = new TcpExecutionEngine('x1', info, handlers, sink)
  engines.push(engine)
  return { engine, handlers, sink }
}

/** A runner and an execution engine with the handshake complete. */
async function connectedPair(dispatcher = vi.fn<MessageDispatcher>(() => 'continue')) {
  const runner = new TcpRunnerEngine('r1', dispatcher)
  engines.push(runner)
  const execution = createExecution()

  const port = await runner.start()
  await execution.engine.connect(port)
  await waitFor(() => runner.state === 'connected' && execution.engine.state === 'connected')

  return { runner, dispatcher, ...execution }
}

/** A listening socket that hands back the accepted connection as a RawPeer. */
async function rawRunner(): Promise<{ port: number; accepted: Promise<RawPeer> }> {
  const server = createServer()
  servers.push(server)
  const accepted = new Promise<RawPeer>((resolve) =>
    server.once('connection', (socket) => {
      const peer = new RawPeer(socket)
      peers.push(peer)
      resolve(peer)
    })
  )
  await new Promise<void>((resolve) => server.listen({ host: '127.0.0.1', port: 0 }, resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('server has no TCP address')
  }
  return { port: address.port, accepted }
}

describe('TcpExecutionEngine', () => {
  describe('before connection', () => {
    it('starts in the initialized state', () => {
      const { engine } = createExecution()
      expect(engine.state).toBe('initialized')
      expect(engine.displayName).toBe('TcpExecutionEngine(x1)')
      expect(engine.runnerInfo).toBeUndefined()
    })

    it('reports and skips messages with no runner', async () => {
      const { engine, sink } = createExecution()
      await engine.sendMessage('op-1', { type: 'x' })
      expect(sink.messages('error')).toEqual([
        'TcpExecutionEngine(x1): sendMessage called when there is no connected runner'
      ])
    })

    it('validates the operation ID of a message', async () => {
      const { engine } = createExecution()
      await expect(engine.sendMessage('', { type: 'x' })).rejects.toBeInstanceOf(ArgumentError)
    })

    it('rejects when the runner is not listening', async () => {
      const runner = new TcpRunnerEngine('r1', () => 'continue')
      const port = await runner.start()
      await runner.dispose()

      const { engine } = createExecution()
      await expect(engine.connect(port)).rejects.toThrow()
      expect(engine.state).toBe('initialized')
    })
  })

  describe('with a runner', () => {
    it('completes the handshake on both sides', async () => {
      const { runner, engine } = await connectedPair()

      expect(runner.testAssemblyUniqueID).toBe('asm-1')
      expect(runner.testFrameworkDisplayName).toBe('demo')
      expect(engine.runnerInfo?.protocolVersion).toBe('1.0')
    })

    it('rejects a second connect', async () => {
      const { engine } = await connectedPair()

      await expect(engine.connect(1)).rejects.toThrow(
        'TcpExecutionEngine(x1): Cannot call connect in any state other than initialized (currently in state connected)'
      )
    })

    it('hands runner commands to the handlers', async () => {
      const { runner, handlers } = await connectedPair()

      await runner.sendFind('op-1')
      await runner.sendRun('op-2')
      await runner.sendCancel('op-3')
      await waitFor(() => handlers.cancel.mock.calls.length === 1)

      expect(handlers.find).toHaveBeenCalledWith('op-1')
      expect(handlers.run).toHaveBeenCalledWith('op-2')
      expect(handlers.cancel).toHaveBeenCalledWith('op-3')
    })

    it('delivers messages to the runner dispatcher', async () => {
      const { engine, dispatcher } = await connectedPair()

      await engine.sendMessage('op-1', { type: 'test_passed', name: 'adds numbers' })
      await waitFor(() => dispatcher.mock.calls.length === 1)

      expect(dispatcher).toHaveBeenCalledWith('op-1', { type: 'test_passed', name: 'adds numbers' })
    })

    it('receives the stop signal as a cancel of everything', async () => {
      const { engine, handlers } = await connectedPair(vi.fn<MessageDispatcher>(() => 'stop'))

      await engine.sendMessage('op-1', { type: 'test_failed' })
      await waitFor(() => handlers.cancel.mock.calls.length === 1)

      expect(handlers.cancel).toHaveBeenCalledWith(undefined)
    })

    it('receives QUIT when the runner is disposed', async () => {
      const { runner, handlers } = await connectedPair()

      await runner.dispose()
      await waitFor(() => handlers.quit.mock.calls.length === 1)

      expect(handlers.find).not.toHaveBeenCalled()
    })
  })

  describe('with a raw runner', () => {
    it('replies to the runner INFO with its own', async () => {
      const { port, accepted } = await rawRunner()
      const { engine } = createExecution()

      await engine.connect(port)
      expect(engine.state).toBe('negotiating')

      const peer = await accepted
      await peer.write('INFO\x1f{"protocolVersion":"1.0"}\0')
      await waitFor(() => peer.frames.length === 1)

      expect(peer.frames).toEqual([EXECUTION_INFO_FRAME])
      expect(engine.state).toBe('connected')
    })

    it('warns about an unknown protocol version and still connects', async () => {
      const { port, accepted } = await rawRunner()
      const { engine, sink } = createExecution()

      await engine.connect(port)
      const peer = await accepted
      await peer.write('INFO\x1f{"protocolVersion":"2.0"}\0')
      await waitFor(() => engine.state === 'connected' && peer.frames.length === 1)

      expect(sink.messages('warn')).toEqual([
        "TcpExecutionEngine(x1): Peer announced protocol version '2.0', which this engine does not know"
      ])
      expect(sink.messages('error')).toEqual([])
      expect(engine.runnerInfo?.protocolVersion).toBe('2.0')
      expect(peer.frames).toEqual([EXECUTION_INFO_FRAME])
    })

    it('seals the runner INFO once connected', async () => {
      const { engine } = await connectedPair()
      const info = engine.runnerInfo

      expect(info?.isSealed).toBe(true)
      expect(() => {
        if (info !== undefined) info.protocolVersion = '9.9'
      }).toThrow(InvalidStateError)
      expect(engine.runnerInfo?.protocolVersion).toBe('1.0')
    })

    it('reports commands without an operation ID', async () => {
      const { port, accepted } = await rawRunner()
      const { engine, handlers, sink } = createExecution()

      await engine.connect(port)
      const peer = await accepted
      await peer.write('INFO\x1f{"protocolVersion":"1.0"}\0FIND\0RUN\x1f\0')
      await waitFor(() => sink.messages('error').length === 2)

      expect(sink.messages('error')).toEqual([
        'TcpExecutionEngine(x1): FIND data is missing the operation ID',
        'TcpExecutionEngine(x1): RUN data is missing the operation ID'
      ])
      expect(handlers.find).not.toHaveBeenCalled()
      expect(handlers.run).not.toHaveBeenCalled()
    })

    it('closes the connection on dispose', async () => {
      const { port, accepted } = await rawRunner()
      const { engine } = createExecution()

      await engine.connect(port)
      const peer = await accepted
      await engine.dispose()
      await waitFor(() => peer.isClosed)

      expect(engine.state).toBe('disconnected')
      await expect(engine.connect(port)).rejects.toBeInstanceOf(InvalidStateError)
    })
  })
})
