/**
 * TcpRunnerEngine: the runner side of the protocol.
 *
 * Opens a loopback port, accepts a single execution engine connection,
 * translates MSG frames into RunnerMessage objects for the dispatcher, and
 * sends FIND / RUN / CANCEL / QUIT commands to the execution engine.
 *
 * Lifecycle:
 * 1. start() binds 127.0.0.1 on an ephemeral port and resolves with it
 * 2. The caller passes the port to the execution engine out-of-band
 * 3. On accept the runner sends its INFO and waits for the engine's INFO
 * 4. Messages flow until dispose(), which sends QUIT unless already sent
 *
 * @module
 */
import { createServer, type Server, type Socket } from 'node:net'
import {
  BROADCAST_OPERATION_ID,
  type DiagnosticSink,
  decodeText,
  EngineDisposedError,
  ExecutionEngineInfo,
  EXECUTION_COMMANDS,
  encodeFrame,
  errorMessage,
  errorMessageFromException,
  InvalidStateError,
  isSupportedProtocolVersion,
  parseRunnerMessage,
  RUNNER_COMMANDS,
  type RunnerCommand,
  RunnerEngineInfo,
  type RunnerMessage,
  splitOnSeparator,
  validateOperationId
} from '@testwire/protocol'
import { isTearingDown } from './engine-state.js'
import { BufferedSocket, closeSocket } from './ipc/buffered-socket.js'
import { TcpEngine } from './tcp-engine.js'

/** What the runner should do after a message has been dispatched. */
export type DispatchResult = 'continue' | 'stop'

/**
 * Receives every message from the execution engine. Returning 'stop'
 * requests cancellation; CANCEL is sent at most once per connection.
 */
export type MessageDispatcher = (operationId: string, message: RunnerMessage) => DispatchResult

export class TcpRunnerEngine extends TcpEngine {
  private client: BufferedSocket | null = null
  private cancelRequested = false
  private quitSent = false
  private info: ExecutionEngineInfo | undefined

  /**
   * @param engineId - Engine ID, used in diagnostics
   * @param messageDispatcher - Receives messages from the execution engine
   * @param diagnostics - Receives diagnostics; optional
   */
  constructor(
    engineId: string,
    private readonly messageDispatcher: MessageDispatcher,
    diagnostics?: DiagnosticSink
  ) {
    super(engineId, diagnostics)
    this.transitionState('initialized')

    this.registerHandler(EXECUTION_COMMANDS.info, (payload) => this.onInfo(payload))
    this.registerHandler(EXECUTION_COMMANDS.message, (payload) => this.onMessage(payload))
  }

  /**
   * The execution engine's INFO, received during negotiation.
   * Undefined until the state reaches connected; sealed from then on.
   */
  get executionEngineInfo(): ExecutionEngineInfo | undefined {
    return this.info
  }

  /**
   * Unique ID of the test assembly hosted by the execution engine.
   * @throws InvalidStateError before the connected state is reached
   */
  get testAssemblyUniqueID(): string {
    return this.requireInfo('testAssemblyUniqueID').testAssemblyUniqueID
  }

  /**
   * Display name of the execution engine's test framework.
   * @throws InvalidStateError before the connected state is reached
   */
  get testFrameworkDisplayName(): string {
    return this.requireInfo('testFrameworkDisplayName').testFrameworkDisplayName
  }

  /**
   * Start the TCP listener. Stop it by disposing the engine.
   *
   * @returns The loopback port the runner is listening on
   * @throws InvalidStateError if not in the initialized state
   * @throws EngineDisposedError if disposed before the port was bound
   */
  async start(): Promise<number> {
    if (this.state !== 'initialized') {
      throw new InvalidStateError(
        `${this.displayName}: Cannot call start in any state other than initialized (currently in state ${this.state})`
      )
    }

    const server = createServer()
    server.maxConnections = 1
    this.disposalTracker.add(() => this.closeListener(server))
    server.once('connection', (socket) => this.onAccept(server, socket))
    this.transitionState('listening')

    await new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        server.off('listening', onListening)
        server.off('error', onError)
        server.off('close', onClose)
      }
      const onListening = () => {
        cleanup()
        resolve()
      }
      const onError = (err: Error) => {
        cleanup()
        reject(err)
      }
      const onClose = () => {
        cleanup()
        reject(new EngineDisposedError(this.displayName))
      }
      server.on('listening', onListening)
      server.on('error', onError)
      server.on('close', onClose)
      server.listen({ host: '127.0.0.1', port: 0, backlog: 1 })
    })

    // dispose() ran while the port was being bound and skipped the listener
    if (isTearingDown(this.state)) {
      server.close()
      throw new EngineDisposedError(this.displayName)
    }

    // Later listener errors (after bind) are diagnostics, not crashes
    server.on('error', (err) => this.report('error', `Listener error: ${err.message}`))

    const address = server.address()
    if (address === null || typeof address === 'string') {
      throw new InvalidStateError(`${this.displayName}: Listener has no TCP address`)
    }

    this.report('info', `Listening on tcp://localhost:${address.port}/`)
    return address.port
  }

  /**
   * Send FIND for the given operation.
   * Without a connected execution engine this is reported and skipped.
   */
  sendFind(operationId: string): Promise<void> {
    return this.sendOperation(RUNNER_COMMANDS.find, operationId)
  }

  /**
   * Send RUN for the given operation.
   * Without a connected execution engine this is reported and skipped.
   */
  sendRun(operationId: string): Promise<void> {
    return this.sendOperation(RUNNER_COMMANDS.run, operationId)
  }

  /**
   * Send CANCEL for the given operation.
   * Without a connected execution engine this is reported and skipped.
   */
  sendCancel(operationId: string): Promise<void> {
    return this.sendOperation(RUNNER_COMMANDS.cancel, operationId)
  }

  /**
   * Send QUIT. Once sent, dispose() no longer sends it.
   * Without a connected execution engine this is reported and skipped.
   */
  async sendQuit(): Promise<void> {
    const client = this.client
    if (client === null) {
      this.report('error', 'sendQuit called when there is no connected execution engine')
      return
    }

    this.quitSent = true
    await client.send(encodeFrame(RUNNER_COMMANDS.quit))
    this.report('info', 'Request sent: QUIT')
  }

  private async sendOperation(command: RunnerCommand, operationId: string): Promise<void> {
    validateOperationId(operationId)

    const client = this.client
    if (client === null) {
      this.report('error', `${command} called when there is no connected execution engine`)
      return
    }

    await client.send(encodeFrame(command, operationId))
    this.report('info', `Request sent: ${command} ${operationId}`)
  }

  private requireInfo(property: string): ExecutionEngineInfo {
    if (this.info === undefined) {
      throw new InvalidStateError(
        `${this.displayName}: Cannot read ${property} before reaching the connected state (currently in state ${this.state})`
      )
    }
    return this.info
  }

  private async closeListener(server: Server): Promise<void> {
    if (!server.listening) return
    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) {
          this.report('error', `Error during listen socket closure: ${err.message}`)
        }
        resolve()
      })
    })
  }

  private onAccept(server: Server, socket: Socket): void {
    // Exactly one connection per engine
    server.close()

    if (isTearingDown(this.state)) {
      this.report('info', 'Connection accepted after disposal began; closing it')
      socket.destroy()
      return
    }

    const remotePort = socket.remotePort?.toString() ?? '<unknown_port>'
    this.report('info', `Connection accepted from tcp://localhost:${remotePort}/`)

    this.disposalTracker.add(async () => {
      this.report('info', `Disconnecting from tcp://localhost:${remotePort}/`)
      try {
        await closeSocket(socket)
      } catch (err) {
        this.report('error', `Error during connection socket closure: ${errorMessage(err)}`)
      }
      this.report('info', `Disconnected from tcp://localhost:${remotePort}/`)
    })

    const client = new BufferedSocket({
      id: `runner::${this.engineId}`,
      socket,
      onFrame: (frame) => this.dispatch(frame),
      onAbnormalTermination: (err) => this.onAbnormalTermination(err),
      diagnostics: this.diagnostics
    })
    this.client = client
    client.start()

    this.disposalTracker.add(async () => {
      try {
        if (!this.quitSent) {
          await this.sendQuit()
        }
      } catch (err) {
        this.report('error', `Error sending QUIT message to execution engine: ${errorMessage(err)}`)
      }

      try {
        await client.dispose()
      } catch (err) {
        this.report('error', `Error during buffered client disposal: ${errorMessage(err)}`)
      }
    })

    this.transitionState('negotiating')

    // Send INFO to start protocol negotiation
    const runnerInfo = new RunnerEngineInfo()
    client
      .send(encodeFrame(RUNNER_COMMANDS.info, JSON.stringify(runnerInfo)))
      .catch((err: unknown) =>
        this.report('error', `Error sending INFO to execution engine: ${errorMessage(err)}`)
      )
  }

  private onAbnormalTermination(err: Error): void {
    try {
      this.messageDispatcher(BROADCAST_OPERATION_ID, errorMessageFromException(err))
    } catch (dispatchErr) {
      this.report('error', `Error dispatching abnormal termination: ${errorMessage(dispatchErr)}`)
    }
  }

  private onInfo(payload: Buffer | undefined): void {
    if (payload === undefined) {
      this.report('error', 'INFO data is missing the JSON')
      return
    }

    const info = ExecutionEngineInfo.parse(payload)

    if (this.state !== 'negotiating') {
      this.report(
        'error',
        `INFO message received outside the negotiating state (current state is ${this.state})`
      )
      return
    }
    if (!isSupportedProtocolVersion(info.protocolVersion)) {
      this.report(
        'warn',
        `Peer announced protocol version '${info.protocolVersion}', which this engine does not know`
      )
    }

    this.info = info.seal()
    this.transitionState('connected')
  }

  private onMessage(payload: Buffer | undefined): void {
    if (payload === undefined) {
      this.report('error', 'MSG data is missing the operation ID and JSON')
      return
    }

    const { head: operationId, rest: json } = splitOnSeparator(payload)
    if (json === undefined) {
      this.report('error', 'MSG data is missing the JSON')
      return
    }

    const message = parseRunnerMessage(json)
    const result = this.messageDispatcher(decodeText(operationId), message)

    if (result === 'stop' && !this.cancelRequested) {
      this.cancelRequested = true
      this.client
        ?.send(encodeFrame(RUNNER_COMMANDS.cancel))
        .catch((err: unknown) =>
          this.report('error', `Error sending CANCEL to execution engine: ${errorMessage(err)}`)
        )
    }
  }
}
