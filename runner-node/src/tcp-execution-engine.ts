/**
 * TcpExecutionEngine: the execution engine side of the protocol.
 *
 * Connects to a runner's loopback port, answers the runner's INFO with its
 * own, then hands FIND / RUN / CANCEL / QUIT commands to the supplied
 * handlers and sends MSG frames back.
 *
 * @module
 */
import { connect, type Socket } from 'node:net'
import {
  type DiagnosticSink,
  decodeText,
  encodeFrame,
  encodeMessageFrame,
  errorMessage,
  EXECUTION_COMMANDS,
  type ExecutionEngineInfo,
  InvalidStateError,
  isSupportedProtocolVersion,
  RUNNER_COMMANDS,
  RunnerEngineInfo,
  type RunnerMessage,
  serializeRunnerMessage
} from '@testwire/protocol'
import { isTearingDown } from './engine-state.js'
import { BufferedSocket, closeSocket } from './ipc/buffered-socket.js'
import { TcpEngine } from './tcp-engine.js'

/**
 * Callbacks for commands received from the runner.
 */
export interface ExecutionCommandHandlers {
  find(operationId: string): void
  run(operationId: string): void
  /** `undefined` when the runner asked to stop every operation in flight. */
  cancel(operationId: string | undefined): void
  quit(): void
}

function openSocket(port: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = connect({ host: '127.0.0.1', port })
    const onConnect = () => {
      socket.off('error', onError)
      resolve(socket)
    }
    const onError = (err: Error) => {
      socket.off('connect', onConnect)
      reject(err)
    }
    socket.once('connect', onConnect)
    socket.once('error', onError)
  })
}

export class TcpExecutionEngine extends TcpEngine {
  private client: BufferedSocket | null = null
  private runner: RunnerEngineInfo | undefined
  private connecting = false

  /**
   * @param engineId - Engine ID, used in diagnostics
   * @param engineInfo - Sent to the runner as this engine's INFO
   * @param handlers - Receive commands from the runner
   * @param diagnostics - Receives diagnostics; optional
   */
  constructor(
    engineId: string,
    private readonly engineInfo: ExecutionEngineInfo,
    private readonly handlers: ExecutionCommandHandlers,
    diagnostics?: DiagnosticSink
  ) {
    super(engineId, diagnostics)
    this.transitionState('initialized')

    this.registerHandler(RUNNER_COMMANDS.info, (payload) => this.onInfo(payload))
    this.registerHandler(RUNNER_COMMANDS.find, (payload) =>
      this.onOperation(RUNNER_COMMANDS.find, payload, (id) => this.handlers.find(id))
    )
    this.registerHandler(RUNNER_COMMANDS.run, (payload) =>
      this.onOperation(RUNNER_COMMANDS.run, payload, (id) => this.handlers.run(id))
    )
    this.registerHandler(RUNNER_COMMANDS.cancel, (payload) =>
      this.handlers.cancel(payload === undefined || payload.length === 0 ? undefined : decodeText(payload))
    )
    this.registerHandler(RUNNER_COMMANDS.quit, () => this.handlers.quit())
  }

  /** The runner's INFO, once received. Sealed. */
  get runnerInfo(): RunnerEngineInfo | undefined {
    return this.runner
  }

  /**
   * Connect to the runner at 127.0.0.1:`port` and enter negotiation. The
   * state reaches connected once the runner's INFO arrives.
   *
   * @throws InvalidStateError if not in the initialized state
   * @throws Error if the connection cannot be established
   */
  async connect(port: number): Promise<void> {
    if (this.state !== 'initialized' || this.connecting) {
      throw new InvalidStateError(
        `${this.displayName}: Cannot call connect in any state other than initialized (currently in state ${this.state})`
      )
    }
    this.connecting = true

    let socket: Socket
    try {
      socket = await openSocket(port)
    } finally {
      this.connecting = false
    }

    if (isTearingDown(this.state)) {
      socket.destroy()
      return
    }

    this.report('info', `Connected to tcp://localhost:${port}/`)

    this.disposalTracker.add(async () => {
      try {
        await closeSocket(socket)
      } catch (err) {
        this.report('error', `Error during connection socket closure: ${errorMessage(err)}`)
      }
    })

    const client = new BufferedSocket({
      id: `execution::${this.engineId}`,
      socket,
      onFrame: (frame) => this.dispatch(frame),
      diagnostics: this.diagnostics
    })
    this.client = client
    client.start()

    this.disposalTracker.add(() => client.dispose())

    this.transitionState('negotiating')
  }

  /**
   * Send an application message to the runner.
   * Without a connection this is reported and skipped.
   */
  async sendMessage(operationId: string, message: RunnerMessage): Promise<void> {
    const frame = encodeMessageFrame(operationId, serializeRunnerMessage(message))

    const client = this.client
    if (client === null) {
      this.report('error', 'sendMessage called when there is no connected runner')
      return
    }

    await client.send(frame)
  }

  private onInfo(payload: Buffer | undefined): void {
    if (payload === undefined) {
      this.report('error', 'INFO data is missing the JSON')
      return
    }

    const info = RunnerEngineInfo.parse(payload)

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

    this.runner = info.seal()
    this.transitionState('connected')

    this.client
      ?.send(encodeFrame(EXECUTION_COMMANDS.info, JSON.stringify(this.engineInfo)))
      .catch((err: unknown) => this.report('error', `Error sending INFO to runner: ${errorMessage(err)}`))
  }

  private onOperation(
    command: string,
    payload: Buffer | undefined,
    handle: (operationId: string) => void
  ): void {
    if (payload === undefined || payload.length === 0) {
      this.report('error', `${command} data is missing the operation ID`)
      return
    }
    handle(decodeText(payload))
  }
}
