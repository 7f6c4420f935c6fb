/**
 * Runner and execution engine in one process.
 *
 * The execution engine "discovers" three tests on FIND and "runs" them on
 * RUN, reporting each as a MSG. The runner stops the run at the first
 * failure, which sends CANCEL, then disposes (sending QUIT).
 *
 * Run with: npm run demo
 */
import { ExecutionEngineInfo, type RunnerMessage } from '@testwire/protocol'
import {
  createStderrDiagnosticSink,
  type DispatchResult,
  type EngineState,
  type TcpEngine,
  TcpExecutionEngine,
  TcpRunnerEngine
} from '@testwire/runner-node'

const TESTS = ['adds numbers', 'divides by zero', 'subtracts numbers']

async function waitForState(engine: TcpEngine, state: EngineState): Promise<void> {
  while (engine.state !== state) {
    await new Promise((resolve) => setTimeout(resolve, 5))
  }
}

async function main(): Promise<void> {
  const diagnostics = createStderrDiagnosticSink({ minLevel: 'info' })

  let finished: () => void = () => {}
  const done = new Promise<void>((resolve) => {
    finished = resolve
  })

  const runner = new TcpRunnerEngine(
    'demo-runner',
    (operationId: string, message: RunnerMessage): DispatchResult => {
      console.log(`[runner] ${operationId}: ${JSON.stringify(message)}`)
      if (message.type === 'run_complete') finished()
      return message.type === 'test_failed' ? 'stop' : 'continue'
    },
    diagnostics
  )

  let cancelled = false

  const execution = new TcpExecutionEngine(
    'demo-execution',
    ExecutionEngineInfo.create({ testAssemblyUniqueID: 'demo-assembly', testFrameworkDisplayName: 'demo' }),
    {
      find: (operationId) => {
        for (const name of TESTS) {
          report(operationId, { type: 'test_discovered', name })
        }
        report(operationId, { type: 'discovery_complete', count: TESTS.length })
      },
      run: (operationId) => {
        // One test per timer tick so a CANCEL can land between them
        const runNext = (index: number) => {
          if (cancelled || index >= TESTS.length) {
            report(operationId, { type: 'run_complete', cancelled })
            return
          }
          const name = TESTS[index]
          report(operationId, { type: name === 'divides by zero' ? 'test_failed' : 'test_passed', name })
          setTimeout(() => runNext(index + 1), 20)
        }
        runNext(0)
      },
      cancel: (operationId) => {
        console.log(`[execution] cancel ${operationId ?? 'everything'}`)
        cancelled = true
      },
      quit: () => console.log('[execution] quit')
    },
    diagnostics
  )

  function report(operationId: string, message: RunnerMessage): void {
    execution.sendMessage(operationId, message).catch((err: unknown) => {
      console.error('[execution] send failed:', err)
    })
  }

  const port = await runner.start()
  await execution.connect(port)
  await waitForState(runner, 'connected')

  await runner.sendFind('find-1')
  await runner.sendRun('run-1')
  await done

  await runner.dispose()
  await execution.dispose()
}

main().catch((err: unknown) => {
  console.error(err)
  process.exit(1)
})
