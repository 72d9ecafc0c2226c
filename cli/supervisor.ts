import kleur from 'kleur'
import type { InboundAttempt } from '../shared/types.js'
import { ControlPlaneClient } from './api/client.js'
import { CLIENT_VERSION, type ListenConfig } from './config.js'
import { ListenError, ReauthRequiredError, describeError } from './errors.js'
import { ListenEventBus } from './events.js'
import { checkLocalTarget, formatHealthMessage } from './healthcheck.js'
import { DeliveryPipeline } from './pipeline/pipeline.js'
import { TransportReporter } from './pipeline/reporter.js'
import { SessionBootstrapper, type BootstrapInput, type Session } from './session/bootstrap.js'
import { parseForwardTarget } from './session/target.js'
import { TunnelTransport } from './transport/client.js'
import { BoundedQueue } from './transport/queue.js'
import { settlesWithin } from './utils.js'
import { createActions } from '../src/lib/actions.js'
import { formatUnreportedSummary } from '../src/lib/format.js'
import { openInBrowser } from '../src/lib/opener.js'
import { createView, resolveOutputMode } from '../src/views/index.js'

/** Fresh sessions opened in a row before giving up on re-authentication */
const MAX_RENEWALS = 3
const HEALTH_CHECK_TIMEOUT_MS = 3_000
/** Floor for closing the socket once the pipeline has used the drain deadline */
const MIN_CLOSE_MS = 250

export interface ListenInput {
  target: string
  sourceQuery?: string
  connectionFilter?: string
  path?: string
  output?: string
}

export interface SupervisorOptions {
  client?: ControlPlaneClient
  /** Shutdown trigger besides SIGINT/SIGTERM and the UI's quit key */
  signal?: AbortSignal
  handleSignals?: boolean
  isTTY?: boolean
  deviceName?: string
  /** Printer for log-mode lines and supervisor messages */
  write?: (line: string) => void
  openBrowser?: (url: string) => Promise<void>
  /** Passed to the transport; tests shorten it */
  welcomeTimeoutMs?: number
}

function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()
  return new Promise(resolve => signal.addEventListener('abort', () => resolve(), { once: true }))
}

/**
 * Run `listen` end to end: bootstrap a session, forward attempts until
 * asked to stop, drain and report. Resolves with the process exit code;
 * rejects with a ListenError when the session cannot be set up.
 */
export async function runListen(
  input: ListenInput,
  config: ListenConfig,
  options: SupervisorOptions = {},
): Promise<number> {
  const write = options.write ?? ((line: string) => console.log(line))
  const target = parseForwardTarget(input.target)
  const mode = resolveOutputMode(input.output, options.isTTY)
  const shutdown = new AbortController()

  const onExternalAbort = () => shutdown.abort()
  options.signal?.addEventListener('abort', onExternalAbort, { once: true })

  const onSignal = (name: NodeJS.Signals) => {
    if (shutdown.signal.aborted) {
      console.warn(`[Supervisor] Received ${name} again, still draining`)
      return
    }
    console.log(`[Supervisor] Received ${name}, draining`)
    shutdown.abort()
  }
  const handleSignals = options.handleSignals ?? true
  if (handleSignals) {
    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)
  }

  try {
    const client = options.client ?? new ControlPlaneClient({
      baseUrl: config.apiBase,
      apiKey: config.apiKey,
      projectId: config.projectId,
      verbose: config.verbose,
    })
    const bootstrapper = new SessionBootstrapper(client, {
      wsBase: config.wsBase,
      wsBaseOverride: config.wsBaseOverride,
      noWss: config.noWss,
      deviceName: options.deviceName,
      signal: shutdown.signal,
      verbose: config.verbose,
    })
    const bootstrapInput: BootstrapInput = {
      target,
      sourceQuery: input.sourceQuery,
      connectionFilter: input.connectionFilter,
      path: input.path,
    }

    const { session, routes } = await bootstrapper.bootstrap(bootstrapInput)

    const health = await checkLocalTarget(target, HEALTH_CHECK_TIMEOUT_MS, config.insecure)
    if (health.healthy) {
      if (mode !== 'quiet') write(kleur.green(formatHealthMessage(health)))
    } else {
      write(kleur.yellow(formatHealthMessage(health)))
    }

    const bus = new ListenEventBus()
    const inbound = new BoundedQueue<InboundAttempt>(config.queueSize)
    const transport = new TunnelTransport({
      session,
      inbound,
      drainDeadlineMs: config.drainMs,
      whenIdle: (): Promise<void> => pipeline.whenIdle(),
      welcomeTimeoutMs: options.welcomeTimeoutMs,
      verbose: config.verbose,
    })
    const reporter = new TransportReporter({ channel: transport, client, verbose: config.verbose })
    const pipeline = new DeliveryPipeline({
      inbound,
      routes,
      reporter,
      bus,
      concurrency: config.concurrency,
      timeoutMs: config.timeoutMs,
      maxBodyBytes: config.maxBodyBytes,
      insecure: config.insecure,
      verbose: config.verbose,
    })

    transport.on('status', status => bus.emit('transport:status', status))
    transport.on('notice', notice => bus.emit('notice', notice))

    let epoch = routes.epoch
    transport.on('session-changed', sessionId => {
      const next = ++epoch
      bootstrapper.refreshRoutes(bootstrapInput, next)
        .then(table => {
          // A later session change may have finished first
          if (next === epoch) pipeline.setRoutes(table)
        })
        .catch(err => console.warn(`[Supervisor] Could not refresh routes for session ${sessionId}: ${describeError(err)}`))
    })

    const view = createView(mode, {
      bus,
      routes: routes.list(),
      dashboardBase: config.dashboardBase,
      info: { version: CLIENT_VERSION, userName: config.userName, projectName: config.projectName },
      actions: createActions(client, options.openBrowser ?? openInBrowser),
      onQuit: () => shutdown.abort(),
      write,
    })
    view.start()

    try {
      const pipelineRun = pipeline.run().catch(err => {
        console.error(`[Supervisor] Pipeline stopped: ${describeError(err)}`)
        shutdown.abort()
      })
      const transportRun = keepConnected(transport, bootstrapper, session, shutdown.signal)
      const failure = await Promise.race([
        whenAborted(shutdown.signal).then(() => undefined),
        transportRun,
      ])
      shutdown.abort()

      const started = Date.now()
      transport.beginDrain()
      const summary = await pipeline.drain(config.drainMs)
      const remaining = Math.max(config.drainMs - (Date.now() - started), MIN_CLOSE_MS)
      await settlesWithin(reporter.settle(), remaining)

      const unsent = await transport.close(Math.max(config.drainMs - (Date.now() - started), MIN_CLOSE_MS))
      await settlesWithin(transportRun, MIN_CLOSE_MS)
      await settlesWithin(pipelineRun, MIN_CLOSE_MS)

      const unreported = [...new Set([...reporter.abandon(), ...unsent])]
      if (unreported.length > 0) {
        bus.emit('attempt:unreported', unreported)
      }
      view.stop()

      if (unreported.length > 0) {
        write(kleur.yellow(formatUnreportedSummary(unreported)))
      }
      if (summary.forced.length > 0 || summary.rejected.length > 0) {
        console.warn(`[Supervisor] Drain ended with ${summary.forced.length} cancelled and ${summary.rejected.length} unstarted attempt(s)`)
      }

      if (failure) {
        write(kleur.red(`ERROR: ${failure.message}`))
        if (failure.hint) write(failure.hint)
        return failure.exitCode
      }
      return summary.clean && unreported.length === 0 ? 0 : 1
    } finally {
      view.stop()
    }
  } finally {
    options.signal?.removeEventListener('abort', onExternalAbort)
    if (handleSignals) {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
    }
  }
}

/**
 * Run the transport, opening a fresh session each time it asks for
 * re-authentication. Resolves with the error that ended it, if any.
 */
async function keepConnected(
  transport: TunnelTransport,
  bootstrapper: SessionBootstrapper,
  initial: Session,
  signal: AbortSignal,
): Promise<ListenError | undefined> {
  let session = initial
  let renewals = 0
  const unsubscribe = transport.on('status', status => {
    if (status.state === 'open') renewals = 0
  })

  try {
    while (!signal.aborted) {
      const failure = await runOnce()
      if (failure !== 'renewed') return failure
    }
    return undefined
  } finally {
    unsubscribe()
  }

  async function runOnce(): Promise<ListenError | undefined | 'renewed'> {
    try {
      await transport.run(signal)
      return undefined
    } catch (err) {
      if (!(err instanceof ReauthRequiredError)) {
        console.error(`[Supervisor] Transport failed: ${describeError(err)}`)
        return err instanceof ListenError ? err : new ListenError(describeError(err), 1)
      }
      if (renewals >= MAX_RENEWALS) {
        return err
      }
      renewals++
      console.warn(`[Supervisor] ${err.message}, opening a new session (${renewals}/${MAX_RENEWALS})`)

      try {
        session = await bootstrapper.renew(session)
      } catch (renewErr) {
        if (signal.aborted) return undefined
        return renewErr instanceof ListenError ? renewErr : new ReauthRequiredError(describeError(renewErr))
      }
      transport.setSession(session)
      return 'renewed'
    }
  }
}
