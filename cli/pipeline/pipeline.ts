import type { AttemptResult, ErrorClass, InboundAttempt, Route } from '../../shared/types.js'
import type { ListenEventBus } from '../events.js'
import { describeError } from '../errors.js'
import { localRequestPath, resolveLocalUrl, type RouteTable } from '../routes/route-table.js'
import type { BoundedQueue } from '../transport/queue.js'
import { sleep } from '../utils.js'
import { SHUTDOWN_REASON, dispatchAttempt } from './dispatch.js'
import type { ResultReporter } from './types.js'

export const UNKNOWN_ROUTE_REASON = 'unknown route'

/** Grace given to aborted dispatches before a result is synthesized */
const ABORT_GRACE_MS = 500

export interface DeliveryPipelineOptions {
  inbound: BoundedQueue<InboundAttempt>
  routes: RouteTable
  reporter: ResultReporter
  bus?: ListenEventBus
  concurrency?: number
  timeoutMs?: number
  maxBodyBytes?: number
  insecure?: boolean
  verbose?: boolean
}

export interface DrainSummary {
  /** Everything in flight finalized before the deadline */
  clean: boolean
  /** Attempts finalized as timeout/shutdown because the deadline hit */
  forced: string[]
  /** Attempts still queued when the deadline hit */
  rejected: string[]
}

interface InFlight {
  attempt: InboundAttempt
  route: Route
  url: URL
  controller: AbortController
  startedAt: number
}

/**
 * Worker pool between the transport's inbound channel and the local target.
 * Each attempt is dispatched once and finalized exactly once; results are
 * handed to the reporter in finalization order.
 */
export class DeliveryPipeline {
  private inbound: BoundedQueue<InboundAttempt>
  private routes: RouteTable
  private reporter: ResultReporter
  private bus?: ListenEventBus
  private concurrency: number
  private timeoutMs: number
  private maxBodyBytes: number
  private insecure: boolean
  private verbose: boolean

  private inFlight = new Map<string, InFlight>()
  private slotWaiters: Array<() => void> = []
  private idleWaiters: Array<() => void> = []
  private accepting = true
  private stopTaking = new AbortController()
  private unknownRoutes = 0

  constructor(options: DeliveryPipelineOptions) {
    this.inbound = options.inbound
    this.routes = options.routes
    this.reporter = options.reporter
    this.bus = options.bus
    this.concurrency = options.concurrency ?? 16
    this.timeoutMs = options.timeoutMs ?? 30_000
    this.maxBodyBytes = options.maxBodyBytes ?? 1024 * 1024
    this.insecure = options.insecure ?? false
    this.verbose = options.verbose ?? false
  }

  get inFlightCount(): number {
    return this.inFlight.size
  }

  get unknownRouteCount(): number {
    return this.unknownRoutes
  }

  get routeTable(): RouteTable {
    return this.routes
  }

  /** Swap the route table; attempts already in flight keep their route. */
  setRoutes(routes: RouteTable): void {
    this.routes = routes
    this.bus?.emit('routes:changed', routes.list())
  }

  /**
   * Take attempts off the inbound channel. Once draining starts, whatever is
   * already queued is still dispatched until the deadline.
   */
  async run(): Promise<void> {
    while (!this.stopTaking.signal.aborted) {
      await this.waitForSlot()
      if (this.stopTaking.signal.aborted) break
      if (!this.accepting && this.inbound.size === 0) break

      const attempt = await this.inbound.take(this.stopTaking.signal)
      if (!attempt) break
      this.start(attempt)
    }
  }

  /** Resolves when nothing is queued or in flight. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve()
    return new Promise(resolve => this.idleWaiters.push(resolve))
  }

  /**
   * Stop accepting attempts and give queued and in-flight ones until
   * `deadlineMs` to finish. Attempts still queued at the deadline, and
   * in-flight attempts still running, finalize as timeout/shutdown.
   */
  async drain(deadlineMs: number): Promise<DrainSummary> {
    this.accepting = false
    if (this.inbound.size === 0) this.stopTakingAttempts()

    const clean = await this.idleWithin(deadlineMs)
    this.stopTakingAttempts()

    const rejected: string[] = []
    const forced: string[] = []
    if (clean) return { clean, forced, rejected }

    for (const attempt of this.inbound.drainAll()) {
      rejected.push(attempt.attemptId)
      this.finalize(attempt, this.routes.lookup(attempt.connectionId), undefined, shutdownResult(attempt, 0))
    }

    for (const [attemptId, entry] of this.inFlight) {
      forced.push(attemptId)
      entry.controller.abort()
    }
    console.warn(`[Pipeline] Drain deadline reached, cancelling ${forced.length} attempt(s), ${rejected.length} never started`)

    if (!(await this.idleWithin(ABORT_GRACE_MS))) {
      for (const entry of [...this.inFlight.values()]) {
        this.finalize(entry.attempt, entry.route, entry.url, shutdownResult(entry.attempt, Date.now() - entry.startedAt), entry)
      }
    }

    return { clean, forced, rejected }
  }

  private stopTakingAttempts(): void {
    this.stopTaking.abort()
    this.releaseSlotWaiters()
  }

  private start(attempt: InboundAttempt): void {
    const route = this.routes.lookup(attempt.connectionId)
    if (!route) {
      this.unknownRoutes++
      console.warn(`[Pipeline] Attempt ${attempt.attemptId} names unknown connection ${attempt.connectionId}`)
      this.finalize(attempt, undefined, undefined, failureResult(attempt, 'local-nonhttp', UNKNOWN_ROUTE_REASON, 0))
      return
    }

    const url = resolveLocalUrl(route, attempt.path, attempt.query)
    const entry: InFlight = { attempt, route, url, controller: new AbortController(), startedAt: Date.now() }
    this.inFlight.set(attempt.attemptId, entry)
    this.bus?.emit('attempt:start', { attempt, route, url, startedAt: entry.startedAt })

    if (this.verbose) {
      console.log(`[Pipeline] ${attempt.method} ${url.href} (attempt ${attempt.attemptId})`)
    }

    dispatchAttempt(attempt, url, {
      timeoutMs: attempt.timeoutMs ?? this.timeoutMs,
      requestPath: localRequestPath(entry.route, attempt.path, attempt.query),
      maxBodyBytes: this.maxBodyBytes,
      insecure: this.insecure,
      signal: entry.controller.signal,
      sourceName: route.sourceName,
      verbose: this.verbose,
    })
      .catch((err: unknown) => failureResult(attempt, 'local-nonhttp', describeError(err), Date.now() - entry.startedAt))
      .then(result => this.finalize(attempt, route, url, result, entry))
      .catch(err => console.error(`[Pipeline] Finalizing ${attempt.attemptId} failed: ${describeError(err)}`))
  }

  /**
   * Hand a result on. `entry` is given for dispatched attempts; a second
   * finalization of the same entry is ignored.
   */
  private finalize(
    attempt: InboundAttempt,
    route: Route | undefined,
    url: URL | undefined,
    result: AttemptResult,
    entry?: InFlight,
  ): void {
    if (entry) {
      if (this.inFlight.get(attempt.attemptId) !== entry) return
      this.inFlight.delete(attempt.attemptId)
    }

    // Reporter queues synchronously, so call order is wire order.
    this.reporter.report(result).catch(err => {
      console.error(`[Pipeline] Reporting ${attempt.attemptId} failed: ${describeError(err)}`)
    })
    this.bus?.emit('attempt:finish', { attempt, result, route, url })

    this.releaseSlot()
    if (this.isIdle()) {
      const waiters = this.idleWaiters
      this.idleWaiters = []
      for (const resolve of waiters) resolve()
    }
  }

  private isIdle(): boolean {
    return this.inFlight.size === 0 && this.inbound.size === 0
  }

  private async idleWithin(ms: number): Promise<boolean> {
    if (this.isIdle()) return true
    const timeout = new AbortController()
    const idle = this.whenIdle().then(() => {
      timeout.abort()
      return true
    })
    const expired = sleep(ms, timeout.signal).then(() => false, () => true)
    return Promise.race([idle, expired])
  }

  // ============ Worker slots ============

  private waitForSlot(): Promise<void> {
    if (this.inFlight.size < this.concurrency) return Promise.resolve()
    return new Promise(resolve => this.slotWaiters.push(resolve))
  }

  private releaseSlot(): void {
    if (this.inFlight.size < this.concurrency) {
      this.slotWaiters.shift()?.()
    }
  }

  private releaseSlotWaiters(): void {
    const waiters = this.slotWaiters
    this.slotWaiters = []
    for (const resolve of waiters) resolve()
  }
}

function failureResult(attempt: InboundAttempt, errorClass: ErrorClass, message: string, durationMs: number): AttemptResult {
  return {
    attemptId: attempt.attemptId,
    connectionId: attempt.connectionId,
    headers: [],
    body: Buffer.alloc(0),
    truncated: false,
    errorClass,
    errorMessage: message,
    durationMs,
    finishedAt: new Date().toISOString(),
  }
}

function shutdownResult(attempt: InboundAttempt, durationMs: number): AttemptResult {
  return failureResult(attempt, 'timeout', SHUTDOWN_REASON, durationMs)
}
