import type { AttemptResult } from '../../shared/types.js'
import type { ControlPlaneClient } from '../api/client.js'
import { OverloadedError, describeError } from '../errors.js'
import { toResultInput } from '../transport/protocol.js'
import type { ResultReporter } from './types.js'

/** The part of the transport the reporter writes through */
export interface ResultChannel {
  readonly isOpen: boolean
  readonly sessionId: string
  send(result: AttemptResult, timeoutMs?: number): Promise<void>
}

export interface TransportReporterOptions {
  channel: ResultChannel
  /** Fallback used while the socket is down */
  client?: Pick<ControlPlaneClient, 'submitAttemptResult'>
  /** Wait for room when queueing for the next connection */
  queueTimeoutMs?: number
  verbose?: boolean
}

/**
 * Sends results over the socket when it is open, through the control plane
 * otherwise, and queues them for the next connection when both fail.
 * Results that cannot go anywhere are remembered as unreported.
 */
export class TransportReporter implements ResultReporter {
  private channel: ResultChannel
  private client?: Pick<ControlPlaneClient, 'submitAttemptResult'>
  private queueTimeoutMs: number
  private verbose: boolean
  private pending = new Map<string, Promise<void>>()
  private failed: string[] = []
  private abandoned = new AbortController()

  constructor(options: TransportReporterOptions) {
    this.channel = options.channel
    this.client = options.client
    this.queueTimeoutMs = options.queueTimeoutMs ?? 5_000
    this.verbose = options.verbose ?? false
  }

  /** Ids of results that could not be queued or submitted */
  get unreported(): string[] {
    return [...this.failed]
  }

  /** Ids of results whose report is still in progress */
  get pendingIds(): string[] {
    return [...this.pending.keys()]
  }

  report(result: AttemptResult): Promise<void> {
    const task: Promise<void> = this.deliver(result)
      .catch(err => {
        if (this.abandoned.signal.aborted) return
        console.error(`[Reporter] Result ${result.attemptId} not reported: ${describeError(err)}`)
        this.failed.push(result.attemptId)
      })
      .finally(() => {
        if (this.pending.get(result.attemptId) === task) this.pending.delete(result.attemptId)
      })
    this.pending.set(result.attemptId, task)
    return task
  }

  /** Wait for every report that is still in progress. */
  async settle(): Promise<void> {
    await Promise.all([...this.pending.values()])
  }

  /**
   * Give up on reports still in progress: cancel their API submissions and
   * count them as unreported. Returns every unreported id.
   */
  abandon(): string[] {
    const stranded = this.pendingIds
    if (stranded.length > 0) {
      console.warn(`[Reporter] Abandoning ${stranded.length} result(s) still being reported`)
    }
    this.abandoned.abort()
    for (const attemptId of stranded) {
      if (!this.failed.includes(attemptId)) this.failed.push(attemptId)
    }
    return this.unreported
  }

  private async deliver(result: AttemptResult): Promise<void> {
    if (this.channel.isOpen) {
      try {
        await this.channel.send(result)
        return
      } catch (err) {
        if (!(err instanceof OverloadedError)) throw err
        console.warn(`[Reporter] Outbound queue full, submitting ${result.attemptId} through the API`)
      }
    }

    if (this.client) {
      try {
        await this.client.submitAttemptResult(
          this.channel.sessionId,
          result.attemptId,
          toResultInput(result),
          this.abandoned.signal,
        )
        if (this.verbose) {
          console.log(`[Reporter] Submitted ${result.attemptId} through the API`)
        }
        return
      } catch (err) {
        if (this.abandoned.signal.aborted) throw err
        console.warn(`[Reporter] API submission of ${result.attemptId} failed, queueing: ${describeError(err)}`)
      }
    }

    await this.channel.send(result, this.queueTimeoutMs)
  }
}
