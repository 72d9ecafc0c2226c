import { WebSocket, type RawData } from 'ws'
import type { AttemptResult, InboundAttempt, TransportState, TransportStatus } from '../../shared/types.js'
import { CLIENT_VERSION } from '../config.js'
import { ReauthRequiredError, describeError } from '../errors.js'
import { TypedEmitter } from '../events.js'
import { settlesWithin, sleep } from '../utils.js'
import { Backoff } from './backoff.js'
import {
  decodeFrame,
  encodeBye,
  encodeHello,
  encodePing,
  encodePong,
  encodeResult,
  type IncomingFrame,
} from './protocol.js'
import { BoundedQueue } from './queue.js'
import { FragmentReassembler } from './reassembler.js'

const DEFAULT_HEARTBEAT_MS = 30_000
const MISSED_PONGS_LIMIT = 2
const REAUTH_ERRORS = new Set(['session_expired', 'unauthorized', 'invalid_token'])
const REAUTH_CLOSE_CODES = new Set([4001, 4003])

export interface TransportSession {
  id: string
  token: string
  endpoint: URL
  heartbeatIntervalMs?: number
}

export interface TransportOptions {
  session: TransportSession
  /** Channel the pipeline consumes; pushing past capacity pauses the socket */
  inbound: BoundedQueue<InboundAttempt>
  outboundCapacity?: number
  /** How long `send` waits for room in the outbound queue */
  sendTimeoutMs?: number
  welcomeTimeoutMs?: number
  heartbeatIntervalMs?: number
  /** Deadline for a server-initiated drain */
  drainDeadlineMs?: number
  backoff?: Backoff
  /** Resolves once the pipeline has nothing queued or in flight */
  whenIdle?: () => Promise<void>
  clientVersion?: string
  verbose?: boolean
}

export type TransportEvents = {
  'status': [TransportStatus]
  /** WELCOME confirmed a different session id than the one dialed with */
  'session-changed': [string]
  'notice': [string]
}

interface OutboundFrame {
  attemptId: string
  payload: string
}

interface Epoch {
  ws: WebSocket
  controller: AbortController
  welcomeTimer?: NodeJS.Timeout
  heartbeatTimer?: NodeJS.Timeout
}

/**
 * Owns the websocket to the remote dispatcher. Reconnects with backoff,
 * keeps the heartbeat, reassembles attempts onto the inbound channel and
 * writes results from the outbound queue in enqueue order.
 */
export class TunnelTransport extends TypedEmitter<TransportEvents> {
  private session: TransportSession
  private inbound: BoundedQueue<InboundAttempt>
  private outbound: BoundedQueue<OutboundFrame>
  private backoff: Backoff
  private reassembler = new FragmentReassembler()
  private sendTimeoutMs: number
  private welcomeTimeoutMs: number
  private defaultHeartbeatMs: number
  private drainDeadlineMs: number
  private whenIdle?: () => Promise<void>
  private clientVersion: string
  private verbose: boolean

  private epoch?: Epoch
  private state: TransportState = 'closed'
  private lastStatus: TransportStatus = { state: 'closed', consecutiveFailures: 0 }
  private stopController = new AbortController()
  private unsubscribeSpace: () => void

  private closing = false
  private draining = false
  private paused = false
  private writing = false
  private reauthReason?: string

  private pingSeq = 0
  private unacked = 0
  private lastHeartbeatSent?: number
  private lastHeartbeatAcked?: number

  constructor(options: TransportOptions) {
    super()
    this.session = options.session
    this.inbound = options.inbound
    this.outbound = new BoundedQueue<OutboundFrame>(options.outboundCapacity ?? 256)
    this.backoff = options.backoff ?? new Backoff()
    this.sendTimeoutMs = options.sendTimeoutMs ?? 2_000
    this.welcomeTimeoutMs = options.welcomeTimeoutMs ?? 10_000
    this.defaultHeartbeatMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_MS
    this.drainDeadlineMs = options.drainDeadlineMs ?? 10_000
    this.whenIdle = options.whenIdle
    this.clientVersion = options.clientVersion ?? CLIENT_VERSION
    this.verbose = options.verbose ?? false
    this.unsubscribeSpace = this.inbound.onSpace(() => this.resumeReading())
  }

  get status(): TransportStatus {
    return this.lastStatus
  }

  get sessionId(): string {
    return this.session.id
  }

  /** True while results can be written to the socket */
  get isOpen(): boolean {
    return (this.state === 'open' || this.state === 'draining') && this.epoch?.ws.readyState === WebSocket.OPEN
  }

  get pendingResults(): number {
    return this.outbound.size
  }

  /** Swap in a renewed session; takes effect on the next dial. */
  setSession(session: TransportSession): void {
    this.session = session
  }

  /**
   * Keep a socket open until `signal` aborts and `close()` is called, or
   * until the session needs re-authentication (rejects with
   * ReauthRequiredError).
   */
  async run(signal: AbortSignal): Promise<void> {
    const onAbort = () => this.beginDrain()
    signal.addEventListener('abort', onAbort, { once: true })
    this.reauthReason = undefined

    try {
      while (!this.closing && !signal.aborted) {
        await this.connectOnce()

        if (this.reauthReason) {
          const reason = this.reauthReason
          this.reauthReason = undefined
          this.setState('closed', { reauthenticating: true })
          throw new ReauthRequiredError(`Session expired (${reason})`)
        }
        if (this.closing || signal.aborted) break

        this.backoff.markClosed()
        const delay = this.backoff.next()
        if (this.verbose) {
          console.log(`[Transport] Reconnecting in ${delay}ms (attempt ${this.backoff.failures})`)
        }
        this.setState('closed', { reconnectInMs: delay })
        try {
          await sleep(delay, this.stopController.signal)
        } catch {
          break
        }
      }
    } finally {
      signal.removeEventListener('abort', onAbort)
    }
  }

  /**
   * Queue a result frame. Waits briefly for room, then fails with
   * OverloadedError. Frames survive reconnects.
   */
  send(result: AttemptResult, timeoutMs = this.sendTimeoutMs): Promise<void> {
    return this.outbound.send({ attemptId: result.attemptId, payload: encodeResult(result) }, timeoutMs)
  }

  /** Stop taking new attempts; the socket stays up so results can still go out. */
  beginDrain(): void {
    if (this.draining) return
    this.draining = true
    if (this.epoch && (this.state === 'open' || this.state === 'connecting')) {
      this.pauseReading()
      if (this.state === 'open') this.setState('draining')
    } else {
      this.stopController.abort()
    }
  }

  /**
   * Flush queued results (bounded by `deadlineMs`), say BYE and close.
   * Returns the ids of results that never left the process.
   */
  async close(deadlineMs: number): Promise<string[]> {
    this.closing = true
    this.draining = true
    const deadline = Date.now() + deadlineMs
    const epoch = this.epoch

    if (epoch && this.isOpen) {
      const flushed = await this.flush(deadline)
      if (!flushed) {
        console.warn(`[Transport] ${this.outbound.size} result(s) still queued at close`)
      }
      try {
        await sendFrame(epoch.ws, encodeBye('shutdown'))
      } catch (err) {
        console.warn(`[Transport] Could not send bye: ${describeError(err)}`)
      }
      epoch.ws.close(1000, 'bye')
      // The close handshake needs the reader running again.
      epoch.ws.resume()
      if (!(await settlesWithin(waitForClose(epoch.ws), Math.max(deadline - Date.now(), 200)))) {
        epoch.ws.terminate()
      }
    } else if (epoch) {
      epoch.ws.terminate()
    }

    this.stopController.abort()
    this.unsubscribeSpace()
    this.setState('closed')
    return this.outbound.drainAll().map(frame => frame.attemptId)
  }

  // ============ Connection epoch ============

  private connectOnce(): Promise<void> {
    return new Promise(resolve => {
      this.setState('connecting')
      this.paused = false
      this.unacked = 0

      const ws = new WebSocket(this.session.endpoint, {
        headers: {
          'Authorization': `Bearer ${this.session.token}`,
          'X-Session-Id': this.session.id,
        },
        handshakeTimeout: this.welcomeTimeoutMs,
      })
      const epoch: Epoch = { ws, controller: new AbortController() }
      this.epoch = epoch

      ws.on('open', () => {
        if (this.verbose) {
          console.log(`[Transport] Connected to ${this.session.endpoint.origin}, sending hello`)
        }
        sendFrame(ws, encodeHello(this.session.id, this.session.token, this.clientVersion)).catch(err => {
          console.warn(`[Transport] Failed to send hello: ${describeError(err)}`)
        })
        epoch.welcomeTimer = setTimeout(() => {
          console.warn(`[Transport] No welcome within ${this.welcomeTimeoutMs}ms, reconnecting`)
          ws.terminate()
        }, this.welcomeTimeoutMs)
      })

      ws.on('message', (data, isBinary) => {
        if (isBinary) {
          if (this.verbose) console.log('[Transport] Ignoring binary frame')
          return
        }
        let frame: IncomingFrame
        try {
          frame = decodeFrame(rawDataToString(data))
        } catch (err) {
          console.warn(`[Transport] Dropping frame: ${describeError(err)}`)
          return
        }
        this.handleFrame(epoch, frame)
      })

      ws.on('error', err => {
        const status = /Unexpected server response: (\d+)/.exec(err.message)
        if (status && (status[1] === '401' || status[1] === '403')) {
          this.reauthReason = 'unauthorized'
        }
        if (this.verbose) {
          console.warn(`[Transport] Socket error: ${err.message}`)
        }
      })

      ws.on('close', (code, reason) => {
        clearTimeout(epoch.welcomeTimer)
        clearInterval(epoch.heartbeatTimer)
        epoch.controller.abort()
        if (REAUTH_CLOSE_CODES.has(code)) {
          this.reauthReason ??= `close code ${code}`
        }
        if (this.verbose) {
          console.log(`[Transport] Socket closed (${code}${reason.length > 0 ? ` ${reason.toString()}` : ''})`)
        }
        if (this.epoch === epoch) this.epoch = undefined
        resolve()
      })
    })
  }

  private handleFrame(epoch: Epoch, frame: IncomingFrame): void {
    const { ws } = epoch

    switch (frame.type) {
      case 'welcome':
        clearTimeout(epoch.welcomeTimer)
        this.handleWelcome(epoch, frame)
        break

      case 'ping':
        sendFrame(ws, encodePong(frame.token)).catch(err => {
          console.warn(`[Transport] Failed to send pong: ${describeError(err)}`)
        })
        break

      case 'pong':
        if (frame.token === this.pingSeq) {
          this.unacked = 0
          this.lastHeartbeatAcked = Date.now()
          this.emitStatus()
        }
        break

      case 'attempt': {
        let attempt: InboundAttempt | undefined
        try {
          attempt = this.reassembler.accept(frame.attempt, frame.fragment)
        } catch (err) {
          console.warn(`[Transport] Dropping fragment: ${describeError(err)}`)
          return
        }
        if (!attempt) return
        if (this.closing) {
          if (this.verbose) console.log(`[Transport] Closing, attempt ${attempt.attemptId} left for redelivery`)
          return
        }
        if (this.inbound.isClosed) {
          console.warn(`[Transport] Pipeline closed, attempt ${attempt.attemptId} left for redelivery`)
          return
        }
        if (!this.inbound.push(attempt)) {
          this.pauseReading()
        }
        break
      }

      case 'control':
        if (frame.control === 'drain') {
          this.serverDrain(epoch).catch(err => {
            console.error(`[Transport] Drain failed: ${describeError(err)}`)
            ws.terminate()
          })
        } else if (frame.control === 'session_revoked') {
          this.reauthReason = 'session_revoked'
          ws.close(1000, 'revoked')
        } else {
          this.emit('notice', frame.message ?? `Server notice: ${frame.control}`)
        }
        break

      case 'bye':
        console.log(`[Transport] Server closed the session${frame.reason ? `: ${frame.reason}` : ''}`)
        if (frame.reason && REAUTH_ERRORS.has(frame.reason)) {
          this.reauthReason = frame.reason
        }
        ws.close(1000)
        break

      case 'unknown':
        if (this.verbose) {
          console.log(`[Transport] Ignoring unknown frame "${frame.event}"`)
        }
        break
    }
  }

  private handleWelcome(epoch: Epoch, frame: Extract<IncomingFrame, { type: 'welcome' }>): void {
    const { ws } = epoch

    if (frame.error) {
      if (REAUTH_ERRORS.has(frame.error)) {
        this.reauthReason = frame.error
      } else {
        console.warn(`[Transport] Session rejected: ${frame.error}`)
      }
      ws.close(1000)
      return
    }

    if (frame.sessionId && frame.sessionId !== this.session.id) {
      console.log(`[Transport] Session changed to ${frame.sessionId}`)
      this.session = { ...this.session, id: frame.sessionId }
      this.emit('session-changed', frame.sessionId)
    }

    const interval = frame.heartbeatIntervalMs ?? this.session.heartbeatIntervalMs ?? this.defaultHeartbeatMs
    epoch.heartbeatTimer = setInterval(() => this.heartbeat(ws), interval)

    this.backoff.markOpen()
    if (this.draining) {
      this.pauseReading()
      this.setState('draining')
    } else {
      this.setState('open')
    }
    if (frame.notice) {
      this.emit('notice', frame.notice)
    }

    this.writeLoop(ws, epoch.controller.signal).catch(err => {
      console.error(`[Transport] Writer stopped: ${describeError(err)}`)
      ws.terminate()
    })
  }

  private heartbeat(ws: WebSocket): void {
    this.reassembler.prune()
    // A paused socket cannot read pongs.
    if (this.paused) return

    if (this.unacked >= MISSED_PONGS_LIMIT) {
      console.warn(`[Transport] No pong for ${MISSED_PONGS_LIMIT} heartbeats, reconnecting`)
      ws.terminate()
      return
    }

    this.pingSeq++
    this.unacked++
    this.lastHeartbeatSent = Date.now()
    sendFrame(ws, encodePing(this.pingSeq)).catch(err => {
      console.warn(`[Transport] Failed to send ping: ${describeError(err)}`)
    })
    this.emitStatus()
  }

  private async serverDrain(epoch: Epoch): Promise<void> {
    console.log('[Transport] Server requested drain')
    this.setState('draining')
    this.pauseReading()

    const deadline = Date.now() + this.drainDeadlineMs
    if (this.whenIdle) {
      await settlesWithin(this.whenIdle(), this.drainDeadlineMs)
    }
    await this.flush(deadline)
    if (epoch.ws.readyState === WebSocket.OPEN) {
      epoch.ws.close(1000, 'drain')
      epoch.ws.resume()
    }
  }

  // ============ Writer ============

  private async writeLoop(ws: WebSocket, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const frame = await this.outbound.take(signal)
      if (!frame) return

      if (ws.readyState !== WebSocket.OPEN) {
        this.outbound.unshift(frame)
        return
      }

      this.writing = true
      try {
        await sendFrame(ws, frame.payload)
      } catch (err) {
        this.outbound.unshift(frame)
        console.warn(`[Transport] Write failed, result ${frame.attemptId} kept for the next connection: ${describeError(err)}`)
        return
      } finally {
        this.writing = false
      }
    }
  }

  /** Wait until every queued result is written, the socket drops or the deadline passes. */
  private async flush(deadline: number): Promise<boolean> {
    while (this.outbound.size > 0 || this.writing) {
      if (Date.now() >= deadline || this.epoch?.ws.readyState !== WebSocket.OPEN) {
        return false
      }
      await sleep(10)
    }
    return true
  }

  // ============ Flow control ============

  private pauseReading(): void {
    if (this.paused || !this.epoch) return
    this.paused = true
    this.epoch.ws.pause()
    if (this.verbose) {
      console.log('[Transport] Paused reading')
    }
  }

  private resumeReading(): void {
    if (!this.paused || this.draining || this.state !== 'open' || !this.epoch) return
    this.paused = false
    this.epoch.ws.resume()
    if (this.verbose) {
      console.log('[Transport] Resumed reading')
    }
  }

  // ============ Status ============

  private setState(state: TransportState, extra: Partial<TransportStatus> = {}): void {
    this.state = state
    this.emitStatus(extra)
  }

  private emitStatus(extra: Partial<TransportStatus> = {}): void {
    this.lastStatus = {
      state: this.state,
      consecutiveFailures: this.backoff.failures,
      lastHeartbeatSent: this.lastHeartbeatSent,
      lastHeartbeatAcked: this.lastHeartbeatAcked,
      ...extra,
    }
    this.emit('status', this.lastStatus)
  }
}

function sendFrame(ws: WebSocket, payload: string): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.send(payload, err => (err ? reject(err) : resolve()))
  })
}

function waitForClose(ws: WebSocket): Promise<void> {
  if (ws.readyState === WebSocket.CLOSED) return Promise.resolve()
  return new Promise(resolve => ws.once('close', () => resolve()))
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8')
  return Buffer.from(data).toString('utf-8')
}
