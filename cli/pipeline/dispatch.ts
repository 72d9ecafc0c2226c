import http from 'http'
import https from 'https'
import type { Socket } from 'net'
import type { AttemptResult, ErrorClass, InboundAttempt } from '../../shared/types.js'
import { describeError } from '../errors.js'
import { buildForwardHeaders, responseHeaderList, toRawHeaders } from './headers.js'
import { CaptureSink } from './sinks/capture-sink.js'
import type { DispatchOptions } from './types.js'

export const SHUTDOWN_REASON = 'shutdown'

class DeadlineExceeded extends Error {
  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`)
    this.name = 'DeadlineExceeded'
  }
}

/**
 * Replay one attempt against the local target and describe the outcome.
 * Never rejects: failures come back as a result with an error class.
 */
export function dispatchAttempt(
  attempt: InboundAttempt,
  url: URL,
  options: DispatchOptions,
): Promise<AttemptResult> {
  return new Promise<AttemptResult>(resolve => {
    const startTime = performance.now()
    const sink = new CaptureSink(options.maxBodyBytes)
    const controller = new AbortController()
    let connected = false
    let responded = false
    let settled = false

    const timer = setTimeout(() => controller.abort(new DeadlineExceeded(options.timeoutMs)), options.timeoutMs)
    const onShutdown = () => controller.abort(new Error(SHUTDOWN_REASON))
    if (options.signal?.aborted) {
      onShutdown()
    } else {
      options.signal?.addEventListener('abort', onShutdown, { once: true })
    }

    const finish = (failure?: { errorClass: ErrorClass; message: string }) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      options.signal?.removeEventListener('abort', onShutdown)

      const result: AttemptResult = {
        attemptId: attempt.attemptId,
        connectionId: attempt.connectionId,
        status: responded ? sink.statusCode : undefined,
        headers: sink.headers,
        body: sink.body,
        truncated: sink.truncated,
        errorClass: failure?.errorClass,
        errorMessage: failure?.message,
        durationMs: performance.now() - startTime,
        finishedAt: new Date().toISOString(),
      }

      if (options.verbose) {
        const outcome = failure ? `${failure.errorClass} (${failure.message})` : `${result.status}`
        console.log(`[Dispatch] ${attempt.method} ${url.href} → ${outcome} in ${result.durationMs.toFixed(1)}ms`)
      }
      resolve(result)
    }

    const fail = (err: unknown) => {
      if (controller.signal.aborted) {
        const reason: unknown = controller.signal.reason
        finish({
          errorClass: 'timeout',
          message: reason instanceof DeadlineExceeded ? reason.message : SHUTDOWN_REASON,
        })
      } else if (responded) {
        finish({ errorClass: 'read', message: describeError(err) })
      } else if (!connected) {
        finish({ errorClass: 'connect', message: describeError(err) })
      } else {
        finish({ errorClass: 'local-nonhttp', message: describeError(err) })
      }
    }

    const isHttps = url.protocol === 'https:'
    const headers = buildForwardHeaders(attempt.headers, {
      host: url.host,
      sourceName: options.sourceName ?? '',
      attemptId: attempt.attemptId,
      bodyLength: attempt.body.length,
    })

    let req: http.ClientRequest
    try {
      const requestOptions: https.RequestOptions = {
        method: attempt.method,
        headers: toRawHeaders(headers),
        signal: controller.signal,
        agent: false,
      }
      if (options.requestPath) {
        requestOptions.path = options.requestPath
      }
      if (isHttps) {
        requestOptions.rejectUnauthorized = !options.insecure
      }
      req = (isHttps ? https : http).request(url, requestOptions)
    } catch (err) {
      // Invalid method or header characters: nothing was sent
      finish({ errorClass: 'local-nonhttp', message: describeError(err) })
      return
    }

    req.on('socket', (socket: Socket) => {
      socket.once(isHttps ? 'secureConnect' : 'connect', () => {
        connected = true
      })
    })

    req.on('response', (res: http.IncomingMessage) => {
      responded = true
      sink.writeHead(res.statusCode ?? 0, responseHeaderList(res.rawHeaders))

      res.on('data', (chunk: Buffer) => sink.write(chunk))
      res.on('end', () => {
        sink.end()
        finish()
      })
      res.on('error', fail)
      res.on('close', () => {
        if (!res.complete) fail(new Error('Response closed before the body was complete'))
      })
    })

    req.on('error', fail)
    req.end(attempt.body)
  })
}
