import net from 'net'
import tls from 'tls'
import { describeError } from './errors.js'

export interface HealthCheckResult {
  healthy: boolean
  url: URL
  durationMs: number
  error?: string
}

function defaultPort(url: URL): number {
  if (url.port) return parseInt(url.port, 10)
  return url.protocol === 'https:' ? 443 : 80
}

/**
 * Open (and immediately close) a TCP connection to the forwarding target,
 * with a TLS handshake for https targets. Never throws.
 */
export function checkLocalTarget(url: URL, timeoutMs = 3_000, insecure = false): Promise<HealthCheckResult> {
  const start = Date.now()
  const host = url.hostname.replace(/^\[|\]$/g, '')
  const port = defaultPort(url)

  return new Promise(resolve => {
    let done = false
    const finish = (error?: unknown) => {
      if (done) return
      done = true
      clearTimeout(timer)
      socket.destroy()
      resolve({
        healthy: error === undefined,
        url,
        durationMs: Date.now() - start,
        error: error === undefined ? undefined : describeError(error),
      })
    }

    const socket = url.protocol === 'https:'
      ? tls.connect({ host, port, servername: net.isIP(host) ? undefined : host, rejectUnauthorized: !insecure }, () => finish())
      : net.connect({ host, port }, () => finish())

    socket.on('error', err => finish(err))
    const timer = setTimeout(() => finish(new Error(`No connection within ${timeoutMs}ms`)), timeoutMs)
  })
}

export function formatHealthMessage(result: HealthCheckResult): string {
  const target = `${result.url.protocol}//${result.url.host}`
  if (result.healthy) {
    return `→ Local server is reachable at ${target}`
  }
  return `● Warning: cannot connect to ${target} (${result.error ?? 'unknown error'}). Events will fail until the local server is running.`
}
