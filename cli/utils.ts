import zlib from 'zlib'
import { setTimeout as delay } from 'timers/promises'
import { decompress as zstdDecompress } from 'fzstd'

export function generateId(): string {
  return Math.random().toString(36).substring(2, 9)
}

/**
 * Resolve after `ms`, or reject with the signal's reason when aborted first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal })
}

/** True when `promise` settles (either way) before `ms` elapses. */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), ms)
  })
  try {
    return await Promise.race([promise.then(() => true, () => true), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Lowercase, dash-separated name accepted by the control plane for sources
 * and connections.
 */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`
}

/**
 * Decode a response body for display. Compressed bodies are inflated;
 * anything that fails to decompress is shown as-is.
 */
export function decompressBody(body: Buffer, encoding: string | undefined): string {
  if (!encoding) {
    return body.toString('utf-8')
  }

  try {
    if (encoding === 'gzip') {
      return zlib.gunzipSync(body).toString('utf-8')
    } else if (encoding === 'deflate') {
      return zlib.inflateSync(body).toString('utf-8')
    } else if (encoding === 'br') {
      return zlib.brotliDecompressSync(body).toString('utf-8')
    } else if (encoding === 'zstd') {
      return Buffer.from(zstdDecompress(new Uint8Array(body))).toString('utf-8')
    }
  } catch (err) {
    console.error('[Preview] Decompression error:', err instanceof Error ? err.message : err)
  }

  return body.toString('utf-8')
}
