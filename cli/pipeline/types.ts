import type { AttemptResult, HeaderList } from '../../shared/types.js'

/**
 * Sink: final destination for a local response
 */
export interface StreamSink {
  name: string

  /**
   * Receive status and headers, in the order the local server sent them
   */
  writeHead(statusCode: number, headers: HeaderList): void

  /**
   * Receive a data chunk
   */
  write(chunk: Buffer): void

  /**
   * Signal end of response
   */
  end(): void
}

/**
 * Options for one local dispatch
 */
export interface DispatchOptions {
  /** Per-attempt deadline, from dispatch until the body is fully read */
  timeoutMs: number
  /** Response bytes kept; the rest is read and discarded */
  maxBodyBytes: number
  /** Path and query for the request line as given; defaults to the URL's */
  requestPath?: string
  /** Accept self-signed certificates on https targets */
  insecure?: boolean
  /** Aborting finalizes the attempt as timeout with reason `shutdown` */
  signal?: AbortSignal
  sourceName?: string
  verbose?: boolean
}

/**
 * Where finalized results go. Resolves once the result is queued for the
 * remote (or submitted through the fallback path).
 */
export interface ResultReporter {
  report(result: AttemptResult): Promise<void>
}
