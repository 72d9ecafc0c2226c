import type { HeaderList } from '../../../shared/types.js'
import type { StreamSink } from '../types.js'

/**
 * Buffer sink that keeps the first `maxBytes` of a response body. Bytes past
 * the cap are counted and dropped so the upstream can still be read to the
 * end.
 */
export class CaptureSink implements StreamSink {
  name = 'capture'
  private chunks: Buffer[] = []
  private captured = 0
  private received = 0
  private _statusCode = 0
  private _headers: HeaderList = []
  private ended = false
  private maxBytes: number

  constructor(maxBytes: number) {
    this.maxBytes = maxBytes
  }

  writeHead(statusCode: number, headers: HeaderList): void {
    this._statusCode = statusCode
    this._headers = [...headers]
  }

  write(chunk: Buffer): void {
    this.received += chunk.length
    const room = this.maxBytes - this.captured
    if (room <= 0) return

    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk
    this.chunks.push(kept)
    this.captured += kept.length
  }

  end(): void {
    this.ended = true
  }

  /**
   * Get the captured response body
   */
  get body(): Buffer {
    return Buffer.concat(this.chunks, this.captured)
  }

  get truncated(): boolean {
    return this.received > this.captured
  }

  /** Total body bytes seen, including the ones past the cap */
  get receivedBytes(): number {
    return this.received
  }

  get statusCode(): number {
    return this._statusCode
  }

  get headers(): HeaderList {
    return this._headers
  }

  get complete(): boolean {
    return this.ended
  }
}
