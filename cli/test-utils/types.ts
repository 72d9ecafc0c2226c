/**
 * Shared shapes for the in-process servers tests run against
 */
import type http from 'http'

export interface ReceivedRequest {
  method: string
  url: string
  headers: http.IncomingHttpHeaders
  /** Header names and values exactly as received, flattened */
  rawHeaders: string[]
  body: Buffer
}

export interface ServerHandle {
  port: number
  url: string
  close: () => Promise<void>
}
