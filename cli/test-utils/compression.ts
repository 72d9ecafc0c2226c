/**
 * Encoded response bodies for decompression tests
 */
import { brotliCompressSync, deflateSync, gzipSync } from 'zlib'

export type Compression = 'none' | 'gzip' | 'deflate' | 'br'

export function compress(data: Buffer | string, compression: Compression): Buffer {
  const input = typeof data === 'string' ? Buffer.from(data) : data
  switch (compression) {
    case 'gzip': return gzipSync(input)
    case 'deflate': return deflateSync(input)
    case 'br': return brotliCompressSync(input)
    case 'none': return input
  }
}
