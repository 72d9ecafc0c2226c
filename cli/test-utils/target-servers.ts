/**
 * Local targets the pipeline forwards to. Paths select the behaviour:
 *
 *   /status/<code>    respond with that status
 *   /slow?delay=<ms>  respond 200 after a delay
 *   /echo             respond with the request as JSON
 *   /gzip             gzip-encoded body
 *   /big?size=<n>     body of n bytes
 *   /reset            drop the connection without responding
 *   /partial          send headers and part of the body, then drop
 *   anything else     200 "ok"
 */
import http from 'http'
import https from 'https'
import net from 'net'
import { generateCert } from './certificates.js'
import { compress } from './compression.js'
import type { ReceivedRequest, ServerHandle } from './types.js'

export interface TargetServer extends ServerHandle {
  received: ReceivedRequest[]
}

export function handleTargetRequest(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  received: ReceivedRequest[],
): void {
  const chunks: Buffer[] = []

  req.on('data', (chunk: Buffer) => chunks.push(chunk))
  req.on('end', () => {
    const body = Buffer.concat(chunks)
    const url = new URL(req.url ?? '/', 'http://localhost')

    received.push({
      method: req.method ?? 'GET',
      url: req.url ?? '/',
      headers: req.headers,
      rawHeaders: req.rawHeaders,
      body,
    })

    const statusMatch = /^\/status\/(\d{3})$/.exec(url.pathname)
    if (statusMatch) {
      res.writeHead(parseInt(statusMatch[1], 10), { 'Content-Type': 'text/plain' })
      res.end(`status ${statusMatch[1]}`)
      return
    }

    switch (url.pathname) {
      case '/slow': {
        const delay = parseInt(url.searchParams.get('delay') ?? '500', 10)
        const timer = setTimeout(() => {
          res.writeHead(200, { 'Content-Type': 'text/plain' })
          res.end('slow')
        }, delay)
        res.on('close', () => clearTimeout(timer))
        return
      }
      case '/echo':
        res.writeHead(200, { 'Content-Type': 'application/json' })
        res.end(JSON.stringify({
          method: req.method,
          path: url.pathname,
          query: url.search,
          headers: req.headers,
          body: body.toString('utf-8'),
        }))
        return
      case '/gzip':
        res.writeHead(200, { 'Content-Type': 'text/plain', 'Content-Encoding': 'gzip' })
        res.end(compress('compressed payload', 'gzip'))
        return
      case '/big': {
        const size = parseInt(url.searchParams.get('size') ?? '1024', 10)
        res.writeHead(200, { 'Content-Type': 'application/octet-stream' })
        res.end(Buffer.alloc(size, 'a'))
        return
      }
      case '/reset':
        req.socket.destroy()
        return
      case '/partial':
        res.writeHead(200, { 'Content-Type': 'text/plain', 'Content-Length': '100' })
        res.write('0123456789', () => res.destroy())
        return
      default:
        res.writeHead(200, { 'Content-Type': 'text/plain' })
        res.end('ok')
    }
  })
}

function listen(server: http.Server | https.Server, protocol: 'http' | 'https', received: ReceivedRequest[]): Promise<TargetServer> {
  return new Promise((resolve, reject) => {
    server.on('error', reject)
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      if (address === null || typeof address === 'string') {
        reject(new Error('Target server has no port'))
        return
      }
      resolve({
        port: address.port,
        url: `${protocol}://127.0.0.1:${address.port}`,
        received,
        close: () => new Promise<void>(done => {
          server.closeAllConnections()
          server.close(() => done())
        }),
      })
    })
  })
}

export function createHttpTargetServer(): Promise<TargetServer> {
  const received: ReceivedRequest[] = []
  return listen(http.createServer((req, res) => handleTargetRequest(req, res, received)), 'http', received)
}

export function createHttpsTargetServer(): Promise<TargetServer> {
  const received: ReceivedRequest[] = []
  const { key, cert } = generateCert()
  return listen(https.createServer({ key, cert }, (req, res) => handleTargetRequest(req, res, received)), 'https', received)
}

/**
 * Accepts TCP connections and answers with bytes that are not HTTP.
 */
export function createGarbageServer(): Promise<ServerHandle> {
  const sockets = new Set<net.Socket>()
  const server = net.createServer(socket => {
    sockets.add(socket)
    socket.on('close', () => sockets.delete(socket))
    socket.on('error', () => socket.destroy())
    socket.once('data', () => socket.end('NOT-HTTP garbage\r\n\r\n'))
  })

  return new Promise((resolve, reject) => {
    server.on('error', reject)
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      if (address === null || typeof address === 'string') {
        reject(new Error('Garbage server has no port'))
        return
      }
      resolve({
        port: address.port,
        url: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>(done => {
          for (const socket of sockets) socket.destroy()
          server.close(() => done())
        }),
      })
    })
  })
}

/**
 * A port nothing listens on.
 */
export function findClosedPort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer()
    server.on('error', reject)
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      if (address === null || typeof address === 'string') {
        reject(new Error('No port assigned'))
        return
      }
      const port = address.port
      server.close(() => resolve(port))
    })
  })
}
