import { ValidationError } from '../errors.js'

const PATH_PATTERN = /^\/+[A-Za-z0-9\-_%.~!$&'()*+,;=:@/]*$/

const MAX_SOURCES = 10

/**
 * Parse the forwarding target: a bare port means http://localhost:<port>/,
 * anything else must be an absolute http(s) URL with a host and no query.
 */
export function parseForwardTarget(input: string): URL {
  const value = input.trim()

  if (/^\d+$/.test(value)) {
    const port = parseInt(value, 10)
    if (port < 1 || port > 65535) {
      throw new ValidationError(`Port ${value} is out of range (1-65535)`)
    }
    return new URL(`http://localhost:${port}/`)
  }

  let url: URL
  try {
    url = new URL(value)
  } catch {
    throw new ValidationError(`Invalid forwarding target "${input}"`, 'Pass a port (e.g. 3000) or a URL (e.g. http://localhost:3000/webhooks)')
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(`Unsupported protocol "${url.protocol}" in forwarding target`)
  }
  if (!url.hostname) {
    throw new ValidationError(`Forwarding URL "${input}" has no host`)
  }
  if (url.search !== '' || value.includes('?')) {
    throw new ValidationError(`Forwarding URL "${input}" must not contain a query string`)
  }
  url.hash = ''
  return url
}

export function isPath(value: string): boolean {
  return PATH_PATTERN.test(value)
}

/**
 * Split a source query into aliases: `*`, a single name, or a comma- or
 * space-separated list.
 */
export function parseSourceQuery(query: string | undefined): string[] {
  if (!query || query.trim() === '') return []

  const separator = query.includes(',') ? ',' : ' '
  const aliases = query.split(separator).map(alias => alias.trim()).filter(alias => alias !== '')

  if (aliases.length > MAX_SOURCES) {
    throw new ValidationError(`max ${MAX_SOURCES} sources supported`)
  }
  return aliases
}

/**
 * Join URL path segments, collapsing duplicate slashes at the seams.
 * joinPaths('/api/', '/hooks') === '/api/hooks'
 */
export function joinPaths(...segments: string[]): string {
  let result = ''
  for (const segment of segments) {
    if (!segment) continue
    if (result === '') {
      result = segment
    } else {
      result = result.replace(/\/+$/, '') + '/' + segment.replace(/^\/+/, '')
    }
  }
  if (!result.startsWith('/')) result = '/' + result
  return result
}
