import os from 'os'
import { slugify } from '../utils.js'

/**
 * Stable name for this machine's CLI destination: host plus local user, so
 * every listen on the same account and machine reuses one destination.
 */
export function deviceName(host = os.hostname(), user = currentUser()): string {
  return slugify(`${host}-${user}`) || 'unknown-device'
}

function currentUser(): string {
  try {
    return os.userInfo().username
  } catch {
    return process.env.USER ?? process.env.USERNAME ?? 'unknown'
  }
}
