import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { z } from 'zod'
import { UnauthenticatedError, ValidationError } from './errors.js'

export const DEFAULT_API_BASE = 'https://api.hookrelay.dev'
export const DEFAULT_DASHBOARD_BASE = 'https://dashboard.hookrelay.dev'
export const DEFAULT_WS_BASE = 'wss://ws.hookrelay.dev'
export const DEFAULT_CREDENTIALS_PATH = path.join(os.homedir(), '.config', 'hookrelay', 'credentials.json')

export const CLIENT_VERSION = '0.1.0'

const credentialsSchema = z.object({
  api_key: z.string().min(1),
  project_id: z.string().optional(),
  project_name: z.string().optional(),
  user_name: z.string().optional(),
  api_base: z.string().url().optional(),
  dashboard_base: z.string().url().optional(),
  ws_base: z.string().url().optional(),
})

export type Credentials = z.infer<typeof credentialsSchema>

export interface ListenConfig {
  apiKey: string
  projectId?: string
  projectName?: string
  userName?: string
  apiBase: string
  dashboardBase: string
  wsBase: string
  /** Set when --ws-base was passed; wins over the endpoint the session returns */
  wsBaseOverride?: string
  noWss: boolean
  timeoutMs: number
  maxBodyBytes: number
  concurrency: number
  queueSize: number
  drainMs: number
  insecure: boolean
  verbose: boolean
}

export type ConfigOverrides = Partial<Omit<ListenConfig, 'apiKey'>> & { credentialsPath?: string }

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name]
  if (raw === undefined || raw === '') return fallback
  const value = parseInt(raw, 10)
  if (isNaN(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got "${raw}"`)
  }
  return value
}

/**
 * Read the credential file written by the login command. Returns null when
 * the file does not exist.
 */
export async function readCredentials(file: string): Promise<Credentials | null> {
  let raw: string
  try {
    raw = await fs.readFile(file, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null
    }
    throw err
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    throw new UnauthenticatedError(`Credential file ${file} is not valid JSON`)
  }

  const parsed = credentialsSchema.safeParse(json)
  if (!parsed.success) {
    throw new UnauthenticatedError(`Credential file ${file} is missing an api_key`)
  }
  return parsed.data
}

/**
 * Resolve configuration from flags, then environment, then the credential
 * file, then defaults.
 */
export async function loadConfig(overrides: ConfigOverrides = {}): Promise<ListenConfig> {
  const credentialsPath = overrides.credentialsPath ?? process.env.HOOKRELAY_CREDENTIALS ?? DEFAULT_CREDENTIALS_PATH
  const credentials = await readCredentials(credentialsPath)
  const apiKey = process.env.HOOKRELAY_API_KEY || credentials?.api_key

  if (!apiKey) {
    throw new UnauthenticatedError(`No API key found in ${credentialsPath}`)
  }

  return {
    apiKey,
    projectId: credentials?.project_id,
    projectName: credentials?.project_name,
    userName: credentials?.user_name,
    apiBase: overrides.apiBase ?? process.env.HOOKRELAY_API_BASE ?? credentials?.api_base ?? DEFAULT_API_BASE,
    dashboardBase: overrides.dashboardBase ?? process.env.HOOKRELAY_DASHBOARD_BASE ?? credentials?.dashboard_base ?? DEFAULT_DASHBOARD_BASE,
    wsBase: overrides.wsBaseOverride ?? process.env.HOOKRELAY_WS_BASE ?? credentials?.ws_base ?? DEFAULT_WS_BASE,
    wsBaseOverride: overrides.wsBaseOverride,
    noWss: overrides.noWss ?? false,
    timeoutMs: overrides.timeoutMs ?? intFromEnv('HOOKRELAY_TIMEOUT_MS', 30_000),
    maxBodyBytes: overrides.maxBodyBytes ?? intFromEnv('HOOKRELAY_MAX_BODY_BYTES', 1024 * 1024),
    concurrency: overrides.concurrency ?? intFromEnv('HOOKRELAY_CONCURRENCY', 16),
    queueSize: overrides.queueSize ?? intFromEnv('HOOKRELAY_QUEUE_SIZE', 256),
    drainMs: overrides.drainMs ?? intFromEnv('HOOKRELAY_DRAIN_MS', 10_000),
    insecure: overrides.insecure ?? false,
    verbose: overrides.verbose ?? process.env.HOOKRELAY_VERBOSE === 'true',
  }
}
