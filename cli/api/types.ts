import { z } from 'zod'

// Remote shapes evolve independently of this tool: unknown keys pass through.

export const sourceSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string().optional(),
}).passthrough()

export const destinationSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string().optional(),
  cli_path: z.string().nullish(),
}).passthrough()

export const connectionSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  source: sourceSchema,
  destination: destinationSchema,
}).passthrough()

export const sessionSchema = z.object({
  id: z.string(),
  token: z.string(),
  websocket_url: z.string().optional(),
  heartbeat_interval_ms: z.number().int().positive().optional(),
}).passthrough()

export function listSchema<T extends z.ZodTypeAny>(model: T) {
  return z.object({
    models: z.array(model),
    count: z.number().optional(),
  }).passthrough()
}

export type Source = z.infer<typeof sourceSchema>
export type Destination = z.infer<typeof destinationSchema>
export type Connection = z.infer<typeof connectionSchema>
export type SessionDescriptor = z.infer<typeof sessionSchema>

export interface CreateConnectionInput {
  name: string
  source_id: string
  destination_id: string
}

export interface CreateSessionInput {
  source_ids: string[]
  webhook_ids: string[]
  device_name: string
}

/** Body of the fallback result submission */
export interface AttemptResultInput {
  webhook_id: string
  status?: number
  headers: Array<[string, string]>
  data: string
  encoding: 'utf8' | 'base64'
  truncated: boolean
  error: boolean
  error_class?: string
  error_message?: string
  duration_ms: number
  finished_at: string
}
