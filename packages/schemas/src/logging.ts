import {z} from 'zod'

export const LOG_EVENT_NAME_PATTERN = /^[a-z][a-z_]*(\.[a-z][a-z_]*)+$/u

export const LogEventLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal'])

export type LogEventLevel = z.infer<typeof LogEventLevelSchema>

/**
 * One line of gateway log output. `correlation_id` and `request_id` are the call
 * envelope id while a request is in flight and `n/a` outside of one; `route` and
 * `path_params` appear once the request has matched a route.
 */
export const LogEventSchema = z
  .object({
    ts: z.iso.datetime({offset: true}),
    level: LogEventLevelSchema,
    service: z.string().min(1),
    env: z.string().min(1),
    event: z.string().regex(LOG_EVENT_NAME_PATTERN),
    component: z.string().min(1),
    correlation_id: z.string().min(1).max(128),
    request_id: z.string().min(1).max(128),
    method: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    path_params: z.record(z.string(), z.string()).optional(),
    message: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict()

export type LogEvent = z.infer<typeof LogEventSchema>
