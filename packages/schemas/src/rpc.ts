import {z} from 'zod'

/**
 * JSON-RPC error codes exchanged between the gateway, its handlers and the bus
 * services. BAD_REQUEST and INVALID_REQUEST share the same code.
 */
export const JSONRPC_ERRORS = {
  PARSE_ERROR: -32700,
  BAD_REQUEST: -32600,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMETERS: -32602,
  INTERNAL_ERROR: -32603,
  NOT_FOUND: 404,
  CONFLICT: 409
} as const

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export type CallParams = Readonly<Record<string, unknown>>

export type CallEnvelope = Readonly<{
  id: string
  operation: string
  params: CallParams
}>

export const CallErrorSchema = z
  .object({
    code: z.number().int(),
    message: z.string().optional(),
    data: z.unknown().optional()
  })
  .loose()

export type CallError = {
  code: number
  message: string
  data?: unknown
}

export type CallSuccess = {
  id: string
  result: unknown
}

export type CallFailure = {
  id: string
  error: CallError
}

export type CallResult = CallSuccess | CallFailure

/**
 * Classifies an untrusted handler or bus reply by the keys it carries. An `error`
 * key wins over `result`, and a value with neither key is `malformed`.
 */
export type ClassifiedCallResult =
  | {kind: 'result'; id: unknown; result: unknown}
  | {kind: 'error'; id: unknown; error: unknown; code: number | undefined}
  | {kind: 'malformed'}

export const classifyCallResult = (value: unknown): ClassifiedCallResult => {
  if (!isRecord(value)) {
    return {kind: 'malformed'}
  }

  if ('error' in value) {
    const parsedError = CallErrorSchema.safeParse(value.error)
    return {
      kind: 'error',
      id: value.id,
      error: value.error,
      code: parsedError.success ? parsedError.data.code : undefined
    }
  }

  if ('result' in value) {
    return {kind: 'result', id: value.id, result: value.result}
  }

  return {kind: 'malformed'}
}

export const BusRequestMessageSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: z.string().min(1),
    method: z.string().min(1),
    params: z.array(z.unknown()),
    reply_to: z.string().min(1)
  })
  .strict()

export type BusRequestMessage = z.infer<typeof BusRequestMessageSchema>

export const BusResponseHeaderSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: z.string().min(1)
  })
  .loose()
