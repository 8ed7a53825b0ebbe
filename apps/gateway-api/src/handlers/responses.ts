import {JSONRPC_ERRORS, type CallEnvelope, type CallFailure, type CallParams, type CallSuccess} from '@cluster-gateway/schemas'
import type {z} from 'zod'

export const createResponse = (id: string, result: unknown): CallSuccess => ({id, result})

export const createErrorResponse = (
  id: string,
  {code, message, data}: {code: number; message: string; data?: unknown}
): CallFailure => ({
  id,
  error: {
    code,
    message,
    ...(data !== undefined ? {data} : {})
  }
})

/** Error result for a failure, naming the error class in `data.exception`. */
export const returnError = (envelope: CallEnvelope, error: unknown, code: number): CallFailure => {
  if (error instanceof Error) {
    return createErrorResponse(envelope.id, {code, message: error.message, data: {exception: error.name}})
  }

  return createErrorResponse(envelope.id, {code, message: String(error), data: {exception: 'Error'}})
}

export const describeIssues = (error: z.ZodError) => error.issues.map(issue => issue.message).join('; ')

export const readString = (params: CallParams, key: string) => {
  const value = params[key]
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

export const missingParameter = (envelope: CallEnvelope, key: string) =>
  createErrorResponse(envelope.id, {
    code: JSONRPC_ERRORS.INVALID_PARAMETERS,
    message: `"${key}" must be given in the url or in the request body`
  })
