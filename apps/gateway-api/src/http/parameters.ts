import type {IncomingMessage} from 'node:http'

import type {StructuredLogger} from '@cluster-gateway/logging'

import {ExtractionError} from '../errors'
import type {MatchResult} from './types'

const COMPONENT = 'gateway.parameters'
const BODY_METHODS = new Set(['PUT', 'POST'])

export type ExtractedParams = Record<string, unknown>

export type ExtractionResult = {ok: true; params: ExtractedParams} | {ok: false; error: ExtractionError}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/** Splits a raw request target into its path and query string. */
export const splitRequestTarget = (target: string | undefined) => {
  const raw = target ?? '/'
  const queryStart = raw.indexOf('?')
  if (queryStart === -1) {
    return {path: raw, query: ''}
  }

  return {path: raw.slice(0, queryStart), query: raw.slice(queryStart + 1)}
}

/** One value stays a string; a repeated key becomes an array in arrival order. */
export const parseQueryString = (query: string): ExtractedParams => {
  const params: Record<string, string | string[]> = {}
  for (const [key, value] of new URLSearchParams(query)) {
    const existing = params[key]
    if (existing === undefined) {
      params[key] = value
    } else if (Array.isArray(existing)) {
      existing.push(value)
    } else {
      params[key] = [existing, value]
    }
  }

  return params
}

const parseContentLength = (header: string | undefined) => {
  if (!header || !/^\d+$/u.test(header.trim())) {
    return 0
  }

  return Number.parseInt(header, 10)
}

const readExactly = async ({request, length}: {request: IncomingMessage; length: number}) => {
  const chunks: Buffer[] = []
  let size = 0

  try {
    for await (const chunk of request) {
      let bufferChunk: Buffer
      if (typeof chunk === 'string') {
        bufferChunk = Buffer.from(chunk, 'utf8')
      } else if (chunk instanceof Uint8Array) {
        bufferChunk = Buffer.from(chunk)
      } else {
        throw new ExtractionError('request_body_unreadable', 'Request body contains an invalid chunk type')
      }

      size += bufferChunk.length
      chunks.push(bufferChunk)
    }
  } catch (error) {
    if (error instanceof ExtractionError) {
      throw error
    }
    throw new ExtractionError('request_body_unreadable', 'Request body could not be read', {cause: error})
  }

  if (size < length) {
    throw new ExtractionError('request_body_incomplete', `Request body ended after ${size} of ${length} bytes`)
  }

  return Buffer.concat(chunks).subarray(0, length)
}

const parseJsonObject = ({raw, logger}: {raw: Buffer; logger: StructuredLogger}) => {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw.toString('utf8'))
  } catch (error) {
    logger.debug({
      event: 'request.body.ignored',
      component: COMPONENT,
      message: 'Request body is not valid JSON',
      metadata: {error}
    })
    return undefined
  }

  if (!isRecord(parsed)) {
    logger.debug({
      event: 'request.body.ignored',
      component: COMPONENT,
      message: 'Request body is not a JSON object'
    })
    return undefined
  }

  return parsed
}

/**
 * Builds the parameter mapping for a matched request. Path segments seed the
 * mapping; PUT and POST then merge a JSON object body over them, every other
 * method merges the query string. Only a failed body read is an error: a body
 * that does not hold a JSON object is logged and left out.
 */
export const extractParameters = async ({
  request,
  match,
  maxBodyBytes,
  logger
}: {
  request: IncomingMessage
  match: MatchResult
  maxBodyBytes: number
  logger: StructuredLogger
}): Promise<ExtractionResult> => {
  const params: ExtractedParams = {...match.segments}
  const method = (request.method ?? 'GET').toUpperCase()

  if (!BODY_METHODS.has(method)) {
    return {ok: true, params: {...params, ...parseQueryString(splitRequestTarget(request.url).query)}}
  }

  const contentLength = parseContentLength(request.headers['content-length'])
  if (contentLength === 0) {
    return {ok: true, params}
  }

  if (contentLength > maxBodyBytes) {
    return {
      ok: false,
      error: new ExtractionError('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
    }
  }

  let raw: Buffer
  try {
    raw = await readExactly({request, length: contentLength})
  } catch (error) {
    if (error instanceof ExtractionError) {
      return {ok: false, error}
    }
    throw error
  }

  const body = parseJsonObject({raw, logger})
  return {ok: true, params: body ? {...params, ...body} : params}
}
