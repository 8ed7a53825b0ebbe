import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import type {RemoteCallClient} from '@cluster-gateway/bus'
import {runWithLogContext, setLogContextFields, type StructuredLogger} from '@cluster-gateway/logging'
import {classifyCallResult, type CallEnvelope} from '@cluster-gateway/schemas'

import {DispatcherError} from '../errors'
import {sendJson, sendText} from '../http'
import type {HandlerRegistry} from './handlerRegistry'
import {extractParameters, splitRequestTarget} from './parameters'
import {describeRoute, type RouteTable} from './routeTable'
import {statusForErrorCode, statusForResult} from './statusMapping'
import type {DispatchOutcome, MatchResult} from './types'

const COMPONENT = 'gateway.dispatcher'

export type Dispatcher = {
  attachRemoteCallClient: (client: RemoteCallClient) => void
  dispatch: (request: IncomingMessage, response: ServerResponse) => Promise<DispatchOutcome>
}

export type DispatcherOptions = {
  routeTable: RouteTable
  registry: HandlerRegistry
  logger: StructuredLogger
  maxBodyBytes: number
}

type RequestScope = {
  request: IncomingMessage
  response: ServerResponse
  method: string
  envelopeId: string
  startedAt: number
  client: RemoteCallClient
}

export const createDispatcher = ({routeTable, registry, logger, maxBodyBytes}: DispatcherOptions): Dispatcher => {
  let remoteCallClient: RemoteCallClient | undefined

  const elapsed = (scope: RequestScope) => Math.max(0, Math.round(performance.now() - scope.startedAt))

  const respondText = (scope: RequestScope, status: number, text: string) => {
    sendText({response: scope.response, status, text, correlationId: scope.envelopeId})
  }

  const failHandler = ({
    scope,
    envelope,
    error,
    message
  }: {
    scope: RequestScope
    envelope: CallEnvelope
    error: unknown
    message: string
  }): DispatchOutcome => {
    logger.error({
      event: 'dispatch.handler.failed',
      component: COMPONENT,
      message,
      status_code: 500,
      duration_ms: elapsed(scope),
      metadata: {envelope, error}
    })
    respondText(scope, 500, 'Internal Server Error')
    return {kind: 'unhandled_exception', status: 500, error}
  }

  const translate = ({
    scope,
    match,
    envelope,
    output
  }: {
    scope: RequestScope
    match: MatchResult
    envelope: CallEnvelope
    output: unknown
  }): DispatchOutcome => {
    const routeIdentity = describeRoute(match.route)
    const classified = classifyCallResult(output)

    if (classified.kind !== 'malformed' && classified.id !== envelope.id) {
      logger.warn({
        event: 'dispatch.result.id_mismatch',
        component: COMPONENT,
        message: 'Handler returned a result for a different envelope id',
        metadata: {envelope_id: envelope.id, result_id: classified.id}
      })
    }

    switch (classified.kind) {
      case 'error': {
        const status = statusForErrorCode(classified.code)
        if (status === undefined || classified.code === undefined) {
          logger.error({
            event: 'dispatch.error.unmapped',
            component: COMPONENT,
            message: `Handler returned an unmapped error code on ${routeIdentity}`,
            status_code: 500,
            duration_ms: elapsed(scope),
            metadata: {envelope, error: classified.error}
          })
          respondText(scope, 500, 'Internal Server Error')
          return {kind: 'unmapped_error', status: 500, code: classified.code}
        }

        sendJson({response: scope.response, status, payload: classified.error, correlationId: scope.envelopeId})
        logger.warn({
          event: 'dispatch.error.domain',
          component: COMPONENT,
          message: `Handler returned error ${classified.code} on ${routeIdentity}`,
          status_code: status,
          duration_ms: elapsed(scope),
          metadata: {envelope, error: classified.error}
        })
        return {kind: 'domain_error', status, code: classified.code, error: classified.error}
      }
      case 'result': {
        const status = statusForResult({method: scope.method, action: match.route.action})
        sendJson({response: scope.response, status, payload: classified.result, correlationId: scope.envelopeId})
        logger.debug({
          event: 'dispatch.completed',
          component: COMPONENT,
          status_code: status,
          duration_ms: elapsed(scope)
        })
        return {kind: 'success', status, result: classified.result}
      }
      case 'malformed':
        logger.warn({
          event: 'dispatch.result.malformed',
          component: COMPONENT,
          message: `Handler on ${routeIdentity} returned neither a result nor an error`,
          status_code: 404,
          duration_ms: elapsed(scope),
          metadata: {envelope}
        })
        respondText(scope, 404, 'Not Found')
        return {kind: 'malformed_result', status: 404}
    }
  }

  const handle = async (scope: RequestScope): Promise<DispatchOutcome> => {
    const {path} = splitRequestTarget(scope.request.url)
    const match = routeTable.match(path, scope.method)
    if (!match) {
      logger.debug({
        event: 'dispatch.route.unmatched',
        component: COMPONENT,
        status_code: 404,
        metadata: {path}
      })
      respondText(scope, 404, 'Not Found')
      return {kind: 'routing_failure', status: 404}
    }

    const routeIdentity = describeRoute(match.route)
    setLogContextFields({route: routeIdentity, path_params: {...match.segments}})

    const extraction = await extractParameters({request: scope.request, match, maxBodyBytes, logger})
    if (!extraction.ok) {
      logger.debug({
        event: 'dispatch.extraction.failed',
        component: COMPONENT,
        message: extraction.error.message,
        reason_code: extraction.error.code,
        status_code: 400
      })
      respondText(scope, 400, 'Bad Request')
      return {kind: 'extraction_failure', status: 400, error: extraction.error}
    }

    const envelope: CallEnvelope = Object.freeze({
      id: scope.envelopeId,
      operation: scope.method,
      params: Object.freeze(extraction.params)
    })
    logger.debug({event: 'dispatch.envelope.created', component: COMPONENT, metadata: {envelope}})

    const {handlerRef} = match.route
    const handler = typeof handlerRef === 'function' ? handlerRef : registry.resolve(handlerRef)
    if (!handler) {
      logger.warn({
        event: 'dispatch.handler.missing',
        component: COMPONENT,
        message: `No handler is registered as ${String(handlerRef)}`,
        status_code: 404
      })
      respondText(scope, 404, 'Not Found')
      return {kind: 'handler_missing', status: 404, handlerName: String(handlerRef)}
    }

    let output: unknown
    try {
      output = await handler(envelope, scope.client)
    } catch (error) {
      return failHandler({scope, envelope, error, message: `Handler on ${routeIdentity} raised an exception`})
    }

    try {
      return translate({scope, match, envelope, output})
    } catch (error) {
      return failHandler({
        scope,
        envelope,
        error,
        message: `Handler on ${routeIdentity} returned a result that cannot be sent`
      })
    }
  }

  return {
    attachRemoteCallClient: client => {
      if (remoteCallClient) {
        throw new DispatcherError('A remote-call client is already attached')
      }
      remoteCallClient = client
    },
    dispatch: async (request, response) => {
      if (!remoteCallClient) {
        throw new DispatcherError('A remote-call client must be attached before dispatching')
      }

      const method = (request.method ?? 'GET').toUpperCase()
      const envelopeId = randomUUID()
      const scope: RequestScope = {
        request,
        response,
        method,
        envelopeId,
        startedAt: performance.now(),
        client: remoteCallClient
      }

      return runWithLogContext({correlation_id: envelopeId, request_id: envelopeId, method}, () => handle(scope))
    }
  }
}
