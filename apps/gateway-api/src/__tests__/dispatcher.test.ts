import {Writable} from 'node:stream'

import {RemoteCallError} from '@cluster-gateway/bus'
import {createStructuredLogger} from '@cluster-gateway/logging'
import {JSONRPC_ERRORS, LogEventSchema, type CallEnvelope} from '@cluster-gateway/schemas'
import {describe, expect, it, vi} from 'vitest'

import {DispatcherError} from '../errors'
import {createDispatcher} from '../http/dispatcher'
import {createHandlerRegistry} from '../http/handlerRegistry'
import {createRouteTable} from '../http/routeTable'
import type {InvocableHandler, RouteRegistration} from '../http/types'
import {createMemoryStorageBus, createRecordingLogger, createRequest, createResponse} from './fixtures'

const setup = async ({
  routes,
  collections = []
}: {
  routes: RouteRegistration[]
  collections?: {name: string; load: () => unknown}[]
}) => {
  const logger = createRecordingLogger()
  const routeTable = createRouteTable()
  for (const route of routes) {
    routeTable.register(route)
  }
  const registry = createHandlerRegistry({logger})
  await registry.load(collections)
  logger.info.mockClear()

  const dispatcher = createDispatcher({routeTable, registry, logger, maxBodyBytes: 1024})
  const bus = createMemoryStorageBus()
  dispatcher.attachRemoteCallClient(bus.client)

  const send = async (input: Parameters<typeof createRequest>[0]) => {
    const request = createRequest(input)
    const {response, body} = createResponse(request)
    const outcome = await dispatcher.dispatch(request, response)
    return {outcome, response, body: body()}
  }

  return {logger, dispatcher, send}
}

const echoResult =
  (result: unknown): InvocableHandler =>
  envelope => ({id: envelope.id, result})

describe('dispatcher', () => {
  it('answers unroutable requests with a plain 404 and no handler call', async () => {
    const handler = vi.fn(echoResult([]))
    const {send, logger} = await setup({routes: [{pattern: '/api/v0/clusters/', methods: ['GET'], handler}]})

    const {outcome, response, body} = await send({method: 'GET', url: '/nowhere'})

    expect(outcome).toEqual({kind: 'routing_failure', status: 404})
    expect(response.statusCode).toBe(404)
    expect(response.getHeader('content-type')).toBe('text/html')
    expect(body).toBe('Not Found')
    expect(handler).not.toHaveBeenCalled()
    expect(logger.error).not.toHaveBeenCalled()
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it('returns 200 with the JSON result for a list', async () => {
    const {send} = await setup({
      routes: [{pattern: '/api/v0/clusters/', methods: ['GET'], handler: echoResult(['alpha', 'beta'])}]
    })

    const {outcome, response, body} = await send({method: 'GET', url: '/api/v0/clusters/'})

    expect(outcome.kind).toBe('success')
    expect(response.statusCode).toBe(200)
    expect(response.getHeader('content-type')).toBe('application/json')
    expect(body).toBe('["alpha","beta"]')
  })

  it('returns 201 for a PUT result and 200 for a PUT on an add route', async () => {
    const {send} = await setup({
      routes: [
        {pattern: '/api/v0/cluster/{name}/', methods: ['PUT'], handler: echoResult({name: 'alpha'})},
        {pattern: '/api/v0/cluster/{name}/hosts/', methods: ['PUT'], handler: echoResult([]), action: 'add'}
      ]
    })

    const created = await send({method: 'PUT', url: '/api/v0/cluster/alpha/', headers: {'content-length': '0'}})
    const added = await send({method: 'PUT', url: '/api/v0/cluster/alpha/hosts/', headers: {'content-length': '0'}})

    expect(created.outcome).toEqual({kind: 'success', status: 201, result: {name: 'alpha'}})
    expect(created.body).toBe('{"name":"alpha"}')
    expect(added.outcome).toEqual({kind: 'success', status: 200, result: []})
  })

  it('builds a frozen envelope from the method, a fresh id and the extracted params', async () => {
    const seen: CallEnvelope[] = []
    const {send} = await setup({
      routes: [
        {
          pattern: '/api/v0/cluster/{name}/',
          handler: envelope => {
            seen.push(envelope)
            return {id: envelope.id, result: []}
          }
        }
      ]
    })

    const {response} = await send({method: 'GET', url: '/api/v0/cluster/alpha/?verbose=1'})

    const [envelope] = seen
    expect(envelope?.operation).toBe('GET')
    expect(envelope?.params).toEqual({name: 'alpha', verbose: '1'})
    expect(envelope?.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/u)
    expect(Object.isFrozen(envelope)).toBe(true)
    expect(Object.isFrozen(envelope?.params)).toBe(true)
    expect(response.getHeader('x-correlation-id')).toBe(envelope?.id)
  })

  it('uses a fresh envelope id for every request', async () => {
    const ids: string[] = []
    const {send} = await setup({
      routes: [
        {
          pattern: '/ping',
          handler: envelope => {
            ids.push(envelope.id)
            return {id: envelope.id, result: 'pong'}
          }
        }
      ]
    })

    await send({method: 'GET', url: '/ping'})
    await send({method: 'GET', url: '/ping'})

    expect(ids).toHaveLength(2)
    expect(ids[0]).not.toBe(ids[1])
  })

  it('maps a NOT_FOUND error result to 404 with the error object as JSON', async () => {
    const error = {code: JSONRPC_ERRORS.NOT_FOUND, message: 'Cluster not found', data: {exception: 'RemoteCallError'}}
    const {send, logger} = await setup({
      routes: [{pattern: '/api/v0/cluster/{name}/', handler: envelope => ({id: envelope.id, error})}]
    })

    const {outcome, response, body} = await send({method: 'GET', url: '/api/v0/cluster/ghost/'})

    expect(outcome).toEqual({kind: 'domain_error', status: 404, code: 404, error})
    expect(response.getHeader('content-type')).toBe('application/json')
    expect(body).toBe(JSON.stringify(error))
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.warn.mock.calls[0]?.[0]).toMatchObject({
      event: 'dispatch.error.domain',
      metadata: {error, envelope: {operation: 'GET', params: {name: 'ghost'}}}
    })
  })

  it('maps bad request, invalid parameters and conflict codes', async () => {
    const codes = [JSONRPC_ERRORS.BAD_REQUEST, JSONRPC_ERRORS.INVALID_PARAMETERS, JSONRPC_ERRORS.CONFLICT]
    const {send} = await setup({
      routes: codes.map(code => ({
        pattern: `/codes/${code}`,
        handler: (envelope: CallEnvelope) => ({id: envelope.id, error: {code, message: 'failed'}})
      }))
    })

    const statuses: number[] = []
    for (const code of codes) {
      const {response} = await send({method: 'GET', url: `/codes/${code}`})
      statuses.push(response.statusCode)
    }

    expect(statuses).toEqual([400, 400, 409])
  })

  it('escalates unmapped error codes to a plain 500', async () => {
    const {send, logger} = await setup({
      routes: [{pattern: '/broken', handler: envelope => ({id: envelope.id, error: {code: 999999, message: 'odd'}})}]
    })

    const {outcome, response, body} = await send({method: 'GET', url: '/broken'})

    expect(outcome).toEqual({kind: 'unmapped_error', status: 500, code: 999999})
    expect(response.getHeader('content-type')).toBe('text/html')
    expect(body).toBe('Internal Server Error')
    expect(logger.error).toHaveBeenCalledTimes(1)
  })

  it('treats an error without an integer code as unmapped', async () => {
    const {send} = await setup({
      routes: [{pattern: '/broken', handler: envelope => ({id: envelope.id, error: 'just text'})}]
    })

    const {outcome} = await send({method: 'GET', url: '/broken'})

    expect(outcome).toEqual({kind: 'unmapped_error', status: 500, code: undefined})
  })

  it('answers a throwing handler with a plain 500 and exactly one error log', async () => {
    const {send, logger} = await setup({
      routes: [
        {
          pattern: '/explode',
          handler: () => {
            throw new Error('handler exploded')
          }
        },
        {
          pattern: '/reject',
          handler: () =>
            Promise.reject(new RemoteCallError({reason: 'timeout', method: 'storage.get', message: 'timed out'}))
        }
      ]
    })

    const thrown = await send({method: 'GET', url: '/explode'})

    expect(thrown.outcome.kind).toBe('unhandled_exception')
    expect(thrown.response.statusCode).toBe(500)
    expect(thrown.body).toBe('Internal Server Error')
    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(logger.error.mock.calls[0]?.[0]).toMatchObject({
      event: 'dispatch.handler.failed',
      message: 'Handler on * /explode raised an exception'
    })

    const rejected = await send({method: 'GET', url: '/reject'})
    expect(rejected.outcome.kind).toBe('unhandled_exception')
    expect(rejected.body).toBe('Internal Server Error')
    expect(logger.error).toHaveBeenCalledTimes(2)
  })

  it('never reads the body of a GET', async () => {
    const seen: CallEnvelope[] = []
    const {send} = await setup({
      routes: [
        {
          pattern: '/hosts/',
          handler: envelope => {
            seen.push(envelope)
            return {id: envelope.id, result: []}
          }
        }
      ]
    })

    const {outcome} = await send({
      method: 'GET',
      url: '/hosts/',
      headers: {'content-length': '12'},
      body: '{"a":"body"}'
    })

    expect(outcome.kind).toBe('success')
    expect(seen[0]?.params).toEqual({})
  })

  it('answers an unreadable body with a plain 400', async () => {
    const handler = vi.fn(echoResult([]))
    const {send, logger} = await setup({routes: [{pattern: '/host/', methods: ['PUT'], handler}]})

    const {outcome, response, body} = await send({
      method: 'PUT',
      url: '/host/',
      headers: {'content-length': '40'},
      body: '{"address":"10.0.0.1"}'
    })

    expect(outcome.kind).toBe('extraction_failure')
    expect(response.statusCode).toBe(400)
    expect(body).toBe('Bad Request')
    expect(handler).not.toHaveBeenCalled()
    expect(logger.debug.mock.calls.map(call => call[0].event)).toContain('dispatch.extraction.failed')
  })

  it('answers a missing registry handler with 404 and a warning', async () => {
    const {send, logger} = await setup({routes: [{pattern: '/hosts/', handler: 'handlers.hosts.missing'}]})

    const {outcome, body} = await send({method: 'GET', url: '/hosts/'})

    expect(outcome).toEqual({kind: 'handler_missing', status: 404, handlerName: 'handlers.hosts.missing'})
    expect(body).toBe('Not Found')
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it('invokes handlers resolved from the registry by name', async () => {
    const {send} = await setup({
      routes: [{pattern: '/hosts/', handler: 'handlers.sample.listHosts'}],
      collections: [
        {
          name: 'handlers.sample',
          load: () => ({
            listHosts: (envelope: CallEnvelope, _bus: unknown) => ({id: envelope.id, result: ['10.0.0.1']})
          })
        }
      ]
    })

    const {body} = await send({method: 'GET', url: '/hosts/'})

    expect(body).toBe('["10.0.0.1"]')
  })

  it('answers a result with neither key as 404 and warns', async () => {
    const {send, logger} = await setup({routes: [{pattern: '/odd', handler: () => ({status: 'done'})}]})

    const {outcome, body} = await send({method: 'GET', url: '/odd'})

    expect(outcome).toEqual({kind: 'malformed_result', status: 404})
    expect(body).toBe('Not Found')
    expect(logger.warn.mock.calls[0]?.[0]).toMatchObject({event: 'dispatch.result.malformed'})
  })

  it('warns when the handler echoes a different id and still translates the result', async () => {
    const {send, logger} = await setup({routes: [{pattern: '/ping', handler: () => ({id: 'other', result: 'pong'})}]})

    const {outcome} = await send({method: 'GET', url: '/ping'})

    expect(outcome).toEqual({kind: 'success', status: 200, result: 'pong'})
    expect(logger.warn.mock.calls[0]?.[0]).toMatchObject({event: 'dispatch.result.id_mismatch'})
  })

  it('sends null for an undefined result', async () => {
    const {send} = await setup({routes: [{pattern: '/nothing', handler: envelope => ({id: envelope.id, result: undefined})}]})

    const {body} = await send({method: 'GET', url: '/nothing'})

    expect(body).toBe('null')
  })

  it('answers a result that cannot be serialized with a plain 500 and one error log', async () => {
    const {send, logger} = await setup({
      routes: [{pattern: '/counter', handler: envelope => ({id: envelope.id, result: {hosts: 1n}})}]
    })

    const {outcome, response, body} = await send({method: 'GET', url: '/counter'})

    expect(outcome.kind).toBe('unhandled_exception')
    expect(outcome.status).toBe(500)
    expect(response.statusCode).toBe(500)
    expect(response.getHeader('content-type')).toBe('text/html')
    expect(body).toBe('Internal Server Error')
    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(logger.error.mock.calls[0]?.[0]).toMatchObject({
      event: 'dispatch.handler.failed',
      message: 'Handler on * /counter returned a result that cannot be sent'
    })
    expect(logger.debug.mock.calls.map(call => call[0].event)).not.toContain('dispatch.completed')
  })

  it('answers an unserializable domain error the same way', async () => {
    const {send, logger} = await setup({
      routes: [
        {
          pattern: '/conflict',
          handler: envelope => ({id: envelope.id, error: {code: 409, message: 'Conflict', data: {revision: 2n}}})
        }
      ]
    })

    const {outcome, body} = await send({method: 'GET', url: '/conflict'})

    expect(outcome.kind).toBe('unhandled_exception')
    expect(body).toBe('Internal Server Error')
    expect(logger.warn).not.toHaveBeenCalled()
    expect(logger.error).toHaveBeenCalledTimes(1)
  })

  it('tags the log lines of a request with its route and path params', async () => {
    const lines: string[] = []
    const sink = new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        lines.push(chunk.toString('utf8'))
        callback()
      }
    })
    const logger = createStructuredLogger({
      service: 'gateway-api',
      env: 'test',
      level: 'debug',
      writer: {stdout: sink, stderr: sink}
    })
    const routeTable = createRouteTable()
    routeTable.register({
      pattern: '/cluster/{name}/hosts/{host}/',
      methods: ['GET'],
      handler: envelope => ({id: envelope.id, result: true})
    })
    const dispatcher = createDispatcher({
      routeTable,
      registry: createHandlerRegistry({logger}),
      logger,
      maxBodyBytes: 1024
    })
    dispatcher.attachRemoteCallClient(createMemoryStorageBus().client)
    const request = createRequest({method: 'GET', url: '/cluster/alpha/hosts/10.0.0.1/'})
    const {response} = createResponse(request)

    await dispatcher.dispatch(request, response)

    const events = lines.map(line => LogEventSchema.parse(JSON.parse(line)))
    const correlationId = response.getHeader('x-correlation-id')
    expect(events.map(event => event.event)).toEqual(['dispatch.envelope.created', 'dispatch.completed'])
    for (const event of events) {
      expect(event).toMatchObject({
        correlation_id: correlationId,
        request_id: correlationId,
        method: 'GET',
        route: 'GET /cluster/{name}/hosts/{host}/',
        path_params: {name: 'alpha', host: '10.0.0.1'}
      })
    }
  })

  it('requires exactly one remote-call client', async () => {
    const logger = createRecordingLogger()
    const dispatcher = createDispatcher({
      routeTable: createRouteTable(),
      registry: createHandlerRegistry({logger}),
      logger,
      maxBodyBytes: 1024
    })
    const request = createRequest({method: 'GET', url: '/'})

    await expect(dispatcher.dispatch(request, createResponse(request).response)).rejects.toThrow(DispatcherError)

    const {client} = createMemoryStorageBus()
    dispatcher.attachRemoteCallClient(client)
    expect(() => dispatcher.attachRemoteCallClient(client)).toThrow('A remote-call client is already attached')
  })
})
