import {IncomingMessage, ServerResponse, type IncomingHttpHeaders} from 'node:http'
import {Socket} from 'node:net'

import {RemoteCallError, type RemoteCallClient} from '@cluster-gateway/bus'
import type {StructuredLogger} from '@cluster-gateway/logging'
import {vi} from 'vitest'

import type {ServiceConfig} from '../config'

export const makeConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  nodeEnv: 'test',
  host: '127.0.0.1',
  port: 0,
  maxBodyBytes: 1024,
  logging: {
    level: 'silent',
    redactExtraKeys: []
  },
  bus: {
    enabled: false,
    exchange: 'test',
    requestTimeoutMs: 1_000,
    redisConnectTimeoutMs: 1_000
  },
  handlerPlugins: [],
  ...overrides
})

export const createRecordingLogger = () => {
  const logger = {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn()
  } satisfies StructuredLogger

  return logger
}

/** A request whose body stream yields `body` and then ends. */
export const createRequest = ({
  method,
  url,
  headers = {},
  body
}: {
  method: string
  url: string
  headers?: IncomingHttpHeaders
  body?: string
}) => {
  const request = new IncomingMessage(new Socket())
  request.method = method
  request.url = url
  request.headers = headers
  if (body !== undefined && body.length > 0) {
    request.push(Buffer.from(body, 'utf8'))
  }
  request.push(null)
  return request
}

export const createJsonRequest = ({method, url, payload}: {method: string; url: string; payload: unknown}) => {
  const body = JSON.stringify(payload)
  return createRequest({
    method,
    url,
    headers: {'content-type': 'application/json', 'content-length': String(Buffer.byteLength(body))},
    body
  })
}

export const createResponse = (request: IncomingMessage) => {
  const response = new ServerResponse(request)
  const end = vi.spyOn(response, 'end')

  return {
    response,
    body: () => {
      const chunk: unknown = end.mock.calls[0]?.[0]
      return Buffer.isBuffer(chunk) ? chunk.toString('utf8') : undefined
    }
  }
}

type StoredRecord = Record<string, unknown>

const MODEL_KEYS: Record<string, string> = {
  Cluster: 'name',
  ClusterDeploy: 'name',
  Host: 'address',
  Network: 'name'
}

const LIST_MODELS: Record<string, string> = {
  Clusters: 'Cluster',
  Hosts: 'Host',
  Networks: 'Network'
}

const isRecord = (value: unknown): value is StoredRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * In-process stand-in for the storage service behind the bus. Unknown records
 * reject the way the remote side does, with a `remote` RemoteCallError.
 */
export const createMemoryStorageBus = (seed: Record<string, StoredRecord[]> = {}) => {
  const tables = new Map<string, Map<string, StoredRecord>>()
  const calls: {method: string; params: unknown[]}[] = []

  const tableFor = (model: string) => {
    const table = tables.get(model) ?? new Map<string, StoredRecord>()
    tables.set(model, table)
    return table
  }

  const keyOf = (model: string, record: StoredRecord) => String(record[MODEL_KEYS[model] ?? 'name'])

  for (const [model, records] of Object.entries(seed)) {
    for (const record of records) {
      tableFor(model).set(keyOf(model, record), {...record})
    }
  }

  const notFound = (method: string, model: string) =>
    new RemoteCallError({reason: 'remote', method, message: `${model} not found`, code: 404})

  const present = (model: string, record: StoredRecord, secure: boolean) => {
    if (model !== 'Host' || secure) {
      return {...record}
    }
    const {ssh_priv_key: _sshPrivKey, ...rest} = record
    return rest
  }

  const client: RemoteCallClient = {
    request: async (method, params = []) => {
      calls.push({method, params})
      const [model, data, secure] = params
      if (typeof model !== 'string') {
        throw new RemoteCallError({reason: 'remote', method, message: 'model is required', code: -32602})
      }

      switch (method) {
        case 'storage.list': {
          const itemModel = LIST_MODELS[model] ?? model
          return [...tableFor(itemModel).values()].map(record => present(itemModel, record, secure === true))
        }
        case 'storage.get': {
          const record = isRecord(data) ? tableFor(model).get(keyOf(model, data)) : undefined
          if (!record) {
            throw notFound(method, model)
          }
          return present(model, record, secure === true)
        }
        case 'storage.save': {
          if (!isRecord(data)) {
            throw new RemoteCallError({reason: 'remote', method, message: 'data is required', code: -32602})
          }
          tableFor(model).set(keyOf(model, data), {...data})
          return {...data}
        }
        case 'storage.delete': {
          if (!isRecord(data) || !tableFor(model).delete(keyOf(model, data))) {
            throw notFound(method, model)
          }
          return []
        }
        default:
          throw new RemoteCallError({reason: 'transport', method, message: `No bus consumer is subscribed for ${method}`})
      }
    }
  }

  return {
    client,
    calls,
    record: (model: string, key: string) => tables.get(model)?.get(key)
  }
}
