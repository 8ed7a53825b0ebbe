import type {StructuredLogger} from '@cluster-gateway/logging'

import type {InvocableHandler} from './types'

const COMPONENT = 'gateway.registry'

export type HandlerCollectionSource = {
  name: string
  load: () => unknown
}

export type RegistryLoadSummary = {
  registered: number
  failedCollections: string[]
}

export type HandlerRegistry = {
  load: (sources: readonly HandlerCollectionSource[]) => Promise<RegistryLoadSummary>
  reload: () => Promise<RegistryLoadSummary>
  resolve: (name: string) => InvocableHandler | undefined
  names: () => string[]
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  (typeof value === 'object' || typeof value === 'function') && value !== null

const isPublicName = (name: string) => name.length > 0 && !name.startsWith('_')

const isClassSyntax = (value: object) => /^class[\s{]/u.test(Function.prototype.toString.call(value))

const isHandlerFunction = (value: unknown): value is InvocableHandler =>
  typeof value === 'function' && value.length === 2 && !isClassSyntax(value)

const prototypeMethodNames = (value: unknown) => {
  if (typeof value !== 'function') {
    return []
  }

  const prototype: unknown = Reflect.get(value, 'prototype')
  if (!isRecord(prototype)) {
    return []
  }

  return Object.getOwnPropertyNames(prototype).filter(
    name => name !== 'constructor' && isPublicName(name) && typeof Reflect.get(prototype, name) === 'function'
  )
}

const isHandlerClass = (value: unknown): value is new () => object =>
  typeof value === 'function' && prototypeMethodNames(value).length > 0

/**
 * Maps fully qualified handler names onto callables. The map is rebuilt from the
 * configured collection sources on every reload and published as a frozen
 * snapshot, so a resolve never sees a half-built registry.
 */
export const createHandlerRegistry = ({logger}: {logger: StructuredLogger}): HandlerRegistry => {
  let sources: readonly HandlerCollectionSource[] = []
  let snapshot: ReadonlyMap<string, InvocableHandler> = new Map()
  let queue: Promise<void> = Promise.resolve()

  const registerClass = ({
    handlers,
    collectionName,
    memberName,
    HandlerClass
  }: {
    handlers: Map<string, InvocableHandler>
    collectionName: string
    memberName: string
    HandlerClass: new () => object
  }) => {
    let instance: object
    try {
      instance = new HandlerClass()
    } catch (error) {
      logger.error({
        event: 'registry.class.failed',
        component: COMPONENT,
        message: `Unable to instantiate handler class ${collectionName}.${memberName}`,
        metadata: {error}
      })
      return
    }

    for (const methodName of prototypeMethodNames(HandlerClass)) {
      const method: unknown = Reflect.get(instance, methodName)
      if (typeof method !== 'function') {
        continue
      }

      const key = `${collectionName}.${memberName}.${methodName}`
      handlers.set(key, (envelope, bus) => Reflect.apply(method, instance, [envelope, bus]))
      logger.debug({event: 'registry.handler.loaded', component: COMPONENT, metadata: {handler: key}})
    }
  }

  const loadCollection = async ({
    handlers,
    source
  }: {
    handlers: Map<string, InvocableHandler>
    source: HandlerCollectionSource
  }) => {
    let collection: unknown
    try {
      collection = await source.load()
    } catch (error) {
      logger.error({
        event: 'registry.collection.failed',
        component: COMPONENT,
        message: `Unable to load handler collection ${source.name}`,
        metadata: {error}
      })
      return false
    }

    if (!isRecord(collection)) {
      logger.error({
        event: 'registry.collection.failed',
        component: COMPONENT,
        message: `Handler collection ${source.name} is not an object`
      })
      return false
    }

    for (const [memberName, member] of Object.entries(collection)) {
      if (!isPublicName(memberName)) {
        continue
      }

      if (isHandlerClass(member)) {
        registerClass({handlers, collectionName: source.name, memberName, HandlerClass: member})
      } else if (isHandlerFunction(member)) {
        const key = `${source.name}.${memberName}`
        handlers.set(key, member)
        logger.debug({event: 'registry.handler.loaded', component: COMPONENT, metadata: {handler: key}})
      } else {
        logger.debug({
          event: 'registry.member.skipped',
          component: COMPONENT,
          message: `${source.name}.${memberName} can not be used as a handler`
        })
      }
    }

    return true
  }

  const rebuild = async (): Promise<RegistryLoadSummary> => {
    const handlers = new Map<string, InvocableHandler>()
    const failedCollections: string[] = []

    for (const source of sources) {
      const loaded = await loadCollection({handlers, source})
      if (!loaded) {
        failedCollections.push(source.name)
      }
    }

    snapshot = Object.freeze(handlers)
    logger.info({
      event: 'registry.loaded',
      component: COMPONENT,
      message: `Loaded ${handlers.size} handlers`,
      metadata: {handlers: handlers.size, failed_collections: failedCollections}
    })

    return {registered: handlers.size, failedCollections}
  }

  // Reloads run one at a time, in the order they were asked for.
  const enqueue = () => {
    const next = queue.then(rebuild)
    queue = next.then(
      () => undefined,
      () => undefined
    )
    return next
  }

  return {
    load: nextSources => {
      sources = [...nextSources]
      return enqueue()
    },
    reload: enqueue,
    resolve: name => snapshot.get(name),
    names: () => [...snapshot.keys()].sort()
  }
}

/** Collections named by module specifier, each exporting `handlers`. */
export const createPluginCollectionSources = (specifiers: readonly string[]): HandlerCollectionSource[] =>
  specifiers.map(specifier => ({
    name: specifier,
    load: async () => {
      const loaded: unknown = await import(specifier)
      if (!isRecord(loaded) || !('handlers' in loaded)) {
        throw new Error(`Plugin module ${specifier} has no handlers export`)
      }

      return loaded.handlers
    }
  }))
