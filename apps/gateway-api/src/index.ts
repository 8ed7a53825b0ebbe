import 'reflect-metadata'

import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@cluster-gateway/logging'

import {appName, createGatewayApiApp} from './app'
import {loadConfig} from './config'

export * from './app'
export * from './config'
export * from './errors'
export {createDispatcher, type Dispatcher} from './http/dispatcher'
export {createHandlerRegistry, type HandlerCollectionSource, type HandlerRegistry} from './http/handlerRegistry'
export {createRouteTable, describeRoute, type RouteTable} from './http/routeTable'
export type {CallHandler, DispatchOutcome, MatchResult, RouteDefinition} from './http/types'

const main = async () => {
  const config = loadConfig(process.env)
  const logger = createStructuredLogger({
    service: appName,
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys
  })
  const app = await createGatewayApiApp({config, logger})

  await app.start()

  const shutdown = async () => {
    await app.stop()
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown()
  })
  process.on('SIGTERM', () => {
    void shutdown()
  })
  process.on('SIGHUP', () => {
    void app.registry
      .reload()
      .then(summary => {
        logger.info({
          event: 'registry.reloaded',
          component: 'process.entrypoint',
          message: `Handler registry reloaded with ${summary.registered} handlers`
        })
      })
      .catch((error: unknown) => {
        logger.error({
          event: 'registry.reload.failed',
          component: 'process.entrypoint',
          metadata: {error}
        })
      })
  })
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch((error: unknown) => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Gateway API startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
