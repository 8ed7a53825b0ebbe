import 'reflect-metadata'

import type {Server} from 'node:http'
import {promises as fs} from 'node:fs'

import helmet from 'helmet'
import express from 'express'
import type {NestApplicationOptions} from '@nestjs/common'
import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'

import type {RemoteCallClient} from '@cluster-gateway/bus'
import {createStructuredLogger, type StructuredLogger} from '@cluster-gateway/logging'

import type {ServiceConfig} from './config'
import {BUILTIN_HANDLER_COLLECTIONS} from './handlers'
import {createDispatcher} from './http/dispatcher'
import {createHandlerRegistry, createPluginCollectionSources} from './http/handlerRegistry'
import {createRouteTable, describeRoute} from './http/routeTable'
import {createProcessInfrastructure, type ProcessInfrastructure} from './infrastructure'
import {GatewayApiNestModule} from './nest/gatewayApiNestModule'
import {registerApiRoutes} from './routes'

export const appName = 'gateway-api'

const loadHttpsOptions = async ({
  config
}: {
  config: ServiceConfig
}): Promise<NonNullable<NestApplicationOptions['httpsOptions']> | undefined> => {
  const tlsConfig = config.tls
  if (!tlsConfig?.enabled) {
    return undefined
  }

  try {
    const [key, cert] = await Promise.all([fs.readFile(tlsConfig.keyPath), fs.readFile(tlsConfig.certPath)])
    return {key, cert}
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error'
    throw new Error(`Unable to load TLS configuration for gateway-api: ${reason}`)
  }
}

export const createGatewayApiApp = async ({
  config,
  logger: providedLogger,
  remoteCallClient
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  remoteCallClient?: RemoteCallClient
}) => {
  const logger =
    providedLogger ??
    createStructuredLogger({
      service: appName,
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys
    })

  const routeTable = createRouteTable()
  registerApiRoutes(routeTable)
  routeTable.seal()

  const registry = createHandlerRegistry({logger})
  await registry.load([...BUILTIN_HANDLER_COLLECTIONS, ...createPluginCollectionSources(config.handlerPlugins)])

  const dispatcher = createDispatcher({
    routeTable,
    registry,
    logger,
    maxBodyBytes: config.maxBodyBytes
  })

  let infrastructure: ProcessInfrastructure | null = null
  try {
    if (remoteCallClient) {
      dispatcher.attachRemoteCallClient(remoteCallClient)
    } else {
      infrastructure = await createProcessInfrastructure({config, logger})
      dispatcher.attachRemoteCallClient(infrastructure.remoteCallClient)
    }
    const processInfrastructure = infrastructure

    const expressApp = express()
    expressApp.disable('x-powered-by')
    expressApp.use(
      helmet({
        contentSecurityPolicy: false
      })
    )

    const httpsOptions = await loadHttpsOptions({config})

    const nestApp = await NestFactory.create(
      GatewayApiNestModule.register({dispatcher}),
      new ExpressAdapter(expressApp),
      {
        bodyParser: false,
        logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log'],
        ...(httpsOptions ? {httpsOptions} : {})
      }
    )

    await nestApp.init()

    const server: Server = nestApp.getHttpServer()

    for (const route of routeTable.routes()) {
      logger.debug({event: 'route.registered', component: 'gateway.routes', route: describeRoute(route)})
    }

    const start = async () => {
      await nestApp.listen(config.port, config.host)
      logger.info({
        event: 'server.started',
        component: 'gateway.server',
        message: `Listening on ${config.host}:${config.port}`,
        metadata: {tls: Boolean(httpsOptions), routes: routeTable.routes().length}
      })
    }

    const stop = async () => {
      await Promise.allSettled([nestApp.close(), processInfrastructure?.close()])
    }

    return {
      server,
      start,
      stop,
      dispatcher,
      registry,
      routeTable
    }
  } catch (error) {
    if (infrastructure) {
      await infrastructure.close()
    }

    throw error
  }
}

export type GatewayApiApp = Awaited<ReturnType<typeof createGatewayApiApp>>
