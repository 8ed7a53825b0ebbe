import {
  createRedisBusClient,
  createUnavailableBusClient,
  type RedisPublisher,
  type RedisSubscriber,
  type RemoteCallClient
} from '@cluster-gateway/bus'
import type {StructuredLogger} from '@cluster-gateway/logging'
import {createClient} from 'redis'

import type {ServiceConfig} from './config'

export type GatewayRedisClient = ReturnType<typeof createClient>

export type ProcessInfrastructure = {
  enabled: boolean
  remoteCallClient: RemoteCallClient
  close: () => Promise<void>
}

const createDisabledInfrastructure = (): ProcessInfrastructure => ({
  enabled: false,
  remoteCallClient: createUnavailableBusClient(),
  close: () => Promise.resolve()
})

const toPublisher = (client: GatewayRedisClient): RedisPublisher => ({
  publish: (channel, message) => client.publish(channel, message)
})

const toSubscriber = (client: GatewayRedisClient): RedisSubscriber => ({
  subscribe: async (channel, listener) => {
    await client.subscribe(channel, (message, messageChannel) => {
      listener(message, messageChannel)
    })
  },
  unsubscribe: async channel => {
    await client.unsubscribe(channel)
  }
})

/**
 * Connects the message bus. Pub/sub needs two Redis connections: one that
 * publishes requests and one that stays subscribed to the reply channel.
 */
export const createProcessInfrastructure = async ({
  config,
  logger
}: {
  config: ServiceConfig
  logger: StructuredLogger
}): Promise<ProcessInfrastructure> => {
  const busConfig = config.bus
  if (!busConfig.enabled) {
    return createDisabledInfrastructure()
  }

  if (!busConfig.redisUrl) {
    throw new Error('Message bus is enabled but GATEWAY_API_BUS_REDIS_URL is missing')
  }

  const publisher = createClient({
    url: busConfig.redisUrl,
    socket: {
      connectTimeout: busConfig.redisConnectTimeoutMs
    }
  })
  const subscriber = publisher.duplicate()
  // An 'error' event with no listener is thrown; node-redis reconnects by itself.
  for (const [role, client] of [
    ['publisher', publisher],
    ['subscriber', subscriber]
  ] as const) {
    client.on('error', (error: unknown) => {
      logger.error({
        event: 'bus.redis.error',
        component: 'bus.redis',
        message: `Redis ${role} connection reported an error`,
        metadata: {role, error}
      })
    })
  }

  const quitAll = async () => {
    await Promise.allSettled([publisher.quit(), subscriber.quit()])
  }

  try {
    await Promise.all([publisher.connect(), subscriber.connect()])
  } catch (error) {
    await quitAll()
    throw error
  }

  const busClient = createRedisBusClient({
    publisher: toPublisher(publisher),
    subscriber: toSubscriber(subscriber),
    exchange: busConfig.exchange,
    requestTimeoutMs: busConfig.requestTimeoutMs,
    logger
  })

  try {
    await busClient.connect()
  } catch (error) {
    await quitAll()
    throw error
  }

  return {
    enabled: true,
    remoteCallClient: busClient,
    close: async () => {
      await busClient.close()
      await quitAll()
    }
  }
}
