import {LogLevelSchema, type LogLevel} from '@cluster-gateway/logging'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const parseCommaList = (raw: string | undefined) => {
  if (!raw) {
    return []
  }

  return raw
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)
}

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    GATEWAY_API_HOST: z.string().default('0.0.0.0'),
    GATEWAY_API_PORT: numberFromEnv.default(8000),
    GATEWAY_API_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    GATEWAY_API_LOG_LEVEL: LogLevelSchema.optional(),
    GATEWAY_API_LOG_REDACT_EXTRA_KEYS: optionalString,
    GATEWAY_API_BUS_ENABLED: booleanFromEnv.optional(),
    GATEWAY_API_BUS_REDIS_URL: optionalString,
    GATEWAY_API_BUS_EXCHANGE: z.string().trim().min(1).default('commissaire'),
    GATEWAY_API_BUS_REQUEST_TIMEOUT_MS: numberFromEnv.default(5_000),
    GATEWAY_API_REDIS_CONNECT_TIMEOUT_MS: numberFromEnv.default(2_000),
    GATEWAY_API_HANDLER_PLUGINS: optionalString,
    GATEWAY_API_TLS_ENABLED: booleanFromEnv.default(false),
    GATEWAY_API_TLS_KEY_PATH: optionalString,
    GATEWAY_API_TLS_CERT_PATH: optionalString
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  bus: {
    enabled: boolean
    redisUrl?: string
    exchange: string
    requestTimeoutMs: number
    redisConnectTimeoutMs: number
  }
  handlerPlugins: string[]
  tls?: {
    enabled: true
    keyPath: string
    certPath: string
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  GATEWAY_API_HOST: env.GATEWAY_API_HOST,
  GATEWAY_API_PORT: env.GATEWAY_API_PORT,
  GATEWAY_API_MAX_BODY_BYTES: env.GATEWAY_API_MAX_BODY_BYTES,
  GATEWAY_API_LOG_LEVEL: env.GATEWAY_API_LOG_LEVEL,
  GATEWAY_API_LOG_REDACT_EXTRA_KEYS: env.GATEWAY_API_LOG_REDACT_EXTRA_KEYS,
  GATEWAY_API_BUS_ENABLED: env.GATEWAY_API_BUS_ENABLED,
  GATEWAY_API_BUS_REDIS_URL: env.GATEWAY_API_BUS_REDIS_URL,
  GATEWAY_API_BUS_EXCHANGE: env.GATEWAY_API_BUS_EXCHANGE,
  GATEWAY_API_BUS_REQUEST_TIMEOUT_MS: env.GATEWAY_API_BUS_REQUEST_TIMEOUT_MS,
  GATEWAY_API_REDIS_CONNECT_TIMEOUT_MS: env.GATEWAY_API_REDIS_CONNECT_TIMEOUT_MS,
  GATEWAY_API_HANDLER_PLUGINS: env.GATEWAY_API_HANDLER_PLUGINS,
  GATEWAY_API_TLS_ENABLED: env.GATEWAY_API_TLS_ENABLED,
  GATEWAY_API_TLS_KEY_PATH: env.GATEWAY_API_TLS_KEY_PATH,
  GATEWAY_API_TLS_CERT_PATH: env.GATEWAY_API_TLS_CERT_PATH
})

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  const busEnabled = parsed.GATEWAY_API_BUS_ENABLED ?? parsed.NODE_ENV !== 'test'
  if (busEnabled && !parsed.GATEWAY_API_BUS_REDIS_URL) {
    throw new Error('GATEWAY_API_BUS_REDIS_URL is required when the message bus is enabled')
  }

  const tlsKeyPath = parsed.GATEWAY_API_TLS_KEY_PATH
  const tlsCertPath = parsed.GATEWAY_API_TLS_CERT_PATH
  if (parsed.GATEWAY_API_TLS_ENABLED && (!tlsKeyPath || !tlsCertPath)) {
    throw new Error('GATEWAY_API_TLS_KEY_PATH and GATEWAY_API_TLS_CERT_PATH are required when TLS is enabled')
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.GATEWAY_API_HOST,
    port: parsed.GATEWAY_API_PORT,
    maxBodyBytes: parsed.GATEWAY_API_MAX_BODY_BYTES,
    logging: {
      level: parsed.GATEWAY_API_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
      redactExtraKeys: parseCommaList(parsed.GATEWAY_API_LOG_REDACT_EXTRA_KEYS)
    },
    bus: {
      enabled: busEnabled,
      ...(parsed.GATEWAY_API_BUS_REDIS_URL ? {redisUrl: parsed.GATEWAY_API_BUS_REDIS_URL} : {}),
      exchange: parsed.GATEWAY_API_BUS_EXCHANGE,
      requestTimeoutMs: parsed.GATEWAY_API_BUS_REQUEST_TIMEOUT_MS,
      redisConnectTimeoutMs: parsed.GATEWAY_API_REDIS_CONNECT_TIMEOUT_MS
    },
    handlerPlugins: parseCommaList(parsed.GATEWAY_API_HANDLER_PLUGINS),
    ...(parsed.GATEWAY_API_TLS_ENABLED && tlsKeyPath && tlsCertPath
      ? {
          tls: {
            enabled: true as const,
            keyPath: tlsKeyPath,
            certPath: tlsCertPath
          }
        }
      : {})
  }
}
