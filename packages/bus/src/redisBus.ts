import {randomUUID} from 'node:crypto';

import {createNoopLogger, type StructuredLogger} from '@cluster-gateway/logging';
import {
  BusResponseHeaderSchema,
  CallErrorSchema,
  classifyCallResult,
  type BusRequestMessage
} from '@cluster-gateway/schemas';
import {z} from 'zod';

import type {RedisPublisher, RedisSubscriber, RemoteCallClient} from './contracts';
import {RemoteCallError} from './errors';

const COMPONENT = 'bus.redis';

const RedisBusSettingsSchema = z
  .object({
    exchange: z.string().trim().min(1),
    requestTimeoutMs: z.number().int().min(1).max(300_000),
    clientId: z.string().trim().min(1)
  })
  .strict();

export type RedisBusClientOptions = {
  publisher: RedisPublisher;
  subscriber: RedisSubscriber;
  exchange: string;
  requestTimeoutMs: number;
  logger?: StructuredLogger;
  clientId?: string;
};

export type RedisBusClient = RemoteCallClient & {
  clientId: string;
  replyChannel: string;
  connect: () => Promise<void>;
  close: () => Promise<void>;
  pendingCount: () => number;
};

type PendingCall = {
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: RemoteCallError) => void;
  timer: ReturnType<typeof setTimeout>;
};

type ClientState = 'idle' | 'connected' | 'closed';

const parseJson = (raw: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return undefined;
  }
};

/**
 * JSON-RPC over Redis pub/sub. Requests go out on `<exchange>.<method>`; every
 * reply comes back on this client's own `<exchange>.reply.<clientId>` channel and
 * is matched to its pending call by id.
 */
export const createRedisBusClient = (options: RedisBusClientOptions): RedisBusClient => {
  const settings = RedisBusSettingsSchema.parse({
    exchange: options.exchange,
    requestTimeoutMs: options.requestTimeoutMs,
    clientId: options.clientId ?? randomUUID()
  });
  const logger = options.logger ?? createNoopLogger();
  const replyChannel = `${settings.exchange}.reply.${settings.clientId}`;
  const pendingCalls = new Map<string, PendingCall>();
  let state: ClientState = 'idle';

  const settle = (id: string): PendingCall | undefined => {
    const pending = pendingCalls.get(id);
    if (!pending) {
      return undefined;
    }

    pendingCalls.delete(id);
    clearTimeout(pending.timer);
    return pending;
  };

  const handleReply = (message: string) => {
    const raw = parseJson(message);
    const header = BusResponseHeaderSchema.safeParse(raw);
    if (!header.success) {
      logger.debug({
        event: 'bus.reply.malformed',
        component: COMPONENT,
        message: 'Dropped a reply that is not a JSON-RPC message'
      });
      return;
    }

    const pending = settle(header.data.id);
    if (!pending) {
      logger.debug({
        event: 'bus.reply.unmatched',
        component: COMPONENT,
        message: 'Dropped a reply with no pending call',
        metadata: {id: header.data.id}
      });
      return;
    }

    const classified = classifyCallResult(raw);
    switch (classified.kind) {
      case 'result':
        pending.resolve(classified.result);
        return;
      case 'error': {
        const parsedError = CallErrorSchema.safeParse(classified.error);
        pending.reject(
          new RemoteCallError({
            reason: 'remote',
            method: pending.method,
            message: parsedError.success && parsedError.data.message ? parsedError.data.message : 'Remote call failed',
            ...(classified.code !== undefined ? {code: classified.code} : {}),
            ...(parsedError.success ? {data: parsedError.data.data} : {})
          })
        );
        return;
      }
      case 'malformed':
        pending.reject(
          new RemoteCallError({
            reason: 'remote',
            method: pending.method,
            message: 'Remote reply carried neither a result nor an error'
          })
        );
        return;
    }
  };

  const connect = async () => {
    if (state === 'connected') {
      return;
    }
    if (state === 'closed') {
      throw new Error('Bus client was closed and cannot reconnect');
    }

    await options.subscriber.subscribe(replyChannel, handleReply);
    state = 'connected';
    logger.info({
      event: 'bus.connected',
      component: COMPONENT,
      message: 'Bus reply channel subscribed',
      metadata: {exchange: settings.exchange, reply_channel: replyChannel}
    });
  };

  const request = (method: string, params: unknown[] = []) => {
    if (state !== 'connected') {
      return Promise.reject(
        new RemoteCallError({reason: 'closed', method, message: 'Bus client is not connected'})
      );
    }

    const id = randomUUID();
    const message: BusRequestMessage = {
      jsonrpc: '2.0',
      id,
      method,
      params,
      reply_to: replyChannel
    };

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (settle(id)) {
          reject(
            new RemoteCallError({
              reason: 'timeout',
              method,
              message: `Remote call ${method} timed out after ${settings.requestTimeoutMs}ms`
            })
          );
        }
      }, settings.requestTimeoutMs);
      pendingCalls.set(id, {method, resolve, reject, timer});

      logger.debug({
        event: 'bus.request.sent',
        component: COMPONENT,
        metadata: {id, method}
      });

      const failTransport = (reason: string) => {
        const pending = settle(id);
        pending?.reject(new RemoteCallError({reason: 'transport', method, message: reason}));
      };

      void Promise.resolve()
        .then(() => options.publisher.publish(`${settings.exchange}.${method}`, JSON.stringify(message)))
        .then(receivers => {
          if (receivers === 0) {
            failTransport(`No bus consumer is subscribed for ${method}`);
          }
        })
        .catch((error: unknown) => {
          failTransport(error instanceof Error ? error.message : 'Bus publish failed');
        });
    });
  };

  const close = async () => {
    if (state === 'closed') {
      return;
    }

    const wasConnected = state === 'connected';
    state = 'closed';
    for (const id of [...pendingCalls.keys()]) {
      const pending = settle(id);
      pending?.reject(
        new RemoteCallError({reason: 'closed', method: pending.method, message: 'Bus client closed'})
      );
    }

    if (wasConnected) {
      await options.subscriber.unsubscribe(replyChannel, handleReply);
    }
  };

  return {
    clientId: settings.clientId,
    replyChannel,
    connect,
    close,
    request,
    pendingCount: () => pendingCalls.size
  };
};

export const createUnavailableBusClient = (): RemoteCallClient => ({
  request: method =>
    Promise.reject(new RemoteCallError({reason: 'transport', method, message: 'Message bus is disabled'}))
});
