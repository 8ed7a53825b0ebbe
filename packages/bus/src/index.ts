export type {RedisPubSubListener, RedisPublisher, RedisSubscriber, RemoteCallClient} from './contracts';
export {isRemoteCallError, RemoteCallError, type RemoteCallFailureReason} from './errors';
export {createRedisBusClient, createUnavailableBusClient, type RedisBusClient, type RedisBusClientOptions} from './redisBus';
