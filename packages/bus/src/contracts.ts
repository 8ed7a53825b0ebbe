/**
 * The backend seen by handlers: a JSON-RPC style call carried over the message bus.
 * Resolves with the remote `result`, rejects with a `RemoteCallError`.
 */
export type RemoteCallClient = {
  request: (method: string, params?: unknown[]) => Promise<unknown>;
};

export type RedisPubSubListener = (message: string, channel?: string) => void;

export type RedisPublisher = {
  publish: (channel: string, message: string) => Promise<number> | number;
};

export type RedisSubscriber = {
  subscribe: (channel: string, listener: RedisPubSubListener) => Promise<void> | void;
  unsubscribe: (channel: string, listener?: RedisPubSubListener) => Promise<void> | void;
};
