export type RemoteCallFailureReason = 'remote' | 'timeout' | 'transport' | 'closed';

export class RemoteCallError extends Error {
  public readonly reason: RemoteCallFailureReason;
  public readonly method: string;
  public readonly code: number | undefined;
  public readonly data: unknown;

  public constructor({
    reason,
    method,
    message,
    code,
    data
  }: {
    reason: RemoteCallFailureReason;
    method: string;
    message: string;
    code?: number;
    data?: unknown;
  }) {
    super(message);
    this.name = 'RemoteCallError';
    this.reason = reason;
    this.method = method;
    this.code = code;
    this.data = data;
  }
}

export const isRemoteCallError = (value: unknown): value is RemoteCallError => value instanceof RemoteCallError;
