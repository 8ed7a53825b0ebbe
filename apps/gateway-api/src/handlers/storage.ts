import {isRemoteCallError, type RemoteCallClient, type RemoteCallError} from '@cluster-gateway/bus'

export type StorageModelName = 'Cluster' | 'Clusters' | 'ClusterDeploy' | 'Host' | 'Hosts' | 'Network' | 'Networks'

// Storage operations live behind the bus; `secure` asks for secret fields too.
export const storageGet = (
  bus: RemoteCallClient,
  model: StorageModelName,
  query: Record<string, unknown>,
  secure = false
) => bus.request('storage.get', [model, query, secure])

export const storageList = (bus: RemoteCallClient, model: StorageModelName, secure = false) =>
  bus.request('storage.list', [model, secure])

export const storageSave = (bus: RemoteCallClient, model: StorageModelName, data: Record<string, unknown>) =>
  bus.request('storage.save', [model, data])

export const storageDelete = (bus: RemoteCallClient, model: StorageModelName, query: Record<string, unknown>) =>
  bus.request('storage.delete', [model, query])

export type Attempt<T> = {ok: true; value: T} | {ok: false; error: RemoteCallError}

/** Runs a storage call, returning remote failures instead of throwing them. */
export const attempt = async <T>(operation: () => Promise<T>): Promise<Attempt<T>> => {
  try {
    return {ok: true, value: await operation()}
  } catch (error) {
    if (isRemoteCallError(error)) {
      return {ok: false, error}
    }
    throw error
  }
}
