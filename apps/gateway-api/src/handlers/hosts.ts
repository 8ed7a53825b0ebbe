import type {RemoteCallClient} from '@cluster-gateway/bus'
import {
  CLUSTER_TYPE_HOST,
  ClusterSchema,
  HostSchema,
  HostStatusSchema,
  JSONRPC_ERRORS,
  toSafeHost
} from '@cluster-gateway/schemas'
import {z} from 'zod'

import type {CallHandler} from '../http/types'
import {createErrorResponse, createResponse, describeIssues, missingParameter, readString, returnError} from './responses'
import {attempt, storageDelete, storageGet, storageList, storageSave} from './storage'

const fetchHost = async (bus: RemoteCallClient, address: string, secure = false) =>
  HostSchema.parse(await storageGet(bus, 'Host', {address}, secure))

const findCluster = async (bus: RemoteCallClient, name: string) => {
  const lookup = await attempt(() => storageGet(bus, 'Cluster', {name}, true))
  return lookup.ok ? ClusterSchema.parse(lookup.value) : undefined
}

export const listHosts: CallHandler = async (envelope, bus) => {
  const hosts = z.array(HostSchema).parse(await storageList(bus, 'Hosts'))
  return createResponse(envelope.id, hosts.map(toSafeHost))
}

export const getHost: CallHandler = async (envelope, bus) => {
  const address = readString(envelope.params, 'address')
  if (!address) {
    return missingParameter(envelope, 'address')
  }

  const lookup = await attempt(() => fetchHost(bus, address))
  if (!lookup.ok) {
    return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  return createResponse(envelope.id, toSafeHost(lookup.value))
}

/**
 * Creates a host, or confirms one that already exists.
 *
 * An existing host is returned as-is when the given `ssh_priv_key` matches the
 * stored one and, if a `cluster` is named, the host is already its member. A new
 * host is added to the named cluster before it is saved.
 */
export const createHost: CallHandler = async (envelope, bus) => {
  const address = readString(envelope.params, 'address')
  if (!address) {
    return missingParameter(envelope, 'address')
  }

  const clusterName = readString(envelope.params, 'cluster')
  const existing = await attempt(() => fetchHost(bus, address, true))

  if (existing.ok) {
    const host = existing.value
    if (host.ssh_priv_key !== (readString(envelope.params, 'ssh_priv_key') ?? '')) {
      return createErrorResponse(envelope.id, {code: JSONRPC_ERRORS.CONFLICT, message: 'Host already exists'})
    }

    if (clusterName) {
      const cluster = await findCluster(bus, clusterName)
      if (!cluster) {
        return createErrorResponse(envelope.id, {
          code: JSONRPC_ERRORS.INVALID_PARAMETERS,
          message: 'Cluster does not exist'
        })
      }
      if (!cluster.hostset.includes(address)) {
        return createErrorResponse(envelope.id, {code: JSONRPC_ERRORS.CONFLICT, message: 'Host not in cluster'})
      }
    }

    return createResponse(envelope.id, toSafeHost(host))
  }

  if (clusterName) {
    const cluster = await findCluster(bus, clusterName)
    if (!cluster) {
      return createErrorResponse(envelope.id, {
        code: JSONRPC_ERRORS.INVALID_PARAMETERS,
        message: 'Cluster does not exist'
      })
    }
    if (!cluster.hostset.includes(address)) {
      await storageSave(bus, 'Cluster', {...cluster, hostset: [...cluster.hostset, address]})
    }
  }

  const parsed = HostSchema.safeParse({...envelope.params, address})
  if (!parsed.success) {
    return createErrorResponse(envelope.id, {
      code: JSONRPC_ERRORS.INVALID_REQUEST,
      message: describeIssues(parsed.error)
    })
  }

  await storageSave(bus, 'Host', parsed.data)
  return createResponse(envelope.id, toSafeHost(parsed.data))
}

export const deleteHost: CallHandler = async (envelope, bus) => {
  const address = readString(envelope.params, 'address')
  if (!address) {
    return missingParameter(envelope, 'address')
  }

  const deleted = await attempt(async () => {
    await storageDelete(bus, 'Host', {address})
    const clusters = z.array(ClusterSchema).parse(await storageList(bus, 'Clusters', true))
    // A host belongs to at most one cluster.
    const owner = clusters.find(cluster => cluster.hostset.includes(address))
    if (owner) {
      await storageSave(bus, 'Cluster', {...owner, hostset: owner.hostset.filter(member => member !== address)})
    }
  })
  if (!deleted.ok) {
    return returnError(envelope, deleted.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  return createResponse(envelope.id, [])
}

export const getHostCreds: CallHandler = async (envelope, bus) => {
  const address = readString(envelope.params, 'address')
  if (!address) {
    return missingParameter(envelope, 'address')
  }

  const lookup = await attempt(() => fetchHost(bus, address, true))
  if (!lookup.ok) {
    return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  return createResponse(envelope.id, {
    remote_user: lookup.value.remote_user,
    ssh_priv_key: lookup.value.ssh_priv_key
  })
}

export const getHostStatus: CallHandler = async (envelope, bus) => {
  const address = readString(envelope.params, 'address')
  if (!address) {
    return missingParameter(envelope, 'address')
  }

  const lookup = await attempt(() => fetchHost(bus, address))
  if (!lookup.ok) {
    return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  const status = HostStatusSchema.parse({
    type: CLUSTER_TYPE_HOST,
    host: {
      last_check: lookup.value.last_check,
      status: lookup.value.status
    },
    container_manager: {}
  })
  return createResponse(envelope.id, status)
}
