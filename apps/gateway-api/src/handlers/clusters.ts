import type {RemoteCallClient} from '@cluster-gateway/bus'
import {
  CLUSTER_STATUS,
  ClusterSchema,
  DEFAULT_CLUSTER_NETWORK,
  HostSchema,
  JSONRPC_ERRORS,
  toSafeCluster,
  type Cluster
} from '@cluster-gateway/schemas'
import {z} from 'zod'

import type {CallHandler} from '../http/types'
import {createErrorResponse, createResponse, describeIssues, missingParameter, readString, returnError} from './responses'
import {attempt, storageDelete, storageGet, storageList, storageSave} from './storage'

const MemberListSchema = z.array(z.string().min(1))

const fetchCluster = async (bus: RemoteCallClient, name: string) =>
  ClusterSchema.parse(await storageGet(bus, 'Cluster', {name}, true))

const saveCluster = async (bus: RemoteCallClient, cluster: Cluster) =>
  ClusterSchema.parse(await storageSave(bus, 'Cluster', cluster))

const isActiveHost = async (bus: RemoteCallClient, address: string) => {
  const lookup = await attempt(() => storageGet(bus, 'Host', {address}))
  if (!lookup.ok) {
    return false
  }

  const host = HostSchema.safeParse(lookup.value)
  return host.success && host.data.status === 'active'
}

const sameMembers = (left: ReadonlySet<string>, right: ReadonlySet<string>) =>
  left.size === right.size && [...left].every(member => right.has(member))

export const listClusters: CallHandler = async (envelope, bus) => {
  const clusters = z.array(ClusterSchema).parse(await storageList(bus, 'Clusters'))
  return createResponse(
    envelope.id,
    clusters.map(cluster => cluster.name)
  )
}

/**
 * The cluster with host counts. Status is `degraded` when any member host is not
 * active and `failed` when none of at least one host is.
 */
export const getCluster: CallHandler = async (envelope, bus) => {
  const name = readString(envelope.params, 'name')
  if (!name) {
    return missingParameter(envelope, 'name')
  }

  const lookup = await attempt(() => fetchCluster(bus, name))
  if (!lookup.ok) {
    return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  const cluster = lookup.value
  let available = 0
  for (const address of cluster.hostset) {
    if (await isActiveHost(bus, address)) {
      available += 1
    }
  }

  const total = cluster.hostset.length
  const unavailable = total - available
  let status: string = CLUSTER_STATUS.OK
  if (total > 0 && unavailable === total) {
    status = CLUSTER_STATUS.FAILED
  } else if (unavailable > 0) {
    status = CLUSTER_STATUS.DEGRADED
  }

  return createResponse(envelope.id, {
    ...toSafeCluster(cluster),
    status,
    hosts: {total, available, unavailable}
  })
}

export const createCluster: CallHandler = async (envelope, bus) => {
  const name = readString(envelope.params, 'name')
  if (!name) {
    return missingParameter(envelope, 'name')
  }

  const params: Record<string, unknown> = {...envelope.params}
  const existing = await attempt(() => fetchCluster(bus, name))
  const network = readString(params, 'network')
  if (!existing.ok && network) {
    const knownNetwork = await attempt(() => storageGet(bus, 'Network', {name: network}))
    if (!knownNetwork.ok) {
      params.network = DEFAULT_CLUSTER_NETWORK.name
    }
  }

  const parsed = ClusterSchema.safeParse(params)
  if (!parsed.success) {
    return createErrorResponse(envelope.id, {
      code: JSONRPC_ERRORS.INVALID_REQUEST,
      message: describeIssues(parsed.error)
    })
  }

  const saved = await saveCluster(bus, parsed.data)
  return createResponse(envelope.id, toSafeCluster(saved))
}

export const deleteCluster: CallHandler = async (envelope, bus) => {
  const name = readString(envelope.params, 'name')
  if (!name) {
    return missingParameter(envelope, 'name')
  }

  const deleted = await attempt(() => storageDelete(bus, 'Cluster', {name}))
  if (!deleted.ok) {
    return returnError(envelope, deleted.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  return createResponse(envelope.id, [])
}

export const listClusterMembers: CallHandler = async (envelope, bus) => {
  const name = readString(envelope.params, 'name')
  if (!name) {
    return missingParameter(envelope, 'name')
  }

  const lookup = await attempt(() => fetchCluster(bus, name))
  if (!lookup.ok) {
    return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  return createResponse(envelope.id, lookup.value.hostset)
}

/** Replaces the member set when `old` equals the stored set; any other `old` is a conflict. */
export const updateClusterMembers: CallHandler = async (envelope, bus) => {
  const oldMembers = MemberListSchema.safeParse(envelope.params.old)
  const newMembers = MemberListSchema.safeParse(envelope.params.new)
  if (!oldMembers.success || !newMembers.success) {
    return createErrorResponse(envelope.id, {
      code: JSONRPC_ERRORS.BAD_REQUEST,
      message: '"old" and "new" must be lists of host addresses'
    })
  }

  const name = readString(envelope.params, 'name')
  if (!name) {
    return missingParameter(envelope, 'name')
  }

  const lookup = await attempt(() => fetchCluster(bus, name))
  if (!lookup.ok) {
    return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  const cluster = lookup.value
  if (!sameMembers(new Set(oldMembers.data), new Set(cluster.hostset))) {
    return createErrorResponse(envelope.id, {
      code: JSONRPC_ERRORS.CONFLICT,
      message: `Conflict setting hosts for cluster ${name}`
    })
  }

  const saved = await saveCluster(bus, {...cluster, hostset: [...new Set(newMembers.data)]})
  return createResponse(envelope.id, saved)
}

export const checkClusterMember: CallHandler = async (envelope, bus) => {
  const name = readString(envelope.params, 'name')
  const host = readString(envelope.params, 'host')
  if (!name || !host) {
    return missingParameter(envelope, name ? 'host' : 'name')
  }

  const lookup = await attempt(() => fetchCluster(bus, name))
  if (!lookup.ok) {
    return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  if (!lookup.value.hostset.includes(host)) {
    return createErrorResponse(envelope.id, {
      code: JSONRPC_ERRORS.NOT_FOUND,
      message: 'The requested host is not part of the cluster.'
    })
  }

  return createResponse(envelope.id, [host])
}

export const addClusterMember: CallHandler = async (envelope, bus) => {
  const name = readString(envelope.params, 'name')
  const host = readString(envelope.params, 'host')
  if (!name || !host) {
    return missingParameter(envelope, name ? 'host' : 'name')
  }

  const lookup = await attempt(() => fetchCluster(bus, name))
  if (!lookup.ok) {
    return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  const cluster = lookup.value
  if (!cluster.hostset.includes(host)) {
    const saved = await attempt(() => saveCluster(bus, {...cluster, hostset: [...cluster.hostset, host]}))
    if (!saved.ok) {
      return returnError(envelope, saved.error, JSONRPC_ERRORS.INTERNAL_ERROR)
    }
  }

  return createResponse(envelope.id, [host])
}

export const deleteClusterMember: CallHandler = async (envelope, bus) => {
  const name = readString(envelope.params, 'name')
  const host = readString(envelope.params, 'host')
  if (!name || !host) {
    return missingParameter(envelope, name ? 'host' : 'name')
  }

  const removed = await attempt(async () => {
    const cluster = await fetchCluster(bus, name)
    if (cluster.hostset.includes(host)) {
      await saveCluster(bus, {...cluster, hostset: cluster.hostset.filter(member => member !== host)})
    }
  })
  if (!removed.ok) {
    return returnError(envelope, removed.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  return createResponse(envelope.id, [])
}
