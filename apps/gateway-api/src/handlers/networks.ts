import type {RemoteCallClient} from '@cluster-gateway/bus'
import {JSONRPC_ERRORS, NetworkSchema, type CallEnvelope, type CallResult} from '@cluster-gateway/schemas'
import {z} from 'zod'

import {createErrorResponse, createResponse, describeIssues, missingParameter, readString, returnError} from './responses'
import {attempt, storageDelete, storageGet, storageList, storageSave} from './storage'

/** Network handlers, registered as `handlers.networks.NetworkHandlers.<method>`. */
export class NetworkHandlers {
  public async listNetworks(envelope: CallEnvelope, bus: RemoteCallClient): Promise<CallResult> {
    const networks = z.array(NetworkSchema).parse(await storageList(bus, 'Networks'))
    return createResponse(
      envelope.id,
      networks.map(network => network.name)
    )
  }

  public async getNetwork(envelope: CallEnvelope, bus: RemoteCallClient): Promise<CallResult> {
    const name = readString(envelope.params, 'name')
    if (!name) {
      return missingParameter(envelope, 'name')
    }

    const lookup = await attempt(() => storageGet(bus, 'Network', {name}))
    if (!lookup.ok) {
      return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
    }

    return createResponse(envelope.id, NetworkSchema.parse(lookup.value))
  }

  public async createNetwork(envelope: CallEnvelope, bus: RemoteCallClient): Promise<CallResult> {
    const parsed = NetworkSchema.safeParse(envelope.params)
    if (!parsed.success) {
      return createErrorResponse(envelope.id, {
        code: JSONRPC_ERRORS.INVALID_REQUEST,
        message: describeIssues(parsed.error)
      })
    }

    const saved = await storageSave(bus, 'Network', parsed.data)
    return createResponse(envelope.id, NetworkSchema.parse(saved))
  }

  public async deleteNetwork(envelope: CallEnvelope, bus: RemoteCallClient): Promise<CallResult> {
    const name = readString(envelope.params, 'name')
    if (!name) {
      return missingParameter(envelope, 'name')
    }

    const deleted = await attempt(() => storageDelete(bus, 'Network', {name}))
    if (!deleted.ok) {
      return returnError(envelope, deleted.error, JSONRPC_ERRORS.NOT_FOUND)
    }

    return createResponse(envelope.id, [])
  }
}
