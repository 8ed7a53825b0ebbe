import {ClusterDeploySchema, JSONRPC_ERRORS} from '@cluster-gateway/schemas'

import type {CallHandler} from '../http/types'
import {createErrorResponse, createResponse, describeIssues, missingParameter, readString, returnError} from './responses'
import {attempt, storageGet, storageSave} from './storage'

export const getClusterDeploy: CallHandler = async (envelope, bus) => {
  const name = readString(envelope.params, 'name')
  if (!name) {
    return missingParameter(envelope, 'name')
  }

  const lookup = await attempt(() => storageGet(bus, 'ClusterDeploy', {name}, true))
  if (!lookup.ok) {
    return returnError(envelope, lookup.error, JSONRPC_ERRORS.NOT_FOUND)
  }

  const deploy = ClusterDeploySchema.safeParse(lookup.value)
  if (!deploy.success) {
    return createErrorResponse(envelope.id, {
      code: JSONRPC_ERRORS.INVALID_PARAMETERS,
      message: `Stored deploy record is invalid: ${describeIssues(deploy.error)}`
    })
  }

  return createResponse(envelope.id, deploy.data)
}

// Records the requested deploy. Starting the deploy itself is up to the storage consumers.
export const createClusterDeploy: CallHandler = async (envelope, bus) => {
  const deploy = ClusterDeploySchema.safeParse({
    name: envelope.params.name,
    version: envelope.params.version
  })
  if (!deploy.success) {
    return createErrorResponse(envelope.id, {
      code: JSONRPC_ERRORS.INVALID_PARAMETERS,
      message: describeIssues(deploy.error)
    })
  }

  const saved = await attempt(() => storageSave(bus, 'ClusterDeploy', deploy.data))
  if (!saved.ok) {
    return returnError(envelope, saved.error, JSONRPC_ERRORS.INTERNAL_ERROR)
  }

  return createResponse(envelope.id, saved.value)
}
