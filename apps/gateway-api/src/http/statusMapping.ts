import {JSONRPC_ERRORS} from '@cluster-gateway/schemas'

export type MappedErrorStatus = 400 | 404 | 409

const STATUS_BY_ERROR_CODE = new Map<number, MappedErrorStatus>([
  [JSONRPC_ERRORS.BAD_REQUEST, 400],
  [JSONRPC_ERRORS.INVALID_PARAMETERS, 400],
  [JSONRPC_ERRORS.NOT_FOUND, 404],
  [JSONRPC_ERRORS.CONFLICT, 409]
])

/** Undefined means the code has no client-facing status and escalates to 500. */
export const statusForErrorCode = (code: number | undefined): MappedErrorStatus | undefined =>
  code === undefined ? undefined : STATUS_BY_ERROR_CODE.get(code)

// A PUT creates unless the route only adds to an existing resource.
export const statusForResult = ({method, action}: {method: string; action: string | undefined}): 200 | 201 =>
  method === 'PUT' && action !== 'add' ? 201 : 200
