import type {RemoteCallClient} from '@cluster-gateway/bus'
import type {CallEnvelope, CallResult} from '@cluster-gateway/schemas'

import type {ExtractionError} from '../errors'

/** A domain handler: one envelope in, one call result out. */
export type CallHandler = (envelope: CallEnvelope, bus: RemoteCallClient) => CallResult | Promise<CallResult>

/**
 * What the dispatcher can invoke. Handlers loaded from collections are only known
 * to take two arguments, so their output is classified before it is trusted.
 */
export type InvocableHandler = (envelope: CallEnvelope, bus: RemoteCallClient) => unknown

export type HandlerRef = InvocableHandler | string

export type RouteDefinition = Readonly<{
  pattern: string
  methodConstraint: ReadonlySet<string>
  segmentConstraints: Readonly<Record<string, string>>
  handlerRef: HandlerRef
  action?: string
}>

export type RouteRegistration = {
  pattern: string
  methods?: readonly string[]
  requirements?: Record<string, string>
  handler: HandlerRef
  action?: string
}

export type MatchResult = {
  route: RouteDefinition
  segments: Readonly<Record<string, string>>
}

export type DispatchOutcome =
  | {kind: 'routing_failure'; status: 404}
  | {kind: 'extraction_failure'; status: 400; error: ExtractionError}
  | {kind: 'handler_missing'; status: 404; handlerName: string}
  | {kind: 'domain_error'; status: 400 | 404 | 409; code: number; error: unknown}
  | {kind: 'unmapped_error'; status: 500; code: number | undefined}
  | {kind: 'unhandled_exception'; status: 500; error: unknown}
  | {kind: 'success'; status: 200 | 201; result: unknown}
  | {kind: 'malformed_result'; status: 404}
