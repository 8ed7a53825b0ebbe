export const GATEWAY_API_DISPATCHER = Symbol('GATEWAY_API_DISPATCHER')
