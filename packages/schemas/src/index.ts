export * from './logging'
export * from './models'
export * from './rpc'
