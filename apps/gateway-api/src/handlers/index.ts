import type {HandlerCollectionSource} from '../http/handlerRegistry'
import * as clusterOperations from './clusterOperations'
import * as clusters from './clusters'
import * as hosts from './hosts'
import {NetworkHandlers} from './networks'

export const BUILTIN_HANDLER_COLLECTIONS: readonly HandlerCollectionSource[] = [
  {name: 'handlers.clusters', load: () => clusters},
  {name: 'handlers.clusterOperations', load: () => clusterOperations},
  {name: 'handlers.hosts', load: () => hosts},
  {name: 'handlers.networks', load: () => ({NetworkHandlers})}
]
