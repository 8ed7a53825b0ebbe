import {
  addClusterMember,
  checkClusterMember,
  createCluster,
  deleteCluster,
  deleteClusterMember,
  getCluster,
  listClusterMembers,
  listClusters,
  updateClusterMembers
} from './handlers/clusters'
import type {RouteTable} from './http/routeTable'

export const API_PREFIX = '/api/v0'

export const ROUTING_REQUIREMENTS = {
  name: '[a-zA-Z0-9\\-\\_]+',
  host: '[a-fA-F0-9:.]+',
  address: '[a-fA-F0-9:.]+'
} as const

const name = {name: ROUTING_REQUIREMENTS.name}
const nameAndHost = {name: ROUTING_REQUIREMENTS.name, host: ROUTING_REQUIREMENTS.host}
const address = {address: ROUTING_REQUIREMENTS.address}

const registerClusterRoutes = (table: RouteTable) => {
  table.register({pattern: `${API_PREFIX}/clusters/`, methods: ['GET'], handler: listClusters})
  table.register({pattern: `${API_PREFIX}/cluster/{name}/`, methods: ['GET'], requirements: name, handler: getCluster})
  table.register({pattern: `${API_PREFIX}/cluster/{name}/`, methods: ['PUT'], requirements: name, handler: createCluster})
  table.register({
    pattern: `${API_PREFIX}/cluster/{name}/`,
    methods: ['DELETE'],
    requirements: name,
    handler: deleteCluster
  })
  table.register({
    pattern: `${API_PREFIX}/cluster/{name}/hosts/`,
    methods: ['GET'],
    requirements: name,
    handler: listClusterMembers
  })
  table.register({
    pattern: `${API_PREFIX}/cluster/{name}/hosts/`,
    methods: ['PUT'],
    requirements: name,
    handler: updateClusterMembers,
    action: 'add'
  })
  table.register({
    pattern: `${API_PREFIX}/cluster/{name}/hosts/{host}/`,
    methods: ['GET'],
    requirements: nameAndHost,
    handler: checkClusterMember
  })
  table.register({
    pattern: `${API_PREFIX}/cluster/{name}/hosts/{host}/`,
    methods: ['PUT'],
    requirements: nameAndHost,
    handler: addClusterMember,
    action: 'add'
  })
  table.register({
    pattern: `${API_PREFIX}/cluster/{name}/hosts/{host}/`,
    methods: ['DELETE'],
    requirements: nameAndHost,
    handler: deleteClusterMember
  })
}

const registerClusterOperationRoutes = (table: RouteTable) => {
  table.register({
    pattern: `${API_PREFIX}/cluster/{name}/deploy`,
    methods: ['GET'],
    requirements: name,
    handler: 'handlers.clusterOperations.getClusterDeploy'
  })
  table.register({
    pattern: `${API_PREFIX}/cluster/{name}/deploy`,
    methods: ['PUT'],
    requirements: name,
    handler: 'handlers.clusterOperations.createClusterDeploy'
  })
}

const registerHostRoutes = (table: RouteTable) => {
  table.register({pattern: `${API_PREFIX}/hosts/`, methods: ['GET'], handler: 'handlers.hosts.listHosts'})
  table.register({
    pattern: `${API_PREFIX}/host/{address}/`,
    methods: ['GET'],
    requirements: address,
    handler: 'handlers.hosts.getHost'
  })
  table.register({
    pattern: `${API_PREFIX}/host/{address}/`,
    methods: ['PUT'],
    requirements: address,
    handler: 'handlers.hosts.createHost'
  })
  // The address may come from the body instead of the path.
  table.register({pattern: `${API_PREFIX}/host/`, methods: ['PUT'], handler: 'handlers.hosts.createHost'})
  table.register({
    pattern: `${API_PREFIX}/host/{address}/`,
    methods: ['DELETE'],
    requirements: address,
    handler: 'handlers.hosts.deleteHost'
  })
  table.register({
    pattern: `${API_PREFIX}/host/{address}/creds`,
    methods: ['GET'],
    requirements: address,
    handler: 'handlers.hosts.getHostCreds'
  })
  table.register({
    pattern: `${API_PREFIX}/host/{address}/status/`,
    methods: ['GET'],
    requirements: address,
    handler: 'handlers.hosts.getHostStatus'
  })
}

const registerNetworkRoutes = (table: RouteTable) => {
  table.register({
    pattern: `${API_PREFIX}/networks/`,
    methods: ['GET'],
    handler: 'handlers.networks.NetworkHandlers.listNetworks'
  })
  table.register({
    pattern: `${API_PREFIX}/network/{name}/`,
    methods: ['GET'],
    requirements: name,
    handler: 'handlers.networks.NetworkHandlers.getNetwork'
  })
  table.register({
    pattern: `${API_PREFIX}/network/{name}/`,
    methods: ['PUT'],
    requirements: name,
    handler: 'handlers.networks.NetworkHandlers.createNetwork'
  })
  table.register({
    pattern: `${API_PREFIX}/network/{name}/`,
    methods: ['DELETE'],
    requirements: name,
    handler: 'handlers.networks.NetworkHandlers.deleteNetwork'
  })
}

export const registerApiRoutes = (table: RouteTable) => {
  registerClusterRoutes(table)
  registerClusterOperationRoutes(table)
  registerHostRoutes(table)
  registerNetworkRoutes(table)
}
