import {z} from 'zod'

export const CLUSTER_STATUS = {
  OK: 'ok',
  DEGRADED: 'degraded',
  FAILED: 'failed'
} as const

export const CLUSTER_TYPE_HOST = 'host_only'

// Stored records may carry keys these schemas do not name; they are stripped.
export const ClusterNameSchema = z.string().regex(/^[a-zA-Z0-9\-_]+$/u, 'name must be alphanumeric, dash or underscore')

export const NetworkSchema = z
  .object({
    name: ClusterNameSchema,
    type: z.enum(['flannel_etcd', 'flannel_server']).default('flannel_etcd'),
    options: z.record(z.string(), z.unknown()).default({})
  })

export type Network = z.infer<typeof NetworkSchema>

export const DEFAULT_CLUSTER_NETWORK: Network = {
  name: 'default',
  type: 'flannel_etcd',
  options: {}
}

export const ClusterSchema = z
  .object({
    name: ClusterNameSchema,
    status: z.string().default(''),
    type: z.string().min(1).default(CLUSTER_TYPE_HOST),
    network: ClusterNameSchema.default(DEFAULT_CLUSTER_NETWORK.name),
    hostset: z.array(z.string().min(1)).default([]),
    container_manager: z.string().min(1).optional()
  })

export type Cluster = z.infer<typeof ClusterSchema>

export const ClusterDeploySchema = z
  .object({
    name: ClusterNameSchema,
    version: z.string().min(1),
    status: z.string().default(''),
    launched: z.string().default(''),
    finished: z.string().default(''),
    deployed: z.array(z.string()).default([]),
    in_process: z.array(z.string()).default([])
  })

export type ClusterDeploy = z.infer<typeof ClusterDeploySchema>

export const HostSchema = z
  .object({
    address: z.string().min(1),
    status: z.string().default(''),
    os: z.string().default(''),
    cpus: z.number().int().default(-1),
    memory: z.number().int().default(-1),
    space: z.number().int().default(-1),
    last_check: z.string().default(''),
    ssh_priv_key: z.string().default(''),
    remote_user: z.string().min(1).default('root'),
    source: z.string().default('')
  })

export type Host = z.infer<typeof HostSchema>

export const HostStatusSchema = z
  .object({
    type: z.string().min(1),
    host: z
      .object({
        last_check: z.string(),
        status: z.string()
      })
      .strict(),
    container_manager: z.record(z.string(), z.unknown())
  })
  .strict()

export type HostStatus = z.infer<typeof HostStatusSchema>

export const toSafeCluster = ({hostset: _hostset, ...safe}: Cluster) => safe

export const toSafeHost = ({ssh_priv_key: _sshPrivKey, ...safe}: Host) => safe
