import { parseList, parseNumber } from '../plumbing/env.ts'
import type { DatabaseConfig } from './types/database-config.ts'

export const getDatabaseConfig = (
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig => {
  const hosts = parseList(env.SCYLLA_HOSTS, ['localhost'])

  const port = parseNumber(env.SCYLLA_PORT, 9042)
  const keyspace = env.SCYLLA_KEYSPACE || 'oauth_link'
  const localDataCenter = env.SCYLLA_LOCAL_DATACENTER || 'datacenter1'
  const username = env.SCYLLA_USERNAME
  const password = env.SCYLLA_PASSWORD
  const isSslEnabled = env.SCYLLA_SSL === 'true'
  const connectTimeoutMs = parseNumber(env.SCYLLA_CONNECT_TIMEOUT_MS, 5_000)
  const poolSizeRaw = parseNumber(env.SCYLLA_POOL_SIZE, 0)

  return {
    hosts,
    port,
    keyspace,
    localDataCenter,
    username,
    password,
    isSslEnabled,
    connectTimeoutMs,
    ...(poolSizeRaw > 0 && { poolSize: poolSizeRaw }),
    connectRetries: parseNumber(env.SCYLLA_CONNECT_RETRIES, 3),
    connectRetryDelayMs: parseNumber(env.SCYLLA_CONNECT_RETRY_DELAY_MS, 1_000),
  }
}
