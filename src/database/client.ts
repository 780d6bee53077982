import { Client, type ClientOptions, types } from 'cassandra-driver'
import { errorMessage, log, logError } from '../plumbing/logger.ts'
import type { DatabaseConfig } from './types/database-config.ts'

export const isDatabaseEnabledForEnv = (
  env: NodeJS.ProcessEnv = process.env,
): boolean => {
  const isExplicitlyDisabled = env.SCYLLA_DISABLED === 'true'
  if (isExplicitlyDisabled) {
    return false
  }

  // By default, avoid opening real DB connections during tests
  // unless explicitly enabled via SCYLLA_ENABLE_IN_TESTS.
  if (env.NODE_ENV === 'test' && env.SCYLLA_ENABLE_IN_TESTS !== 'true') {
    return false
  }

  return true
}

export const getContactPoints = (config: DatabaseConfig): string[] =>
  config.hosts.map((host) => `${host}:${config.port}`)

const createCassandraClient = (
  config: DatabaseConfig,
  options?: { skipKeyspace?: boolean },
): Client => {
  const clientOptions: ClientOptions = {
    contactPoints: getContactPoints(config),
    localDataCenter: config.localDataCenter,
    // Migrations connect without a keyspace so they can create it
    keyspace: options?.skipKeyspace ? undefined : config.keyspace,
    credentials:
      config.username && config.password
        ? {
            username: config.username,
            password: config.password,
          }
        : undefined,
    sslOptions: config.isSslEnabled ? { rejectUnauthorized: true } : undefined,
    socketOptions: {
      connectTimeout: config.connectTimeoutMs,
    },
    pooling: config.poolSize
      ? {
          coreConnectionsPerHost: {
            [types.distance.local]: config.poolSize,
            [types.distance.remote]: 1,
          },
        }
      : undefined,
  }

  return new Client(clientOptions)
}

/**
 * Opens the process-wide pooled client, retrying `connectRetries` times.
 * Resolves to null when the database is disabled for this environment.
 */
export const connectDatabase = async (
  config: DatabaseConfig,
  options?: { skipKeyspace?: boolean; env?: NodeJS.ProcessEnv },
): Promise<Client | null> => {
  if (!isDatabaseEnabledForEnv(options?.env)) {
    log('Database initialization skipped for current environment')
    return null
  }

  const maxRetries = Math.max(1, config.connectRetries)
  let attempt = 0

  while (true) {
    attempt += 1
    const client = createCassandraClient(config, options)

    try {
      await client.connect()

      log({
        message: 'Database connection established',
        hosts: getContactPoints(config),
        keyspace: options?.skipKeyspace
          ? '(none - for migrations)'
          : config.keyspace,
        localDataCenter: config.localDataCenter,
        attempt,
      })

      return client
    } catch (error) {
      logError({
        message: 'Failed to connect to database',
        error: errorMessage(error),
        attempt,
      })
      try {
        await client.shutdown()
      } catch (shutdownError) {
        log({
          message: 'Error shutting down failed client',
          error: errorMessage(shutdownError),
        })
      }

      if (attempt >= maxRetries) {
        throw error instanceof Error
          ? error
          : new Error(String(error ?? 'Unknown database connection error'))
      }

      await new Promise((resolve) => {
        setTimeout(resolve, config.connectRetryDelayMs)
      })
    }
  }
}

export const closeDatabase = async (client: Client | null): Promise<void> => {
  if (!client) {
    return
  }

  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    logError({
      message: 'Error while closing database connection',
      error: errorMessage(error),
    })
  }
}
