import type { Client } from 'cassandra-driver'
import type { DatabaseConfig } from './types/database-config.ts'

export interface DatabaseHealthStatus {
  isHealthy: boolean
  message: string
  details?: {
    keyspaceExists?: boolean
    hostCount?: number
  }
}

type HealthClient = Pick<Client, 'execute'> & {
  hosts: { length: number }
}

export const checkDatabaseHealth = async (
  client: HealthClient | null,
  config: Pick<DatabaseConfig, 'keyspace'>,
): Promise<DatabaseHealthStatus> => {
  if (!client) {
    return {
      isHealthy: false,
      message: 'Database not connected',
    }
  }

  try {
    await client.execute('SELECT now() FROM system.local')

    const keyspaceQuery =
      'SELECT keyspace_name FROM system_schema.keyspaces WHERE keyspace_name = ?'
    const result = await client.execute(keyspaceQuery, [config.keyspace])
    const keyspaceExists = result.rows.length > 0

    return {
      isHealthy: true,
      message: 'Database connection is healthy',
      details: {
        keyspaceExists,
        hostCount: client.hosts.length,
      },
    }
  } catch (error) {
    return {
      isHealthy: false,
      message:
        error instanceof Error ? error.message : 'Database health check failed',
    }
  }
}
