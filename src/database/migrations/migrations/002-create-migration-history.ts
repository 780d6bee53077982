import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '002',
  name: 'create_migration_history',
  description: 'Create table recording applied and rolled back migrations',
  up: async (client, keyspace) => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.migration_history (
        version TEXT PRIMARY KEY,
        name TEXT,
        description TEXT,
        applied_at TIMESTAMP,
        rolled_back_at TIMESTAMP
      )
    `)
  },
  down: async (client, keyspace) => {
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.migration_history`)
  },
}
