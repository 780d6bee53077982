import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '001',
  name: 'create_keyspace',
  description: 'Create the service keyspace with SimpleStrategy replication',
  up: async (client, keyspace) => {
    await client.execute(`
      CREATE KEYSPACE IF NOT EXISTS ${keyspace}
      WITH REPLICATION = {
        'class': 'SimpleStrategy',
        'replication_factor': 1
      }
    `)
  },
  down: async (client, keyspace) => {
    await client.execute(`DROP KEYSPACE IF EXISTS ${keyspace}`)
  },
}
