import type { Migration } from '../types.ts'

/** Lets the polling worker select rows with processed = false. */
export const migration: Migration = {
  version: '004',
  name: 'index_oauth_users_processed',
  description: 'Secondary index on oauth_users.processed',
  up: async (client, keyspace) => {
    await client.execute(`
      CREATE INDEX IF NOT EXISTS oauth_users_processed_idx
      ON ${keyspace}.oauth_users (processed)
    `)
  },
  down: async (client, keyspace) => {
    await client.execute(
      `DROP INDEX IF EXISTS ${keyspace}.oauth_users_processed_idx`,
    )
  },
}
