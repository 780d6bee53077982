import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '003',
  name: 'create_oauth_users_table',
  description:
    'Create oauth_users table holding one linked provider account per user_id',
  up: async (client, keyspace) => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.oauth_users (
        user_id TEXT,
        username TEXT,
        discriminator TEXT,
        avatar_hash TEXT,
        connected_at BIGINT,
        processed BOOLEAN,
        pulled_resources LIST<TEXT>,
        PRIMARY KEY (user_id)
      )
    `)
  },
  down: async (client, keyspace) => {
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.oauth_users`)
  },
}
