#!/usr/bin/env node
import 'dotenv/config'
import type { Client } from 'cassandra-driver'
import { closeDatabase, connectDatabase } from '../client.ts'
import { getDatabaseConfig } from '../config.ts'
import { loadMigrations } from './loader.ts'
import { runMigrations } from './runner.ts'
import { getMigrationStatus } from './status.ts'

const command = process.argv[2]

const main = async (): Promise<void> => {
  const config = getDatabaseConfig()
  let client: Client | null = null

  try {
    // Connect without keyspace to allow migrations to create it
    client = await connectDatabase(config, { skipKeyspace: true })
    if (!client) {
      console.error('Database is disabled for this environment')
      process.exitCode = 1
      return
    }

    const migrations = loadMigrations()

    switch (command) {
      case 'up': {
        await runMigrations(client, config.keyspace, migrations, 'up')
        console.log('Migrations applied successfully')
        break
      }
      case 'down': {
        await runMigrations(client, config.keyspace, migrations, 'down')
        console.log('Migration rolled back successfully')
        break
      }
      case 'status': {
        const status = await getMigrationStatus(
          client,
          config.keyspace,
          migrations,
        )
        console.table(
          status.map((s) => ({
            version: s.version,
            name: s.name,
            applied: s.applied ? '✓' : '✗',
            appliedAt: s.appliedAt?.toISOString() ?? '-',
            rolledBackAt: s.rolledBackAt?.toISOString() ?? '-',
          })),
        )
        break
      }
      default: {
        console.log('Usage: migrate [up|down|status]')
        console.log('  up     - Apply pending migrations')
        console.log('  down   - Rollback last migration')
        console.log('  status - Show migration status')
        process.exitCode = 1
      }
    }
  } catch (error) {
    console.error('Migration error:', error)
    process.exitCode = 1
  } finally {
    await closeDatabase(client)
  }
}

main().catch((error) => {
  console.error('Fatal error:', error)
  process.exit(1)
})
