import { errorMessage, log, logError } from '../../plumbing/logger.ts'
import type { Migration, MigrationClient } from './types.ts'

export const ensureMigrationHistory = async (
  client: MigrationClient,
  keyspace: string,
): Promise<void> => {
  // The history table lives in the keyspace, so the keyspace comes first
  await client.execute(`
    CREATE KEYSPACE IF NOT EXISTS ${keyspace}
    WITH REPLICATION = {
      'class': 'SimpleStrategy',
      'replication_factor': 1
    }
  `)

  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${keyspace}.migration_history (
      version TEXT PRIMARY KEY,
      name TEXT,
      description TEXT,
      applied_at TIMESTAMP,
      rolled_back_at TIMESTAMP
    )
  `)
}

export interface MigrationHistoryRow {
  version: string
  appliedAt?: Date
  rolledBackAt?: Date
}

const toDate = (value: unknown): Date | undefined =>
  value instanceof Date ? value : undefined

/**
 * Fetch all migration history rows, including rolled-back ones.
 */
export const getMigrationHistory = async (
  client: MigrationClient,
  keyspace: string,
): Promise<MigrationHistoryRow[]> => {
  const result = await client.execute(
    `SELECT version, applied_at, rolled_back_at FROM ${keyspace}.migration_history`,
  )
  return result.rows.map((row) => ({
    version: String(row.version),
    appliedAt: toDate(row.applied_at),
    rolledBackAt: toDate(row.rolled_back_at),
  }))
}

export const getAppliedMigrations = async (
  client: MigrationClient,
  keyspace: string,
): Promise<string[]> => {
  // CQL doesn't support IS NULL in WHERE clauses, so we fetch all and filter in code
  const history = await getMigrationHistory(client, keyspace)
  return history
    .filter((row) => row.rolledBackAt === undefined)
    .map((row) => row.version)
}

export const recordMigration = async (
  client: MigrationClient,
  keyspace: string,
  migration: Migration,
  action: 'up' | 'down',
): Promise<void> => {
  const now = new Date()

  if (action === 'up') {
    await client.execute(
      `INSERT INTO ${keyspace}.migration_history (version, name, description, applied_at, rolled_back_at)
       VALUES (?, ?, ?, ?, ?)`,
      [migration.version, migration.name, migration.description, now, null],
      { prepare: true },
    )
  } else {
    await client.execute(
      `UPDATE ${keyspace}.migration_history
       SET rolled_back_at = ?
       WHERE version = ?`,
      [now, migration.version],
      { prepare: true },
    )
  }
}

export const runMigrations = async (
  client: MigrationClient,
  keyspace: string,
  migrations: Migration[],
  direction: 'up' | 'down' = 'up',
): Promise<void> => {
  await ensureMigrationHistory(client, keyspace)
  const appliedMigrations = await getAppliedMigrations(client, keyspace)

  if (direction === 'up') {
    const pendingMigrations = migrations
      .filter((m) => !appliedMigrations.includes(m.version))
      .sort((a, b) => a.version.localeCompare(b.version))

    for (const migration of pendingMigrations) {
      log({
        message: 'Running migration',
        version: migration.version,
        name: migration.name,
      })

      try {
        await migration.up(client, keyspace)
        await recordMigration(client, keyspace, migration, 'up')
        log({
          message: 'Migration completed',
          version: migration.version,
        })
      } catch (error) {
        logError({
          message: 'Migration failed',
          version: migration.version,
          error: errorMessage(error),
        })
        throw error
      }
    }
    return
  }

  const appliedMigrationsList = migrations
    .filter((m) => appliedMigrations.includes(m.version))
    .sort((a, b) => b.version.localeCompare(a.version))

  const lastMigration = appliedMigrationsList[0]
  if (!lastMigration) {
    log('No migrations to rollback')
    return
  }

  log({
    message: 'Rolling back migration',
    version: lastMigration.version,
    name: lastMigration.name,
  })

  try {
    await lastMigration.down(client, keyspace)
    await recordMigration(client, keyspace, lastMigration, 'down')
    log({
      message: 'Migration rolled back',
      version: lastMigration.version,
    })
  } catch (error) {
    logError({
      message: 'Migration rollback failed',
      version: lastMigration.version,
      error: errorMessage(error),
    })
    throw error
  }
}
