import { getMigrationHistory } from './runner.ts'
import type { Migration, MigrationClient, MigrationStatus } from './types.ts'

export const getMigrationStatus = async (
  client: MigrationClient,
  keyspace: string,
  migrations: Migration[],
): Promise<MigrationStatus[]> => {
  const history = await getMigrationHistory(client, keyspace)
  const byVersion = new Map(history.map((row) => [row.version, row]))

  return migrations.map((migration) => {
    const row = byVersion.get(migration.version)
    return {
      version: migration.version,
      name: migration.name,
      applied: row !== undefined && row.rolledBackAt === undefined,
      appliedAt: row?.appliedAt,
      rolledBackAt: row?.rolledBackAt,
    }
  })
}
