import type { Client } from 'cassandra-driver'

export type MigrationClient = Pick<Client, 'execute'>

export interface Migration {
  version: string
  name: string
  description: string
  up: (client: MigrationClient, keyspace: string) => Promise<void>
  down: (client: MigrationClient, keyspace: string) => Promise<void>
}

export interface MigrationStatus {
  version: string
  name: string
  applied: boolean
  appliedAt?: Date
  rolledBackAt?: Date
}
