import { type Client, types } from 'cassandra-driver'
import { errorMessage } from '../plumbing/logger.ts'
import { err, ok, type Result } from '../plumbing/result.ts'
import type {
  StoreError,
  UserRecord,
  UserRecordInput,
} from './types/user-record.ts'

export interface UserStore {
  /**
   * Inserts or fully replaces the record for `record.id`, re-queuing it for
   * the downstream worker. Never throws.
   */
  upsert: (record: UserRecordInput) => Promise<Result<void, StoreError>>
}

export interface ScyllaUserStoreOptions {
  keyspace: string
  writeTimeoutMs: number
}

export const toStoredRecord = (record: UserRecordInput): UserRecord => ({
  ...record,
  processed: false,
  pulledResources: [],
})

/**
 * UserStore over the shared oauth_users table. A CQL INSERT naming every
 * column replaces the whole row, so re-linking resets the worker flags.
 */
export const createScyllaUserStore = (
  client: Pick<Client, 'execute'>,
  options: ScyllaUserStoreOptions,
): UserStore => ({
  upsert: async (input) => {
    const record = toStoredRecord(input)
    try {
      await client.execute(
        `INSERT INTO ${options.keyspace}.oauth_users
         (user_id, username, discriminator, avatar_hash, connected_at, processed, pulled_resources)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [
          record.id,
          record.username,
          record.discriminator ?? null,
          record.avatarHash ?? null,
          types.Long.fromNumber(record.connectedAt),
          record.processed,
          record.pulledResources,
        ],
        { prepare: true, readTimeout: options.writeTimeoutMs },
      )
      return ok(undefined)
    } catch (error) {
      return err<StoreError>({
        kind: 'unavailable',
        message: errorMessage(error),
      })
    }
  },
})

/**
 * Stand-in used when no database connection exists (disabled for the
 * environment, or unreachable at startup).
 */
export const createUnavailableUserStore = (reason: string): UserStore => ({
  upsert: async () =>
    err<StoreError>({ kind: 'unavailable', message: reason }),
})
