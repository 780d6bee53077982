/**
 * One provider account linked through the OAuth flow. Rows are picked up by
 * an external worker that polls for `processed === false`.
 */
export interface UserRecord {
  /** Provider-issued id, stored verbatim */
  id: string
  username: string
  /** Legacy suffix; absent or "0" for accounts without one */
  discriminator?: string
  avatarHash?: string
  /** Seconds since epoch of the most recent link */
  connectedAt: number
  processed: boolean
  pulledResources: string[]
}

/** What the flow supplies; the store fills `processed` and `pulledResources`. */
export type UserRecordInput = Omit<UserRecord, 'processed' | 'pulledResources'>

export type StoreError = { kind: 'unavailable'; message: string }
