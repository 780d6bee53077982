import type { Result } from '../../plumbing/result.ts'

/**
 * Token endpoint payload. Only `access_token` is read; its presence is
 * checked by the caller.
 */
export interface TokenResponse {
  access_token?: unknown
  token_type?: unknown
  expires_in?: unknown
  refresh_token?: unknown
  scope?: unknown
  [key: string]: unknown
}

export interface UserProfile {
  /** Provider-issued id, kept as the exact string the provider sent */
  id: string
  username: string
  discriminator?: string
  avatarHash?: string
}

export type ProviderCallError =
  | { kind: 'timeout'; message: string }
  | { kind: 'rejected'; status: number; message: string }
  | { kind: 'network'; message: string }
  | { kind: 'invalid_response'; message: string }

export interface ProviderClient {
  readonly name: string
  readonly isConfigured: boolean
  getAuthorizationUrl: () => string
  exchangeCode: (
    code: string,
    signal?: AbortSignal,
  ) => Promise<Result<TokenResponse, ProviderCallError>>
  fetchProfile: (
    accessToken: string,
    signal?: AbortSignal,
  ) => Promise<Result<UserProfile, ProviderCallError>>
}
