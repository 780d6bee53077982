import { log, logWarning } from '../plumbing/logger.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import type { ProviderClient } from '../providers/types/provider-client.ts'
import type { UserStore } from '../users/storage.ts'
import {
  type DisplayNameFormatter,
  formatLegacyDisplayName,
} from './display-name.ts'
import type { CallbackQuery, CallbackResult } from './types/callback-result.ts'

export const CALLBACK_ERROR_CODES = {
  notConfigured: 'NOT_CONFIGURED',
  noCode: 'NO_CODE',
  tokenError: 'TOKEN_ERROR',
  noToken: 'NO_TOKEN',
  userError: 'USER_ERROR',
  cancelled: 'CANCELLED',
} as const

export interface CallbackFlowDependencies {
  provider: ProviderClient
  userStore: UserStore
  formatDisplayName?: DisplayNameFormatter
  /** Epoch milliseconds; defaults to Date.now */
  now?: () => number
}

type FlowStage =
  | 'parsing_params'
  | 'exchanging'
  | 'fetching_profile'
  | 'persisting'

/**
 * Handles one OAuth redirect: code → access token → profile → stored user.
 * Each failure becomes a coded CallbackResult; store failures do not, since
 * the provider handshake itself succeeded.
 */
export const runCallbackFlow = async (
  query: CallbackQuery,
  deps: CallbackFlowDependencies,
  signal?: AbortSignal,
): Promise<CallbackResult> => {
  const {
    provider,
    userStore,
    formatDisplayName = formatLegacyDisplayName,
    now = Date.now,
  } = deps

  const fail = (
    stage: FlowStage,
    code: string,
    message: string,
  ): CallbackResult => {
    log({
      message: 'OAuth callback failed',
      provider: provider.name,
      stage,
      code,
    })
    logSecurityEvent({
      event: 'auth_failure',
      provider: provider.name,
      reason: code,
    })
    return { kind: 'failure', code, message }
  }

  if (query.error) {
    return fail(
      'parsing_params',
      query.error.toUpperCase(),
      query.errorDescription || 'Authorization was denied.',
    )
  }

  if (!query.code) {
    return fail(
      'parsing_params',
      CALLBACK_ERROR_CODES.noCode,
      'No authorization code received.',
    )
  }

  if (!provider.isConfigured) {
    return fail(
      'exchanging',
      CALLBACK_ERROR_CODES.notConfigured,
      'OAuth client credentials are not configured on this server.',
    )
  }

  const exchange = await provider.exchangeCode(query.code, signal)
  if (!exchange.ok) {
    return fail(
      'exchanging',
      CALLBACK_ERROR_CODES.tokenError,
      exchange.error.message,
    )
  }

  const accessToken = exchange.value.access_token
  if (typeof accessToken !== 'string' || accessToken.length === 0) {
    return fail(
      'exchanging',
      CALLBACK_ERROR_CODES.noToken,
      'No access token in response.',
    )
  }

  const profileResult = await provider.fetchProfile(accessToken, signal)
  if (!profileResult.ok) {
    return fail(
      'fetching_profile',
      CALLBACK_ERROR_CODES.userError,
      profileResult.error.message,
    )
  }
  const profile = profileResult.value

  // Nothing has been written yet; a disconnected client leaves no record behind
  if (signal?.aborted) {
    return fail(
      'persisting',
      CALLBACK_ERROR_CODES.cancelled,
      'Request was cancelled before the account was saved.',
    )
  }

  const stored = await userStore.upsert({
    id: profile.id,
    username: profile.username,
    discriminator: profile.discriminator,
    avatarHash: profile.avatarHash,
    connectedAt: Math.floor(now() / 1000),
  })

  if (stored.ok) {
    log({
      message: 'Linked user saved',
      provider: provider.name,
      user_id: profile.id,
    })
  } else {
    logWarning({
      message: 'Failed to save linked user',
      provider: provider.name,
      user_id: profile.id,
      error: stored.error.message,
    })
    logSecurityEvent({
      event: 'user_link_persist_failed',
      user_id: profile.id,
      provider: provider.name,
    })
  }

  logSecurityEvent({
    event: 'auth_success',
    user_id: profile.id,
    provider: provider.name,
  })

  return {
    kind: 'success',
    id: profile.id,
    displayName: formatDisplayName(profile),
  }
}
