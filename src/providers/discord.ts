import { err, ok } from '../plumbing/result.ts'
import { requestProviderJson } from './http.ts'
import type { DiscordConfig } from './types/discord-config.ts'
import type {
  ProviderCallError,
  ProviderClient,
  TokenResponse,
  UserProfile,
} from './types/provider-client.ts'

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined

/**
 * Snowflake ids arrive as JSON strings. A numeric id is accepted as sent,
 * but never converted the other way.
 */
const readId = (value: unknown): string | undefined => {
  if (typeof value === 'string' && value.length > 0) return value
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return String(value)
  }
  return undefined
}

const toUserProfile = (body: Record<string, unknown>): UserProfile | null => {
  const id = readId(body.id)
  const username = optionalString(body.username)
  if (!id || !username) {
    return null
  }
  const discriminator = optionalString(body.discriminator)
  const avatarHash = optionalString(body.avatar)
  return {
    id,
    username,
    ...(discriminator && { discriminator }),
    ...(avatarHash && { avatarHash }),
  }
}

/**
 * Build the Discord OAuth authorization URL.
 */
export const getDiscordAuthorizationUrl = (config: DiscordConfig): string => {
  if (!config.clientId) {
    throw new Error(
      'Discord OAuth is not configured: DISCORD_CLIENT_ID required',
    )
  }

  const params = new URLSearchParams({
    client_id: config.clientId,
    redirect_uri: config.redirectUri,
    response_type: 'code',
    scope: config.scopes.join(' '),
  })

  return `${config.authorizeUrl}?${params.toString()}`
}

/**
 * Discord token and profile endpoints. Uses the global fetch, whose
 * dispatcher keeps one keep-alive pool for the whole process.
 */
export const createDiscordClient = (config: DiscordConfig): ProviderClient => ({
  name: 'discord',
  isConfigured: config.isConfigured,

  getAuthorizationUrl: () => getDiscordAuthorizationUrl(config),

  exchangeCode: async (code, signal) => {
    const form = new URLSearchParams({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      grant_type: 'authorization_code',
      code,
      redirect_uri: config.redirectUri,
    })

    const result = await requestProviderJson(
      config.tokenUrl,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: form.toString(),
      },
      {
        timeoutMs: config.tokenTimeoutMs,
        signal,
        messages: {
          rejected: 'Token exchange failed',
          timeout: 'Token exchange timed out',
          network: 'Network error during token exchange',
          invalidJson: 'Invalid JSON response from token endpoint',
          describeErrorBody: (body) =>
            optionalString(body.error_description) ??
            optionalString(body.error),
        },
      },
    )
    if (!result.ok) {
      return result
    }
    const tokenResponse: TokenResponse = result.value
    return ok(tokenResponse)
  },

  fetchProfile: async (accessToken, signal) => {
    const result = await requestProviderJson(
      `${config.apiBaseUrl}/users/@me`,
      {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
        },
      },
      {
        timeoutMs: config.profileTimeoutMs,
        signal,
        messages: {
          rejected: 'Failed to fetch user info',
          timeout: 'User info request timed out',
          network: 'Network error fetching user info',
          invalidJson: 'Invalid JSON from user info endpoint',
          describeErrorBody: (body) => optionalString(body.message),
        },
      },
    )
    if (!result.ok) {
      return result
    }

    const profile = toUserProfile(result.value)
    if (!profile) {
      return err<ProviderCallError>({
        kind: 'invalid_response',
        message: 'User info response is missing id or username',
      })
    }
    return ok(profile)
  },
})
