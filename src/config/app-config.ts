import { getDiscordConfig } from '../providers/discord-config.ts'
import {
  parseBoolean,
  parseList,
  parseNumber,
  readString,
} from '../plumbing/env.ts'
import type { AppConfig } from './types/app-config.ts'

const DEFAULT_CLIENT_IP_HEADERS = [
  'CF-Connecting-IP',
  'X-Real-IP',
  'X-Forwarded-For',
]

const isHttpUrl = (value: string): boolean => /^https?:\/\/[^\s]+$/.test(value)

const validateConfig = (config: AppConfig): void => {
  const errors: string[] = []
  const { provider } = config

  if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
    errors.push('PORT must be an integer between 1 and 65535')
  }

  const urls: Array<[string, string]> = [
    ['OAUTH_REDIRECT_URI', provider.redirectUri],
    ['DISCORD_AUTHORIZE_URL', provider.authorizeUrl],
    ['DISCORD_TOKEN_URL', provider.tokenUrl],
    ['DISCORD_API_BASE', provider.apiBaseUrl],
  ]
  for (const [variable, value] of urls) {
    if (!isHttpUrl(value)) {
      errors.push(`${variable} must be a valid URL (http:// or https://)`)
    }
  }

  const timeouts: Array<[string, number]> = [
    ['TOKEN_TIMEOUT_MS', provider.tokenTimeoutMs],
    ['PROFILE_TIMEOUT_MS', provider.profileTimeoutMs],
    ['STORE_WRITE_TIMEOUT_MS', config.storeWriteTimeoutMs],
  ]
  for (const [variable, value] of timeouts) {
    if (value <= 0) {
      errors.push(`${variable} must be greater than zero`)
    }
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`)
  }
}

/**
 * Reads service configuration from the environment. Defaults are for local
 * development; deployments must set the provider credentials and redirect URI.
 */
export const loadAppConfig = (
  env: NodeJS.ProcessEnv = process.env,
): AppConfig => {
  const port = parseNumber(env.PORT, 3000)
  const supportContact = env.SUPPORT_CONTACT?.trim()

  const config: AppConfig = {
    port,
    provider: getDiscordConfig(env, port),
    proxy: {
      trustProxyHeaders: parseBoolean(env.TRUST_PROXY_HEADERS, true),
      hostHeader: readString(env.PROXY_HEADER_HOST, 'X-Forwarded-Host'),
      protoHeader: readString(env.PROXY_HEADER_PROTO, 'X-Forwarded-Proto'),
      clientIpHeaders: parseList(
        env.PROXY_HEADER_CLIENT_IP,
        DEFAULT_CLIENT_IP_HEADERS,
      ),
    },
    storeWriteTimeoutMs: parseNumber(env.STORE_WRITE_TIMEOUT_MS, 5_000),
    legacyDiscriminatorDisplay: parseBoolean(
      env.LEGACY_DISCRIMINATOR_DISPLAY,
      true,
    ),
    siteName: readString(env.SITE_NAME, 'LINK BIOS'),
    ...(supportContact && { supportContact }),
  }

  validateConfig(config)

  return config
}
