import { parseList, parseNumber, readString } from '../plumbing/env.ts'
import type { DiscordConfig } from './types/discord-config.ts'

export const DISCORD_API_BASE = 'https://discord.com/api/v10'
export const DISCORD_AUTHORIZE_URL = 'https://discord.com/api/oauth2/authorize'
export const DISCORD_TOKEN_URL = 'https://discord.com/api/oauth2/token'
export const DISCORD_CDN_ORIGIN = 'https://cdn.discordapp.com'

export const DISCORD_SCOPES = ['identify'] as const

export const getDiscordConfig = (
  env: NodeJS.ProcessEnv,
  port: number,
): DiscordConfig => {
  const clientId = env.DISCORD_CLIENT_ID?.trim() ?? ''
  const clientSecret = env.DISCORD_CLIENT_SECRET?.trim() ?? ''
  return {
    clientId,
    clientSecret,
    isConfigured: clientId.length > 0 && clientSecret.length > 0,
    redirectUri: readString(
      env.OAUTH_REDIRECT_URI,
      `http://localhost:${port}/callback`,
    ),
    authorizeUrl: readString(env.DISCORD_AUTHORIZE_URL, DISCORD_AUTHORIZE_URL),
    tokenUrl: readString(env.DISCORD_TOKEN_URL, DISCORD_TOKEN_URL),
    apiBaseUrl: readString(env.DISCORD_API_BASE, DISCORD_API_BASE).replace(
      /\/$/,
      '',
    ),
    scopes: parseList(env.DISCORD_SCOPES?.replace(/\s+/g, ','), [
      ...DISCORD_SCOPES,
    ]),
    tokenTimeoutMs: parseNumber(env.TOKEN_TIMEOUT_MS, 30_000),
    profileTimeoutMs: parseNumber(env.PROFILE_TIMEOUT_MS, 15_000),
  }
}
