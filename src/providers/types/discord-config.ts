export interface DiscordConfig {
  clientId: string
  clientSecret: string
  isConfigured: boolean
  /** Must match the redirect URI registered with the application exactly */
  redirectUri: string
  authorizeUrl: string
  tokenUrl: string
  apiBaseUrl: string
  scopes: string[]
  tokenTimeoutMs: number
  profileTimeoutMs: number
}
