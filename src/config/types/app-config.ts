import type { DiscordConfig } from '../../providers/types/discord-config.ts'

export interface ProxyConfig {
  /** When false, forwarded headers are ignored and socket/URL values are used */
  trustProxyHeaders: boolean
  hostHeader: string
  protoHeader: string
  /** Checked in order; X-Forwarded-For contributes its first entry */
  clientIpHeaders: string[]
}

export interface AppConfig {
  port: number
  provider: DiscordConfig
  proxy: ProxyConfig
  storeWriteTimeoutMs: number
  legacyDiscriminatorDisplay: boolean
  siteName: string
  supportContact?: string
}
