import 'dotenv/config'
import { serve } from '@hono/node-server'
import type { Client } from 'cassandra-driver'
import { createApp } from './app.ts'
import { loadAppConfig } from './config/app-config.ts'
import { closeDatabase, connectDatabase } from './database/client.ts'
import { getDatabaseConfig } from './database/config.ts'
import { checkDatabaseHealth } from './database/health.ts'
import { getDisplayNameFormatter } from './flows/display-name.ts'
import { createPageRenderer } from './pages/renderer.ts'
import { errorMessage, log, logError, logWarning } from './plumbing/logger.ts'
import { createDiscordClient } from './providers/discord.ts'
import { DISCORD_CDN_ORIGIN } from './providers/discord-config.ts'
import {
  createScyllaUserStore,
  createUnavailableUserStore,
} from './users/storage.ts'

const SHUTDOWN_TIMEOUT_MS = 30_000

const main = async (): Promise<void> => {
  const config = loadAppConfig()
  const databaseConfig = getDatabaseConfig()

  if (!config.provider.isConfigured) {
    logWarning(
      'DISCORD_CLIENT_ID or DISCORD_CLIENT_SECRET is not set - callbacks will fail with NOT_CONFIGURED',
    )
  }

  let client: Client | null = null
  try {
    client = await connectDatabase(databaseConfig)
  } catch (error) {
    // Linking still completes for the user; records are not saved until restart
    logError({
      message: 'Starting without database',
      error: errorMessage(error),
    })
  }

  const userStore = client
    ? createScyllaUserStore(client, {
        keyspace: databaseConfig.keyspace,
        writeTimeoutMs: config.storeWriteTimeoutMs,
      })
    : createUnavailableUserStore('Database not connected')

  const app = createApp({
    config,
    provider: createDiscordClient(config.provider),
    userStore,
    renderer: createPageRenderer({
      siteName: config.siteName,
      providerLabel: 'DISCORD',
      supportContact: config.supportContact,
    }),
    checkStoreHealth: () => checkDatabaseHealth(client, databaseConfig),
    formatDisplayName: getDisplayNameFormatter(
      config.legacyDiscriminatorDisplay,
    ),
    imageOrigins: [DISCORD_CDN_ORIGIN],
  })

  const server = serve({ fetch: app.fetch, port: config.port }, (address) => {
    log({
      message: 'OAuth link service listening',
      port: String(address.port),
      redirectUri: config.provider.redirectUri,
    })
  })

  let isShuttingDown = false
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return
    isShuttingDown = true
    log({ message: 'Shutting down', signal })

    const forceExit = setTimeout(() => {
      logError('Graceful shutdown timed out')
      process.exit(1)
    }, SHUTDOWN_TIMEOUT_MS)
    forceExit.unref()

    await new Promise<void>((resolve) => {
      server.close(() => resolve())
    })
    await closeDatabase(client)
    log('Shutdown complete')
    process.exit(0)
  }

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        logError({ message: 'Shutdown failed', error: errorMessage(error) })
        process.exit(1)
      })
    })
  }
}

main().catch((error) => {
  logError({ message: 'Fatal startup error', error: errorMessage(error) })
  process.exit(1)
})
