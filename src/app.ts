import { Hono } from 'hono'
import { compress } from 'hono/compress'
import info from '../package.json' with { type: 'json' }
import type { AppConfig } from './config/types/app-config.ts'
import type { DatabaseHealthStatus } from './database/health.ts'
import type { DisplayNameFormatter } from './flows/display-name.ts'
import { createFlowRoutes } from './flows/routes.ts'
import { requestInfo } from './middleware/request-info.ts'
import { securityHeaders } from './middleware/security-headers.ts'
import type { PageRenderer } from './pages/renderer.ts'
import { errorMessage, logError } from './plumbing/logger.ts'
import type { ProviderClient } from './providers/types/provider-client.ts'
import type { UserStore } from './users/storage.ts'

const { name, version } = info

export interface AppDependencies {
  config: AppConfig
  provider: ProviderClient
  userStore: UserStore
  renderer: PageRenderer
  checkStoreHealth: () => Promise<DatabaseHealthStatus>
  formatDisplayName?: DisplayNameFormatter
  /** Origins allowed in img-src, e.g. the provider's avatar CDN */
  imageOrigins?: string[]
}

export const createApp = (deps: AppDependencies): Hono => {
  const app = new Hono()

  app.use('*', requestInfo(deps.config.proxy))
  app.use('*', securityHeaders({ imageOrigins: deps.imageOrigins }))
  app.use('*', compress())

  app.get('/health', async (c) => {
    const store = await deps.checkStoreHealth()
    const details = c.get('requestInfo')
    return c.json(
      {
        status: store.isHealthy ? 'healthy' : 'degraded',
        timestamp: Math.floor(Date.now() / 1000),
        service: name,
        version,
        store: store.isHealthy ? 'connected' : 'disconnected',
        storeMessage: store.message,
        clientIp: details.clientIp,
        scheme: details.scheme,
        requestId: details.requestId,
      },
      store.isHealthy ? 200 : 503,
    )
  })

  app.route(
    '/',
    createFlowRoutes({
      provider: deps.provider,
      userStore: deps.userStore,
      renderer: deps.renderer,
      formatDisplayName: deps.formatDisplayName,
    }),
  )

  app.onError((error, c) => {
    logError({
      message: 'Unhandled request error',
      path: c.req.path,
      error: errorMessage(error),
    })
    return c.text('Internal Server Error', 500)
  })

  return app
}
