import { Hono } from 'hono'
import type { PageRenderer } from '../pages/renderer.ts'
import { detectViewport } from '../pages/viewport.ts'
import type { ProviderClient } from '../providers/types/provider-client.ts'
import type { UserStore } from '../users/storage.ts'
import { runCallbackFlow } from './callback-flow.ts'
import type { DisplayNameFormatter } from './display-name.ts'

export interface FlowRouteDependencies {
  provider: ProviderClient
  userStore: UserStore
  renderer: PageRenderer
  formatDisplayName?: DisplayNameFormatter
}

const DEFAULT_ERROR_CODE = 'AUTH_FAILED'
const DEFAULT_ERROR_MESSAGE = 'Authorization was denied or expired.'

export const createFlowRoutes = (deps: FlowRouteDependencies): Hono => {
  const { provider, userStore, renderer, formatDisplayName } = deps
  const flows = new Hono()

  /**
   * GET /
   * Landing page with the connect link.
   */
  flows.get('/', (c) => {
    const viewport = detectViewport(c.req.header('user-agent'))
    const connectUrl = provider.isConfigured
      ? provider.getAuthorizationUrl()
      : null
    return c.html(renderer.renderLanding(viewport, connectUrl))
  })

  /**
   * GET /authorize
   * Redirect to the provider's authorization URL.
   * TODO: add a signed `state` value here and verify it in /callback.
   */
  flows.get('/authorize', (c) => {
    if (!provider.isConfigured) {
      return c.json(
        {
          error:
            'OAuth is not configured. Set DISCORD_CLIENT_ID and DISCORD_CLIENT_SECRET.',
        },
        503,
      )
    }
    return c.redirect(provider.getAuthorizationUrl(), 302)
  })

  /**
   * GET /callback
   * OAuth redirect target. Failures are rendered in-page with status 200.
   */
  flows.get('/callback', async (c) => {
    const result = await runCallbackFlow(
      {
        code: c.req.query('code'),
        error: c.req.query('error'),
        errorDescription: c.req.query('error_description'),
      },
      { provider, userStore, formatDisplayName },
      c.req.raw.signal,
    )
    const viewport = detectViewport(c.req.header('user-agent'))
    return c.html(renderer.render(result, viewport))
  })

  /**
   * GET /error
   * Renders the error screen from `code` and `message` query parameters.
   */
  flows.get('/error', (c) => {
    const viewport = detectViewport(c.req.header('user-agent'))
    return c.html(
      renderer.render(
        {
          kind: 'failure',
          code: c.req.query('code') || DEFAULT_ERROR_CODE,
          message: c.req.query('message') || DEFAULT_ERROR_MESSAGE,
        },
        viewport,
      ),
    )
  })

  return flows
}
