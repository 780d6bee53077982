import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createApp } from '../app.ts'
import { loadAppConfig } from '../config/app-config.ts'
import type { DatabaseHealthStatus } from '../database/health.ts'
import {
  createFakeProvider,
  createMemoryUserStore,
} from '../flows/__tests__/fakes.ts'
import { errorHexCode } from '../pages/error-hex.ts'
import { createPageRenderer } from '../pages/renderer.ts'
import type { ProviderClient } from '../providers/types/provider-client.ts'

const healthy: DatabaseHealthStatus = {
  isHealthy: true,
  message: 'Database connection is healthy',
}

const createTestApp = (
  options: {
    provider?: ProviderClient
    storeHealth?: DatabaseHealthStatus
  } = {},
) => {
  const memory = createMemoryUserStore()
  const provider = options.provider ?? createFakeProvider()
  const app = createApp({
    config: loadAppConfig({
      DISCORD_CLIENT_ID: 'test-client-id',
      DISCORD_CLIENT_SECRET: 'test-client-secret',
    }),
    provider,
    userStore: memory.store,
    renderer: createPageRenderer({
      siteName: 'LINK BIOS',
      providerLabel: 'DISCORD',
      now: () => new Date('2024-01-02T03:04:05Z'),
    }),
    checkStoreHealth: async () => options.storeHealth ?? healthy,
    imageOrigins: ['https://cdn.discordapp.com'],
  })
  return { app, provider, records: memory.records }
}

describe('app', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('GET /', () => {
    it('should render the landing page with the connect link', async () => {
      const { app } = createTestApp()

      const res = await app.request('/')

      expect(res.status).toBe(200)
      expect(res.headers.get('Content-Type')).toContain('text/html')
      expect(await res.text()).toContain(
        '<a href="https://discord.com/api/oauth2/authorize?client_id=test-client-id" class="connect-btn">[ CONNECT WITH DISCORD ]</a>',
      )
    })

    it('should leave out the connect link when not configured', async () => {
      const { app } = createTestApp({
        provider: createFakeProvider({ isConfigured: false }),
      })

      const html = await (await app.request('/')).text()

      expect(html).not.toContain('CONNECT WITH')
      expect(html).toContain('OAuth client credentials are not configured.')
    })

    it('should render the mobile layout for mobile user agents', async () => {
      const { app } = createTestApp()

      const res = await app.request('/', {
        headers: { 'User-Agent': 'Mozilla/5.0 (iPhone) Mobile/15E148' },
      })

      expect(await res.text()).toContain('<div class="screen mobile">')
    })

    it('should carry the security headers', async () => {
      const { app } = createTestApp()

      const res = await app.request('/')

      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
      expect(res.headers.get('Content-Security-Policy')).toContain(
        'https://cdn.discordapp.com',
      )
    })
  })

  describe('GET /authorize', () => {
    it('should redirect to the provider', async () => {
      const { app } = createTestApp()

      const res = await app.request('/authorize')

      expect(res.status).toBe(302)
      expect(res.headers.get('Location')).toBe(
        'https://discord.com/api/oauth2/authorize?client_id=test-client-id',
      )
    })

    it('should return 503 when not configured', async () => {
      const { app } = createTestApp({
        provider: createFakeProvider({ isConfigured: false }),
      })

      const res = await app.request('/authorize')

      expect(res.status).toBe(503)
      expect(await res.json()).toEqual({
        error:
          'OAuth is not configured. Set DISCORD_CLIENT_ID and DISCORD_CLIENT_SECRET.',
      })
    })
  })

  describe('GET /callback', () => {
    it('should link the account and render success', async () => {
      const { app, records } = createTestApp()

      const res = await app.request('/callback?code=abc')

      expect(res.status).toBe(200)
      const html = await res.text()
      expect(html).toContain('AUTHENTICATION SUCCESSFUL')
      expect(html).toContain('<span class="white">alice</span>')
      expect(records.get('123')).toMatchObject({
        id: '123',
        username: 'alice',
        processed: false,
        pulledResources: [],
      })
    })

    it('should render a provider error with status 200', async () => {
      const { app, provider } = createTestApp()

      const res = await app.request(
        '/callback?error=access_denied&error_description=User%20cancelled',
      )

      expect(res.status).toBe(200)
      const html = await res.text()
      expect(html).toContain(
        `<span class="fail">ERR 0x${errorHexCode('ACCESS_DENIED')}: ACCESS_DENIED</span>`,
      )
      expect(html).toContain('<span class="cyan">User cancelled</span>')
      expect(provider.exchangeCode).not.toHaveBeenCalled()
    })

    it('should render NO_CODE without a code', async () => {
      const { app } = createTestApp()

      const html = await (await app.request('/callback')).text()

      expect(html).toContain(
        `<span class="fail">ERR 0x518E: NO_CODE</span>`,
      )
    })
  })

  describe('GET /error', () => {
    it('should render the given code and message', async () => {
      const { app } = createTestApp()

      const html = await (
        await app.request('/error?code=TOKEN_ERROR&message=Expired%20code')
      ).text()

      expect(html).toContain(
        `<span class="fail">ERR 0x${errorHexCode('TOKEN_ERROR')}: TOKEN_ERROR</span>`,
      )
      expect(html).toContain('<span class="cyan">Expired code</span>')
    })

    it('should fall back to a generic failure', async () => {
      const { app } = createTestApp()

      const html = await (await app.request('/error')).text()

      expect(html).toContain(': AUTH_FAILED</span>')
      expect(html).toContain(
        '<span class="cyan">Authorization was denied or expired.</span>',
      )
    })
  })

  describe('GET /health', () => {
    it('should report healthy when the store is connected', async () => {
      const { app } = createTestApp()

      const res = await app.request('/health', {
        headers: { 'x-request-id': 'req-health' },
      })

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        status: 'healthy',
        timestamp: expect.any(Number),
        service: 'oauth-link-service',
        version: '1.0.0',
        store: 'connected',
        storeMessage: 'Database connection is healthy',
        clientIp: 'unknown',
        scheme: 'http',
        requestId: 'req-health',
      })
    })

    it('should report degraded with 503 when the store is down', async () => {
      const { app } = createTestApp({
        storeHealth: { isHealthy: false, message: 'Database not connected' },
      })

      const res = await app.request('/health')

      expect(res.status).toBe(503)
      expect(await res.json()).toMatchObject({
        status: 'degraded',
        store: 'disconnected',
        storeMessage: 'Database not connected',
      })
    })
  })

  describe('errors', () => {
    it('should answer unexpected failures with 500', async () => {
      const { app } = createTestApp({
        provider: createFakeProvider({
          getAuthorizationUrl: () => {
            throw new Error('boom')
          },
        }),
      })

      const res = await app.request('/authorize')

      expect(res.status).toBe(500)
      expect(await res.text()).toBe('Internal Server Error')
    })

    it('should return 404 for unknown routes', async () => {
      const { app } = createTestApp()

      const res = await app.request('/missing')

      expect(res.status).toBe(404)
    })
  })
})
