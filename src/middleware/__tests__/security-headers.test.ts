import { Hono } from 'hono'
import { describe, expect, it } from 'vitest'
import type { ProxyConfig } from '../../config/types/app-config.ts'
import { requestInfo } from '../request-info.ts'
import {
  buildContentSecurityPolicy,
  securityHeaders,
} from '../security-headers.ts'

const createTestApp = (options?: { imageOrigins?: string[] }) => {
  const app = new Hono()
  app.use('*', securityHeaders(options))
  app.get('/test', (c) => c.json({ ok: true }))
  app.get('/raw', () => new Response('raw body'))
  return app
}

describe('buildContentSecurityPolicy', () => {
  it('should allow images from the given origins', () => {
    expect(
      buildContentSecurityPolicy(['https://cdn.discordapp.com']),
    ).toContain("img-src 'self' data: https://cdn.discordapp.com")
  })

  it('should allow inline styles and scripts for the themed pages', () => {
    const policy = buildContentSecurityPolicy([])

    expect(policy).toContain("style-src 'self' 'unsafe-inline'")
    expect(policy).toContain("script-src 'self' 'unsafe-inline'")
    expect(policy).toContain("img-src 'self' data:;")
  })
})

describe('securityHeaders', () => {
  it('should set X-Content-Type-Options, X-Frame-Options, Referrer-Policy', async () => {
    const res = await createTestApp().request('/test')

    expect(res.status).toBe(200)
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
    expect(res.headers.get('X-Frame-Options')).toBe('SAMEORIGIN')
    expect(res.headers.get('Referrer-Policy')).toBe(
      'strict-origin-when-cross-origin',
    )
  })

  it('should set the content security policy', async () => {
    const res = await createTestApp({
      imageOrigins: ['https://cdn.discordapp.com'],
    }).request('/test')

    expect(res.headers.get('Content-Security-Policy')).toBe(
      buildContentSecurityPolicy(['https://cdn.discordapp.com']),
    )
  })

  it('should add headers to raw Response returns', async () => {
    const res = await createTestApp().request('/raw')

    expect(await res.text()).toBe('raw body')
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
  })

  it('should not set HSTS over plain HTTP', async () => {
    const res = await createTestApp().request('/test')

    expect(res.headers.get('Strict-Transport-Security')).toBeNull()
  })

  it('should set HSTS when request is over HTTPS', async () => {
    const res = await createTestApp().request('https://example.com/test')

    expect(res.headers.get('Strict-Transport-Security')).toBe(
      'max-age=31536000; includeSubDomains',
    )
  })

  it('should set HSTS when x-forwarded-proto is https', async () => {
    const res = await createTestApp().request('/test', {
      headers: { 'x-forwarded-proto': 'https' },
    })

    expect(res.headers.get('Strict-Transport-Security')).toBe(
      'max-age=31536000; includeSubDomains',
    )
  })

  it('should follow the scheme resolved by requestInfo', async () => {
    const proxy: ProxyConfig = {
      trustProxyHeaders: false,
      hostHeader: 'x-forwarded-host',
      protoHeader: 'x-forwarded-proto',
      clientIpHeaders: [],
    }
    const app = new Hono()
    app.use('*', requestInfo(proxy))
    app.use('*', securityHeaders())
    app.get('/test', (c) => c.json({ ok: true }))

    const res = await app.request('/test', {
      headers: { 'x-forwarded-proto': 'https' },
    })

    expect(res.headers.get('Strict-Transport-Security')).toBeNull()
  })
})
