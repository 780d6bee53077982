import { Hono } from 'hono'
import { describe, expect, it } from 'vitest'
import type { ProxyConfig } from '../../config/types/app-config.ts'
import { requestInfo } from '../request-info.ts'

const trustedProxy: ProxyConfig = {
  trustProxyHeaders: true,
  hostHeader: 'x-forwarded-host',
  protoHeader: 'x-forwarded-proto',
  clientIpHeaders: ['CF-Connecting-IP', 'X-Real-IP', 'X-Forwarded-For'],
}

const createTestApp = (proxy: ProxyConfig) => {
  const app = new Hono()
  app.use('*', requestInfo(proxy))
  app.get('/info', (c) => c.json(c.get('requestInfo')))
  return app
}

describe('requestInfo', () => {
  it('should fall back to the URL when no proxy headers are sent', async () => {
    const res = await createTestApp(trustedProxy).request('/info', {
      headers: { 'x-request-id': 'req-1' },
    })

    expect(await res.json()).toEqual({
      clientIp: 'unknown',
      scheme: 'http',
      host: 'localhost',
      requestId: 'req-1',
    })
  })

  it('should read trusted proxy headers', async () => {
    const res = await createTestApp(trustedProxy).request('/info', {
      headers: {
        'x-forwarded-for': '203.0.113.7, 10.0.0.2',
        'x-forwarded-proto': 'https',
        'x-forwarded-host': 'link.example.com',
        'x-request-id': 'req-2',
      },
    })

    expect(await res.json()).toEqual({
      clientIp: '203.0.113.7',
      scheme: 'https',
      host: 'link.example.com',
      requestId: 'req-2',
    })
  })

  it('should check client IP headers in the configured order', async () => {
    const res = await createTestApp(trustedProxy).request('/info', {
      headers: {
        'x-forwarded-for': '198.51.100.1',
        'x-real-ip': '198.51.100.2',
        'cf-connecting-ip': '198.51.100.3',
      },
    })

    expect(await res.json()).toMatchObject({ clientIp: '198.51.100.3' })
  })

  it('should prefer CF-Visitor over the proto header', async () => {
    const res = await createTestApp(trustedProxy).request('/info', {
      headers: {
        'cf-visitor': '{"scheme":"https"}',
        'x-forwarded-proto': 'http',
      },
    })

    expect(await res.json()).toMatchObject({ scheme: 'https' })
  })

  it('should ignore a malformed CF-Visitor header', async () => {
    const res = await createTestApp(trustedProxy).request('/info', {
      headers: {
        'cf-visitor': 'not json',
        'x-forwarded-proto': 'https',
      },
    })

    expect(await res.json()).toMatchObject({ scheme: 'https' })
  })

  it('should ignore proxy headers when they are not trusted', async () => {
    const res = await createTestApp({
      ...trustedProxy,
      trustProxyHeaders: false,
    }).request('/info', {
      headers: {
        'x-forwarded-for': '203.0.113.7',
        'x-forwarded-proto': 'https',
        'x-forwarded-host': 'evil.example.com',
        'x-request-id': 'req-3',
      },
    })

    expect(await res.json()).toEqual({
      clientIp: 'unknown',
      scheme: 'http',
      host: 'localhost',
      requestId: 'req-3',
    })
  })

  it('should echo the request id', async () => {
    const res = await createTestApp(trustedProxy).request('/info', {
      headers: { 'x-amzn-trace-id': 'Root=1-abc' },
    })

    expect(res.headers.get('X-Request-Id')).toBe('Root=1-abc')
  })

  it('should generate a request id when none is sent', async () => {
    const res = await createTestApp(trustedProxy).request('/info')

    const requestId = res.headers.get('X-Request-Id')
    expect(requestId).toMatch(/^[A-Za-z0-9_-]{21}$/)
    expect(await res.json()).toMatchObject({ requestId })
  })
})
