import { getConnInfo } from '@hono/node-server/conninfo'
import type { Context, MiddlewareHandler } from 'hono'
import { nanoid } from 'nanoid'
import type { ProxyConfig } from '../config/types/app-config.ts'

export interface RequestDetails {
  clientIp: string
  scheme: 'http' | 'https'
  host: string
  requestId: string
}

const REQUEST_ID_HEADERS = ['x-amzn-trace-id', 'x-request-id']

const toScheme = (value: string | undefined): 'http' | 'https' | undefined => {
  const normalized = value?.trim().toLowerCase()
  return normalized === 'https' || normalized === 'http' ? normalized : undefined
}

const getSocketAddress = (c: Context): string => {
  try {
    const info = getConnInfo(c)
    const address = info.remote.address
    if (address) return address
  } catch {
    // getConnInfo requires Node server bindings; unavailable under app.request
  }
  return 'unknown'
}

const getUrl = (c: Context): URL | null => {
  try {
    return new URL(c.req.url)
  } catch {
    return null
  }
}

const readClientIp = (c: Context, proxy: ProxyConfig): string | undefined => {
  for (const headerName of proxy.clientIpHeaders) {
    const value = c.req.header(headerName)?.trim()
    if (!value) continue
    // X-Forwarded-For lists the original client first
    const first = value.split(',')[0]?.trim()
    if (first) return first
  }
  return undefined
}

const readScheme = (
  c: Context,
  proxy: ProxyConfig,
): 'http' | 'https' | undefined => {
  const visitor = c.req.header('cf-visitor')
  if (visitor) {
    try {
      const parsed: unknown = JSON.parse(visitor)
      if (typeof parsed === 'object' && parsed !== null && 'scheme' in parsed) {
        const scheme = toScheme(String(parsed.scheme))
        if (scheme) return scheme
      }
    } catch {
      // malformed CF-Visitor: fall back to the proto header
    }
  }
  return toScheme(c.req.header(proxy.protoHeader))
}

/**
 * Resolves the client address, scheme, host and request id, preferring
 * reverse-proxy headers when they are trusted.
 */
export const resolveRequestDetails = (
  c: Context,
  proxy: ProxyConfig,
): RequestDetails => {
  const url = getUrl(c)
  const directScheme = url?.protocol === 'https:' ? 'https' : 'http'
  const directHost = c.req.header('host') ?? url?.host ?? 'localhost'
  const requestId =
    REQUEST_ID_HEADERS.map((name) => c.req.header(name)?.trim()).find(
      (value): value is string => Boolean(value),
    ) ?? nanoid()

  if (!proxy.trustProxyHeaders) {
    return {
      clientIp: getSocketAddress(c),
      scheme: directScheme,
      host: directHost,
      requestId,
    }
  }

  return {
    clientIp: readClientIp(c, proxy) ?? getSocketAddress(c),
    scheme: readScheme(c, proxy) ?? directScheme,
    host: c.req.header(proxy.hostHeader)?.trim() || directHost,
    requestId,
  }
}

/** Stores RequestDetails as `requestInfo` and echoes the id in X-Request-Id. */
export const requestInfo = (proxy: ProxyConfig): MiddlewareHandler => {
  return async (c, next) => {
    const details = resolveRequestDetails(c, proxy)
    c.set('requestInfo', details)
    c.header('X-Request-Id', details.requestId)
    await next()
  }
}
