import type { Context, MiddlewareHandler, Next } from 'hono'
import { isHttps } from './is-https.ts'

const HSTS_HEADER = 'max-age=31536000; includeSubDomains'

/**
 * Content Security Policy for the themed pages: inline styles and the
 * typewriter script, web fonts, and avatars from the provider's CDN.
 */
export const buildContentSecurityPolicy = (imageOrigins: string[]): string =>
  [
    "default-src 'self'",
    "style-src 'self' 'unsafe-inline' https://fonts.googleapis.com",
    "font-src 'self' https://fonts.gstatic.com",
    "script-src 'self' 'unsafe-inline'",
    ['img-src', "'self'", 'data:', ...imageOrigins].join(' '),
    "frame-ancestors 'self'",
  ].join('; ')

const mergeSecurityHeadersIntoResponse = (
  res: Response,
  headersToSet: Record<string, string>,
): Response => {
  const headers = new Headers(res.headers)
  for (const [name, value] of Object.entries(headersToSet)) {
    headers.set(name, value)
  }
  return new Response(res.body, {
    status: res.status,
    statusText: res.statusText,
    headers,
  })
}

/**
 * Security headers middleware. Sets standard security headers on all responses.
 * HSTS is only set when the request is over HTTPS.
 * Runs after next() too, so raw Response returns get the headers as well.
 */
export const securityHeaders = (options?: {
  imageOrigins?: string[]
}): MiddlewareHandler => {
  const baseHeaders: Record<string, string> = {
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'SAMEORIGIN',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
    'Permissions-Policy': 'geolocation=(), microphone=(), camera=()',
    'Content-Security-Policy': buildContentSecurityPolicy(
      options?.imageOrigins ?? [],
    ),
  }

  return async (c: Context, next: Next): Promise<void> => {
    const headersToSet = isHttps(c)
      ? { ...baseHeaders, 'Strict-Transport-Security': HSTS_HEADER }
      : baseHeaders

    await next()

    c.res = mergeSecurityHeadersIntoResponse(c.res, headersToSet)
  }
}
