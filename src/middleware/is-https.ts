import type { Context } from 'hono'

/**
 * Returns true if the request is over HTTPS, as resolved by the requestInfo
 * middleware, or directly from the URL / x-forwarded-proto without it.
 */
export const isHttps = (c: Context): boolean => {
  const resolved = c.get('requestInfo')?.scheme
  if (resolved) return resolved === 'https'
  try {
    const url = new URL(c.req.url)
    if (url.protocol === 'https:') return true
  } catch {
    // ignore
  }
  return c.req.header('x-forwarded-proto') === 'https'
}
