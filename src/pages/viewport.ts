export type Viewport = 'desktop' | 'mobile'

const MOBILE_KEYWORDS = [
  'mobile',
  'android',
  'iphone',
  'ipad',
  'ipod',
  'webos',
  'blackberry',
  'opera mini',
  'opera mobi',
]

export const detectViewport = (userAgent: string | undefined): Viewport => {
  const normalized = (userAgent ?? '').toLowerCase()
  return MOBILE_KEYWORDS.some((keyword) => normalized.includes(keyword))
    ? 'mobile'
    : 'desktop'
}
