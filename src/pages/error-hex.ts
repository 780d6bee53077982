const FNV_OFFSET_BASIS = 0x811c9dc5
const FNV_PRIME = 0x01000193

/**
 * Decorative "ERR 0xNNNN" value for the error screen: 32-bit FNV-1a of the
 * code masked to 16 bits. Display only.
 */
export const errorHexCode = (code: string): string => {
  let hash = FNV_OFFSET_BASIS
  for (let i = 0; i < code.length; i++) {
    hash ^= code.charCodeAt(i)
    hash = Math.imul(hash, FNV_PRIME) >>> 0
  }
  return (hash & 0xffff).toString(16).toUpperCase().padStart(4, '0')
}
