/**
 * Safely parse a string to a number. Returns fallback for empty, invalid, or non-finite values.
 */
export const parseNumber = (
  value: string | undefined,
  fallback: number,
): number => {
  if (!value) {
    return fallback
  }

  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    return fallback
  }

  return parsed
}

/**
 * Reads "true"/"false" (any case). Anything else yields the fallback.
 */
export const parseBoolean = (
  value: string | undefined,
  fallback: boolean,
): boolean => {
  const normalized = value?.trim().toLowerCase()
  if (normalized === 'true') return true
  if (normalized === 'false') return false
  return fallback
}

/**
 * Splits a comma-separated value, trimming entries and dropping empty ones.
 */
export const parseList = (
  value: string | undefined,
  fallback: string[],
): string[] => {
  if (!value) {
    return fallback
  }
  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
  return entries.length > 0 ? entries : fallback
}

/** Trimmed value, or the fallback when unset or blank. */
export const readString = (
  value: string | undefined,
  fallback: string,
): string => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : fallback
}
