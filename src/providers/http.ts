import { errorMessage } from '../plumbing/logger.ts'
import { err, ok, type Result } from '../plumbing/result.ts'
import type { ProviderCallError } from './types/provider-client.ts'

export const MAX_ERROR_BODY_LENGTH = 200

export interface ProviderRequestMessages {
  /** e.g. "Token exchange failed" */
  rejected: string
  timeout: string
  network: string
  invalidJson: string
  /** Picks a readable description out of a JSON error body */
  describeErrorBody: (body: Record<string, unknown>) => string | undefined
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const truncate = (text: string): string =>
  text.length > MAX_ERROR_BODY_LENGTH
    ? text.slice(0, MAX_ERROR_BODY_LENGTH)
    : text

const describeRejection = (
  text: string,
  messages: ProviderRequestMessages,
): string => {
  try {
    const parsed: unknown = JSON.parse(text)
    if (isRecord(parsed)) {
      return messages.describeErrorBody(parsed) ?? 'Unknown error'
    }
  } catch {
    // not JSON: fall through to the raw body
  }
  return truncate(text)
}

/**
 * Issues one provider request bounded by `timeoutMs`. Never throws: timeouts,
 * transport failures, non-2xx statuses and unparseable bodies all come back as
 * a ProviderCallError. Aborting `signal` cancels the request.
 */
export const requestProviderJson = async (
  url: string,
  init: RequestInit,
  options: {
    timeoutMs: number
    signal?: AbortSignal
    messages: ProviderRequestMessages
  },
): Promise<Result<Record<string, unknown>, ProviderCallError>> => {
  const { timeoutMs, signal, messages } = options
  const controller = new AbortController()
  let hasTimedOut = false

  const timer = setTimeout(() => {
    hasTimedOut = true
    controller.abort()
  }, timeoutMs)
  const onCallerAbort = (): void => controller.abort()
  if (signal?.aborted) {
    controller.abort()
  } else {
    signal?.addEventListener('abort', onCallerAbort, { once: true })
  }

  try {
    const response = await fetch(url, { ...init, signal: controller.signal })
    const text = await response.text()

    if (!response.ok) {
      return err<ProviderCallError>({
        kind: 'rejected',
        status: response.status,
        message: `${messages.rejected} (${response.status}): ${describeRejection(text, messages)}`,
      })
    }

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (error) {
      return err<ProviderCallError>({
        kind: 'invalid_response',
        message: `${messages.invalidJson}: ${errorMessage(error)}`,
      })
    }
    if (!isRecord(body)) {
      return err<ProviderCallError>({
        kind: 'invalid_response',
        message: `${messages.invalidJson}: expected a JSON object`,
      })
    }
    return ok(body)
  } catch (error) {
    if (hasTimedOut) {
      return err<ProviderCallError>({
        kind: 'timeout',
        message: messages.timeout,
      })
    }
    if (signal?.aborted) {
      return err<ProviderCallError>({
        kind: 'network',
        message: 'Request cancelled',
      })
    }
    return err<ProviderCallError>({
      kind: 'network',
      message: `${messages.network}: ${errorMessage(error)}`,
    })
  } finally {
    clearTimeout(timer)
    signal?.removeEventListener('abort', onCallerAbort)
  }
}
