import type { RequestDetails } from '../middleware/request-info.ts'

declare module 'hono' {
  interface ContextVariableMap {
    requestInfo: RequestDetails
  }
}

export {}
