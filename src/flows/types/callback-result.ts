export type CallbackResult =
  | { kind: 'success'; id: string; displayName: string }
  | { kind: 'failure'; code: string; message: string }

export interface CallbackQuery {
  code?: string
  error?: string
  errorDescription?: string
}
