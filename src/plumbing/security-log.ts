/**
 * Audit logging for account linking.
 * Never logs authorization codes, access tokens or client secrets.
 */

import { log } from './logger.ts'

export interface AuthSuccessEvent {
  event: 'auth_success'
  user_id: string
  provider: string
}

export interface AuthFailureEvent {
  event: 'auth_failure'
  provider: string
  /** Error code shown to the user */
  reason: string
}

export interface UserLinkPersistFailedEvent {
  event: 'user_link_persist_failed'
  user_id: string
  provider: string
}

export type SecurityEvent =
  | AuthSuccessEvent
  | AuthFailureEvent
  | UserLinkPersistFailedEvent

export const logSecurityEvent = (event: SecurityEvent): void => {
  log({
    message: 'Security event',
    security_event: event,
  })
}
