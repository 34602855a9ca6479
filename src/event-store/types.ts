/**
 * Notification Log Types
 *
 * Notifications are append-only log entries, never queryable state. Amounts
 * travel as decimal strings so the log stays plain JSON.
 */

export enum NotificationType {
  ISSUER_AUTHORIZED = 'ISSUER_AUTHORIZED',
  ISSUER_DEAUTHORIZED = 'ISSUER_DEAUTHORIZED',
  ISSUER_AUTHORIZATION_TRANSFERRED = 'ISSUER_AUTHORIZATION_TRANSFERRED',
  ISSUER_ACTIVITY = 'ISSUER_ACTIVITY',
}

export interface IssuerAuthorizedPayload {
  type: NotificationType.ISSUER_AUTHORIZED;
  identity: string;
  expirationBlock: number;
}

export interface IssuerDeauthorizedPayload {
  type: NotificationType.ISSUER_DEAUTHORIZED;
  identity: string;
  initiatedBy: string;
  cooldownUntil?: number;
}

export interface IssuerAuthorizationTransferredPayload {
  type: NotificationType.ISSUER_AUTHORIZATION_TRANSFERRED;
  from: string;
  to: string;
  position: number;
}

export interface IssuerActivityPayload {
  type: NotificationType.ISSUER_ACTIVITY;
  identity: string;
  mintedThisCall: string;
  burnedThisCall: string;
  totalMinted: string;
  totalBurned: string;
  mintCount: number;
  burnCount: number;
}

export type NotificationPayload =
  | IssuerAuthorizedPayload
  | IssuerDeauthorizedPayload
  | IssuerAuthorizationTransferredPayload
  | IssuerActivityPayload;

/**
 * A committed notification, linked to its predecessor by hash.
 */
export interface NotificationEvent {
  eventHash: string;
  prevEventHash: string;
  sequenceNumber: number;
  block: number;
  action: string;
  payload: NotificationPayload;
  createdAt: number;
}

export interface EventStoreState {
  headHash: string;
  sequenceNumber: number;
  eventCount: number;
  lastBlock: number;
}
