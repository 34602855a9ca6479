/**
 * Event Store Module
 *
 * Notification types and the hash-chained notification log.
 */

export * from './types';
export * from './event-store';
