/**
 * Storage Module Exports
 *
 * Atomic, crash-safe storage for issuance state.
 */

export { AtomicStorage, ChecksummedFile, ReadResult } from './atomic-storage';
export { deserializeRegistry, PersistedState, SerializedRegistry, serializeRegistry, StateStore } from './state-store';
