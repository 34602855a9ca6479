/**
 * Notification Log
 *
 * Append-only log of committed notifications with a hash chain.
 * Each event is content-addressed and linked to the previous event.
 *
 * Layout under dataDir:
 * - notifications.ndjson        one JSON event per line
 * - event-store-state.json      head hash and counters (atomic write)
 *
 * The log file is the source of truth; the state file lets startup detect
 * a log that lost committed events.
 */

import * as fs from 'fs';
import * as path from 'path';
import { sha256 } from '../crypto';
import { canonicalCborEncode } from '../crypto/canonical-cbor';
import { logger } from '../observability/structured-logger';
import { AtomicStorage } from '../storage/atomic-storage';
import { EventStoreState, NotificationEvent, NotificationPayload } from './types';

const DOMAIN_SEPARATOR = Buffer.from('ISSUANCE_EVT_V1_SHA256', 'utf8');

/**
 * Byte range of one event inside the log file, for O(1) reads
 */
interface LogIndexEntry {
  off: number;
  len: number;
}

function isEventStoreState(value: unknown): value is EventStoreState {
  if (value === null || typeof value !== 'object') return false;
  if (!('headHash' in value && 'sequenceNumber' in value && 'eventCount' in value && 'lastBlock' in value)) return false;
  return typeof value.headHash === 'string'
    && Number.isSafeInteger(value.sequenceNumber)
    && Number.isSafeInteger(value.eventCount)
    && Number.isSafeInteger(value.lastBlock);
}

export function calculateEventHash(event: Omit<NotificationEvent, 'eventHash'>): string {
  const canonical = {
    prevEventHash: event.prevEventHash,
    sequenceNumber: event.sequenceNumber,
    block: event.block,
    action: event.action,
    payload: event.payload,
    createdAt: event.createdAt,
  };
  const delimiter = Buffer.from([0x00]);
  return sha256(Buffer.concat([DOMAIN_SEPARATOR, delimiter, canonicalCborEncode(canonical)]));
}

export class EventStore {
  private logFile: string;
  private stateFile: string;
  private state: EventStoreState;
  private index: LogIndexEntry[] = [];

  // LRU event cache — avoids repeated disk reads for recent events
  private eventCache: Map<number, NotificationEvent> = new Map();
  private eventCacheMaxSize: number;

  constructor(dataDir: string, opts?: { cacheSize?: number }) {
    this.logFile = path.join(dataDir, 'notifications.ndjson');
    this.stateFile = path.join(dataDir, 'event-store-state.json');
    this.eventCacheMaxSize = opts?.cacheSize ?? (Number(process.env.ISSUANCE_EVENT_CACHE_SIZE) || 1000);

    fs.mkdirSync(dataDir, { recursive: true });
    AtomicStorage.cleanupTempFiles(dataDir);

    this.state = this.loadFromLog();
  }

  /**
   * Append all notifications of one committed transaction, in order.
   */
  appendBatch(payloads: NotificationPayload[], block: number, action: string): NotificationEvent[] {
    if (payloads.length === 0) return [];

    const createdAt = Date.now();
    const events: NotificationEvent[] = [];
    let prevEventHash = this.state.headHash;
    let sequenceNumber = this.state.sequenceNumber;

    for (const payload of payloads) {
      sequenceNumber += 1;
      const unsigned = { prevEventHash, sequenceNumber, block, action, payload, createdAt };
      const event: NotificationEvent = { eventHash: calculateEventHash(unsigned), ...unsigned };
      events.push(event);
      prevEventHash = event.eventHash;
    }

    const startOffset = fs.existsSync(this.logFile) ? fs.statSync(this.logFile).size : 0;
    const lines = events.map((event) => JSON.stringify(event) + '\n');
    const nextState: EventStoreState = {
      headHash: prevEventHash,
      sequenceNumber,
      eventCount: this.state.eventCount + events.length,
      lastBlock: block,
    };

    try {
      const fd = fs.openSync(this.logFile, 'a');
      try {
        fs.writeSync(fd, lines.join(''));
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      AtomicStorage.writeFileAtomic(this.stateFile, nextState);
    } catch (err) {
      // A batch is either fully in the log or not at all
      if (fs.existsSync(this.logFile)) {
        fs.truncateSync(this.logFile, startOffset);
      }
      throw err;
    }

    let offset = startOffset;
    events.forEach((event, i) => {
      const len = Buffer.byteLength(lines[i], 'utf8');
      this.index.push({ off: offset, len });
      offset += len;
      this.addToCache(event);
    });
    this.state = nextState;

    return events;
  }

  /**
   * Drop every event after `sequence`. Used to undo the append of a
   * transaction whose state could not be saved.
   */
  truncateTo(sequence: number): void {
    if (sequence >= this.state.sequenceNumber) return;

    const cut = this.index[sequence];
    fs.truncateSync(this.logFile, cut.off);
    this.index.length = sequence;
    for (const seq of Array.from(this.eventCache.keys())) {
      if (seq > sequence) this.eventCache.delete(seq);
    }

    const head = sequence > 0 ? this.readAt(this.index[sequence - 1]) : null;
    this.state = {
      headHash: head ? head.eventHash : '',
      sequenceNumber: sequence,
      eventCount: sequence,
      lastBlock: head ? head.block : 0,
    };
    AtomicStorage.writeFileAtomic(this.stateFile, this.state);
    logger.warn('EventStore', 'Log truncated', { sequence });
  }

  headSequence(): number {
    return this.state.sequenceNumber;
  }

  getEventBySequence(sequence: number): NotificationEvent | null {
    const cached = this.eventCache.get(sequence);
    if (cached) {
      // Move to end (most recently used) by re-inserting
      this.eventCache.delete(sequence);
      this.eventCache.set(sequence, cached);
      return cached;
    }

    const entry = this.index[sequence - 1];
    if (!entry) return null;

    const event = this.readAt(entry);
    this.addToCache(event);
    return event;
  }

  /**
   * Events with fromSequence <= sequenceNumber <= toSequence
   */
  getEventsBySequence(fromSequence: number, toSequence: number): NotificationEvent[] {
    const events: NotificationEvent[] = [];
    const last = Math.min(toSequence, this.state.sequenceNumber);
    for (let seq = Math.max(1, fromSequence); seq <= last; seq++) {
      const event = this.getEventBySequence(seq);
      if (event) events.push(event);
    }
    return events;
  }

  /**
   * Recompute every hash and chain link from disk.
   */
  verifyHashChain(): { valid: boolean; error?: string } {
    let prevHash = '';
    for (let seq = 1; seq <= this.index.length; seq++) {
      const event = this.readAt(this.index[seq - 1]);
      const { eventHash, ...rest } = event;

      if (event.sequenceNumber !== seq) {
        return { valid: false, error: `Event at line ${seq} has sequence ${event.sequenceNumber}` };
      }
      if (calculateEventHash(rest) !== eventHash) {
        return { valid: false, error: `Event ${seq} hash mismatch` };
      }
      if (event.prevEventHash !== prevHash) {
        return { valid: false, error: `Event ${seq} chain link broken` };
      }
      prevHash = eventHash;
    }

    const saved = this.readSavedState();
    if (saved && saved.sequenceNumber > this.index.length) {
      return { valid: false, error: `Log holds ${this.index.length} events but ${saved.sequenceNumber} were committed` };
    }
    return { valid: true };
  }

  getState(): EventStoreState {
    return { ...this.state };
  }

  // ============================================================================
  // Internals
  // ============================================================================

  /**
   * Build the byte index from the log. A torn final line (crash during
   * append) is truncated away.
   */
  private loadFromLog(): EventStoreState {
    const genesis: EventStoreState = { headHash: '', sequenceNumber: 0, eventCount: 0, lastBlock: 0 };
    if (!fs.existsSync(this.logFile)) return genesis;

    const raw = fs.readFileSync(this.logFile);
    let offset = 0;
    let state = genesis;

    while (offset < raw.length) {
      const newline = raw.indexOf(0x0a, offset);
      if (newline === -1) {
        logger.warn('EventStore', 'Truncating torn final log line', { offset, bytes: raw.length - offset });
        fs.truncateSync(this.logFile, offset);
        break;
      }

      const len = newline - offset + 1;
      const event: NotificationEvent = JSON.parse(raw.subarray(offset, newline).toString('utf8'));
      this.index.push({ off: offset, len });
      state = {
        headHash: event.eventHash,
        sequenceNumber: event.sequenceNumber,
        eventCount: state.eventCount + 1,
        lastBlock: event.block,
      };
      offset += len;
    }

    return state;
  }

  private readSavedState(): EventStoreState | null {
    if (!AtomicStorage.exists(this.stateFile)) return null;
    const result = AtomicStorage.readFileAtomic(this.stateFile, isEventStoreState);
    return result.success && result.data ? result.data : null;
  }

  private readAt(entry: LogIndexEntry): NotificationEvent {
    const fd = fs.openSync(this.logFile, 'r');
    try {
      const buf = Buffer.alloc(entry.len);
      fs.readSync(fd, buf, 0, entry.len, entry.off);
      return JSON.parse(buf.toString('utf8').trim());
    } finally {
      fs.closeSync(fd);
    }
  }

  private addToCache(event: NotificationEvent): void {
    while (this.eventCache.size >= this.eventCacheMaxSize) {
      const oldest = this.eventCache.keys().next();
      if (oldest.done) break;
      this.eventCache.delete(oldest.value);
    }
    this.eventCache.set(event.sequenceNumber, event);
  }
}
