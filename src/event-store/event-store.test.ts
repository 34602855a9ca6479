import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { sha256 } from '../crypto';
import { canonicalCborEncode } from '../crypto/canonical-cbor';
import { AtomicStorage } from '../storage/atomic-storage';
import { calculateEventHash, EventStore } from './event-store';
import { NotificationPayload, NotificationType } from './types';

const authorized = (identity: string): NotificationPayload => ({
  type: NotificationType.ISSUER_AUTHORIZED,
  identity,
  expirationBlock: 110,
});

describe('EventStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'issuance-event-store-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('uses canonical CBOR + domain separation for eventHash', () => {
    const now = 1700000000000;
    const nowSpy = jest.spyOn(Date, 'now').mockReturnValue(now);

    try {
      const store = new EventStore(tmpDir);
      const payload = authorized('alice');
      const [event] = store.appendBatch([payload], 10, 'authorizeIssuer');

      const canonical = {
        prevEventHash: '',
        sequenceNumber: 1,
        block: 10,
        action: 'authorizeIssuer',
        payload,
        createdAt: now,
      };
      const domainSep = Buffer.from('ISSUANCE_EVT_V1_SHA256', 'utf8');
      const delimiter = Buffer.from([0x00]);
      const expectedHash = sha256(Buffer.concat([domainSep, delimiter, canonicalCborEncode(canonical)]));

      expect(event.eventHash).toBe(expectedHash);
    } finally {
      nowSpy.mockRestore();
    }
  });

  it('chains every event of a batch to its predecessor', () => {
    const store = new EventStore(tmpDir);
    const first = store.appendBatch([authorized('alice')], 10, 'authorizeIssuer');
    const second = store.appendBatch([authorized('bob'), authorized('carol')], 11, 'batch');

    expect(second.map((e) => e.sequenceNumber)).toEqual([2, 3]);
    expect(second[0].prevEventHash).toBe(first[0].eventHash);
    expect(second[1].prevEventHash).toBe(second[0].eventHash);

    const { eventHash, ...rest } = second[1];
    expect(calculateEventHash(rest)).toBe(eventHash);

    expect(store.getState()).toEqual({
      headHash: second[1].eventHash,
      sequenceNumber: 3,
      eventCount: 3,
      lastBlock: 11,
    });
  });

  it('ignores empty batches', () => {
    const store = new EventStore(tmpDir);
    expect(store.appendBatch([], 5, 'noop')).toEqual([]);
    expect(fs.existsSync(path.join(tmpDir, 'notifications.ndjson'))).toBe(false);
    expect(store.getState().sequenceNumber).toBe(0);
  });

  it('reloads the log and serves ranges', () => {
    const store = new EventStore(tmpDir);
    store.appendBatch([authorized('alice'), authorized('bob')], 10, 'a');
    store.appendBatch([authorized('carol')], 12, 'b');

    const reopened = new EventStore(tmpDir, { cacheSize: 1 });
    expect(reopened.getState()).toEqual(store.getState());
    expect(reopened.getEventsBySequence(2, 10).map((e) => e.payload)).toEqual([authorized('bob'), authorized('carol')]);
    expect(reopened.getEventBySequence(4)).toBeNull();
    expect(reopened.verifyHashChain()).toEqual({ valid: true });
  });

  it('detects a tampered event', () => {
    const store = new EventStore(tmpDir);
    store.appendBatch([authorized('alice'), authorized('bob')], 10, 'a');

    const logFile = path.join(tmpDir, 'notifications.ndjson');
    const content = fs.readFileSync(logFile, 'utf8');
    fs.writeFileSync(logFile, content.replace('"identity":"alice"', '"identity":"mallory"'));

    expect(new EventStore(tmpDir).verifyHashChain()).toEqual({ valid: false, error: 'Event 1 hash mismatch' });
  });

  it('detects committed events missing from the log', () => {
    const store = new EventStore(tmpDir);
    store.appendBatch([authorized('alice'), authorized('bob')], 10, 'a');

    const logFile = path.join(tmpDir, 'notifications.ndjson');
    const firstLine = fs.readFileSync(logFile, 'utf8').split('\n')[0];
    fs.writeFileSync(logFile, firstLine + '\n');

    expect(new EventStore(tmpDir).verifyHashChain()).toEqual({
      valid: false,
      error: 'Log holds 1 events but 2 were committed',
    });
  });

  it('truncates a torn final line on load', () => {
    const store = new EventStore(tmpDir);
    store.appendBatch([authorized('alice')], 10, 'a');

    const logFile = path.join(tmpDir, 'notifications.ndjson');
    const intactSize = fs.statSync(logFile).size;
    fs.appendFileSync(logFile, '{"eventHash":"partial');

    const reopened = new EventStore(tmpDir);
    expect(fs.statSync(logFile).size).toBe(intactSize);
    expect(reopened.getState().sequenceNumber).toBe(1);

    const [next] = reopened.appendBatch([authorized('bob')], 11, 'b');
    expect(next.sequenceNumber).toBe(2);
    expect(reopened.verifyHashChain()).toEqual({ valid: true });
  });

  it('leaves the log untouched when a batch cannot be written', () => {
    const store = new EventStore(tmpDir);
    store.appendBatch([authorized('alice')], 10, 'a');
    const logFile = path.join(tmpDir, 'notifications.ndjson');
    const sizeBefore = fs.statSync(logFile).size;

    const writeSpy = jest.spyOn(AtomicStorage, 'writeFileAtomic').mockImplementation(() => {
      throw new Error('ENOSPC: no space left on device');
    });
    try {
      expect(() => store.appendBatch([authorized('bob')], 11, 'b')).toThrow('ENOSPC');
    } finally {
      writeSpy.mockRestore();
    }

    expect(fs.statSync(logFile).size).toBe(sizeBefore);
    expect(store.getState().sequenceNumber).toBe(1);
    expect(store.appendBatch([authorized('carol')], 12, 'c')[0].sequenceNumber).toBe(2);
    expect(new EventStore(tmpDir).verifyHashChain()).toEqual({ valid: true });
  });

  it('truncates back to an earlier head', () => {
    const store = new EventStore(tmpDir);
    const [first] = store.appendBatch([authorized('alice')], 10, 'a');
    store.appendBatch([authorized('bob'), authorized('carol')], 11, 'b');

    store.truncateTo(1);

    expect(store.getState()).toEqual({ headHash: first.eventHash, sequenceNumber: 1, eventCount: 1, lastBlock: 10 });
    expect(store.getEventsBySequence(1, 10).map((e) => e.sequenceNumber)).toEqual([1]);

    const reopened = new EventStore(tmpDir);
    expect(reopened.verifyHashChain()).toEqual({ valid: true });
    const [next] = reopened.appendBatch([authorized('dave')], 12, 'd');
    expect(next).toMatchObject({ sequenceNumber: 2, prevEventHash: first.eventHash });
  });
});
