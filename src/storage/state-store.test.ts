import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createRegistryState } from '../issuance/types';
import { AtomicStorage } from './atomic-storage';
import { deserializeRegistry, isPersistedState, PersistedState, serializeRegistry, StateStore } from './state-store';

function sampleState(): PersistedState {
  const registry = createRegistryState();
  registry.issuerList.push('alice');
  registry.records.set('alice', {
    position: 0,
    startBlock: 3,
    expirationBlock: 103,
    totalMinted: 12_345_678_901_234_567_890n,
    mintCount: 2,
    totalBurned: 5n,
    burnCount: 1,
  });
  registry.cooldownUntil.set('bob', 90);

  return {
    block: 42,
    sequenceNumber: 6,
    registry: serializeRegistry(registry),
    ledger: { balances: [['carol', '12345678901234567885']], allowances: [['carol', 'alice', '7']] },
  };
}

describe('AtomicStorage', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'issuance-storage-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const isNumberList = (value: unknown): value is number[] =>
    Array.isArray(value) && value.every((v) => typeof v === 'number');

  it('round-trips data through a checksummed wrapper', () => {
    const file = path.join(tmpDir, 'data.json');
    AtomicStorage.writeFileAtomic(file, [1, 2, 3]);

    expect(AtomicStorage.readFileAtomic(file, isNumberList)).toEqual({ success: true, data: [1, 2, 3] });
  });

  it('recovers from the backup when the main file is corrupt', () => {
    const file = path.join(tmpDir, 'data.json');
    AtomicStorage.writeFileAtomic(file, [1]);
    AtomicStorage.writeFileAtomic(file, [2]);
    fs.writeFileSync(file, '{ not json');

    const result = AtomicStorage.readFileAtomic(file, isNumberList);
    expect(result).toEqual({ success: true, data: [1], recoveredFromBackup: true });
    expect(AtomicStorage.readFileAtomic(file, isNumberList).data).toEqual([1]);
  });

  it('rejects data of the wrong shape', () => {
    const file = path.join(tmpDir, 'data.json');
    AtomicStorage.writeFileAtomic(file, { not: 'a list' });

    const result = AtomicStorage.readFileAtomic(file, isNumberList);
    expect(result.success).toBe(false);
  });

  it('removes orphaned temp files', () => {
    fs.writeFileSync(path.join(tmpDir, 'data.json.tmp'), 'partial');
    expect(AtomicStorage.cleanupTempFiles(tmpDir)).toBe(1);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });
});

describe('StateStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'issuance-state-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns null before anything was saved', () => {
    expect(new StateStore(tmpDir).load()).toBeNull();
  });

  it('saves and loads registry, cooldowns and ledger', () => {
    const state = sampleState();
    new StateStore(tmpDir).save(state);

    const loaded = new StateStore(tmpDir).load();
    expect(loaded).toEqual(state);
    if (!loaded) return;

    const registry = deserializeRegistry(loaded.registry);
    expect(registry.records.get('alice')?.totalMinted).toBe(12_345_678_901_234_567_890n);
    expect(registry.cooldownUntil.get('bob')).toBe(90);
    expect(registry.issuerList).toEqual(['alice']);
  });

  it('throws when the saved state is unreadable', () => {
    const store = new StateStore(tmpDir);
    store.save(sampleState());
    fs.writeFileSync(path.join(tmpDir, 'issuance-state.json'), 'garbage');

    expect(() => store.load()).toThrow(/Cannot load issuance state/);
  });
});

describe('isPersistedState', () => {
  it('rejects amounts that are not decimal strings', () => {
    const state = sampleState();
    expect(isPersistedState(state)).toBe(true);
    expect(isPersistedState({ ...state, ledger: { balances: [['carol', '-1']], allowances: [] } })).toBe(false);
    expect(isPersistedState({ ...state, block: '42' })).toBe(false);
    expect(isPersistedState({ ...state, sequenceNumber: undefined })).toBe(false);
  });
});
