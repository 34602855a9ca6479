/**
 * State Store
 *
 * Persists the canonical record store (registry, cooldowns, ledger
 * balances and the clock height) inside every transaction, together with
 * the notification log head it corresponds to.
 */

import * as path from 'path';
import { IssuerRecord, RegistryState } from '../issuance/types';
import { LedgerSnapshot } from '../ledger/types';
import { AtomicStorage } from './atomic-storage';

interface SerializedIssuerRecord {
  position: number;
  startBlock: number;
  expirationBlock: number;
  totalMinted: string;
  mintCount: number;
  totalBurned: string;
  burnCount: number;
}

export interface SerializedRegistry {
  issuerList: string[];
  records: Array<[string, SerializedIssuerRecord]>;
  cooldownUntil: Array<[string, number]>;
}

export interface PersistedState {
  block: number;
  /** Notification log head at the time of the save */
  sequenceNumber: number;
  registry: SerializedRegistry;
  ledger: LedgerSnapshot;
}

export function serializeRegistry(state: RegistryState): SerializedRegistry {
  return {
    issuerList: [...state.issuerList],
    records: Array.from(state.records, ([identity, r]): [string, SerializedIssuerRecord] => [
      identity,
      { ...r, totalMinted: r.totalMinted.toString(), totalBurned: r.totalBurned.toString() },
    ]),
    cooldownUntil: Array.from(state.cooldownUntil),
  };
}

export function deserializeRegistry(data: SerializedRegistry): RegistryState {
  const records = new Map<string, IssuerRecord>();
  for (const [identity, r] of data.records) {
    records.set(identity, { ...r, totalMinted: BigInt(r.totalMinted), totalBurned: BigInt(r.totalBurned) });
  }
  return {
    issuerList: [...data.issuerList],
    records,
    cooldownUntil: new Map(data.cooldownUntil),
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isTuple(value: unknown, length: number): value is unknown[] {
  return Array.isArray(value) && value.length === length;
}

function isDecimal(value: unknown): value is string {
  return typeof value === 'string' && /^\d+$/.test(value);
}

function isSerializedRecord(value: unknown): value is SerializedIssuerRecord {
  if (!isObject(value)) return false;
  return ['position', 'startBlock', 'expirationBlock', 'mintCount', 'burnCount'].every((k) => Number.isSafeInteger(value[k]))
    && isDecimal(value.totalMinted)
    && isDecimal(value.totalBurned);
}

export function isPersistedState(value: unknown): value is PersistedState {
  if (!isObject(value) || !Number.isSafeInteger(value.block) || !Number.isSafeInteger(value.sequenceNumber)) return false;

  const { registry, ledger } = value;
  if (!isObject(registry) || !isObject(ledger)) return false;

  const { issuerList, records, cooldownUntil } = registry;
  if (!Array.isArray(issuerList) || !issuerList.every((i) => typeof i === 'string')) return false;
  if (!Array.isArray(records) || !records.every((e) => isTuple(e, 2) && typeof e[0] === 'string' && isSerializedRecord(e[1]))) {
    return false;
  }
  if (!Array.isArray(cooldownUntil) || !cooldownUntil.every((e) => isTuple(e, 2) && typeof e[0] === 'string' && Number.isSafeInteger(e[1]))) {
    return false;
  }

  const { balances, allowances } = ledger;
  if (!Array.isArray(balances) || !balances.every((e) => isTuple(e, 2) && typeof e[0] === 'string' && isDecimal(e[1]))) {
    return false;
  }
  return Array.isArray(allowances)
    && allowances.every((e) => isTuple(e, 3) && typeof e[0] === 'string' && typeof e[1] === 'string' && isDecimal(e[2]));
}

export class StateStore {
  private stateFile: string;

  constructor(private dataDir: string) {
    this.stateFile = path.join(dataDir, 'issuance-state.json');
  }

  /**
   * Null when nothing was ever saved. Throws when a saved state exists but
   * neither it nor its backup can be read.
   */
  load(): PersistedState | null {
    AtomicStorage.cleanupTempFiles(this.dataDir);
    if (!AtomicStorage.exists(this.stateFile)) {
      return null;
    }

    const result = AtomicStorage.readFileAtomic(this.stateFile, isPersistedState);
    if (!result.success || !result.data) {
      throw new Error(`Cannot load issuance state: ${result.error}`);
    }
    return result.data;
  }

  save(state: PersistedState): void {
    AtomicStorage.writeFileAtomic(this.stateFile, state);
  }
}
