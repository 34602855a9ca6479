/**
 * Issuance Types
 *
 * Shapes shared by the issuer registry, the mint factor calculator and the
 * issuance controller. Amounts are bigint; blocks, counts and positions are
 * plain safe integers.
 */

import { NotificationPayload } from '../event-store/types';

/** P2PKH address on the configured network */
export type Identity = string;

/** Fixed-point scale for every ratio (parts per 10,000) */
export const MINT_FACTOR_SCALE = 10_000;

export interface IssuerRecord {
  position: number;
  startBlock: number;
  expirationBlock: number;

  // Lifetime counters - only grow while the record exists
  totalMinted: bigint;
  mintCount: number;
  totalBurned: bigint;
  burnCount: number;
}

/**
 * Canonical registry state. Membership is the key set of `records`,
 * and `totalIssuers` is `issuerList.length`.
 */
export interface RegistryState {
  issuerList: Identity[];
  records: Map<Identity, IssuerRecord>;
  cooldownUntil: Map<Identity, number>;
}

/**
 * Deployment constants. Fixed for the life of the process.
 */
export interface IssuanceConfig {
  maxIssuers: number;
  issuerTermLength: number;
  baseMintFactor: number;
  supplyFloor: bigint;
  earlyExitThresholdBps: number;
  lowMintThreshold: number;
  burnBonusStep: number;
}

export const DEFAULT_ISSUANCE_CONFIG: Readonly<IssuanceConfig> = Object.freeze({
  maxIssuers: 10,
  issuerTermLength: 100_000,
  baseMintFactor: 1_000,        // 10% of supply per action
  supplyFloor: 1_000_000n,
  earlyExitThresholdBps: 9_500, // 95% of the term
  lowMintThreshold: 200,        // 2% of supply
  burnBonusStep: 100,           // 1% of supply per satisfied condition
});

/**
 * Identities the controller refuses as targets: the null identity and
 * its own identity.
 */
export interface ReservedIdentities {
  nullIdentity: Identity;
  controllerIdentity: Identity;
}

/**
 * What one operation sees of its host: the block it runs at and the
 * notification buffer it appends to. Both are fixed for the whole call.
 */
export interface OperationContext {
  readonly now: number;
  emit(payload: NotificationPayload): void;
}

export function createRegistryState(): RegistryState {
  return {
    issuerList: [],
    records: new Map(),
    cooldownUntil: new Map(),
  };
}

export function cloneRegistryState(state: RegistryState): RegistryState {
  const records = new Map<Identity, IssuerRecord>();
  for (const [identity, record] of state.records) {
    records.set(identity, { ...record });
  }
  return {
    issuerList: [...state.issuerList],
    records,
    cooldownUntil: new Map(state.cooldownUntil),
  };
}
