/**
 * Guard clauses shared by registry and controller operations.
 *
 * Each guard either returns (possibly a narrowed value) or throws an
 * IssuanceError. Operations call them at the top, in the order that
 * decides which failure a caller observes.
 */

import { CooldownTracker } from './cooldown-tracker';
import { IssuanceError } from './errors';
import { Identity, IssuerRecord, RegistryState, ReservedIdentities } from './types';

export function requireMember(state: RegistryState, identity: Identity): IssuerRecord {
  const record = state.records.get(identity);
  if (!record) {
    throw new IssuanceError('NotAuthorized', { identity });
  }
  return record;
}

export function requireUnexpired(identity: Identity, record: IssuerRecord, now: number): void {
  if (now >= record.expirationBlock) {
    throw new IssuanceError('TermExpired', { identity, expirationBlock: record.expirationBlock, block: now });
  }
}

/**
 * Member first, then unexpired.
 */
export function requireActiveIssuer(state: RegistryState, identity: Identity, now: number): IssuerRecord {
  const record = requireMember(state, identity);
  requireUnexpired(identity, record, now);
  return record;
}

export function requireNotMember(state: RegistryState, identity: Identity): void {
  if (state.records.has(identity)) {
    throw new IssuanceError('AlreadyAuthorized', { identity });
  }
}

export function requireCapacity(state: RegistryState, maxIssuers: number): void {
  if (state.issuerList.length >= maxIssuers) {
    throw new IssuanceError('CapReached', { maxIssuers });
  }
}

export function requireNoCooldown(cooldowns: CooldownTracker, identity: Identity, now: number): void {
  if (cooldowns.isCoolingDown(identity, now)) {
    throw new IssuanceError('CooldownActive', { identity, cooldownUntil: cooldowns.getCooldown(identity) });
  }
}

export function requireUsableTarget(
  identity: Identity,
  reserved: ReservedIdentities,
  code: 'InvalidTarget' | 'InvalidReceiver' = 'InvalidTarget'
): void {
  if (identity === reserved.nullIdentity || identity === reserved.controllerIdentity) {
    throw new IssuanceError(code, { identity });
  }
}

export function requirePositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new IssuanceError('InvalidAmount', { amount: amount.toString() });
  }
}
