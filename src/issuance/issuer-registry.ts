/**
 * Issuer Registry
 *
 * Owns the bounded set of authorized issuers:
 * - Dense `issuerList` plus `records[identity].position` as reverse index
 * - O(1) swap-and-truncate removal
 * - Term expiry, forced removal after expiry, bulk expiry sweep
 * - Verbatim record migration on authorization transfer
 *
 * Every mutating method takes the OperationContext of the running
 * transaction; it never reads a clock of its own.
 */

import { NotificationType } from '../event-store/types';
import { logger } from '../observability/structured-logger';
import { CooldownTracker } from './cooldown-tracker';
import { IssuanceError } from './errors';
import {
  requireActiveIssuer,
  requireCapacity,
  requireMember,
  requireNoCooldown,
  requireNotMember,
  requireUsableTarget,
} from './guards';
import {
  cloneRegistryState,
  Identity,
  IssuanceConfig,
  IssuerRecord,
  OperationContext,
  RegistryState,
  ReservedIdentities,
} from './types';

const log = logger.child({ module: 'registry' });

export class IssuerRegistry {
  private state: RegistryState;
  private cooldowns: CooldownTracker;

  constructor(
    state: RegistryState,
    private config: IssuanceConfig,
    private reserved: ReservedIdentities
  ) {
    this.state = state;
    this.cooldowns = this.trackerFor(state);
  }

  // ============================================================================
  // Membership operations
  // ============================================================================

  authorize(ctx: OperationContext, identity: Identity): IssuerRecord {
    requireUsableTarget(identity, this.reserved);
    requireNotMember(this.state, identity);
    requireCapacity(this.state, this.config.maxIssuers);
    requireNoCooldown(this.cooldowns, identity, ctx.now);

    this.state.issuerList.push(identity);
    const record: IssuerRecord = {
      position: this.state.issuerList.length - 1,
      startBlock: ctx.now,
      expirationBlock: ctx.now + this.config.issuerTermLength,
      totalMinted: 0n,
      mintCount: 0,
      totalBurned: 0n,
      burnCount: 0,
    };
    this.state.records.set(identity, record);

    ctx.emit({
      type: NotificationType.ISSUER_AUTHORIZED,
      identity,
      expirationBlock: record.expirationBlock,
    });
    log.debug('IssuerRegistry', 'Issuer authorized', { identity, block: ctx.now, expirationBlock: record.expirationBlock });

    return { ...record };
  }

  /**
   * Remove an issuer. The issuer may always leave; anyone else must wait
   * for the term to expire.
   */
  deauthorize(ctx: OperationContext, identity: Identity, caller: Identity): void {
    const record = requireMember(this.state, identity);
    const selfInitiated = caller === identity;
    if (!selfInitiated && ctx.now < record.expirationBlock) {
      throw new IssuanceError('TermNotExpired', { identity, expirationBlock: record.expirationBlock, block: ctx.now });
    }

    this.remove(ctx, identity, record, caller, selfInitiated);
  }

  /**
   * Remove every issuer whose term has ended. Walks the list back to front:
   * a swap-removal only ever moves an element from a slot already visited.
   */
  deauthorizeAllExpired(ctx: OperationContext, caller: Identity): Identity[] {
    const removed: Identity[] = [];

    for (let i = this.state.issuerList.length - 1; i >= 0; i--) {
      const identity = this.state.issuerList[i];
      const record = requireMember(this.state, identity);
      if (record.expirationBlock > ctx.now) continue;

      this.remove(ctx, identity, record, caller, caller === identity);
      removed.push(identity);
    }

    if (removed.length > 0) {
      log.info('IssuerRegistry', 'Expired issuers swept', { count: removed.length, block: ctx.now });
    }
    return removed;
  }

  /**
   * Hand an unexpired authorization, with its full history, to a new
   * identity. The record keeps its position, so the list is rewritten in
   * place rather than shifted.
   */
  transferAuthorization(ctx: OperationContext, from: Identity, to: Identity): number {
    const record = requireActiveIssuer(this.state, from, ctx.now);
    requireNotMember(this.state, to);
    requireUsableTarget(to, this.reserved);
    requireNoCooldown(this.cooldowns, to, ctx.now);

    const migrated: IssuerRecord = { ...record };
    const cooldownUntil = this.cooldowns.recordExit(from, record, ctx.now) ? record.expirationBlock : undefined;

    this.state.records.delete(from);
    this.state.records.set(to, migrated);
    this.state.issuerList[migrated.position] = to;

    ctx.emit({
      type: NotificationType.ISSUER_AUTHORIZATION_TRANSFERRED,
      from,
      to,
      position: migrated.position,
    });
    log.debug('IssuerRegistry', 'Issuer authorization transferred', { from, to, position: migrated.position, cooldownUntil });

    return migrated.position;
  }

  // ============================================================================
  // Statistics (called by the issuance controller)
  // ============================================================================

  requireActiveIssuer(identity: Identity, now: number): IssuerRecord {
    return { ...requireActiveIssuer(this.state, identity, now) };
  }

  recordMint(identity: Identity, amount: bigint): IssuerRecord {
    const record = requireMember(this.state, identity);
    record.totalMinted += amount;
    record.mintCount += 1;
    return { ...record };
  }

  recordBurn(identity: Identity, amount: bigint): IssuerRecord {
    const record = requireMember(this.state, identity);
    record.totalBurned += amount;
    record.burnCount += 1;
    return { ...record };
  }

  // ============================================================================
  // Read-only queries
  // ============================================================================

  getIssuers(): Identity[] {
    return [...this.state.issuerList];
  }

  /**
   * Issuers whose term has ended at `now`. Counts first so the result is
   * allocated at its exact size.
   */
  getExpiredIssuers(now: number): Identity[] {
    let count = 0;
    for (const identity of this.state.issuerList) {
      if (this.isExpired(identity, now)) count++;
    }

    const expired = new Array<Identity>(count);
    let next = 0;
    for (const identity of this.state.issuerList) {
      if (this.isExpired(identity, now)) expired[next++] = identity;
    }
    return expired;
  }

  getRecord(identity: Identity): IssuerRecord | undefined {
    const record = this.state.records.get(identity);
    return record ? { ...record } : undefined;
  }

  isIssuer(identity: Identity): boolean {
    return this.state.records.has(identity);
  }

  getCooldown(identity: Identity): number {
    return this.cooldowns.getCooldown(identity);
  }

  get totalIssuers(): number {
    return this.state.issuerList.length;
  }

  get maxIssuers(): number {
    return this.config.maxIssuers;
  }

  // ============================================================================
  // Snapshots (transaction rollback and persistence)
  // ============================================================================

  snapshot(): RegistryState {
    return cloneRegistryState(this.state);
  }

  restore(snapshot: RegistryState): void {
    this.state = cloneRegistryState(snapshot);
    this.cooldowns = this.trackerFor(this.state);
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private trackerFor(state: RegistryState): CooldownTracker {
    return new CooldownTracker(state.cooldownUntil, this.config.issuerTermLength, this.config.earlyExitThresholdBps);
  }

  private isExpired(identity: Identity, now: number): boolean {
    const record = this.state.records.get(identity);
    return record !== undefined && record.expirationBlock <= now;
  }

  private remove(
    ctx: OperationContext,
    identity: Identity,
    record: IssuerRecord,
    caller: Identity,
    selfInitiated: boolean
  ): void {
    const cooldownUntil = selfInitiated && this.cooldowns.recordExit(identity, record, ctx.now)
      ? record.expirationBlock
      : undefined;

    this.swapAndTruncate(record.position);
    this.state.records.delete(identity);

    ctx.emit({
      type: NotificationType.ISSUER_DEAUTHORIZED,
      identity,
      initiatedBy: caller,
      cooldownUntil,
    });
    log.debug('IssuerRegistry', 'Issuer deauthorized', { identity, caller, block: ctx.now, cooldownUntil });
  }

  /**
   * Overwrite slot `idx` with the last identity and drop the tail,
   * re-pointing the moved identity's record at its new slot.
   */
  private swapAndTruncate(idx: number): void {
    const list = this.state.issuerList;
    const last = list.length - 1;

    if (idx !== last) {
      const moved = list[last];
      list[idx] = moved;
      requireMember(this.state, moved).position = idx;
    }
    list.pop();
  }
}
