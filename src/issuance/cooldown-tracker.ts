import { Identity, IssuerRecord, MINT_FACTOR_SCALE } from './types';

/**
 * Reactivation delays for identities that leave before serving most of
 * their term. Backed by the registry's `cooldownUntil` map.
 */
export class CooldownTracker {
  constructor(
    private cooldownUntil: Map<Identity, number>,
    private termLength: number,
    private earlyExitThresholdBps: number
  ) {}

  /**
   * Block before which (re)authorization is refused, or 0 when none.
   */
  getCooldown(identity: Identity): number {
    return this.cooldownUntil.get(identity) ?? 0;
  }

  isCoolingDown(identity: Identity, now: number): boolean {
    return now < this.getCooldown(identity);
  }

  /**
   * True when fewer than `earlyExitThresholdBps` of the term have elapsed.
   */
  isEarlyExit(record: IssuerRecord, now: number): boolean {
    const served = Math.max(0, now - record.startBlock);
    return served * MINT_FACTOR_SCALE < this.termLength * this.earlyExitThresholdBps;
  }

  /**
   * Apply the early-exit rule for a self-initiated exit. The cooldown runs
   * until the natural end of the abandoned term.
   */
  recordExit(identity: Identity, record: IssuerRecord, now: number): boolean {
    if (!this.isEarlyExit(record, now)) return false;
    this.cooldownUntil.set(identity, record.expirationBlock);
    return true;
  }
}
