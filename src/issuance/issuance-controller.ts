/**
 * Issuance Controller
 *
 * Orchestrates mint and burn requests:
 * 1. Caller must be a current, unexpired issuer
 * 2. Target and amount checks
 * 3. Mint factor bound against current supply
 * 4. Supply floor top-up
 * 5. Ledger credit/debit, then the issuer's lifetime counters
 */

import { NotificationType } from '../event-store/types';
import { FungibleLedger } from '../ledger/types';
import { logger } from '../observability/structured-logger';
import { IssuanceError } from './errors';
import { requirePositive, requireUsableTarget } from './guards';
import { IssuerRegistry } from './issuer-registry';
import { computeMaxMintable, computeMintFactor, explainMintFactor, MintFactorBreakdown, withinMintFactor } from './mint-factor';
import { Identity, IssuanceConfig, IssuerRecord, OperationContext, ReservedIdentities } from './types';

const log = logger.child({ module: 'controller' });

export interface MintResult {
  minted: bigint;
  toppedUp: bigint;
  record: IssuerRecord;
}

export interface BurnResult {
  burned: bigint;
  record: IssuerRecord;
}

export class IssuanceController {
  constructor(
    private registry: IssuerRegistry,
    private ledger: FungibleLedger,
    private config: IssuanceConfig,
    private reserved: ReservedIdentities
  ) {}

  /**
   * At zero supply the request amount is ignored and exactly the supply
   * floor is minted. Otherwise the request must fit the caller's mint
   * factor, and any shortfall to the floor is added on top.
   */
  mint(ctx: OperationContext, caller: Identity, to: Identity, requested: bigint): MintResult {
    const record = this.registry.requireActiveIssuer(caller, ctx.now);
    requireUsableTarget(to, this.reserved, 'InvalidReceiver');

    const supply = this.ledger.totalSupply();
    let amount: bigint;

    if (supply === 0n) {
      amount = this.config.supplyFloor;
    } else {
      requirePositive(requested);
      const factor = computeMintFactor(record, supply, this.config);
      if (!withinMintFactor(requested, supply, factor)) {
        throw new IssuanceError('ExceedsMintFactor', {
          requested: requested.toString(),
          maxMintable: computeMaxMintable(supply, factor, this.config.supplyFloor).toString(),
          mintFactor: factor,
        });
      }
      amount = requested + this.shortfall(supply + requested);
    }

    this.ledger.mint(to, amount);
    const updated = this.registry.recordMint(caller, amount);

    this.emitActivity(ctx, caller, amount, 0n, updated);
    log.debug('IssuanceController', 'Minted', { caller, to, amount, supply: this.ledger.totalSupply() });

    return { minted: amount, toppedUp: supply === 0n ? amount : amount - requested, record: updated };
  }

  burn(ctx: OperationContext, caller: Identity, amount: bigint): BurnResult {
    this.registry.requireActiveIssuer(caller, ctx.now);
    requirePositive(amount);

    this.ledger.burn(caller, amount);
    return this.finishBurn(ctx, caller, amount);
  }

  /**
   * Burn from another account's balance, spending the allowance it granted
   * the caller.
   */
  burnFrom(ctx: OperationContext, caller: Identity, account: Identity, amount: bigint): BurnResult {
    this.registry.requireActiveIssuer(caller, ctx.now);
    requirePositive(amount);

    this.ledger.spendAllowance(account, caller, amount);
    this.ledger.burn(account, amount);
    return this.finishBurn(ctx, caller, amount);
  }

  // ============================================================================
  // Read-only queries
  // ============================================================================

  getIssuerMintFactor(identity: Identity): number {
    const record = this.requireRecord(identity);
    return computeMintFactor(record, this.ledger.totalSupply(), this.config);
  }

  getIssuerMaxMintable(identity: Identity): bigint {
    const supply = this.ledger.totalSupply();
    const factor = computeMintFactor(this.requireRecord(identity), supply, this.config);
    return computeMaxMintable(supply, factor, this.config.supplyFloor);
  }

  explainIssuerMintFactor(identity: Identity): MintFactorBreakdown {
    return explainMintFactor(this.requireRecord(identity), this.ledger.totalSupply(), this.config);
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply();
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private shortfall(supplyAfter: bigint): bigint {
    return supplyAfter < this.config.supplyFloor ? this.config.supplyFloor - supplyAfter : 0n;
  }

  private requireRecord(identity: Identity): IssuerRecord {
    const record = this.registry.getRecord(identity);
    if (!record) {
      throw new IssuanceError('NotAuthorized', { identity });
    }
    return record;
  }

  private finishBurn(ctx: OperationContext, caller: Identity, amount: bigint): BurnResult {
    const updated = this.registry.recordBurn(caller, amount);
    this.emitActivity(ctx, caller, 0n, amount, updated);
    log.debug('IssuanceController', 'Burned', { caller, amount, supply: this.ledger.totalSupply() });
    return { burned: amount, record: updated };
  }

  private emitActivity(ctx: OperationContext, identity: Identity, minted: bigint, burned: bigint, record: IssuerRecord): void {
    ctx.emit({
      type: NotificationType.ISSUER_ACTIVITY,
      identity,
      mintedThisCall: minted.toString(),
      burnedThisCall: burned.toString(),
      totalMinted: record.totalMinted.toString(),
      totalBurned: record.totalBurned.toString(),
      mintCount: record.mintCount,
      burnCount: record.burnCount,
    });
  }
}
