/**
 * Issuance Node
 *
 * Wires the issuance core to its host:
 * - Loads persisted state and verifies it before accepting writes
 * - Runs every mutating operation through the transaction executor
 * - Saves state inside each transaction, so a failed save aborts it
 * - Broadcasts notifications after each commit
 * - Serves the HTTP API and the WebSocket notification feed
 */

import * as http from 'http';
import { BlockClock, IntervalBlockClock } from './chain/block-clock';
import { NodeConfig } from './config/node-config';
import { nullIdentity, publicKeyToAddress } from './crypto';
import { EventStore } from './event-store';
import { CommitInfo, TransactionExecutor } from './executor/transaction-executor';
import { verifyRegistryInvariants } from './issuance/invariants';
import { IssuanceController } from './issuance/issuance-controller';
import { IssuerRegistry } from './issuance/issuer-registry';
import { createRegistryState, Identity, IssuerRecord, ReservedIdentities } from './issuance/types';
import { InMemoryLedger } from './ledger/in-memory-ledger';
import { LedgerChange } from './ledger/types';
import { metrics } from './observability/metrics';
import { logger } from './observability/structured-logger';
import { IssuanceAPIServer } from './operator/api-server';
import { NotificationFeed } from './operator/notification-feed';
import { RequestAuthenticator } from './operator/request-auth';
import { deserializeRegistry, serializeRegistry, StateStore } from './storage';

export interface IssuerStatus {
  identity: Identity;
  isIssuer: boolean;
  record?: IssuerRecord;
  expired: boolean;
  cooldownUntil: number;
}

export class IssuanceNode {
  readonly reserved: ReservedIdentities;
  readonly registry: IssuerRegistry;
  readonly ledger: InMemoryLedger;
  readonly controller: IssuanceController;
  readonly events: EventStore;
  readonly executor: TransactionExecutor;
  readonly clock: BlockClock;

  private stateStore: StateStore;
  private api: IssuanceAPIServer;
  private httpServer?: http.Server;
  private feed?: NotificationFeed;

  constructor(readonly config: NodeConfig, clock?: BlockClock) {
    this.reserved = {
      nullIdentity: nullIdentity(config.network),
      controllerIdentity: publicKeyToAddress(config.controllerPublicKey, config.network),
    };

    this.stateStore = new StateStore(config.dataDir);
    this.events = new EventStore(config.dataDir);

    const persisted = this.stateStore.load();
    const registryState = persisted ? deserializeRegistry(persisted.registry) : createRegistryState();

    const report = verifyRegistryInvariants(registryState, config.issuance.maxIssuers);
    if (!report.valid) {
      throw new Error(`Persisted registry state is inconsistent: ${report.violations.join('; ')}`);
    }
    const chain = this.events.verifyHashChain();
    if (!chain.valid) {
      throw new Error(`Notification log integrity check failed: ${chain.error}`);
    }
    const savedSequence = persisted?.sequenceNumber ?? 0;
    const logSequence = this.events.getState().sequenceNumber;
    if (savedSequence !== logSequence) {
      throw new Error(
        `Saved state is out of step with the notification log (state at ${savedSequence}, log at ${logSequence})`
      );
    }

    this.registry = new IssuerRegistry(registryState, config.issuance, this.reserved);
    this.ledger = new InMemoryLedger(persisted?.ledger);
    this.ledger.on('change', (change: LedgerChange) => logger.debug('Ledger', 'Balance change', { ...change }));
    this.controller = new IssuanceController(this.registry, this.ledger, config.issuance, this.reserved);

    const startHeight = Math.max(persisted?.block ?? 0, this.events.getState().lastBlock);
    this.clock = clock ?? new IntervalBlockClock({ startHeight, blockTimeMs: config.blockTimeMs });

    this.executor = new TransactionExecutor(this.clock, this.events, {
      persist: () => this.persist(),
      onCommit: (info) => this.afterCommit(info),
    });
    this.executor.register(this.registry);
    this.executor.register(this.ledger);

    this.api = new IssuanceAPIServer(this, new RequestAuthenticator(config.network, config.requestMaxAgeMs));
    this.refreshGauges();

    logger.info('IssuanceNode', 'State loaded', {
      block: startHeight,
      issuers: this.registry.totalIssuers,
      supply: this.ledger.totalSupply(),
      notifications: this.events.getState().sequenceNumber,
    });
  }

  // ============================================================================
  // Operations
  // ============================================================================

  authorizeIssuer(caller: Identity, identity: Identity): Promise<IssuerRecord> {
    return this.executor.submit('authorizeIssuer', (ctx) => {
      logger.debug('IssuanceNode', 'authorizeIssuer', { caller, identity });
      const record = this.registry.authorize(ctx, identity);
      metrics.incCounter('issuance_authorizations_total');
      return record;
    });
  }

  deauthorizeIssuer(caller: Identity, identity: Identity): Promise<void> {
    return this.executor.submit('deauthorizeIssuer', (ctx) => {
      this.registry.deauthorize(ctx, identity, caller);
      metrics.incCounter('issuance_deauthorizations_total');
    });
  }

  deauthorizeAllExpiredIssuers(caller: Identity): Promise<Identity[]> {
    return this.executor.submit('deauthorizeAllExpiredIssuers', (ctx) => {
      const removed = this.registry.deauthorizeAllExpired(ctx, caller);
      metrics.incCounter('issuance_deauthorizations_total', removed.length);
      return removed;
    });
  }

  transferIssuerAuthorization(caller: Identity, newIdentity: Identity): Promise<number> {
    return this.executor.submit('transferIssuerAuthorization', (ctx) =>
      this.registry.transferAuthorization(ctx, caller, newIdentity)
    );
  }

  mint(caller: Identity, to: Identity, amount: bigint) {
    return this.executor.submit('mint', (ctx) => {
      const result = this.controller.mint(ctx, caller, to, amount);
      metrics.incCounter('issuance_mints_total');
      return result;
    });
  }

  burn(caller: Identity, amount: bigint) {
    return this.executor.submit('burn', (ctx) => {
      const result = this.controller.burn(ctx, caller, amount);
      metrics.incCounter('issuance_burns_total');
      return result;
    });
  }

  burnFrom(caller: Identity, account: Identity, amount: bigint) {
    return this.executor.submit('burnFrom', (ctx) => {
      const result = this.controller.burnFrom(ctx, caller, account, amount);
      metrics.incCounter('issuance_burns_total');
      return result;
    });
  }

  approve(caller: Identity, spender: Identity, amount: bigint): Promise<void> {
    return this.executor.submit('approve', () => this.ledger.approve(caller, spender, amount));
  }

  transfer(caller: Identity, to: Identity, amount: bigint): Promise<void> {
    return this.executor.submit('transfer', () => this.ledger.transfer(caller, to, amount));
  }

  // ============================================================================
  // Queries
  // ============================================================================

  getIssuers(): Identity[] {
    return this.registry.getIssuers();
  }

  getExpiredIssuers(): Identity[] {
    return this.registry.getExpiredIssuers(this.clock.currentBlock());
  }

  getIssuerMintFactor(identity: Identity): number {
    return this.controller.getIssuerMintFactor(identity);
  }

  getIssuerMaxMintable(identity: Identity): bigint {
    return this.controller.getIssuerMaxMintable(identity);
  }

  getIssuerStatus(identity: Identity): IssuerStatus {
    const record = this.registry.getRecord(identity);
    return {
      identity,
      isIssuer: record !== undefined,
      record,
      expired: record !== undefined && record.expirationBlock <= this.clock.currentBlock(),
      cooldownUntil: this.registry.getCooldown(identity),
    };
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Port actually bound; differs from config.port when that is 0.
   */
  get listeningPort(): number | undefined {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  async start(): Promise<void> {
    this.httpServer = http.createServer(this.api.app);
    this.feed = new NotificationFeed(this.httpServer, (from, to) => this.events.getEventsBySequence(from, to));

    if (this.clock instanceof IntervalBlockClock) {
      this.clock.on('block', (height: number) => metrics.setGauge('issuance_block_height', height));
      this.clock.start();
    }

    const server = this.httpServer;
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, () => resolve());
    });
    logger.info('IssuanceNode', 'Listening', {
      port: this.config.port,
      controller: this.reserved.controllerIdentity,
      network: this.config.network,
    });
  }

  async stop(): Promise<void> {
    logger.info('IssuanceNode', 'Stopping...');

    if (this.clock instanceof IntervalBlockClock) {
      this.clock.stop();
    }
    if (this.feed) {
      await this.feed.close();
      this.feed = undefined;
    }
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      this.httpServer = undefined;
    }

    this.persist();
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private afterCommit(info: CommitInfo): void {
    this.refreshGauges();
    this.feed?.broadcast(info.events);
  }

  private persist(): void {
    this.stateStore.save({
      block: this.clock.currentBlock(),
      sequenceNumber: this.events.headSequence(),
      registry: serializeRegistry(this.registry.snapshot()),
      ledger: this.ledger.snapshot(),
    });
  }

  private refreshGauges(): void {
    metrics.setGauge('issuance_issuers', this.registry.totalIssuers);
    metrics.setGauge('issuance_block_height', this.clock.currentBlock());
    metrics.setGauge('issuance_total_supply', Number(this.ledger.totalSupply()));
  }
}
