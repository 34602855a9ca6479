import express, { Express, Request, Response } from 'express';
import { isValidIdentity } from '../crypto';
import { isIssuanceError } from '../issuance/errors';
import { MintFactorBreakdown } from '../issuance/mint-factor';
import { Identity, IssuerRecord } from '../issuance/types';
import { LedgerError } from '../ledger/types';
import { metrics } from '../observability/metrics';
import { describeError, logger } from '../observability/structured-logger';
import type { IssuanceNode } from '../issuance-node';
import { AuthenticatedRequest, RequestAuthenticator, RequestAuthError } from './request-auth';

/**
 * Action names bound into request signatures. A signature for one action
 * is never accepted by another route.
 */
export const API_ACTIONS = {
  authorize: 'authorizeIssuer',
  deauthorize: 'deauthorizeIssuer',
  deauthorizeExpired: 'deauthorizeAllExpiredIssuers',
  transfer: 'transferIssuerAuthorization',
  mint: 'mint',
  burn: 'burn',
  burnFrom: 'burnFrom',
  approve: 'approve',
  ledgerTransfer: 'transfer',
} as const;

export type ApiAction = (typeof API_ACTIONS)[keyof typeof API_ACTIONS];

const DEFAULT_PAGE = 100;
const MAX_PAGE = 1000;

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export function serializeRecord(record: IssuerRecord) {
  return {
    position: record.position,
    startBlock: record.startBlock,
    expirationBlock: record.expirationBlock,
    totalMinted: record.totalMinted.toString(),
    mintCount: record.mintCount,
    totalBurned: record.totalBurned.toString(),
    burnCount: record.burnCount,
  };
}

function serializeBreakdown(b: MintFactorBreakdown) {
  return {
    avgMint: b.avgMint.toString(),
    avgBurn: b.avgBurn.toString(),
    avgPercentMint: b.avgPercentMint.toString(),
    adjustedBase: b.adjustedBase.toString(),
    burnOffset: b.burnOffset.toString(),
  };
}

function parseAmount(value: string | undefined, field: string): bigint {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new BadRequestError(`${field} must be a non-negative integer in decimal string form`);
  }
  return BigInt(value);
}

function parseCount(value: unknown, fallback: number, field: string): number {
  if (value === undefined) return fallback;
  const n = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new BadRequestError(`${field} must be a non-negative integer`);
  }
  return n;
}

export class IssuanceAPIServer {
  readonly app: Express;

  constructor(
    private node: IssuanceNode,
    private auth: RequestAuthenticator
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '64kb' }));
    this.app.use(metrics.httpMiddleware());

    this.app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type');

      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
      } else {
        next();
      }
    });
  }

  private setupRoutes(): void {
    // ------------------------------------------------------------------
    // Mutations (signed)
    // ------------------------------------------------------------------

    this.mutation('/api/issuers/authorize', API_ACTIONS.authorize, async ({ caller, body }) => {
      const identity = this.requireIdentity(body.identity, 'identity');
      const record = await this.node.authorizeIssuer(caller, identity);
      return { identity, record: serializeRecord(record) };
    });

    this.mutation('/api/issuers/deauthorize', API_ACTIONS.deauthorize, async ({ caller, body }) => {
      const identity = this.requireIdentity(body.identity, 'identity');
      await this.node.deauthorizeIssuer(caller, identity);
      return { identity };
    });

    this.mutation('/api/issuers/deauthorize-expired', API_ACTIONS.deauthorizeExpired, async ({ caller }) => {
      const removed = await this.node.deauthorizeAllExpiredIssuers(caller);
      return { removed };
    });

    this.mutation('/api/issuers/transfer', API_ACTIONS.transfer, async ({ caller, body }) => {
      const newIdentity = this.requireIdentity(body.newIdentity, 'newIdentity');
      const position = await this.node.transferIssuerAuthorization(caller, newIdentity);
      return { from: caller, to: newIdentity, position };
    });

    this.mutation('/api/mint', API_ACTIONS.mint, async ({ caller, body }) => {
      const to = this.requireIdentity(body.to, 'to');
      const amount = parseAmount(body.amount, 'amount');
      const result = await this.node.mint(caller, to, amount);
      return {
        to,
        minted: result.minted.toString(),
        toppedUp: result.toppedUp.toString(),
        record: serializeRecord(result.record),
      };
    });

    this.mutation('/api/burn', API_ACTIONS.burn, async ({ caller, body }) => {
      const amount = parseAmount(body.amount, 'amount');
      const result = await this.node.burn(caller, amount);
      return { burned: result.burned.toString(), record: serializeRecord(result.record) };
    });

    this.mutation('/api/burn-from', API_ACTIONS.burnFrom, async ({ caller, body }) => {
      const account = this.requireIdentity(body.account, 'account');
      const amount = parseAmount(body.amount, 'amount');
      const result = await this.node.burnFrom(caller, account, amount);
      return { account, burned: result.burned.toString(), record: serializeRecord(result.record) };
    });

    this.mutation('/api/ledger/approve', API_ACTIONS.approve, async ({ caller, body }) => {
      const spender = this.requireIdentity(body.spender, 'spender');
      const amount = parseAmount(body.amount, 'amount');
      await this.node.approve(caller, spender, amount);
      return { owner: caller, spender, allowance: amount.toString() };
    });

    this.mutation('/api/ledger/transfer', API_ACTIONS.ledgerTransfer, async ({ caller, body }) => {
      const to = this.requireIdentity(body.to, 'to');
      const amount = parseAmount(body.amount, 'amount');
      await this.node.transfer(caller, to, amount);
      return { from: caller, to, amount: amount.toString() };
    });

    // ------------------------------------------------------------------
    // Queries
    // ------------------------------------------------------------------

    this.query('/api/issuers', () => ({
      issuers: this.node.getIssuers(),
      maxIssuers: this.node.registry.maxIssuers,
      block: this.node.clock.currentBlock(),
    }));

    this.query('/api/issuers/expired', () => ({
      expired: this.node.getExpiredIssuers(),
      block: this.node.clock.currentBlock(),
    }));

    this.query('/api/issuers/:identity', (req) => {
      const status = this.node.getIssuerStatus(this.requireIdentity(req.params.identity, 'identity'));
      return {
        identity: status.identity,
        isIssuer: status.isIssuer,
        expired: status.expired,
        cooldownUntil: status.cooldownUntil,
        record: status.record ? serializeRecord(status.record) : null,
      };
    });

    this.query('/api/issuers/:identity/mint-factor', (req) => {
      const identity = this.requireIdentity(req.params.identity, 'identity');
      return {
        identity,
        mintFactor: this.node.getIssuerMintFactor(identity),
        breakdown: serializeBreakdown(this.node.controller.explainIssuerMintFactor(identity)),
      };
    });

    this.query('/api/issuers/:identity/max-mintable', (req) => {
      const identity = this.requireIdentity(req.params.identity, 'identity');
      return {
        identity,
        maxMintable: this.node.getIssuerMaxMintable(identity).toString(),
        totalSupply: this.node.ledger.totalSupply().toString(),
      };
    });

    this.query('/api/supply', () => ({
      totalSupply: this.node.ledger.totalSupply().toString(),
      supplyFloor: this.node.config.issuance.supplyFloor.toString(),
      block: this.node.clock.currentBlock(),
    }));

    this.query('/api/balances/:account', (req) => {
      const account = this.requireIdentity(req.params.account, 'account');
      return { account, balance: this.node.ledger.balanceOf(account).toString() };
    });

    this.query('/api/notifications', (req) => {
      const from = Math.max(1, parseCount(req.query.from, 1, 'from'));
      const limit = Math.min(MAX_PAGE, Math.max(1, parseCount(req.query.limit, DEFAULT_PAGE, 'limit')));
      const events = this.node.events.getEventsBySequence(from, from + limit - 1);
      return { events, headSequence: this.node.events.getState().sequenceNumber };
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      const chain = this.node.events.getState();
      res.json({
        status: 'healthy',
        block: this.node.clock.currentBlock(),
        issuers: this.node.registry.totalIssuers,
        totalSupply: this.node.ledger.totalSupply().toString(),
        notifications: chain.sequenceNumber,
        headHash: chain.headHash,
      });
    });

    this.app.get('/metrics', (_req: Request, res: Response) => {
      res.type('text/plain').send(metrics.render());
    });
  }

  private mutation(
    path: string,
    action: ApiAction,
    handler: (request: AuthenticatedRequest) => Promise<Record<string, unknown>>
  ): void {
    this.app.post(path, async (req: Request, res: Response) => {
      try {
        const request = this.auth.authenticate(action, req.body);
        const result = await handler(request);
        res.json({ success: true, ...result });
      } catch (error) {
        this.sendError(res, action, error);
      }
    });
  }

  private query(path: string, handler: (req: Request) => Record<string, unknown>): void {
    this.app.get(path, (req: Request, res: Response) => {
      try {
        res.json(handler(req));
      } catch (error) {
        this.sendError(res, path, error);
      }
    });
  }

  private requireIdentity(value: string | undefined, field: string): Identity {
    if (value === undefined || !isValidIdentity(value, this.node.config.network)) {
      throw new BadRequestError(`${field} must be a valid ${this.node.config.network} address`);
    }
    return value;
  }

  private sendError(res: Response, route: string, error: unknown): void {
    if (error instanceof BadRequestError) {
      res.status(400).json({ success: false, error: error.message, code: 'BadRequest' });
      return;
    }
    if (error instanceof RequestAuthError) {
      res.status(error.status).json({
        success: false,
        error: error.message,
        code: error.status === 400 ? 'BadRequest' : 'Unauthorized',
      });
      return;
    }
    if (isIssuanceError(error)) {
      res.status(409).json({ success: false, error: error.message, code: error.code, details: error.details });
      return;
    }
    if (error instanceof LedgerError) {
      res.status(409).json({ success: false, error: error.message, code: error.code });
      return;
    }

    logger.error('IssuanceAPIServer', 'Request failed', { route, error: describeError(error) });
    res.status(500).json({ success: false, error: 'Internal error', code: 'Internal' });
  }
}
