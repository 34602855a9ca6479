import { InMemoryLedger } from '../ledger/in-memory-ledger';
import { LedgerError } from '../ledger/types';
import { isIssuanceError } from './errors';
import { verifyRegistryInvariants } from './invariants';
import { IssuanceController } from './issuance-controller';
import { IssuerRegistry } from './issuer-registry';
import { createRegistryState, DEFAULT_ISSUANCE_CONFIG, IssuanceConfig, OperationContext } from './types';

const reserved = { nullIdentity: 'null-id', controllerIdentity: 'controller-id' };

const config: IssuanceConfig = {
  ...DEFAULT_ISSUANCE_CONFIG,
  maxIssuers: 4,
  issuerTermLength: 40,
  supplyFloor: 10_000n,
};

const IDENTITIES = ['a', 'b', 'c', 'd', 'e', 'f', 'null-id', 'controller-id'];

// Small deterministic PRNG so failures reproduce
function mulberry32(seed: number): () => number {
  let t = seed;
  return () => {
    t = (t + 0x6d2b79f5) | 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r;
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

describe('verifyRegistryInvariants', () => {
  it('accepts an empty registry', () => {
    expect(verifyRegistryInvariants(createRegistryState(), 1)).toEqual({ valid: true, violations: [] });
  });

  it('reports a stale position index', () => {
    const state = createRegistryState();
    const registry = new IssuerRegistry(state, config, reserved);
    const ctx: OperationContext = { now: 0, emit: () => undefined };
    registry.authorize(ctx, 'a');
    registry.authorize(ctx, 'b');

    const record = state.records.get('b');
    if (!record) throw new Error('missing record');
    record.position = 0;

    expect(verifyRegistryInvariants(state, config.maxIssuers).violations).toEqual([
      'b is at position 1 but its record says 0',
    ]);
  });

  it('reports orphaned records and a breached cap', () => {
    const state = createRegistryState();
    state.issuerList.push('a', 'b');
    state.records.set('a', { position: 0, startBlock: 0, expirationBlock: 10, totalMinted: 0n, mintCount: 0, totalBurned: 0n, burnCount: 0 });
    state.records.set('b', { position: 1, startBlock: 0, expirationBlock: 10, totalMinted: 0n, mintCount: 0, totalBurned: 0n, burnCount: 0 });
    state.records.set('z', { position: 2, startBlock: 0, expirationBlock: 10, totalMinted: 0n, mintCount: 0, totalBurned: 0n, burnCount: 0 });

    expect(verifyRegistryInvariants(state, 1).violations).toEqual([
      'issuerList has 2 entries but 3 records exist',
      '2 issuers exceed the cap of 1',
      'record for z has no entry in issuerList',
    ]);
  });

  it('holds across a long random operation sequence', () => {
    const random = mulberry32(20240611);
    const pick = <T>(items: T[]): T => items[Math.floor(random() * items.length)];

    const state = createRegistryState();
    const registry = new IssuerRegistry(state, config, reserved);
    const ledger = new InMemoryLedger();
    const controller = new IssuanceController(registry, ledger, config, reserved);

    let now = 0;
    let rejected = 0;

    for (let step = 0; step < 2_000; step++) {
      now += Math.floor(random() * 3);
      const ctx: OperationContext = { now, emit: () => undefined };
      const caller = pick(IDENTITIES);
      const target = pick(IDENTITIES);
      const snapshot = registry.snapshot();
      const ledgerSnapshot = ledger.snapshot();

      try {
        switch (Math.floor(random() * 7)) {
          case 0:
            registry.authorize(ctx, target);
            break;
          case 1:
            registry.deauthorize(ctx, target, caller);
            break;
          case 2:
            registry.deauthorizeAllExpired(ctx, caller);
            break;
          case 3:
            registry.transferAuthorization(ctx, caller, target);
            break;
          case 4:
            controller.mint(ctx, caller, target, BigInt(Math.floor(random() * 2_000)));
            break;
          case 5:
            controller.burn(ctx, caller, BigInt(1 + Math.floor(random() * 500)));
            break;
          default:
            expect(registry.getExpiredIssuers(now).every((id) => registry.isIssuer(id))).toBe(true);
        }
      } catch (err) {
        // Failed operations are rolled back by the host; do the same here
        if (!isIssuanceError(err) && !(err instanceof LedgerError)) throw err;
        registry.restore(snapshot);
        ledger.restore(ledgerSnapshot);
        rejected++;
      }

      const report = verifyRegistryInvariants(registry.snapshot(), config.maxIssuers);
      expect(report.violations).toEqual([]);
      expect(IDENTITIES.slice(6).some((id) => registry.isIssuer(id))).toBe(false);
    }

    expect(rejected).toBeGreaterThan(0);
  });
});
