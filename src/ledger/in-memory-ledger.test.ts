import { InMemoryLedger } from './in-memory-ledger';
import { LedgerChange, LedgerError } from './types';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof LedgerError ? err.code : 'unexpected';
  }
  return undefined;
}

describe('InMemoryLedger', () => {
  it('tracks balances and total supply', () => {
    const ledger = new InMemoryLedger();
    ledger.mint('alice', 100n);
    ledger.mint('bob', 50n);
    ledger.transfer('alice', 'bob', 30n);
    ledger.burn('bob', 80n);

    expect(ledger.balanceOf('alice')).toBe(70n);
    expect(ledger.balanceOf('bob')).toBe(0n);
    expect(ledger.totalSupply()).toBe(70n);
    expect(ledger.snapshot().balances).toEqual([['alice', '70']]);
  });

  it('rejects non-positive amounts and overdrafts', () => {
    const ledger = new InMemoryLedger();
    ledger.mint('alice', 10n);

    expect(codeOf(() => ledger.mint('alice', 0n))).toBe('InvalidAmount');
    expect(codeOf(() => ledger.burn('alice', 11n))).toBe('InsufficientBalance');
    expect(codeOf(() => ledger.transfer('alice', 'bob', 11n))).toBe('InsufficientBalance');
    expect(codeOf(() => ledger.approve('alice', 'bob', -1n))).toBe('InvalidAmount');
  });

  it('spends allowances', () => {
    const ledger = new InMemoryLedger();
    ledger.approve('alice', 'bob', 10n);
    ledger.spendAllowance('alice', 'bob', 4n);

    expect(ledger.allowance('alice', 'bob')).toBe(6n);
    expect(codeOf(() => ledger.spendAllowance('alice', 'bob', 7n))).toBe('InsufficientAllowance');

    ledger.spendAllowance('alice', 'bob', 6n);
    expect(ledger.snapshot().allowances).toEqual([]);
  });

  it('restores from a snapshot', () => {
    const ledger = new InMemoryLedger();
    ledger.mint('alice', 100n);
    ledger.approve('alice', 'bob', 5n);
    const snap = ledger.snapshot();

    ledger.burn('alice', 100n);
    ledger.approve('alice', 'bob', 0n);
    ledger.restore(snap);

    expect(ledger.totalSupply()).toBe(100n);
    expect(ledger.allowance('alice', 'bob')).toBe(5n);
    expect(new InMemoryLedger(snap).balanceOf('alice')).toBe(100n);
  });

  it('announces changes', () => {
    const ledger = new InMemoryLedger();
    const changes: LedgerChange[] = [];
    ledger.on('change', (change: LedgerChange) => changes.push(change));

    ledger.mint('alice', 3n);
    ledger.burn('alice', 1n);

    expect(changes).toEqual([
      { kind: 'mint', to: 'alice', amount: 3n },
      { kind: 'burn', from: 'alice', amount: 1n },
    ]);
  });
});
