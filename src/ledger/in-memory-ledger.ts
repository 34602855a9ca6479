import { EventEmitter } from 'events';
import { FungibleLedger, LedgerChange, LedgerError, LedgerSnapshot } from './types';

/**
 * In-process balance ledger.
 *
 * Emits 'change' with a LedgerChange after every successful mutation.
 * snapshot()/restore() give the transaction executor its rollback point.
 */
export class InMemoryLedger extends EventEmitter implements FungibleLedger {
  private balances: Map<string, bigint> = new Map();
  private allowances: Map<string, Map<string, bigint>> = new Map();
  private supply: bigint = 0n;

  constructor(snapshot?: LedgerSnapshot) {
    super();
    if (snapshot) this.load(snapshot);
  }

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  mint(account: string, amount: bigint): void {
    this.requirePositive(amount);
    this.balances.set(account, this.balanceOf(account) + amount);
    this.supply += amount;
    this.announce({ kind: 'mint', to: account, amount });
  }

  burn(account: string, amount: bigint): void {
    this.requirePositive(amount);
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new LedgerError('InsufficientBalance', `Balance ${balance} of ${account} is below ${amount}`);
    }
    this.setBalance(account, balance - amount);
    this.supply -= amount;
    this.announce({ kind: 'burn', from: account, amount });
  }

  spendAllowance(owner: string, spender: string, amount: bigint): void {
    const current = this.allowance(owner, spender);
    if (current < amount) {
      throw new LedgerError('InsufficientAllowance', `Allowance ${current} from ${owner} to ${spender} is below ${amount}`);
    }
    this.setAllowance(owner, spender, current - amount);
  }

  approve(owner: string, spender: string, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError('InvalidAmount', 'Allowance cannot be negative');
    }
    this.setAllowance(owner, spender, amount);
    this.announce({ kind: 'approve', from: owner, to: spender, amount });
  }

  transfer(from: string, to: string, amount: bigint): void {
    this.requirePositive(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new LedgerError('InsufficientBalance', `Balance ${balance} of ${from} is below ${amount}`);
    }
    this.setBalance(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.announce({ kind: 'transfer', from, to, amount });
  }

  snapshot(): LedgerSnapshot {
    const allowances: Array<[string, string, string]> = [];
    for (const [owner, spenders] of this.allowances) {
      for (const [spender, amount] of spenders) {
        allowances.push([owner, spender, amount.toString()]);
      }
    }
    return {
      balances: Array.from(this.balances, ([account, amount]): [string, string] => [account, amount.toString()]),
      allowances,
    };
  }

  restore(snapshot: LedgerSnapshot): void {
    this.balances.clear();
    this.allowances.clear();
    this.supply = 0n;
    this.load(snapshot);
  }

  private load(snapshot: LedgerSnapshot): void {
    for (const [account, amount] of snapshot.balances) {
      const value = BigInt(amount);
      this.balances.set(account, value);
      this.supply += value;
    }
    for (const [owner, spender, amount] of snapshot.allowances) {
      this.setAllowance(owner, spender, BigInt(amount));
    }
  }

  private setBalance(account: string, amount: bigint): void {
    if (amount === 0n) {
      this.balances.delete(account);
    } else {
      this.balances.set(account, amount);
    }
  }

  private setAllowance(owner: string, spender: string, amount: bigint): void {
    let spenders = this.allowances.get(owner);
    if (!spenders) {
      spenders = new Map();
      this.allowances.set(owner, spenders);
    }
    if (amount === 0n) {
      spenders.delete(spender);
      if (spenders.size === 0) this.allowances.delete(owner);
    } else {
      spenders.set(spender, amount);
    }
  }

  private requirePositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new LedgerError('InvalidAmount', 'Amount must be positive');
    }
  }

  private announce(change: LedgerChange): void {
    this.emit('change', change);
  }
}
