/**
 * Fungible Ledger Interface
 *
 * The balance ledger the issuance controller drives. Balance storage,
 * transfers and allowances live behind this interface; the controller only
 * needs supply, mint, burn and allowance spending.
 */

export type LedgerErrorCode = 'InsufficientBalance' | 'InsufficientAllowance' | 'InvalidAmount';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
  }
}

export interface LedgerChange {
  kind: 'mint' | 'burn' | 'transfer' | 'approve';
  from?: string;
  to?: string;
  amount: bigint;
}

export interface FungibleLedger {
  totalSupply(): bigint;
  balanceOf(account: string): bigint;
  allowance(owner: string, spender: string): bigint;

  mint(account: string, amount: bigint): void;
  burn(account: string, amount: bigint): void;
  spendAllowance(owner: string, spender: string, amount: bigint): void;

  approve(owner: string, spender: string, amount: bigint): void;
  transfer(from: string, to: string, amount: bigint): void;
}

/**
 * Serialized ledger contents. Amounts are decimal strings.
 */
export interface LedgerSnapshot {
  balances: Array<[string, string]>;
  allowances: Array<[string, string, string]>;
}
