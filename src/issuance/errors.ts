export type IssuanceErrorCode =
  // Eligibility
  | 'NotAuthorized'
  | 'TermExpired'
  | 'AlreadyAuthorized'
  | 'CapReached'
  | 'CooldownActive'
  // Target validity
  | 'InvalidTarget'
  | 'InvalidReceiver'
  // Economic bound
  | 'ExceedsMintFactor'
  | 'InvalidAmount'
  // Timing
  | 'TermNotExpired';

const MESSAGES: Record<IssuanceErrorCode, string> = {
  NotAuthorized: 'Caller is not an authorized issuer',
  TermExpired: 'Issuer term has expired',
  AlreadyAuthorized: 'Identity is already an authorized issuer',
  CapReached: 'Maximum number of issuers reached',
  CooldownActive: 'Identity is cooling down after an early exit',
  InvalidTarget: 'Target identity is the null identity or the controller',
  InvalidReceiver: 'Receiver is the null identity or the controller',
  ExceedsMintFactor: 'Requested amount exceeds the issuer mint factor',
  InvalidAmount: 'Amount must be positive',
  TermNotExpired: 'Issuer term has not expired',
};

/**
 * A rejected issuance request. Every guard failure surfaces as one of these;
 * the transaction executor rolls back whatever the operation touched.
 */
export class IssuanceError extends Error {
  readonly code: IssuanceErrorCode;
  readonly details: Record<string, string | number>;

  constructor(code: IssuanceErrorCode, details: Record<string, string | number> = {}) {
    super(MESSAGES[code]);
    this.name = 'IssuanceError';
    this.code = code;
    this.details = details;
  }
}

export function isIssuanceError(err: unknown): err is IssuanceError {
  return err instanceof IssuanceError;
}
