import { RegistryState } from './types';

export interface InvariantReport {
  valid: boolean;
  violations: string[];
}

/**
 * Check a registry snapshot against the data-model invariants:
 * list/count agreement, position index, record-iff-member, the cap, and
 * non-negative counters. Used on startup and throughout the tests.
 */
export function verifyRegistryInvariants(state: RegistryState, maxIssuers: number): InvariantReport {
  const violations: string[] = [];
  const { issuerList, records } = state;

  if (issuerList.length !== records.size) {
    violations.push(`issuerList has ${issuerList.length} entries but ${records.size} records exist`);
  }

  if (issuerList.length > maxIssuers) {
    violations.push(`${issuerList.length} issuers exceed the cap of ${maxIssuers}`);
  }

  const seen = new Set<string>();
  issuerList.forEach((identity, i) => {
    if (seen.has(identity)) {
      violations.push(`${identity} appears more than once in issuerList`);
    }
    seen.add(identity);

    const record = records.get(identity);
    if (!record) {
      violations.push(`${identity} at position ${i} has no record`);
      return;
    }
    if (record.position !== i) {
      violations.push(`${identity} is at position ${i} but its record says ${record.position}`);
    }
  });

  for (const [identity, record] of records) {
    if (!seen.has(identity)) {
      violations.push(`record for ${identity} has no entry in issuerList`);
    }
    if (record.totalMinted < 0n || record.totalBurned < 0n || record.mintCount < 0 || record.burnCount < 0) {
      violations.push(`record for ${identity} has a negative counter`);
    }
    if (record.expirationBlock < record.startBlock) {
      violations.push(`record for ${identity} expires before it starts`);
    }
  }

  return { valid: violations.length === 0, violations };
}
