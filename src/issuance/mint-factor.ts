import { IssuanceConfig, IssuerRecord, MINT_FACTOR_SCALE } from './types';

export type MintFactorParams = Pick<IssuanceConfig, 'baseMintFactor' | 'lowMintThreshold' | 'burnBonusStep'>;

export interface MintFactorBreakdown {
  avgMint: bigint;
  avgBurn: bigint;
  avgPercentMint: bigint;
  adjustedBase: bigint;
  burnOffset: bigint;
  factor: number;
}

const SCALE = BigInt(MINT_FACTOR_SCALE);

/**
 * Every intermediate of the mint factor for one issuer. All divisions are
 * bigint divisions over non-negative operands, so they truncate toward zero.
 */
export function explainMintFactor(
  record: Pick<IssuerRecord, 'totalMinted' | 'mintCount' | 'totalBurned' | 'burnCount'>,
  currentSupply: bigint,
  params: MintFactorParams
): MintFactorBreakdown {
  const base = BigInt(params.baseMintFactor);

  const avgMint = record.mintCount > 0 ? record.totalMinted / BigInt(record.mintCount) : 0n;
  const avgBurn = record.burnCount > 0 ? record.totalBurned / BigInt(record.burnCount) : 0n;

  // Bootstrap: nothing to take a fraction of yet
  if (currentSupply <= 0n) {
    return { avgMint, avgBurn, avgPercentMint: 0n, adjustedBase: base, burnOffset: 0n, factor: params.baseMintFactor };
  }

  const avgPercentMint = (avgMint * SCALE) / currentSupply;
  const adjustedBase = avgPercentMint >= base ? 0n : base - avgPercentMint;

  const step = BigInt(params.burnBonusStep);
  let burnOffset = 0n;
  if (record.totalBurned >= record.totalMinted) burnOffset += step;
  if (avgBurn >= avgMint) burnOffset += step;
  if (avgPercentMint < BigInt(params.lowMintThreshold)) burnOffset += step;

  const uncapped = adjustedBase + burnOffset;
  const factor = uncapped < base ? uncapped : base;

  return { avgMint, avgBurn, avgPercentMint, adjustedBase, burnOffset, factor: Number(factor) };
}

/**
 * Maximum fraction of supply, over MINT_FACTOR_SCALE, the issuer may mint
 * in one action. Never exceeds the base factor.
 */
export function computeMintFactor(
  record: Pick<IssuerRecord, 'totalMinted' | 'mintCount' | 'totalBurned' | 'burnCount'>,
  currentSupply: bigint,
  params: MintFactorParams
): number {
  return explainMintFactor(record, currentSupply, params).factor;
}

/**
 * floor(supply * factor / scale); at zero supply the bootstrap mint is
 * always exactly the supply floor.
 */
export function computeMaxMintable(currentSupply: bigint, factor: number, supplyFloor: bigint): bigint {
  if (currentSupply <= 0n) return supplyFloor;
  return (currentSupply * BigInt(factor)) / SCALE;
}

export function withinMintFactor(requested: bigint, currentSupply: bigint, factor: number): boolean {
  return requested * SCALE <= currentSupply * BigInt(factor);
}
