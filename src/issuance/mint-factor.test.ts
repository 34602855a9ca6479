import { computeMaxMintable, computeMintFactor, explainMintFactor, withinMintFactor } from './mint-factor';
import { DEFAULT_ISSUANCE_CONFIG } from './types';

const params = DEFAULT_ISSUANCE_CONFIG; // base 1000, low-mint threshold 200, step 100

function stats(totalMinted: bigint, mintCount: number, totalBurned = 0n, burnCount = 0) {
  return { totalMinted, mintCount, totalBurned, burnCount };
}

describe('explainMintFactor', () => {
  it('returns the base factor at zero supply', () => {
    const b = explainMintFactor(stats(5_000n, 2), 0n, params);
    expect(b.factor).toBe(1000);
    expect(b.adjustedBase).toBe(1000n);
    expect(b.burnOffset).toBe(0n);
    expect(b.avgMint).toBe(2_500n);
  });

  it('caps a fresh issuer at the base factor', () => {
    const b = explainMintFactor(stats(0n, 0), 1_000_000n, params);
    expect(b.adjustedBase).toBe(1000n);
    expect(b.burnOffset).toBe(300n);
    expect(b.factor).toBe(1000);
  });

  it('reduces the factor by the average share of supply minted', () => {
    // avgMint 25_000 of 1_000_000 supply = 250 / 10000
    const b = explainMintFactor(stats(50_000n, 2), 1_000_000n, params);
    expect(b.avgPercentMint).toBe(250n);
    expect(b.adjustedBase).toBe(750n);
    expect(b.burnOffset).toBe(0n);
    expect(b.factor).toBe(750);
  });

  it('adds one step per burn condition met', () => {
    // burned 60_000 >= minted 50_000, avgBurn 30_000 >= avgMint 25_000
    const b = explainMintFactor(stats(50_000n, 2, 60_000n, 2), 1_000_000n, params);
    expect(b.avgBurn).toBe(30_000n);
    expect(b.burnOffset).toBe(200n);
    expect(b.factor).toBe(950);
  });

  it('never exceeds the base factor', () => {
    // avgPercentMint 1 -> adjusted 999, low-mint bonus 100 -> 1099 before the cap
    const b = explainMintFactor(stats(100n, 1), 1_000_000n, params);
    expect(b.adjustedBase).toBe(999n);
    expect(b.burnOffset).toBe(100n);
    expect(b.factor).toBe(1000);
  });

  it('floors the adjusted base at zero', () => {
    const b = explainMintFactor(stats(1_000_000n, 1), 1_000_000n, params);
    expect(b.avgPercentMint).toBe(10_000n);
    expect(b.adjustedBase).toBe(0n);
    expect(b.factor).toBe(0);
  });

  it('truncates averages', () => {
    expect(explainMintFactor(stats(10n, 3, 7n, 2), 1_000n, params).avgMint).toBe(3n);
    expect(explainMintFactor(stats(10n, 3, 7n, 2), 1_000n, params).avgBurn).toBe(3n);
  });
});

describe('computeMintFactor', () => {
  it('matches the breakdown factor', () => {
    expect(computeMintFactor(stats(50_000n, 2), 1_000_000n, params)).toBe(750);
  });
});

describe('computeMaxMintable', () => {
  it('returns the supply floor at zero supply', () => {
    expect(computeMaxMintable(0n, 1000, 1_000_000n)).toBe(1_000_000n);
  });

  it('truncates supply * factor / scale', () => {
    expect(computeMaxMintable(1_000_000n, 750, 1n)).toBe(75_000n);
    expect(computeMaxMintable(999n, 1000, 1n)).toBe(99n);
  });
});

describe('withinMintFactor', () => {
  it('accepts requests up to the exact bound', () => {
    expect(withinMintFactor(75_000n, 1_000_000n, 750)).toBe(true);
    expect(withinMintFactor(75_001n, 1_000_000n, 750)).toBe(false);
  });

  it('rejects everything at a zero factor', () => {
    expect(withinMintFactor(1n, 1_000_000n, 0)).toBe(false);
  });
});
