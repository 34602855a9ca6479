import { CooldownTracker } from './cooldown-tracker';
import { IssuerRecord } from './types';

function record(startBlock: number, expirationBlock: number): IssuerRecord {
  return { position: 0, startBlock, expirationBlock, totalMinted: 0n, mintCount: 0, totalBurned: 0n, burnCount: 0 };
}

describe('CooldownTracker', () => {
  // 95% of a 1000-block term
  const tracker = () => new CooldownTracker(new Map(), 1_000, 9_500);

  it('treats an exit before the threshold as early', () => {
    const t = tracker();
    expect(t.isEarlyExit(record(100, 1_100), 1_049)).toBe(true);
    expect(t.isEarlyExit(record(100, 1_100), 1_050)).toBe(false);
  });

  it('blocks the identity until the abandoned term would have ended', () => {
    const t = tracker();
    expect(t.recordExit('alice', record(100, 1_100), 500)).toBe(true);

    expect(t.getCooldown('alice')).toBe(1_100);
    expect(t.isCoolingDown('alice', 1_099)).toBe(true);
    expect(t.isCoolingDown('alice', 1_100)).toBe(false);
  });

  it('leaves no cooldown after a late exit', () => {
    const t = tracker();
    expect(t.recordExit('alice', record(100, 1_100), 1_060)).toBe(false);
    expect(t.getCooldown('alice')).toBe(0);
    expect(t.isCoolingDown('alice', 0)).toBe(false);
  });
});
