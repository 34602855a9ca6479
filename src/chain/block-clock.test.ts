import { IntervalBlockClock, ManualBlockClock } from './block-clock';

describe('ManualBlockClock', () => {
  it('only moves forward', () => {
    const clock = new ManualBlockClock(5);
    expect(clock.advance()).toBe(6);
    expect(clock.advance(4)).toBe(10);

    clock.setBlock(10);
    expect(() => clock.setBlock(9)).toThrow('Block height cannot go backwards (10 -> 9)');
    expect(() => clock.advance(-1)).toThrow('Cannot advance by -1 blocks');
    expect(clock.currentBlock()).toBe(10);
  });
});

describe('IntervalBlockClock', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('produces one block per interval from the start height', () => {
    const clock = new IntervalBlockClock({ startHeight: 40, blockTimeMs: 1_000 });
    const heights: number[] = [];
    clock.on('block', (height: number) => heights.push(height));

    clock.start();
    jest.advanceTimersByTime(3_500);
    clock.stop();
    jest.advanceTimersByTime(5_000);

    expect(heights).toEqual([41, 42, 43]);
    expect(clock.currentBlock()).toBe(43);
  });
});
