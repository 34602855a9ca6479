import { EventEmitter } from 'events';
import { logger } from '../observability/structured-logger';

/**
 * Monotonically non-decreasing block counter used for every timing decision.
 */
export interface BlockClock {
  currentBlock(): number;
}

/**
 * Clock that only moves when told to. Tests and tooling.
 */
export class ManualBlockClock implements BlockClock {
  constructor(private height: number = 0) {}

  currentBlock(): number {
    return this.height;
  }

  advance(blocks: number = 1): number {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new Error(`Cannot advance by ${blocks} blocks`);
    }
    this.height += blocks;
    return this.height;
  }

  setBlock(height: number): void {
    if (height < this.height) {
      throw new Error(`Block height cannot go backwards (${this.height} -> ${height})`);
    }
    this.height = height;
  }
}

export interface IntervalClockConfig {
  startHeight: number;
  blockTimeMs: number; // Default: 10000 (10 seconds)
}

/**
 * Produces one block per `blockTimeMs`. Emits 'block' with the new height.
 */
export class IntervalBlockClock extends EventEmitter implements BlockClock {
  private height: number;
  private blockTimeMs: number;
  private timer?: NodeJS.Timeout;

  constructor(config?: Partial<IntervalClockConfig>) {
    super();
    this.height = config?.startHeight || 0;
    this.blockTimeMs = config?.blockTimeMs || 10000;
  }

  currentBlock(): number {
    return this.height;
  }

  start(): void {
    if (this.timer) {
      return; // Already running
    }

    logger.info('BlockClock', `Producing a block every ${this.blockTimeMs}ms`, { height: this.height });

    this.timer = setInterval(() => {
      this.height += 1;
      this.emit('block', this.height);
    }, this.blockTimeMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }
}
