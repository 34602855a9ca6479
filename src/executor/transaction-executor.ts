/**
 * Transaction Executor
 *
 * Serialized, all-or-nothing host for state-mutating operations:
 * - One operation runs at a time, in submission order
 * - The block height is read once and fixed for the whole operation
 * - Notifications are buffered and only reach the log on commit
 * - State is saved before the operation counts as committed
 * - Any thrown error, including a failed append or save, restores every
 *   participant to its pre-operation snapshot, cuts the log back to its
 *   previous head and is rethrown to the caller
 */

import { EventEmitter } from 'events';
import { BlockClock } from '../chain/block-clock';
import { NotificationEvent, NotificationPayload } from '../event-store/types';
import { OperationContext } from '../issuance/types';
import { metrics } from '../observability/metrics';
import { describeError, logger } from '../observability/structured-logger';

/**
 * State that can be captured before an operation and put back after a
 * failed one.
 */
export interface Snapshottable<S> {
  snapshot(): S;
  restore(snapshot: S): void;
}

export interface NotificationLog {
  appendBatch(payloads: NotificationPayload[], block: number, action: string): NotificationEvent[];
  headSequence(): number;
  truncateTo(sequence: number): void;
}

export interface CommitInfo {
  action: string;
  block: number;
  events: NotificationEvent[];
}

export interface ExecutorHooks {
  /** Runs inside the transaction after the log append; a throw aborts it */
  persist?: (info: CommitInfo) => void;
  /** Runs once the transaction is durable */
  onCommit?: (info: CommitInfo) => void;
}

interface Participant {
  capture(): () => void;
}

export class TransactionExecutor extends EventEmitter {
  private participants: Participant[] = [];
  private queue: Promise<unknown> = Promise.resolve();
  private running = false;

  constructor(
    private clock: BlockClock,
    private log: NotificationLog,
    private hooks: ExecutorHooks = {}
  ) {
    super();
  }

  register<S>(participant: Snapshottable<S>): void {
    this.participants.push({
      capture: () => {
        const snap = participant.snapshot();
        return () => participant.restore(snap);
      },
    });
  }

  /**
   * Run `operation` synchronously as one transaction. Nested calls are
   * refused: the host never interleaves operations.
   */
  execute<T>(action: string, operation: (ctx: OperationContext) => T): T {
    if (this.running) {
      throw new Error(`Cannot start ${action} while another transaction is running`);
    }

    const block = this.clock.currentBlock();
    const buffered: NotificationPayload[] = [];
    const ctx: OperationContext = {
      now: block,
      emit: (payload) => {
        buffered.push(payload);
      },
    };
    const rollbacks = this.participants.map((p) => p.capture());
    const head = this.log.headSequence();

    this.running = true;
    let result: T;
    let info: CommitInfo;
    try {
      result = operation(ctx);
      info = { action, block, events: this.log.appendBatch(buffered, block, action) };
      this.hooks.persist?.(info);
    } catch (err) {
      for (const rollback of rollbacks) rollback();
      this.discardAppended(head, action);
      metrics.incCounter('issuance_tx_rolled_back_total');
      logger.debug('TransactionExecutor', 'Rolled back', { action, block, error: describeError(err) });
      throw err;
    } finally {
      this.running = false;
    }

    metrics.incCounter('issuance_tx_committed_total');
    try {
      this.hooks.onCommit?.(info);
    } catch (err) {
      logger.error('TransactionExecutor', 'Post-commit hook failed', { action, block, error: describeError(err) });
    }
    this.emit('committed', info);
    return result;
  }

  /**
   * Queue an operation behind every previously submitted one. Callers from
   * async contexts (HTTP handlers) go through here.
   */
  submit<T>(action: string, operation: (ctx: OperationContext) => T): Promise<T> {
    const next = this.queue.then(() => this.execute(action, operation));
    this.queue = next.catch(() => undefined);
    return next;
  }

  /**
   * Read-only access at the current block, outside any transaction.
   */
  currentBlock(): number {
    return this.clock.currentBlock();
  }

  private discardAppended(head: number, action: string): void {
    if (this.log.headSequence() <= head) return;
    try {
      this.log.truncateTo(head);
    } catch (err) {
      // Startup refuses a log that runs ahead of the saved state
      logger.error('TransactionExecutor', 'Cannot undo log append', { action, head, error: describeError(err) });
    }
  }
}
