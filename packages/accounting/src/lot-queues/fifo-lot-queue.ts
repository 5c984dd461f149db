import { LotQueue } from './lot-queue.js';

/**
 * FIFO (First-In-First-Out) lot queue
 *
 * Disposals consume the oldest lots first.
 *
 * Example:
 * - Buy 1 BTC on Jan 1, buy 1 BTC on Jan 15
 * - Sell 1.5 BTC on Feb 1
 * → Consumes all of the Jan 1 lot and 0.5 of the Jan 15 lot
 */
export class FifoLotQueue extends LotQueue {
  getName(): 'fifo' {
    return 'fifo';
  }

  protected nextIndex(): number {
    return 0;
  }
}
