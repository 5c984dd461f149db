import { LotQueue } from './lot-queue.js';

/**
 * LIFO (Last-In-First-Out) lot queue
 *
 * Disposals consume the newest lots first.
 */
export class LifoLotQueue extends LotQueue {
  getName(): 'lifo' {
    return 'lifo';
  }

  protected nextIndex(): number {
    return this.lots.length - 1;
  }
}
