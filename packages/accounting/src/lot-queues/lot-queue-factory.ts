import type { CostBasisMethod } from '../config/taxation-config.js';

import { FifoLotQueue } from './fifo-lot-queue.js';
import { LifoLotQueue } from './lifo-lot-queue.js';
import type { LotQueue } from './lot-queue.js';

export type LotQueueFactory = (coin: string) => LotQueue;

/**
 * Get the queue constructor for a cost basis method.
 */
export function getLotQueueFactory(method: CostBasisMethod): LotQueueFactory {
  switch (method) {
    case 'fifo': {
      return (coin) => new FifoLotQueue(coin);
    }
    case 'lifo': {
      return (coin) => new LifoLotQueue(coin);
    }
  }
}
