import type { LotQueueFactory } from './lot-queue-factory.js';
import type { LotQueue } from './lot-queue.js';

/**
 * Lot queues created on first use. With `multiDepot` every platform keeps its
 * own balance per coin; otherwise all platforms share one queue per coin.
 */
export class LotQueueRegistry {
  private readonly queuesByPlatform = new Map<string, Map<string, LotQueue>>();
  private readonly sharedQueues = new Map<string, LotQueue>();
  private readonly created: LotQueue[] = [];

  constructor(
    private readonly createQueue: LotQueueFactory,
    private readonly multiDepot: boolean
  ) {}

  get(platform: string, coin: string): LotQueue {
    const queues = this.multiDepot ? this.platformQueues(platform) : this.sharedQueues;
    let queue = queues.get(coin);
    if (!queue) {
      queue = this.createQueue(coin);
      queues.set(coin, queue);
      this.created.push(queue);
    }
    return queue;
  }

  /**
   * Queues in creation order
   */
  all(): LotQueue[] {
    return [...this.created];
  }

  private platformQueues(platform: string): Map<string, LotQueue> {
    let queues = this.queuesByPlatform.get(platform);
    if (!queues) {
      queues = new Map<string, LotQueue>();
      this.queuesByPlatform.set(platform, queues);
    }
    return queues;
  }
}
