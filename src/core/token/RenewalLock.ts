// src/core/token/RenewalLock.ts

import PQueue from 'p-queue';
import type { Logger } from '../../observability/Logger';

/**
 * In-process mutual exclusion per storage locator.
 *
 * Serializes load-check-renew-save for one gist slot inside this process.
 * Separate processes sharing a gist can still race; the store stays
 * last-write-wins.
 */
export class RenewalLock {
  private queues: Map<string, PQueue> = new Map();

  constructor(private logger: Logger) {}

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);

    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
    } else {
      this.logger.debug('Renewal lock held, waiting', {
        key,
        waiting: queue.size + queue.pending,
      });
    }

    try {
      return await queue.add(task);
    } finally {
      if (queue.size === 0 && queue.pending === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    }
  }

  isHeld(key: string): boolean {
    return this.queues.has(key);
  }
}
