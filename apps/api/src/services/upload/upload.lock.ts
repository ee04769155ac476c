// src/services/upload/upload.lock.ts

import PQueue from "p-queue";

/**
 * One single-concurrency queue per key. Tasks for the same key run one at a
 * time in arrival order; tasks for different keys never wait on each other.
 * A key's queue is dropped as soon as it drains.
 */
export class KeyedLock {
  private readonly queues = new Map<string, PQueue>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
    }

    const q = queue;
    try {
      return await q.add(task, { throwOnTimeout: true });
    } finally {
      if (q.size === 0 && q.pending === 0 && this.queues.get(key) === q) {
        this.queues.delete(key);
      }
    }
  }

  get activeKeys(): number {
    return this.queues.size;
  }
}
