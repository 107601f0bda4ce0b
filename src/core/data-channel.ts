import type { DataCallback } from '../shared/types.js';
import type { Logger } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import { CallbackList } from './callback-list.js';

export interface DataChannelOptions {
  logger?: Logger;
  dedupe?: boolean;
}

/**
 * Keyed publish/subscribe. Delivery is synchronous and best-effort: a payload
 * published under a key with no subscribers is dropped, never buffered.
 * Entries are created lazily and outlive the panels that share their key.
 */
export class DataChannel<D = unknown> {
  private readonly subscribers = new Map<string, CallbackList<[D]>>();
  private readonly logger: Logger;
  private readonly dedupe: boolean;

  constructor(options: DataChannelOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.dedupe = options.dedupe ?? true;
  }

  subscribe(key: string, callback: DataCallback<D>): void {
    this.entry(key).add(callback);
  }

  unsubscribe(key: string, callback: DataCallback<D>): void {
    this.subscribers.get(key)?.remove(callback);
  }

  /** Returns how many subscribers received `data`. */
  publish(key: string, data: D): number {
    return this.entry(key).invoke(this.logger, `Data subscriber for ${key}`, data);
  }

  subscriberCount(key: string): number {
    return this.subscribers.get(key)?.size ?? 0;
  }

  hasEntry(key: string): boolean {
    return this.subscribers.has(key);
  }

  private entry(key: string): CallbackList<[D]> {
    let list = this.subscribers.get(key);
    if (!list) {
      list = new CallbackList({ dedupe: this.dedupe });
      this.subscribers.set(key, list);
    }
    return list;
  }
}
