import type { Logger } from '../shared/logger.js';
import { describeError } from '../shared/errors.js';

export interface CallbackListOptions {
  /** Ignore a second `add` of a callback that is already present. */
  dedupe?: boolean;
}

/**
 * Ordered list of callbacks invoked synchronously in registration order.
 * Invocation walks a copy, so callbacks may add or remove entries mid-dispatch.
 */
export class CallbackList<Args extends unknown[]> {
  private readonly callbacks: Array<(...args: Args) => void> = [];
  private readonly dedupe: boolean;

  constructor(options: CallbackListOptions = {}) {
    this.dedupe = options.dedupe ?? true;
  }

  get size(): number {
    return this.callbacks.length;
  }

  add(callback: (...args: Args) => void): void {
    if (this.dedupe && this.callbacks.includes(callback)) return;
    this.callbacks.push(callback);
  }

  /** Removes the earliest registration of `callback`; no-op when absent. */
  remove(callback: (...args: Args) => void): boolean {
    const idx = this.callbacks.indexOf(callback);
    if (idx === -1) return false;
    this.callbacks.splice(idx, 1);
    return true;
  }

  /**
   * Calls every callback with `args`. A throwing callback is reported under
   * `label` and the rest still run. Returns the number of callbacks invoked.
   */
  invoke(logger: Logger, label: string, ...args: Args): number {
    const snapshot = [...this.callbacks];
    for (const cb of snapshot) {
      try {
        cb(...args);
      } catch (err) {
        logger.error(`${label} callback failed: ${describeError(err)}`);
      }
    }
    return snapshot.length;
  }
}
