import type { PanelIdentity, PanelState } from '../shared/types.js';
import type { Logger } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import { keyOf } from './identity.js';
import type { Panel } from './panel.js';

export interface PanelRecord<K extends string = string> {
  readonly identity: PanelIdentity<K>;
  readonly key: string;
  readonly handle: Panel<K>;
  readonly destroyOnHide: boolean;
  active: boolean;
  state: PanelState;
}

/**
 * Bookkeeping for live panels: one map by canonical key and one list per kind.
 * Every mutation updates both indices before returning.
 */
export class PanelRegistry<K extends string = string> {
  private readonly byKey = new Map<string, PanelRecord<K>>();
  private readonly byKind = new Map<K, PanelRecord<K>[]>();

  constructor(private readonly logger: Logger = silentLogger) {}

  get size(): number {
    return this.byKey.size;
  }

  /** Inserts a record, replacing (with a warning) any record under the same key. */
  register(identity: PanelIdentity<K>, handle: Panel<K>, destroyOnHide: boolean): PanelRecord<K> {
    const key = keyOf(identity);
    const previous = this.byKey.get(key);
    if (previous) {
      this.logger.warn(`Panel ${key} already registered. Replacing previous reference.`);
      this.dropFromKind(previous);
    }

    const record: PanelRecord<K> = {
      identity: { kind: identity.kind, instanceId: identity.instanceId },
      key,
      handle,
      destroyOnHide,
      active: false,
      state: 'hidden',
    };

    this.byKey.set(key, record);
    let list = this.byKind.get(identity.kind);
    if (!list) {
      list = [];
      this.byKind.set(identity.kind, list);
    }
    list.push(record);
    return record;
  }

  lookup(identity: PanelIdentity<K>): PanelRecord<K> | undefined {
    return this.byKey.get(keyOf(identity));
  }

  lookupKey(key: string): PanelRecord<K> | undefined {
    return this.byKey.get(key);
  }

  /** Insertion order; a replaced record moves to the end. Returns a copy. */
  lookupAllOfKind(kind: K): PanelRecord<K>[] {
    return [...(this.byKind.get(kind) ?? [])];
  }

  activeOfKind(kind: K): PanelRecord<K>[] {
    return this.lookupAllOfKind(kind).filter(r => r.active);
  }

  /** Removes the record under `identity`; no-op when absent. */
  remove(identity: PanelIdentity<K>): PanelRecord<K> | undefined {
    const key = keyOf(identity);
    const record = this.byKey.get(key);
    if (!record) return undefined;
    this.byKey.delete(key);
    this.dropFromKind(record);
    return record;
  }

  /** Snapshot of every record, in key insertion order. */
  all(): PanelRecord<K>[] {
    return [...this.byKey.values()];
  }

  kinds(): K[] {
    return [...this.byKind.keys()];
  }

  private dropFromKind(record: PanelRecord<K>): void {
    const list = this.byKind.get(record.identity.kind);
    if (!list) return;
    const idx = list.indexOf(record);
    if (idx !== -1) list.splice(idx, 1);
    if (list.length === 0) this.byKind.delete(record.identity.kind);
  }
}
