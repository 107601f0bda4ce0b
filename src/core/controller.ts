import type { CapabilityType, DataCallback, PanelIdentity, PanelState } from '../shared/types.js';
import type { Logger } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import { DataChannel } from './data-channel.js';
import type { PanelFactory, SceneDiscovery } from './factory.js';
import { identityOf } from './identity.js';
import { Panel } from './panel.js';
import { PanelRegistry, type PanelRecord } from './registry.js';

export interface PanelControllerOptions<K extends string> {
  factory: PanelFactory<K>;
  logger?: Logger;
  registry?: PanelRegistry<K>;
  channel?: DataChannel;
  /** Used when no channel is supplied. Defaults to true. */
  dedupeSubscribers?: boolean;
}

function isPanelOfKind<K extends string>(panel: Panel, kind: K): panel is Panel<K> {
  return panel.kind === kind;
}

/**
 * Shows, hides and destroys panels. Resolves an identity to an existing record
 * or asks the factory for a new host, delivers show payloads through the data
 * channel, then runs the hook sequence.
 *
 * Hooks run synchronously and may call back into the controller. Bulk
 * operations walk snapshots, and every step re-checks that the record it is
 * working on is still the registered one.
 */
export class PanelController<K extends string = string> {
  readonly registry: PanelRegistry<K>;
  readonly channel: DataChannel;
  private readonly factory: PanelFactory<K>;
  private readonly logger: Logger;

  constructor(options: PanelControllerOptions<K>) {
    this.factory = options.factory;
    this.logger = options.logger ?? silentLogger;
    this.registry = options.registry ?? new PanelRegistry<K>(this.logger);
    this.channel = options.channel ?? new DataChannel({
      logger: this.logger,
      dedupe: options.dedupeSubscribers,
    });
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /** Registers a panel that was built outside the factory. */
  attach(handle: Panel<K>): PanelRecord<K> {
    const record = this.registry.register(handle.identity, handle, handle.destroyOnHide);
    if (handle.isVisible()) {
      record.active = true;
      record.state = 'active';
    }
    return record;
  }

  /** Registers every discovered panel and forces it hidden. */
  adoptExisting(discovery: SceneDiscovery<K>): number {
    const panels = discovery.enumerateExistingPanels();
    for (const handle of panels) {
      const record = this.attach(handle);
      if (handle.isVisible()) handle.setVisible(false);
      record.active = false;
      record.state = 'hidden';
      this.logger.debug(`Adopted existing panel ${record.key}`);
    }
    return panels.length;
  }

  // ---------------------------------------------------------------------------
  // Show / hide
  // ---------------------------------------------------------------------------

  show(kind: K, instanceId?: string, data?: unknown): Panel<K> | undefined {
    const identity = identityOf(kind, instanceId);
    const record = this.registry.lookup(identity) ?? this.create(identity);
    if (!record) return undefined;

    if (data !== undefined) {
      this.channel.publish(record.key, data);
      if (!this.isCurrent(record)) return undefined;
    }

    return this.runShow(record) ? record.handle : undefined;
  }

  /** Shows the panel, then looks up a capability on it. */
  showAs<T>(type: CapabilityType<T>, kind: K, instanceId?: string, data?: unknown): T | undefined {
    return this.show(kind, instanceId, data)?.getCapability(type);
  }

  /** Without an instance id, hides every active panel of `kind`. */
  hide(kind: K, instanceId?: string): void {
    if (!instanceId) {
      this.hideAllOfKind(kind);
      return;
    }
    const record = this.registry.lookup(identityOf(kind, instanceId));
    if (record) this.runHide(record);
  }

  hideAllOfKind(kind: K): void {
    for (const record of this.registry.activeOfKind(kind)) {
      this.runHide(record);
    }
  }

  hideAll(): void {
    for (const record of this.registry.all().filter(r => r.active)) {
      this.runHide(record);
    }
  }

  // ---------------------------------------------------------------------------
  // Destroy
  // ---------------------------------------------------------------------------

  /** Unregisters the panel and releases its host. No-op for unknown handles. */
  destroy(handle: Panel<K>): void {
    // Matched by handle, not by key: the instance id may have changed since registration.
    const record = this.registry.lookupAllOfKind(handle.kind).find(r => r.handle === handle);
    if (!record) return;

    this.registry.remove(record.identity);
    record.active = false;
    record.state = 'destroyed';
    this.factory.destroyInstance(handle.host);
    this.logger.debug(`Destroyed panel ${record.key}`);
  }

  destroyAllOfKind(kind: K): void {
    for (const record of this.registry.lookupAllOfKind(kind)) {
      this.destroy(record.handle);
    }
  }

  destroyAll(): void {
    for (const record of this.registry.all()) {
      this.destroy(record.handle);
    }
  }

  dispose(): void {
    this.destroyAll();
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Without an instance id, true when any panel of `kind` is active. */
  isActive(kind: K, instanceId?: string): boolean {
    if (!instanceId) return this.registry.activeOfKind(kind).length > 0;
    return this.registry.lookup(identityOf(kind, instanceId))?.active ?? false;
  }

  getPanel(kind: K, instanceId?: string): Panel<K> | undefined {
    return this.registry.lookup(identityOf(kind, instanceId))?.handle;
  }

  stateOf(kind: K, instanceId?: string): PanelState | undefined {
    return this.registry.lookup(identityOf(kind, instanceId))?.state;
  }

  /**
   * Without an instance id, returns the first match walking the kind's panels
   * in registration order.
   */
  getComponent<T>(type: CapabilityType<T>, kind: K, instanceId?: string): T | undefined {
    if (instanceId) {
      return this.registry.lookup(identityOf(kind, instanceId))?.handle.getCapability(type);
    }
    for (const record of this.registry.lookupAllOfKind(kind)) {
      const found = record.handle.getCapability(type);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  getActivePanelsOfKind(kind: K): Panel<K>[] {
    return this.registry.activeOfKind(kind).map(r => r.handle);
  }

  // ---------------------------------------------------------------------------
  // Data
  // ---------------------------------------------------------------------------

  sendData(key: string, data: unknown): void {
    this.channel.publish(key, data);
  }

  /** Publishes to every registered panel of `kind`, active or not. */
  sendDataToKind(kind: K, data: unknown): void {
    for (const record of this.registry.lookupAllOfKind(kind)) {
      this.channel.publish(record.key, data);
    }
  }

  subscribe(key: string, callback: DataCallback): void {
    this.channel.subscribe(key, callback);
  }

  unsubscribe(key: string, callback: DataCallback): void {
    this.channel.unsubscribe(key, callback);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private create(identity: PanelIdentity<K>): PanelRecord<K> | undefined {
    const host = this.factory.createInstance(identity.kind);
    if (!host) {
      this.logger.warn(`No template found for panel kind ${identity.kind}`);
      return undefined;
    }

    const candidate = host.getCapability(Panel);
    if (!candidate || !isPanelOfKind(candidate, identity.kind)) {
      this.logger.error(`Template for ${identity.kind} does not produce a ${identity.kind} panel`);
      this.factory.destroyInstance(host);
      return undefined;
    }

    if (candidate.instanceId !== identity.instanceId) {
      candidate.setInstanceId(identity.instanceId);
    }
    return this.registry.register(candidate.identity, candidate, candidate.destroyOnHide);
  }

  private isCurrent(record: PanelRecord<K>): boolean {
    return record.state !== 'destroyed' && this.registry.lookupKey(record.key) === record;
  }

  private runShow(record: PanelRecord<K>): boolean {
    // Already mid-show: a hook asked for the same panel again.
    if (record.state === 'showing') return true;
    const { handle, key } = record;
    record.state = 'showing';
    handle.showBegin.invoke(this.logger, `${key} show-begin`);
    if (!this.isCurrent(record)) return false;

    record.active = true;
    handle.setVisible(true);
    handle.showComplete.invoke(this.logger, `${key} show-complete`);
    if (!this.isCurrent(record)) return false;

    // A hook may have hidden the panel again.
    record.state = record.active ? 'active' : 'hidden';
    return true;
  }

  private runHide(record: PanelRecord<K>): void {
    if (!record.active || record.state === 'hiding' || !this.isCurrent(record)) return;
    const { handle, key } = record;

    record.state = 'hiding';
    handle.hideBegin.invoke(this.logger, `${key} hide-begin`);
    if (!this.isCurrent(record)) return;

    record.active = false;
    handle.setVisible(false);
    handle.hideComplete.invoke(this.logger, `${key} hide-complete`);
    if (!this.isCurrent(record) || record.active) return;

    record.state = 'hidden';
    if (record.destroyOnHide) this.destroy(handle);
  }
}
