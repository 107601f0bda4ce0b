import type { CapabilityType, PanelHost, PanelIdentity } from '../shared/types.js';
import { CallbackList } from './callback-list.js';
import { canonicalKey } from './identity.js';

export interface PanelOptions<K extends string> {
  kind: K;
  instanceId?: string;
  destroyOnHide?: boolean;
}

export type PanelHook = CallbackList<[]>;

/**
 * Handle to a panel living on an externally-owned host. Subclass it to give a
 * panel kind its own behaviour; the controller only relies on this surface.
 */
export class Panel<K extends string = string> {
  readonly kind: K;
  readonly destroyOnHide: boolean;
  readonly host: PanelHost;

  readonly showBegin: PanelHook = new CallbackList();
  readonly showComplete: PanelHook = new CallbackList();
  readonly hideBegin: PanelHook = new CallbackList();
  readonly hideComplete: PanelHook = new CallbackList();

  private _instanceId: string;

  constructor(host: PanelHost, options: PanelOptions<K>) {
    this.host = host;
    this.kind = options.kind;
    this.destroyOnHide = options.destroyOnHide ?? false;
    this._instanceId = options.instanceId ?? '';
  }

  get instanceId(): string {
    return this._instanceId;
  }

  get identity(): PanelIdentity<K> {
    return { kind: this.kind, instanceId: this._instanceId };
  }

  get key(): string {
    return canonicalKey(this.kind, this._instanceId);
  }

  /** Called by the controller on freshly created panels, before registration. */
  setInstanceId(id: string): void {
    this._instanceId = id;
  }

  setVisible(visible: boolean): void {
    this.host.setActive(visible);
  }

  isVisible(): boolean {
    return this.host.active;
  }

  getCapability<T>(type: CapabilityType<T>): T | undefined {
    if (this instanceof type) return this;
    return this.host.getCapability(type);
  }
}
