export type PanelState = 'hidden' | 'showing' | 'active' | 'hiding' | 'destroyed';

/** Class used as a lookup key for capabilities carried by a host or panel. */
export type CapabilityType<T> = abstract new (...args: never[]) => T;

export interface PanelIdentity<K extends string = string> {
  kind: K;
  /** Empty string when the panel has no instance discriminator. */
  instanceId: string;
}

/**
 * The externally-owned visual object a panel lives on. The core only toggles
 * its activation and queries it for capabilities.
 */
export interface PanelHost {
  readonly active: boolean;
  setActive(active: boolean): void;
  getCapability<T>(type: CapabilityType<T>): T | undefined;
}

export type DataCallback<D = unknown> = (data: D) => void;
