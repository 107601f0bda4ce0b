import type { PanelHost } from '../shared/types.js';
import type { Panel } from './panel.js';

/**
 * Creates and releases the visual objects panels live on. Template
 * registration belongs to the implementation.
 */
export interface PanelFactory<K extends string = string> {
  /** Returns `undefined` when no template exists for `kind`; never throws for that case. */
  createInstance(kind: K): PanelHost | undefined;
  destroyInstance(host: PanelHost): void;
}

/** Startup-only source of panels that already exist when the controller is built. */
export interface SceneDiscovery<K extends string = string> {
  enumerateExistingPanels(): Panel<K>[];
}
