export type { CapabilityType, DataCallback, PanelHost, PanelIdentity, PanelState } from './shared/types.js';
export { PanelError, type PanelErrorCode } from './shared/errors.js';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './shared/logger.js';
export { loadConfig, type Config } from './shared/config.js';
export { KEY_SEPARATOR, canonicalKey, identityOf, keyOf, sameIdentity } from './core/identity.js';
export { CallbackList, type CallbackListOptions } from './core/callback-list.js';
export { Panel, type PanelHook, type PanelOptions } from './core/panel.js';
export { PanelRegistry, type PanelRecord } from './core/registry.js';
export { DataChannel, type DataChannelOptions } from './core/data-channel.js';
export type { PanelFactory, SceneDiscovery } from './core/factory.js';
export { PanelController, type PanelControllerOptions } from './core/controller.js';
export { getDefaultController, hasDefaultController, setDefaultController } from './core/default-controller.js';
export {
  MemoryHost,
  MemoryScene,
  TemplateFactory,
  panelTemplate,
  type PanelTemplate,
  type PanelTemplateOptions,
} from './core/memory.js';
