import { v4 as uuidv4 } from 'uuid';
import type { CapabilityType, PanelHost } from '../shared/types.js';
import type { PanelFactory, SceneDiscovery } from './factory.js';
import { Panel } from './panel.js';

/** In-process host: a bag of components plus an activation flag. */
export class MemoryHost implements PanelHost {
  readonly id: string = uuidv4();
  active: boolean;
  destroyed = false;
  private readonly components: object[] = [];

  constructor(readonly name: string, active: boolean = false) {
    this.active = active;
  }

  setActive(active: boolean): void {
    this.active = active;
  }

  addComponent<T extends object>(component: T): T {
    this.components.push(component);
    return component;
  }

  getCapability<T>(type: CapabilityType<T>): T | undefined {
    for (const component of this.components) {
      if (component instanceof type) return component;
    }
    return undefined;
  }
}

export type PanelTemplate<K extends string> = (host: MemoryHost, kind: K) => void;

export interface PanelTemplateOptions {
  destroyOnHide?: boolean;
  /** Extra components attached next to the panel. */
  components?: Array<(host: MemoryHost) => object>;
}

export function panelTemplate<K extends string>(options: PanelTemplateOptions = {}): PanelTemplate<K> {
  return (host, kind) => {
    host.addComponent(new Panel(host, { kind, destroyOnHide: options.destroyOnHide }));
    for (const make of options.components ?? []) {
      host.addComponent(make(host));
    }
  };
}

export class TemplateFactory<K extends string = string> implements PanelFactory<K> {
  private readonly templates = new Map<K, PanelTemplate<K>>();
  readonly created: MemoryHost[] = [];
  readonly destroyed: PanelHost[] = [];

  define(kind: K, template: PanelTemplate<K> = panelTemplate()): this {
    this.templates.set(kind, template);
    return this;
  }

  createInstance(kind: K): MemoryHost | undefined {
    const template = this.templates.get(kind);
    if (!template) return undefined;
    const host = new MemoryHost(kind);
    template(host, kind);
    this.created.push(host);
    return host;
  }

  destroyInstance(host: PanelHost): void {
    if (host instanceof MemoryHost) host.destroyed = true;
    this.destroyed.push(host);
  }
}

/** Discovery over a fixed list of panels, each starting visible. */
export class MemoryScene<K extends string = string> implements SceneDiscovery<K> {
  private readonly panels: Panel<K>[] = [];

  add(kind: K, instanceId?: string, destroyOnHide?: boolean): Panel<K> {
    const host = new MemoryHost(kind, true);
    const panel = host.addComponent(new Panel(host, { kind, instanceId, destroyOnHide }));
    this.panels.push(panel);
    return panel;
  }

  enumerateExistingPanels(): Panel<K>[] {
    return [...this.panels];
  }
}
