import { PanelError, describeError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { PanelController } from '../core/controller.js';
import { canonicalKey } from '../core/identity.js';
import { MemoryScene, TemplateFactory, panelTemplate } from '../core/memory.js';
import { Panel } from '../core/panel.js';

export type Step =
  | { op: 'show'; kind: string; id?: string; data?: unknown }
  | { op: 'hide'; kind: string; id?: string }
  | { op: 'hideAll' }
  | { op: 'destroy'; kind: string; id?: string }
  | { op: 'destroyAllOfKind'; kind: string }
  | { op: 'send'; key: string; data: unknown }
  | { op: 'sendToKind'; kind: string; data: unknown }
  | { op: 'isActive'; kind: string; id?: string }
  | { op: 'active'; kind: string };

export interface Scenario {
  templates: string[];
  destroyOnHide: string[];
  existing: Array<{ kind: string; id?: string }>;
  subscribe: string[];
  steps: Step[];
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string): PanelError {
  return new PanelError('INVALID_SCRIPT', message);
}

function stringList(obj: JsonObject, field: string): string[] {
  const value = obj[field];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw invalid(`"${field}" must be an array of strings`);
  }
  return value;
}

function requireString(obj: JsonObject, field: string, where: string): string {
  const value = obj[field];
  if (typeof value !== 'string' || value === '') {
    throw invalid(`${where}: "${field}" must be a non-empty string`);
  }
  return value;
}

function optionalString(obj: JsonObject, field: string, where: string): string | undefined {
  const value = obj[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw invalid(`${where}: "${field}" must be a string`);
  return value;
}

function parseStep(raw: unknown, index: number): Step {
  const where = `step ${index + 1}`;
  if (!isObject(raw)) throw invalid(`${where} must be an object`);

  switch (raw.op) {
    case 'show':
      return { op: 'show', kind: requireString(raw, 'kind', where), id: optionalString(raw, 'id', where), data: raw.data };
    case 'hide':
      return { op: 'hide', kind: requireString(raw, 'kind', where), id: optionalString(raw, 'id', where) };
    case 'destroy':
      return { op: 'destroy', kind: requireString(raw, 'kind', where), id: optionalString(raw, 'id', where) };
    case 'isActive':
      return { op: 'isActive', kind: requireString(raw, 'kind', where), id: optionalString(raw, 'id', where) };
    case 'hideAll':
      return { op: 'hideAll' };
    case 'destroyAllOfKind':
      return { op: 'destroyAllOfKind', kind: requireString(raw, 'kind', where) };
    case 'active':
      return { op: 'active', kind: requireString(raw, 'kind', where) };
    case 'send':
      return { op: 'send', key: requireString(raw, 'key', where), data: raw.data };
    case 'sendToKind':
      return { op: 'sendToKind', kind: requireString(raw, 'kind', where), data: raw.data };
    default:
      throw invalid(`${where}: unknown op ${JSON.stringify(raw.op)}`);
  }
}

export function parseScenario(text: string): Scenario {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw invalid(`Scenario is not valid JSON: ${describeError(err)}`);
  }
  if (!isObject(raw)) throw invalid('Scenario must be a JSON object');

  const existingRaw = raw.existing ?? [];
  if (!Array.isArray(existingRaw)) throw invalid('"existing" must be an array');
  const existing = existingRaw.map((entry, i) => {
    const where = `existing ${i + 1}`;
    if (!isObject(entry)) throw invalid(`${where} must be an object`);
    return { kind: requireString(entry, 'kind', where), id: optionalString(entry, 'id', where) };
  });

  const stepsRaw = raw.steps;
  if (!Array.isArray(stepsRaw)) throw invalid('"steps" must be an array');

  return {
    templates: stringList(raw, 'templates'),
    destroyOnHide: stringList(raw, 'destroyOnHide'),
    existing,
    subscribe: stringList(raw, 'subscribe'),
    steps: stepsRaw.map(parseStep),
  };
}

function traceHooks(panel: Panel, trace: (line: string) => void): void {
  panel.showBegin.add(() => trace(`  ${panel.key} show-begin`));
  panel.showComplete.add(() => trace(`  ${panel.key} show-complete`));
  panel.hideBegin.add(() => trace(`  ${panel.key} hide-begin`));
  panel.hideComplete.add(() => trace(`  ${panel.key} hide-complete`));
}

export interface RunOptions {
  logger: Logger;
  dedupeSubscribers?: boolean;
}

/**
 * Replays a scenario against in-memory hosts and returns the trace: one line
 * per step, indented lines for hooks and data deliveries it caused.
 */
export function runScenario(scenario: Scenario, options: RunOptions): string[] {
  const lines: string[] = [];
  const trace = (line: string) => lines.push(line);

  const factory = new TemplateFactory();
  for (const kind of scenario.templates) {
    const base = panelTemplate<string>({ destroyOnHide: scenario.destroyOnHide.includes(kind) });
    factory.define(kind, (host, k) => {
      base(host, k);
      const panel = host.getCapability(Panel);
      if (panel) traceHooks(panel, trace);
    });
  }

  const controller = new PanelController({
    factory,
    logger: options.logger,
    dedupeSubscribers: options.dedupeSubscribers,
  });

  const scene = new MemoryScene();
  for (const { kind, id } of scenario.existing) {
    traceHooks(scene.add(kind, id, scenario.destroyOnHide.includes(kind)), trace);
  }
  const adopted = controller.adoptExisting(scene);
  if (adopted > 0) trace(`adopted ${adopted} existing panel(s)`);

  for (const key of scenario.subscribe) {
    controller.subscribe(key, data => trace(`  data ${key} <- ${JSON.stringify(data)}`));
  }

  for (const step of scenario.steps) {
    switch (step.op) {
      case 'show': {
        const key = canonicalKey(step.kind, step.id);
        trace(`show ${key}`);
        const panel = controller.show(step.kind, step.id, step.data);
        trace(`  -> ${panel ? 'shown' : 'none'}`);
        break;
      }
      case 'hide':
        trace(`hide ${canonicalKey(step.kind, step.id)}`);
        controller.hide(step.kind, step.id);
        break;
      case 'hideAll':
        trace('hideAll');
        controller.hideAll();
        break;
      case 'destroy': {
        const key = canonicalKey(step.kind, step.id);
        const panel = controller.getPanel(step.kind, step.id);
        trace(`destroy ${key}${panel ? '' : ' (not registered)'}`);
        if (panel) controller.destroy(panel);
        break;
      }
      case 'destroyAllOfKind':
        trace(`destroyAllOfKind ${step.kind}`);
        controller.destroyAllOfKind(step.kind);
        break;
      case 'send':
        trace(`send ${step.key}`);
        controller.sendData(step.key, step.data);
        break;
      case 'sendToKind':
        trace(`sendToKind ${step.kind}`);
        controller.sendDataToKind(step.kind, step.data);
        break;
      case 'isActive':
        trace(`isActive ${canonicalKey(step.kind, step.id)} = ${controller.isActive(step.kind, step.id)}`);
        break;
      case 'active': {
        const keys = controller.getActivePanelsOfKind(step.kind).map(p => p.key);
        trace(`active ${step.kind} = [${keys.join(', ')}]`);
        break;
      }
    }
  }

  controller.dispose();
  return lines;
}
