import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { PanelController } from '../core/controller.js';
import type { Panel } from '../core/panel.js';
import { TemplateFactory, panelTemplate } from '../core/memory.js';
import { recordingLogger, messagesAt, type LogEntry } from './helpers.js';

type Kind = 'Settings' | 'Dialogue' | 'Notification';

let factory: TemplateFactory<Kind>;
let controller: PanelController<Kind>;
let entries: LogEntry[];

function mustShow(kind: Kind, instanceId?: string): Panel<Kind> {
  const panel = controller.show(kind, instanceId);
  assert.ok(panel, `expected ${kind} to be shown`);
  return panel;
}

beforeEach(() => {
  factory = new TemplateFactory<Kind>()
    .define('Settings')
    .define('Dialogue', panelTemplate({ destroyOnHide: true }))
    .define('Notification');
  const recorder = recordingLogger();
  entries = recorder.entries;
  controller = new PanelController({ factory, logger: recorder.logger });
});

describe('hooks that re-enter the controller', () => {
  it('survives a hide-begin hook destroying a sibling mid-iteration', () => {
    const a = mustShow('Settings', 'A');
    const b = mustShow('Settings', 'B');
    const c = mustShow('Settings', 'C');
    const hidden: string[] = [];
    for (const panel of [a, b, c]) {
      panel.hideComplete.add(() => { hidden.push(panel.key); });
    }
    a.hideBegin.add(() => controller.destroy(b));

    controller.hide('Settings');

    assert.deepStrictEqual(hidden, ['Settings_A', 'Settings_C']);
    assert.deepStrictEqual(controller.registry.lookupAllOfKind('Settings').map(r => r.key), ['Settings_A', 'Settings_C']);
    assert.equal(controller.registry.size, 2);
  });

  it('aborts show when show-begin destroys the panel', () => {
    const panel = mustShow('Notification');
    controller.hide('Notification');
    let completed = false;
    panel.showBegin.add(() => controller.destroy(panel));
    panel.showComplete.add(() => { completed = true; });

    assert.equal(controller.show('Notification'), undefined);
    assert.equal(completed, false);
    assert.equal(controller.registry.size, 0);
    assert.equal(panel.isVisible(), false);
  });

  it('aborts show when the data subscriber destroys the panel', () => {
    const panel = mustShow('Settings');
    let began = false;
    panel.showBegin.add(() => { began = true; });
    controller.subscribe('Settings', () => controller.destroy(panel));

    assert.equal(controller.show('Settings', undefined, 'payload'), undefined);
    assert.equal(began, false);
  });

  it('settles as hidden when show-complete hides the panel again', () => {
    const panel = mustShow('Settings');
    panel.showComplete.add(() => controller.hide('Settings'));

    assert.equal(controller.show('Settings'), panel);
    assert.equal(controller.isActive('Settings'), false);
    assert.equal(controller.stateOf('Settings'), 'hidden');
  });

  it('lets hide-complete show another panel', () => {
    const dialogue = mustShow('Dialogue');
    dialogue.hideComplete.add(() => controller.show('Notification'));

    controller.hideAll();

    assert.equal(controller.isActive('Notification'), true);
    assert.equal(controller.getPanel('Dialogue'), undefined);
  });

  it('skips destroy-on-hide when hide-complete re-shows the panel', () => {
    const dialogue = mustShow('Dialogue');
    let reshown = false;
    dialogue.hideComplete.add(() => {
      if (reshown) return;
      reshown = true;
      controller.show('Dialogue');
    });

    controller.hide('Dialogue');

    assert.equal(controller.getPanel('Dialogue'), dialogue);
    assert.equal(controller.isActive('Dialogue'), true);
    assert.equal(controller.stateOf('Dialogue'), 'active');
  });

  it('runs the hide sequence once when hide-begin calls hideAll', () => {
    const dialogue = mustShow('Dialogue');
    let begins = 0;
    let completes = 0;
    dialogue.hideBegin.add(() => {
      begins++;
      controller.hideAll();
    });
    dialogue.hideComplete.add(() => { completes++; });

    controller.hide('Dialogue');

    assert.equal(begins, 1);
    assert.equal(completes, 1);
    assert.equal(controller.getPanel('Dialogue'), undefined);
    assert.equal(factory.destroyed.length, 1);
    assert.deepStrictEqual(messagesAt(entries, 'error'), []);
  });

  it('runs the show sequence once when show-begin shows the same panel', () => {
    const panel = mustShow('Settings');
    controller.hide('Settings');
    let begins = 0;
    let completes = 0;
    panel.showBegin.add(() => {
      begins++;
      controller.show('Settings');
    });
    panel.showComplete.add(() => { completes++; });

    assert.equal(controller.show('Settings'), panel);
    assert.equal(begins, 1);
    assert.equal(completes, 1);
    assert.equal(controller.stateOf('Settings'), 'active');
  });

  it('finds nothing left to destroy after hideAll removed destroy-on-hide panels', () => {
    mustShow('Dialogue', 'one');
    mustShow('Dialogue', 'two');

    controller.hideAll();
    controller.destroyAllOfKind('Dialogue');

    assert.equal(controller.registry.size, 0);
    assert.equal(factory.destroyed.length, 2);
  });
});
