import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CallbackList } from '../core/callback-list.js';
import { recordingLogger, messagesAt } from './helpers.js';

describe('CallbackList', () => {
  it('invokes callbacks in registration order', () => {
    const { logger } = recordingLogger();
    const list = new CallbackList<[number]>();
    const seen: string[] = [];
    list.add(n => seen.push(`first ${n}`));
    list.add(n => seen.push(`second ${n}`));

    assert.equal(list.invoke(logger, 'test', 7), 2);
    assert.deepStrictEqual(seen, ['first 7', 'second 7']);
  });

  it('ignores a repeated add by default', () => {
    const { logger } = recordingLogger();
    const list = new CallbackList<[]>();
    let calls = 0;
    const cb = () => { calls++; };
    list.add(cb);
    list.add(cb);

    list.invoke(logger, 'test');
    assert.equal(list.size, 1);
    assert.equal(calls, 1);
  });

  it('keeps duplicates when dedupe is off', () => {
    const { logger } = recordingLogger();
    const list = new CallbackList<[]>({ dedupe: false });
    let calls = 0;
    const cb = () => { calls++; };
    list.add(cb);
    list.add(cb);

    list.invoke(logger, 'test');
    assert.equal(calls, 2);
    assert.equal(list.remove(cb), true);
    assert.equal(list.size, 1);
  });

  it('lets a callback remove another mid-dispatch without skipping the snapshot', () => {
    const { logger } = recordingLogger();
    const list = new CallbackList<[]>();
    const seen: string[] = [];
    const second = () => { seen.push('second'); };
    list.add(() => {
      seen.push('first');
      list.remove(second);
    });
    list.add(second);

    list.invoke(logger, 'test');
    assert.deepStrictEqual(seen, ['first', 'second']);

    seen.length = 0;
    list.invoke(logger, 'test');
    assert.deepStrictEqual(seen, ['first']);
  });

  it('reports a throwing callback and keeps going', () => {
    const { logger, entries } = recordingLogger();
    const list = new CallbackList<[]>();
    let reached = false;
    list.add(() => { throw new Error('boom'); });
    list.add(() => { reached = true; });

    list.invoke(logger, 'Settings show-begin');
    assert.equal(reached, true);
    assert.deepStrictEqual(messagesAt(entries, 'error'), ['Settings show-begin callback failed: boom']);
  });

  it('treats removal of an unknown callback as a no-op', () => {
    const list = new CallbackList<[]>();
    assert.equal(list.remove(() => {}), false);
  });
});
