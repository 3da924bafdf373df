import { describe, it, expect } from 'vitest';

import { StateStore } from '../src/core/state.js';

describe('StateStore', () => {
  it('should overwrite on set (last writer wins)', () => {
    const store = new StateStore({ topic: 'bees' });
    store.set('topic', 'wasps');

    expect(store.get('topic')).toBe('wasps');
    expect(store.has('missing')).toBe(false);
    expect(store.get('missing')).toBeUndefined();
  });

  it('should return a frozen snapshot detached from later writes', () => {
    const store = new StateStore({ a: '1' });
    const snapshot = store.snapshot();
    store.set('b', '2');

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot).toEqual({ a: '1' });
  });

  describe('fork', () => {
    it('should see the parent state at fork time only', () => {
      const parent = new StateStore({ a: '1' });
      const fork = parent.fork();
      parent.set('late', 'x');

      expect(fork.get('a')).toBe('1');
      expect(fork.has('late')).toBe(false);
    });

    it('should keep its writes away from the parent', () => {
      const parent = new StateStore();
      const fork = parent.fork();
      fork.set('out', 'value');

      expect(parent.has('out')).toBe(false);
      expect(fork.writes()).toEqual({ out: 'value' });
    });

    it('should record only writes made after the fork', () => {
      const parent = new StateStore({ seeded: 'yes' });
      parent.set('before', '1');
      const fork = parent.fork();

      expect(fork.writes()).toEqual({});
    });
  });

  describe('merge', () => {
    it('should apply deltas in order and report collisions', () => {
      const store = new StateStore();
      const collisions = store.merge([
        { source: 'A', writes: { x: 'from A' } },
        { source: 'B', writes: { x: 'from B', y: 'only B' } },
      ]);

      expect(store.get('x')).toBe('from B');
      expect(store.get('y')).toBe('only B');
      expect(collisions).toEqual([{ key: 'x', sources: ['A', 'B'] }]);
    });

    it('should report nothing when branches write distinct keys', () => {
      const store = new StateStore();
      const collisions = store.merge([
        { source: 'A', writes: { a: '1' } },
        { source: 'B', writes: { b: '2' } },
      ]);

      expect(collisions).toEqual([]);
      expect(store.keys()).toEqual(['a', 'b']);
    });

    it('should record merged keys as writes of the receiving store', () => {
      const outer = new StateStore();
      const branch = outer.fork();
      branch.merge([{ source: 'Inner', writes: { k: 'v' } }]);

      expect(branch.writes()).toEqual({ k: 'v' });
    });
  });

  it('should expose a read-only view', () => {
    const store = new StateStore({ a: '1' });
    const view = store.view();
    store.set('b', '2');

    expect(view.get('b')).toBe('2');
    expect(view.keys()).toEqual(['a', 'b']);
    expect('set' in view).toBe(false);
  });
});
