import { describe, it, expect } from 'vitest';

import { MemoStore } from './memoize.js';

describe('MemoStore', () => {
  it('computes once per distinct argument tuple', () => {
    const store = new MemoStore();
    let calls = 0;
    const double = store.memoize('double', (n: number) => {
      calls++;
      return n * 2;
    });

    expect(double(2)).toBe(4);
    expect(double(2)).toBe(4);
    expect(double(3)).toBe(6);
    expect(calls).toBe(2);
    expect(store.size('double')).toBe(2);
  });

  it('caches falsy results', () => {
    const store = new MemoStore();
    let calls = 0;
    const no = store.memoize('no', (_id: string) => {
      calls++;
      return false;
    });

    expect(no('x')).toBe(false);
    expect(no('x')).toBe(false);
    expect(calls).toBe(1);
  });

  it('keeps functions with the same arguments apart', () => {
    const store = new MemoStore();
    const upper = store.memoize('upper', (s: string) => s.toUpperCase());
    const len = store.memoize('len', (s: string) => s.length);

    expect(upper('gnu')).toBe('GNU');
    expect(len('gnu')).toBe(3);
    expect(store.size()).toBe(2);
  });

  it('does not cache thrown errors', () => {
    const store = new MemoStore();
    let fail = true;
    const flaky = store.memoize('flaky', (s: string) => {
      if (fail) throw new Error('not yet');
      return s;
    });

    expect(() => flaky('a')).toThrow('not yet');
    fail = false;
    expect(flaky('a')).toBe('a');
    expect(store.size('flaky')).toBe(1);
  });

  it('rejects duplicate names', () => {
    const store = new MemoStore();
    store.memoize('f', (s: string) => s);
    expect(() => store.memoize('f', (s: string) => s)).toThrow(
      'Memoized function already registered: f',
    );
  });

  it('clear() empties every table', () => {
    const store = new MemoStore();
    const id = store.memoize('id', (s: string) => s);
    id('a');
    id('b');
    store.clear();
    expect(store.size()).toBe(0);
    expect(store.size('missing')).toBe(0);
  });
});
