import { describe, expect, it } from 'vitest';

import { OpenSet } from './open-set.js';

describe('OpenSet', () => {
  it('pops the lowest priority first', () => {
    const open = new OpenSet();
    open.push(1, 7);
    open.push(2, 3);
    open.push(3, 5);

    expect([open.pop(), open.pop(), open.pop()]).toEqual([2, 3, 1]);
    expect(open.pop()).toBeUndefined();
  });

  it('breaks ties by insertion order', () => {
    const open = new OpenSet();
    for (const index of [9, 4, 6, 1, 8]) {
      open.push(index, 2);
    }
    open.push(0, 1);

    const popped: Array<number | undefined> = [];
    while (open.size > 0) popped.push(open.pop());
    expect(popped).toEqual([0, 9, 4, 6, 1, 8]);
  });

  it('keeps duplicate entries of the same cell', () => {
    const open = new OpenSet();
    open.push(5, 4);
    open.push(5, 2);

    expect(open.size).toBe(2);
    expect(open.pop()).toBe(5);
    expect(open.pop()).toBe(5);
  });

  it('exposes no heap internals', () => {
    const open = new OpenSet();
    open.push(1, 1);

    expect(Object.keys(open)).toEqual([]);
    expect(open.size).toBe(1);
  });
});
