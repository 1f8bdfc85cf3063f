import { describe, it, expect } from 'vitest';
import { SortedIndex } from './sorted-index.js';

describe('SortedIndex', () => {
  it('returns keys within an inclusive range in value order', () => {
    const index = new SortedIndex();
    index.set('c', 30);
    index.set('a', 10);
    index.set('b', 20);
    index.set('d', 40);

    expect(index.between(20, 30)).toEqual(['b', 'c']);
    expect(index.between(-Infinity, Infinity)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('orders equal values by key', () => {
    const index = new SortedIndex();
    index.set('y', 5);
    index.set('x', 5);

    expect(index.between(5, 5)).toEqual(['x', 'y']);
  });

  it('moves a key when set again', () => {
    const index = new SortedIndex();
    index.set('a', 1);
    index.set('a', 100);

    expect(index.size).toBe(1);
    expect(index.between(0, 10)).toEqual([]);
    expect(index.between(50, 150)).toEqual(['a']);
  });

  it('removes keys and ignores unknown ones', () => {
    const index = new SortedIndex();
    index.set('a', 1);
    index.set('b', 1);
    index.remove('a');
    index.remove('missing');

    expect(index.between(0, 10)).toEqual(['b']);
  });

  it('returns nothing for an inverted or NaN range', () => {
    const index = new SortedIndex();
    index.set('a', 1);

    expect(index.between(10, 0)).toEqual([]);
    expect(index.between(Number.NaN, 10)).toEqual([]);
  });

  it('clears every key', () => {
    const index = new SortedIndex();
    index.set('a', 1);
    index.clear();

    expect(index.size).toBe(0);
    expect(index.between(-Infinity, Infinity)).toEqual([]);
  });
});
