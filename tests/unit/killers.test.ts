/**
 * Unit tests for the killer-move table.
 */
import { describe, it, expect } from 'vitest';
import { KillerTable } from '../../src/search/killers';

describe('KillerTable', () => {
  it('evicts the oldest mask past capacity', () => {
    const killers = new KillerTable(4);
    for (const mask of [1, 2, 4, 8, 16]) killers.push(mask);
    expect(killers.entries()).toEqual([2, 4, 8, 16]);
    expect(killers.has(1)).toBe(false);
    expect(killers.has(16)).toBe(true);
  });

  it('stores nothing with zero capacity', () => {
    const killers = new KillerTable(0);
    killers.push(8);
    expect(killers.size).toBe(0);
    expect(killers.has(8)).toBe(false);
  });

  it('rejects invalid capacities', () => {
    expect(() => new KillerTable(-1)).toThrow(RangeError);
    expect(() => new KillerTable(2.5)).toThrow(RangeError);
  });

  it('moves killers to the front and keeps the rest stable', () => {
    const killers = new KillerTable();
    killers.push(8);
    killers.push(2);
    expect(killers.reorder([1, 2, 4, 8], mask => mask)).toEqual([2, 8, 1, 4]);
  });

  it('returns a copy when empty', () => {
    const items = [3, 1, 2];
    const reordered = new KillerTable().reorder(items, n => n);
    expect(reordered).toEqual([3, 1, 2]);
    expect(reordered).not.toBe(items);
  });

  it('clears', () => {
    const killers = new KillerTable(2);
    killers.push(1);
    killers.clear();
    expect(killers.entries()).toEqual([]);
  });
});
