import {expect, test} from 'vitest';
import fc from 'fast-check';
import {prefixSums, upperBound} from './search.js';

const numberComparator = (l: number, r: number) => l - r;

test('upperBound', () => {
  type Case = {
    name: string;
    sorted: number[];
    target: number;
    expected: number;
  };

  const cases: Case[] = [
    {name: 'empty', sorted: [], target: 3, expected: 0},
    {name: 'below all', sorted: [2, 4, 6], target: 1, expected: 0},
    {name: 'above all', sorted: [2, 4, 6], target: 7, expected: 3},
    {name: 'equal to last', sorted: [2, 4, 6], target: 6, expected: 3},
    {name: 'equal to first', sorted: [2, 4, 6], target: 2, expected: 1},
    {name: 'between', sorted: [2, 4, 6], target: 5, expected: 2},
    {name: 'after duplicates', sorted: [1, 3, 3, 3, 5], target: 3, expected: 4},
    {name: 'all equal', sorted: [7, 7, 7], target: 7, expected: 3},
    {name: 'zero target', sorted: [0, 0, 1], target: 0, expected: 2},
  ];

  for (const c of cases) {
    expect(upperBound(c.sorted, c.target), c.name).toBe(c.expected);
  }
});

test('upperBound counts the elements at or below the target', () => {
  fc.assert(
    fc.property(fc.array(fc.nat(50)), fc.nat(60), (arr, target) => {
      const sorted = arr.sort(numberComparator);
      expect(upperBound(sorted, target)).toBe(
        sorted.filter(v => v <= target).length,
      );
    }),
  );
});

test('prefixSums', () => {
  type Case = {
    name: string;
    sorted: number[];
    expected: number[];
  };

  const cases: Case[] = [
    {name: 'empty', sorted: [], expected: []},
    {name: 'single', sorted: [4], expected: [4]},
    {name: 'multiple', sorted: [1, 2, 3, 4, 5], expected: [1, 3, 6, 10, 15]},
    {name: 'zeros', sorted: [0, 0, 2], expected: [0, 0, 2]},
  ];

  for (const c of cases) {
    expect(prefixSums(c.sorted), c.name).toEqual(c.expected);
  }
});
