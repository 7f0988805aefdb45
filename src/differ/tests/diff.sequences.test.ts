import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import type { DiffInput } from './helpers';
import { createDiffRunner } from './helpers';
import { typed } from '../../inspect/infer';
import { t } from '../../inspect/types';

/**
 * Arrays and slices.
 * Focus: index labels, length mismatch, fixed-length arrays.
 */
describe('Sequences: index labels, length mismatch, fixed arrays.', () => {
  const run = createDiffRunner();

  describe('Inferred Arrays', () => {
    const scenarios: Array<TestScenario<DiffInput, string[]>> = [
      {
        id: 'Equal',
        description: 'Equal arrays emit nothing.',
        input: { left: [1, 'a', true], right: [1, 'a', true] },
        expected: []
      },
      {
        id: 'Item Changed',
        description: 'A changed item is labeled with its index.',
        input: { left: [1, 2, 3], right: [1, 5, 3] },
        expected: ['[1]: 2 != 5']
      },
      {
        id: 'Items Changed',
        description: 'Each changed item gets its own line, in index order.',
        input: { left: [1, 2, 3], right: [9, 2, 8] },
        expected: ['[0]: 1 != 9', '[2]: 3 != 8']
      },
      {
        id: 'Length Mismatch',
        description: 'Differing lengths emit one line and skip the items.',
        input: { left: [1, 2], right: [1] },
        expected: ['unknown[] (length 2) != unknown[] (length 1)']
      },
      {
        id: 'Length Mismatch, Empty',
        description: 'An empty array against a non-empty one.',
        input: { left: [], right: ['a'] },
        expected: ['unknown[] (length 0) != unknown[] (length 1)']
      },
      {
        id: 'Item Type Mismatch',
        description: 'Items are compared by their concrete types.',
        input: { left: [1], right: ['1'] },
        expected: ['[0]: number != string']
      },
      {
        id: 'Nested Length Mismatch',
        description: 'The length line carries the label of the inner array.',
        input: { left: [[1], [1, 2]], right: [[1], [1]] },
        expected: ['[1]: unknown[] (length 2) != unknown[] (length 1)']
      },
      {
        id: 'Nested Item Changed',
        description: 'Index segments are appended without a dot.',
        input: { left: [[1, [2]]], right: [[1, [3]]] },
        expected: ['[0][1][0]: 2 != 3']
      },
      {
        id: 'Absent Item',
        description: 'An undefined item renders as nil.',
        input: { left: [undefined], right: [0] },
        expected: ['[0]: nil != 0']
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Declared Sequences', () => {
    const ints = t.slice(t.int);
    const triple = t.array(3, t.int);

    const scenarios: Array<TestScenario<DiffInput, string[]>> = [
      {
        id: 'Slice, Length Mismatch',
        description: 'The declared element type appears in the length line.',
        input: { left: typed(ints, [1, 2]), right: typed(ints, [1]) },
        expected: ['int[] (length 2) != int[] (length 1)']
      },
      {
        id: 'Slice, Nil vs Empty',
        description: 'A nil slice has length 0 and equals an empty slice.',
        input: { left: typed(ints, null), right: typed(ints, []) },
        expected: []
      },
      {
        id: 'Slice, Structurally Identical Types',
        description: 'Separately built slice descriptors are the same type.',
        input: {
          left: typed(t.slice(t.int), [1]),
          right: typed(t.slice(t.int), [2])
        },
        expected: ['[0]: 1 != 2']
      },
      {
        id: 'Array, Item Changed',
        description: 'Fixed-length arrays compare item by item.',
        input: { left: typed(triple, [1, 2, 3]), right: typed(triple, [1, 2, 4]) },
        expected: ['[2]: 3 != 4']
      },
      {
        id: 'Array, Length In Type',
        description: 'Arrays of different lengths are different types.',
        input: {
          left: typed(triple, [1, 2, 3]),
          right: typed(t.array(2, t.int), [1, 2])
        },
        expected: ['int[3] != int[2]']
      },
      {
        id: 'Slice vs Array',
        description: 'A slice and an array are different types.',
        input: { left: typed(ints, [1]), right: typed(t.array(1, t.int), [1]) },
        expected: ['int[] != int[1]']
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });
});
