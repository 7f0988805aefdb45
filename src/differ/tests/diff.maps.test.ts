import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import type { DiffInput } from './helpers';
import { createDiffRunner } from './helpers';
import { typed } from '../../inspect/infer';
import { t } from '../../inspect/types';

/**
 * Maps and sets.
 * Focus: key partitioning, key labels, structural key matching.
 */
describe('Maps: key partitioning, key labels, key matching.', () => {
  const run = createDiffRunner();

  describe('Inferred Maps', () => {
    const scenarios: Array<TestScenario<DiffInput, string[]>> = [
      {
        id: 'Only Left',
        description: 'A key missing on the right is reported once.',
        input: { left: new Map([['a', 1]]), right: new Map() },
        expected: ['["a"]: 1 != (missing)']
      },
      {
        id: 'Only Right',
        description: 'A key missing on the left is reported once.',
        input: { left: new Map(), right: new Map([['a', 1]]) },
        expected: ['["a"]: (missing) != 1']
      },
      {
        id: 'Value Changed',
        description: 'Matched keys recurse with the key as label.',
        input: { left: new Map([['a', 1]]), right: new Map([['a', 2]]) },
        expected: ['["a"]: 1 != 2']
      },
      {
        id: 'Partition Order',
        description: 'Only-left lines come first, then matches, then only-right.',
        input: {
          left: new Map<string, number>([
            ['shared', 1],
            ['gone', 2]
          ]),
          right: new Map<string, number>([
            ['added', 3],
            ['shared', 4]
          ])
        },
        expected: [
          '["gone"]: 2 != (missing)',
          '["shared"]: 1 != 4',
          '["added"]: (missing) != 3'
        ]
      },
      {
        id: 'Insertion Order Ignored',
        description: 'Maps with the same entries in another order are equal.',
        input: {
          left: new Map([
            ['a', 1],
            ['b', 2]
          ]),
          right: new Map([
            ['b', 2],
            ['a', 1]
          ])
        },
        expected: []
      },
      {
        id: 'Number Keys',
        description: 'Keys render the way values do.',
        input: { left: new Map([[1, 'x']]), right: new Map([[1, 'y']]) },
        expected: ['[1]: "x" != "y"']
      },
      {
        id: 'Key Type Matters',
        description: 'A number key never matches a string key.',
        input: { left: new Map([[1, true]]), right: new Map([['1', true]]) },
        expected: ['[1]: true != (missing)', '["1"]: (missing) != true']
      },
      {
        id: 'Nested Map Value',
        description: 'Labels chain through nested maps and records.',
        input: {
          left: { m: new Map([['k', { v: 1 }]]) },
          right: { m: new Map([['k', { v: 2 }]]) }
        },
        expected: ['m["k"].v: 1 != 2']
      },
      {
        id: 'Percent In Key',
        description: 'A percent sign in a key label is printed literally.',
        input: { left: new Map([['50%', 1]]), right: new Map([['50%', 2]]) },
        expected: ['["50%"]: 1 != 2']
      },
      {
        id: 'Missing Value Rendered',
        description: 'Container values of missing keys are rendered in full.',
        input: { left: new Map([['a', [1, 2]]]), right: new Map() },
        expected: ['["a"]: [1, 2] != (missing)']
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Sets', () => {
    const scenarios: Array<TestScenario<DiffInput, string[]>> = [
      {
        id: 'Equal',
        description: 'Sets with the same members are equal.',
        input: { left: new Set([1, 2]), right: new Set([2, 1]) },
        expected: []
      },
      {
        id: 'Members Changed',
        description: 'Members map to true; missing members are reported.',
        input: { left: new Set([1, 2]), right: new Set([2, 3]) },
        expected: ['[1]: true != (missing)', '[3]: (missing) != true']
      },
      {
        id: 'Set vs Map',
        description: 'A set and a map are different types.',
        input: { left: new Set(), right: new Map() },
        expected: ['Set<unknown> != Map<unknown, unknown>']
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Structural Keys', () => {
    const point = t.struct('Point', { X: t.int, Y: t.int });
    const byPoint = t.map(point, t.string);
    const byPair = t.map(t.array(2, t.int), t.string);

    const scenarios: Array<TestScenario<DiffInput, string[]>> = [
      {
        id: 'Struct Keys, Matched By Fields',
        description: 'Distinct key objects with equal fields are one key.',
        input: {
          left: typed(byPoint, new Map([[{ X: 1, Y: 2 }, 'a']])),
          right: typed(byPoint, new Map([[{ X: 1, Y: 2 }, 'b']]))
        },
        expected: ['[Point { X: 1, Y: 2 }]: "a" != "b"']
      },
      {
        id: 'Array Keys, Matched By Items',
        description: 'Fixed-length array keys compare item by item.',
        input: {
          left: typed(byPair, new Map([[[1, 2], 'a']])),
          right: typed(byPair, new Map([[[1, 3], 'a']]))
        },
        expected: ['[[1, 2]]: "a" != (missing)', '[[1, 3]]: (missing) != "a"']
      },
      {
        id: 'String-Keyed Object As Map',
        description: 'A plain object can back a map with string keys.',
        input: {
          left: typed(t.map(t.string, t.int), { a: 1, b: 2 }),
          right: typed(t.map(t.string, t.int), { b: 2, a: 3 })
        },
        expected: ['["a"]: 1 != 3']
      },
      {
        id: 'Nil Map vs Empty Map',
        description: 'A nil map has no keys.',
        input: {
          left: typed(t.map(t.string, t.int), null),
          right: typed(t.map(t.string, t.int), new Map())
        },
        expected: []
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });
});
