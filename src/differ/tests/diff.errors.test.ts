import { describe, expect, test } from 'vitest';

import { diff } from '..';
import {
  DiffError,
  InspectionError,
  InvalidMapKeyError,
  UnsupportedKindError
} from '../../errors';
import { typed } from '../../inspect/infer';
import { t, type Type } from '../../inspect/types';

/**
 * Fatal conditions.
 * Focus: errors raised instead of diff lines, and their messages.
 */
describe('Errors: unsupported kinds, invalid keys, mismatched values.', () => {
  test('an unknown descriptor kind is fatal', () => {
    const broken: Type = JSON.parse('{ "id": -1, "kind": "tuple" }');
    const run = () => diff(typed(broken, 1), typed(broken, 2));

    expect(run).toThrow(UnsupportedKindError);
    expect(run).toThrow('Unsupported value kind: tuple');
  });

  test('slice keys are rejected by the key matcher', () => {
    const bySlice = t.map(t.slice(t.int), t.string);
    const run = () =>
      diff(
        typed(bySlice, new Map([[[1], 'a']])),
        typed(bySlice, new Map([[[1], 'a']]))
      );

    expect(run).toThrow(InvalidMapKeyError);
    expect(run).toThrow('Invalid map key type: int[]');
  });

  test('array values as inferred map keys are rejected', () => {
    const run = () => diff(new Map([[[1], 'a']]), new Map([[[1], 'a']]));
    expect(run).toThrow('Invalid map key type: unknown[]');
  });

  test('a value that does not fit its descriptor is fatal', () => {
    const run = () => diff(typed(t.int, 'one'), typed(t.int, 'two'));

    expect(run).toThrow(InspectionError);
    expect(run).toThrow('Expected an integer for int, received string');
  });

  test('a fixed-length array over the wrong number of items is fatal', () => {
    const pair = t.array(2, t.int);
    const run = () => diff(typed(pair, [1]), typed(pair, [1]));
    expect(run).toThrow('Expected 2 items for int[2], received object');
  });

  test('errors share the DiffError base and carry their class name', () => {
    const error = new InvalidMapKeyError('int[]');
    expect(error).toBeInstanceOf(DiffError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidMapKeyError');
    expect(error.typeName).toBe('int[]');
  });

  test('invalid array lengths are rejected when building descriptors', () => {
    expect(() => t.array(-1, t.int)).toThrow(RangeError);
    expect(() => t.array(1.5, t.int)).toThrow('Invalid array length: 1.5');
  });
});
