import { InvalidMapKeyError } from '../errors';
import { identical, typeName } from '../inspect/types';
import type { InspectedValue } from '../inspect/value';

/**
 * A left map key paired with the structurally equal key found on the right.
 */
export type KeyPair = readonly [left: InspectedValue, right: InspectedValue];

export type KeyPartition = {
  /**
   * Left keys with no equal key on the right, in left iteration order.
   */
  onlyLeft: InspectedValue[];

  /**
   * Matched keys, in left iteration order. Each side keeps its own key so
   * that values can be looked up in their own map.
   */
  both: KeyPair[];

  /**
   * Right keys with no equal key on the left, in right iteration order.
   */
  onlyRight: InspectedValue[];
};

/**
 * Compares two map keys for equality.
 *
 * Only kinds that may act as map keys are supported:
 * - scalars (bool, int, uint, float, complex, string) by value,
 *   floats exactly (`NaN` never matches),
 * - arrays and structs item-wise / field-wise,
 * - pointers, channels and opaque handles by identity,
 * - interfaces by their unwrapped values.
 *
 * Two absent values are equal; an absent and a present value, or values of
 * different types, are not.
 *
 * @throws {InvalidMapKeyError} For slice, map and func keys.
 */
export function keyEqual(left: InspectedValue, right: InspectedValue): boolean {
  if (!left.type && !right.type) return true;
  if (!left.type || !right.type || !identical(left.type, right.type)) {
    return false;
  }

  switch (left.type.kind) {
    case 'bool':
      return left.bool() === right.bool();
    case 'int':
      return left.int() === right.int();
    case 'uint':
      return left.uint() === right.uint();
    case 'float':
      return left.float() === right.float();
    case 'complex': {
      const a = left.complex();
      const b = right.complex();
      return a.real === b.real && a.imag === b.imag;
    }
    case 'string':
      return left.string() === right.string();
    case 'array': {
      for (let i = 0; i < left.len(); i++) {
        if (!keyEqual(left.index(i), right.index(i))) return false;
      }
      return true;
    }
    case 'struct': {
      for (let i = 0; i < left.numField(); i++) {
        if (!keyEqual(left.field(i), right.field(i))) return false;
      }
      return true;
    }
    case 'pointer':
    case 'chan':
    case 'opaque':
      // null and undefined are the same nil reference
      return (left.raw ?? null) === (right.raw ?? null);
    case 'interface':
      return keyEqual(left.elem(), right.elem());
    default:
      throw new InvalidMapKeyError(typeName(left.type));
  }
}

/**
 * Pairs up the keys of two maps by structural equality.
 *
 * Pairwise scan, O(|left| x |right|) key comparisons. A left key is paired
 * with the first equal right key.
 */
export function partitionKeys(
  leftKeys: readonly InspectedValue[],
  rightKeys: readonly InspectedValue[]
): KeyPartition {
  const partition: KeyPartition = { onlyLeft: [], both: [], onlyRight: [] };

  for (const leftKey of leftKeys) {
    const match = rightKeys.find(rightKey => keyEqual(leftKey, rightKey));
    if (match) {
      partition.both.push([leftKey, match]);
    } else {
      partition.onlyLeft.push(leftKey);
    }
  }

  for (const rightKey of rightKeys) {
    if (!leftKeys.some(leftKey => keyEqual(leftKey, rightKey))) {
      partition.onlyRight.push(rightKey);
    }
  }

  return partition;
}
