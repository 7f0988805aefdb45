import {
  createStruct,
  implicitPointer,
  t,
  type MapType,
  type PointerType,
  type SliceType,
  type StructType,
  type Type
} from './types';

/**
 * A complex number, the runtime representation of `complex64`/`complex128`.
 */
export type Complex = {
  readonly real: number;
  readonly imag: number;
};

export function complex(real: number, imag: number): Complex {
  return { real, imag };
}

/**
 * A mutable box: the pointee storage of an explicit pointer whose target is
 * not itself an object (e.g. `*int`).
 */
export class Ref<T = unknown> {
  constructor(public value: T) {}
}

export function ref<T>(value: T): Ref<T> {
  return new Ref(value);
}

/**
 * A value paired with an explicit type descriptor.
 *
 * Inference returns `type` for such a value instead of guessing from the
 * runtime shape, which is how callers reach kinds plain JavaScript values
 * never infer to (`uint8`, `complex128`, fixed-length arrays, ...).
 */
export class Typed<T = unknown> {
  constructor(
    readonly type: Type,
    readonly value: T
  ) {}
}

export function typed<T>(type: Type, value: T): Typed<T> {
  return new Typed(type, value);
}

const ANY_SLICE: SliceType = t.slice(t.unknown);
const ANY_MAP: MapType = t.map(t.unknown, t.unknown);
const ANY_SET: MapType = t.map(t.unknown, t.bool, 'Set<unknown>');
const FUNCTION = t.func('Function');

const DATE: StructType = t.struct('Date', {
  time: {
    type: t.number,
    get: holder => (holder instanceof Date ? holder.getTime() : Number.NaN)
  }
});

const REG_EXP: StructType = t.struct('RegExp', {
  source: {
    type: t.string,
    get: holder => (holder instanceof RegExp ? holder.source : '')
  },
  flags: {
    type: t.string,
    get: holder => (holder instanceof RegExp ? holder.flags : '')
  }
});

// Boxed primitives hold their value in an internal slot, not a property.
const NUMBER_BOX: StructType = t.struct('Number', {
  value: {
    type: t.number,
    get: holder => (holder instanceof Number ? holder.valueOf() : Number.NaN)
  }
});

const STRING_BOX: StructType = t.struct('String', {
  value: {
    type: t.string,
    get: holder => (holder instanceof String ? holder.valueOf() : '')
  }
});

const BOOLEAN_BOX: StructType = t.struct('Boolean', {
  value: {
    type: t.bool,
    get: holder => holder instanceof Boolean && holder.valueOf()
  }
});

const BIGINT_BOX: StructType = t.struct('BigInt', {
  value: {
    type: t.bigint,
    get: holder => (holder instanceof BigInt ? holder.valueOf() : 0n)
  }
});

const ERROR: StructType = t.struct('Error', {
  name: {
    type: t.string,
    get: holder => (holder instanceof Error ? holder.name : '')
  },
  message: {
    type: t.string,
    get: holder => (holder instanceof Error ? holder.message : '')
  }
});

/**
 * Built-in objects whose state is not held in enumerable own properties.
 * Matched with `instanceof` in insertion order, so subclasses (`TypeError`)
 * resolve to their base entry.
 */
const BUILTIN_TYPES = new Map<Function, Type>([
  [Date, implicitPointer(DATE)],
  [RegExp, implicitPointer(REG_EXP)],
  [Number, implicitPointer(NUMBER_BOX)],
  [String, implicitPointer(STRING_BOX)],
  [Boolean, implicitPointer(BOOLEAN_BOX)],
  [BigInt, implicitPointer(BIGINT_BOX)],
  [Error, implicitPointer(ERROR)],
  [Promise, t.opaque('Promise')],
  [WeakMap, t.opaque('WeakMap')],
  [WeakSet, t.opaque('WeakSet')],
  [WeakRef, t.opaque('WeakRef')]
]);

/**
 * Record descriptors are shared between objects of the same shape so that
 * two `{ x, y }` objects have the identical type. Keyed by constructor
 * (a sentinel for null-prototype objects), then by the sorted key list;
 * fields follow that sorted order, whatever order the keys were added in.
 */
const recordTypes = new WeakMap<object, Map<string, PointerType>>();
const NULL_PROTOTYPE = {};

function recordType(value: object): PointerType {
  const prototype: unknown = Object.getPrototypeOf(value);
  const ctor =
    prototype !== null &&
    typeof prototype === 'object' &&
    'constructor' in prototype
      ? prototype.constructor
      : undefined;
  const owner = typeof ctor === 'function' ? ctor : NULL_PROTOTYPE;
  const keys = Object.keys(value).sort();
  const shapeKey = keys.join('\u0000');

  let shapes = recordTypes.get(owner);
  if (!shapes) {
    shapes = new Map();
    recordTypes.set(owner, shapes);
  }

  const cached = shapes.get(shapeKey);
  if (cached) return cached;

  const name = typeof ctor === 'function' && ctor !== Object ? ctor.name : '';
  const fields = Object.fromEntries(keys.map(key => [key, t.unknown]));
  const pointer = implicitPointer(createStruct(name, fields, true));
  shapes.set(shapeKey, pointer);
  return pointer;
}

function builtinType(value: object): Type | undefined {
  for (const [ctor, type] of BUILTIN_TYPES) {
    if (value instanceof ctor) return type;
  }
  return undefined;
}

/**
 * Reports the concrete type of a plain JavaScript value.
 *
 * Mapping:
 * - `null` / `undefined` -> `undefined` (absent, no type)
 * - primitives -> `boolean`, `number`, `bigint`, `string`, `symbol`
 * - functions -> `Function`
 * - arrays -> `unknown[]`
 * - `Map` -> `Map<unknown, unknown>`, `Set` -> `Set<unknown>`
 * - `Date`, `RegExp`, `Error` and boxed primitives -> structs with computed
 *   fields
 * - `Promise`, `WeakMap`, `WeakSet`, `WeakRef` -> opaque handles
 * - `Typed` -> its declared type
 * - any other object -> an implicit pointer to a record of its own keys,
 *   sorted
 */
export function typeOf(value: unknown): Type | undefined {
  switch (typeof value) {
    case 'undefined':
      return undefined;
    case 'boolean':
      return t.bool;
    case 'number':
      return t.number;
    case 'bigint':
      return t.bigint;
    case 'string':
      return t.string;
    case 'symbol':
      return t.symbol;
    case 'function':
      return FUNCTION;
    case 'object':
      return value === null ? undefined : objectType(value);
  }
}

function objectType(value: object): Type {
  if (value instanceof Typed) return value.type;
  if (Array.isArray(value)) return ANY_SLICE;
  if (value instanceof Map) return ANY_MAP;
  if (value instanceof Set) return ANY_SET;

  return builtinType(value) ?? recordType(value);
}
