import { InspectionError } from '../errors';
import { type Complex, Ref, Typed, typeOf } from './infer';
import { type Kind, type StructField, type Type, typeName } from './types';

/**
 * Slot of a pointee that is the referenced object itself rather than one of
 * its properties.
 */
export const SELF: unique symbol = Symbol('self');

export type Slot = string | number | typeof SELF;

/**
 * Where an addressable value is stored: a property (or the whole) of a heap
 * object. Values without a location are not addressable.
 */
export type Location = {
  readonly holder: object;
  readonly slot: Slot;
};

/**
 * Anything that can be compared by identity: objects (functions included)
 * and symbols.
 */
export type Handle = object | symbol;

function isObject(value: unknown): value is object {
  return (
    (typeof value === 'object' && value !== null) || typeof value === 'function'
  );
}

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function isComplex(value: unknown): value is Complex {
  return (
    isObject(value) &&
    'real' in value &&
    'imag' in value &&
    typeof value.real === 'number' &&
    typeof value.imag === 'number'
  );
}

/**
 * An opaque handle over a runtime value plus its type descriptor.
 *
 * The accessors mirror what the differ needs per kind: scalar readers,
 * sequence items, struct fields, map entries, pointee/unwrapped values, and
 * the storage location when the value is addressable. Accessors that do not
 * apply to the value's kind, or a runtime value that does not fit the
 * descriptor, raise `InspectionError`.
 */
export class InspectedValue {
  constructor(
    readonly type: Type | undefined,
    readonly raw: unknown,
    readonly location?: Location
  ) {}

  /**
   * Inspects a plain value using its inferred (or `typed`-declared) type.
   * The result is not addressable.
   */
  static of(value: unknown): InspectedValue {
    const type = typeOf(value);
    const raw = value instanceof Typed ? value.value : value;
    return new InspectedValue(type, raw);
  }

  /**
   * `false` for the absent value (no type, e.g. `undefined` at a root or
   * inside an interface).
   */
  get isValid(): boolean {
    return this.type !== undefined;
  }

  get kind(): Kind | undefined {
    return this.type?.kind;
  }

  get canAddr(): boolean {
    return this.location !== undefined;
  }

  private describe(): string {
    return this.type ? typeName(this.type) : 'nil';
  }

  private fail(expected: string): never {
    throw new InspectionError(
      `Expected ${expected} for ${this.describe()}, received ${typeof this.raw}`
    );
  }

  bool(): boolean {
    if (typeof this.raw !== 'boolean') this.fail('a boolean');
    return this.raw;
  }

  int(): bigint {
    const { raw } = this;
    if (typeof raw === 'bigint') return raw;
    if (typeof raw === 'number' && Number.isInteger(raw)) return BigInt(raw);
    return this.fail('an integer');
  }

  uint(): bigint {
    const value = this.int();
    if (value < 0n) this.fail('a non-negative integer');
    return value;
  }

  float(): number {
    if (typeof this.raw !== 'number') this.fail('a number');
    return this.raw;
  }

  complex(): Complex {
    if (!isComplex(this.raw)) this.fail('a complex number');
    return this.raw;
  }

  string(): string {
    if (typeof this.raw !== 'string') this.fail('a string');
    return this.raw;
  }

  /**
   * Reports whether a nilable value (pointer, map, slice, chan, func,
   * interface) holds nothing.
   */
  isNil(): boolean {
    switch (this.kind) {
      case 'pointer':
      case 'map':
      case 'slice':
      case 'chan':
      case 'func':
      case 'interface':
        return isAbsent(this.raw);
      default:
        return this.fail('a nilable value');
    }
  }

  /**
   * Identity of a reference-like value (pointer, chan, func, opaque handle).
   */
  pointer(): Handle {
    const { raw } = this;
    if (isObject(raw) || typeof raw === 'symbol') return raw;
    return this.fail('a reference');
  }

  private items(): readonly unknown[] {
    const { raw, type } = this;
    if (type?.kind === 'slice' && isAbsent(raw)) return [];
    if (!Array.isArray(raw)) return this.fail('an array');
    if (type?.kind === 'array' && raw.length !== type.length) {
      this.fail(`${type.length} items`);
    }
    return raw;
  }

  /**
   * Number of items of an array or slice, or of entries of a map.
   */
  len(): number {
    if (this.type?.kind === 'map') return this.mapKeys().length;
    return this.items().length;
  }

  /**
   * Item `i` of an array or slice.
   *
   * Slice items are always addressable (they live in the backing array);
   * array items only when the array itself is.
   */
  index(i: number): InspectedValue {
    const { type } = this;
    if (type?.kind !== 'array' && type?.kind !== 'slice') {
      return this.fail('an array or slice');
    }

    const items = this.items();
    const location =
      type.kind === 'slice' || this.canAddr
        ? { holder: items, slot: i }
        : undefined;
    return new InspectedValue(type.elem, items[i], location);
  }

  private structFields(): readonly StructField[] {
    if (this.type?.kind !== 'struct') return this.fail('a struct');
    return this.type.fields;
  }

  numField(): number {
    return this.structFields().length;
  }

  fieldName(i: number): string {
    return this.structFields()[i].name;
  }

  /**
   * Field `i` in declaration order. Stored fields of an addressable struct
   * are addressable; computed fields never are.
   */
  field(i: number): InspectedValue {
    const field = this.structFields()[i];
    const { raw } = this;
    if (!isObject(raw)) return this.fail('an object');

    if (field.get) {
      return new InspectedValue(field.type, field.get(raw));
    }

    const value: unknown = Reflect.get(raw, field.name);
    const location = this.canAddr
      ? { holder: raw, slot: field.name }
      : undefined;
    return new InspectedValue(field.type, value, location);
  }

  /**
   * Keys of a map in iteration order. Keys are not addressable.
   */
  mapKeys(): InspectedValue[] {
    const { raw, type } = this;
    if (type?.kind !== 'map') return this.fail('a map');
    if (isAbsent(raw)) return [];

    let keys: unknown[];
    if (raw instanceof Map || raw instanceof Set) {
      keys = Array.from(raw.keys());
    } else if (isObject(raw) && type.key.kind === 'string') {
      keys = Object.keys(raw);
    } else {
      return this.fail('a Map, a Set or a string-keyed object');
    }

    return keys.map(key => new InspectedValue(type.key, key));
  }

  /**
   * Value stored under `key`, which must come from this map's `mapKeys()`.
   * Map values are not addressable.
   */
  mapIndex(key: InspectedValue): InspectedValue {
    const { raw, type } = this;
    if (type?.kind !== 'map') return this.fail('a map');

    let value: unknown;
    if (raw instanceof Map) {
      value = raw.get(key.raw);
    } else if (raw instanceof Set) {
      value = raw.has(key.raw) ? true : undefined;
    } else if (isObject(raw) && typeof key.raw === 'string') {
      value = Reflect.get(raw, key.raw);
    }

    return new InspectedValue(type.elem, value);
  }

  /**
   * The pointee of a non-nil pointer (addressable), or the concrete value
   * held by an interface (not addressable).
   */
  elem(): InspectedValue {
    const { raw, type } = this;

    if (type?.kind === 'interface') {
      return InspectedValue.of(raw);
    }

    if (type?.kind !== 'pointer') return this.fail('a pointer or interface');

    if (raw instanceof Ref) {
      return new InspectedValue(type.elem, raw.value, {
        holder: raw,
        slot: 'value'
      });
    }

    if (!isObject(raw)) return this.fail('a Ref or an object');
    return new InspectedValue(type.elem, raw, { holder: raw, slot: SELF });
  }
}
