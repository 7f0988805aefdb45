/**
 * The kind taxonomy understood by the inspector, the key matcher and the
 * differ. Every type descriptor belongs to exactly one kind.
 */
export type Kind =
  | 'bool'
  | 'int'
  | 'uint'
  | 'float'
  | 'complex'
  | 'string'
  | 'array'
  | 'slice'
  | 'map'
  | 'pointer'
  | 'struct'
  | 'interface'
  | 'func'
  | 'chan'
  | 'opaque';

/**
 * Shared properties of every descriptor.
 */
type TypeBase = {
  /**
   * Process-unique number assigned at construction.
   * Part of the identity key used by the cycle guard.
   */
  readonly id: number;
};

export type ScalarKind =
  | 'bool'
  | 'int'
  | 'uint'
  | 'float'
  | 'complex'
  | 'string';

/**
 * A named scalar type (`boolean`, `int32`, `number`, `string`, ...).
 */
export type BasicType = TypeBase & {
  readonly kind: ScalarKind;
  readonly name: string;
};

/**
 * A fixed-length sequence. Values of this type always hold `length` items.
 */
export type ArrayType = TypeBase & {
  readonly kind: 'array';
  readonly length: number;
  readonly elem: Type;
};

/**
 * A variable-length sequence.
 */
export type SliceType = TypeBase & {
  readonly kind: 'slice';
  readonly elem: Type;
};

export type MapType = TypeBase & {
  readonly kind: 'map';
  readonly key: Type;
  readonly elem: Type;
  /**
   * Display name overriding the derived `Map<K, V>` form (used for `Set`).
   */
  readonly name?: string;
};

/**
 * A reference to a value of type `elem`.
 *
 * Implicit pointers describe plain JavaScript object references found by
 * inference; they print as their pointee. Explicit pointers print as `*T`.
 */
export type PointerType = TypeBase & {
  readonly kind: 'pointer';
  readonly elem: Type;
  readonly implicit: boolean;
};

export type StructField = {
  readonly name: string;
  readonly type: Type;
  /**
   * Computes the field from its holder instead of reading `holder[name]`.
   * Computed fields have no storage and are never addressable.
   */
  readonly get?: (holder: object) => unknown;
};

export type StructType = TypeBase & {
  readonly kind: 'struct';
  /**
   * Declared name, or the constructor name of an inferred record
   * (empty for plain objects).
   */
  readonly name: string;
  readonly fields: readonly StructField[];
  /**
   * `true` for records built by inference; their type name lists the keys.
   */
  readonly inferred: boolean;
};

export type InterfaceType = TypeBase & {
  readonly kind: 'interface';
  readonly name: string;
};

export type FuncType = TypeBase & {
  readonly kind: 'func';
  readonly name: string;
};

export type ChanType = TypeBase & {
  readonly kind: 'chan';
  readonly elem: Type;
};

export type OpaqueType = TypeBase & {
  readonly kind: 'opaque';
  readonly name: string;
};

/**
 * A type descriptor: the runtime stand-in for the static type of a value.
 */
export type Type =
  | BasicType
  | ArrayType
  | SliceType
  | MapType
  | PointerType
  | StructType
  | InterfaceType
  | FuncType
  | ChanType
  | OpaqueType;

/**
 * A descriptor, or a thunk producing one. Thunks let a struct refer to
 * itself (`Next: t.pointer(() => Node)`).
 */
export type TypeRef = Type | (() => Type);

/**
 * Field declarations accepted by `t.struct`, in declaration order.
 */
export type FieldDecls = Readonly<Record<string, TypeRef | FieldDecl>>;

export type FieldDecl = {
  readonly type: TypeRef;
  readonly get?: (holder: object) => unknown;
};

let nextTypeId = 1;

function allocateId(): number {
  return nextTypeId++;
}

function resolve(ref: TypeRef): Type {
  return typeof ref === 'function' ? ref() : ref;
}

function isFieldDecl(value: TypeRef | FieldDecl): value is FieldDecl {
  return typeof value === 'object' && !('kind' in value);
}

function basic(kind: ScalarKind, name: string): BasicType {
  return { id: allocateId(), kind, name };
}

/**
 * Builds a struct descriptor. Fields are resolved on first access, so both
 * the field map and individual field types may be thunks.
 */
export function createStruct(
  name: string,
  fields: FieldDecls | (() => FieldDecls),
  inferred = false
): StructType {
  let resolved: readonly StructField[] | undefined;
  const id = allocateId();

  return {
    id,
    kind: 'struct',
    name,
    inferred,
    get fields(): readonly StructField[] {
      if (!resolved) {
        const decls = typeof fields === 'function' ? fields() : fields;
        resolved = Object.entries(decls).map(([fieldName, decl]) =>
          isFieldDecl(decl)
            ? { name: fieldName, type: resolve(decl.type), get: decl.get }
            : { name: fieldName, type: resolve(decl) }
        );
      }
      return resolved;
    }
  };
}

function createPointer(elem: TypeRef, implicit: boolean): PointerType {
  const id = allocateId();
  return {
    id,
    kind: 'pointer',
    implicit,
    get elem(): Type {
      return resolve(elem);
    }
  };
}

/**
 * Builds an implicit pointer: the type of a plain object reference.
 */
export function implicitPointer(elem: Type): PointerType {
  return createPointer(elem, true);
}

/**
 * Descriptor constructors and the predeclared scalar types.
 *
 * @example
 * ```ts
 * const Node: StructType = t.struct('Node', () => ({
 *   Value: t.int,
 *   Next: t.pointer(Node)
 * }));
 * ```
 */
export const t = {
  bool: basic('bool', 'boolean'),

  int: basic('int', 'int'),
  int8: basic('int', 'int8'),
  int16: basic('int', 'int16'),
  int32: basic('int', 'int32'),
  int64: basic('int', 'int64'),
  bigint: basic('int', 'bigint'),

  uint: basic('uint', 'uint'),
  uint8: basic('uint', 'uint8'),
  uint16: basic('uint', 'uint16'),
  uint32: basic('uint', 'uint32'),
  uint64: basic('uint', 'uint64'),
  uintptr: basic('uint', 'uintptr'),

  float32: basic('float', 'float32'),
  float64: basic('float', 'float64'),
  number: basic('float', 'number'),

  complex64: basic('complex', 'complex64'),
  complex128: basic('complex', 'complex128'),

  string: basic('string', 'string'),

  unknown: {
    id: allocateId(),
    kind: 'interface',
    name: 'unknown'
  } satisfies InterfaceType,
  symbol: {
    id: allocateId(),
    kind: 'opaque',
    name: 'symbol'
  } satisfies OpaqueType,

  array(length: number, elem: TypeRef): ArrayType {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Invalid array length: ${length}`);
    }
    const id = allocateId();
    return {
      id,
      kind: 'array',
      length,
      get elem(): Type {
        return resolve(elem);
      }
    };
  },

  slice(elem: TypeRef): SliceType {
    const id = allocateId();
    return {
      id,
      kind: 'slice',
      get elem(): Type {
        return resolve(elem);
      }
    };
  },

  map(key: Type, elem: TypeRef, name?: string): MapType {
    const id = allocateId();
    return {
      id,
      kind: 'map',
      key,
      name,
      get elem(): Type {
        return resolve(elem);
      }
    };
  },

  pointer(elem: TypeRef): PointerType {
    return createPointer(elem, false);
  },

  struct(name: string, fields: FieldDecls | (() => FieldDecls)): StructType {
    return createStruct(name, fields);
  },

  interface(name: string): InterfaceType {
    return { id: allocateId(), kind: 'interface', name };
  },

  func(name: string): FuncType {
    return { id: allocateId(), kind: 'func', name };
  },

  chan(elem: TypeRef): ChanType {
    const id = allocateId();
    return {
      id,
      kind: 'chan',
      get elem(): Type {
        return resolve(elem);
      }
    };
  },

  opaque(name: string): OpaqueType {
    return { id: allocateId(), kind: 'opaque', name };
  }
} as const;

/**
 * Wraps element names that would otherwise bind ambiguously in a suffix form
 * (`(*Node)[]` rather than `*Node[]`).
 */
function wrapElem(type: Type): string {
  const name = typeName(type);
  const needsParens =
    (type.kind === 'pointer' && !type.implicit) ||
    type.kind === 'chan' ||
    type.kind === 'func';
  return needsParens ? `(${name})` : name;
}

/**
 * Returns the printable name of a descriptor, as used in type-mismatch lines.
 *
 * Examples: `number`, `int32[3]`, `unknown[]`, `Map<string, int>`, `*Node`,
 * `chan int`, `{ a, b }`, `Point { x, y }`.
 */
export function typeName(type: Type): string {
  switch (type.kind) {
    case 'array':
      return `${wrapElem(type.elem)}[${type.length}]`;
    case 'slice':
      return `${wrapElem(type.elem)}[]`;
    case 'map':
      return type.name ?? `Map<${typeName(type.key)}, ${typeName(type.elem)}>`;
    case 'pointer':
      return type.implicit ? typeName(type.elem) : `*${typeName(type.elem)}`;
    case 'chan':
      return `chan ${typeName(type.elem)}`;
    case 'struct': {
      if (!type.inferred) return type.name;
      const keys = type.fields.map(field => field.name).join(', ');
      const shape = keys ? `{ ${keys} }` : '{}';
      return type.name ? `${type.name} ${shape}` : shape;
    }
    default:
      return type.name;
  }
}

/**
 * Reports whether two descriptors denote the same type.
 *
 * Rules:
 * 1. Named types (scalars, structs, interfaces, opaque handles) are identical
 *    only to themselves.
 * 2. Unnamed composites (array, slice, map, pointer, chan) are identical when
 *    their parts are identical.
 * 3. Function types are identical when their signatures (names) match.
 */
export function identical(left: Type, right: Type): boolean {
  if (left === right) return true;

  switch (left.kind) {
    case 'array':
      return (
        right.kind === 'array' &&
        left.length === right.length &&
        identical(left.elem, right.elem)
      );
    case 'slice':
      return right.kind === 'slice' && identical(left.elem, right.elem);
    case 'map':
      return (
        right.kind === 'map' &&
        left.name === right.name &&
        identical(left.key, right.key) &&
        identical(left.elem, right.elem)
      );
    case 'pointer':
      return right.kind === 'pointer' && identical(left.elem, right.elem);
    case 'chan':
      return right.kind === 'chan' && identical(left.elem, right.elem);
    case 'func':
      return right.kind === 'func' && left.name === right.name;
    default:
      return false;
  }
}
