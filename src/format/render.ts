import { UnsupportedKindError } from '../errors';
import type { InspectedValue } from '../inspect/value';
import { typeName } from '../inspect/types';

/**
 * Formats a float the way it is compared: exactly, keeping the sign of zero.
 */
export function formatFloat(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

/**
 * Formats a complex number as `(real+imagi)`, e.g. `(1+2i)` or `(0-1.5i)`.
 */
export function formatComplex(real: number, imag: number): string {
  const sign = imag < 0 || Object.is(imag, -0) ? '' : '+';
  return `(${formatFloat(real)}${sign}${formatFloat(imag)}i)`;
}

function functionName(value: unknown): string {
  if (typeof value !== 'function') return '[Function]';
  return value.name ? `[Function: ${value.name}]` : '[Function (anonymous)]';
}

/**
 * Renders inspected values as single-line literals for diff output.
 *
 * Containers currently being rendered are tracked so that a value reachable
 * from itself prints `[Circular]` instead of recursing.
 */
class Renderer {
  private readonly active = new Set<unknown>();

  render(value: InspectedValue): string {
    const { type } = value;
    if (!type) return 'nil';

    switch (type.kind) {
      case 'bool':
        return String(value.bool());
      case 'int':
        return String(value.int());
      case 'uint':
        return String(value.uint());
      case 'float':
        return formatFloat(value.float());
      case 'complex': {
        const { real, imag } = value.complex();
        return formatComplex(real, imag);
      }
      case 'string':
        return JSON.stringify(value.string());
      case 'array':
      case 'slice':
        if (type.kind === 'slice' && value.isNil()) return 'nil';
        return this.guard(value.raw, () => this.renderItems(value));
      case 'struct':
        return this.guard(value.raw, () => this.renderStruct(value));
      case 'map':
        if (value.isNil()) return 'nil';
        return this.guard(value.raw, () => this.renderMap(value));
      case 'pointer': {
        if (value.isNil()) return 'nil';
        const pointee = this.render(value.elem());
        return type.implicit ? pointee : `&${pointee}`;
      }
      case 'interface':
        return value.isNil() ? 'nil' : this.render(value.elem());
      case 'func':
        return value.isNil() ? 'nil' : functionName(value.raw);
      case 'chan':
        return value.isNil() ? 'nil' : `[${typeName(type)}]`;
      case 'opaque': {
        const { raw } = value;
        if (raw === null || raw === undefined) return 'nil';
        return typeof raw === 'symbol' ? raw.toString() : `[${typeName(type)}]`;
      }
      default:
        throw new UnsupportedKindError(String(Reflect.get(type, 'kind')));
    }
  }

  private guard(raw: unknown, renderBody: () => string): string {
    if (this.active.has(raw)) return '[Circular]';
    this.active.add(raw);
    try {
      return renderBody();
    } finally {
      this.active.delete(raw);
    }
  }

  private renderItems(value: InspectedValue): string {
    const items: string[] = [];
    for (let i = 0; i < value.len(); i++) {
      items.push(this.render(value.index(i)));
    }
    return `[${items.join(', ')}]`;
  }

  private renderStruct(value: InspectedValue): string {
    const fields: string[] = [];
    for (let i = 0; i < value.numField(); i++) {
      fields.push(`${value.fieldName(i)}: ${this.render(value.field(i))}`);
    }

    const body = fields.length > 0 ? `{ ${fields.join(', ')} }` : '{}';
    const name = value.type?.kind === 'struct' ? value.type.name : '';
    return name ? `${name} ${body}` : body;
  }

  private renderMap(value: InspectedValue): string {
    const keys = value.mapKeys();
    const isSet = value.raw instanceof Set;

    const entries = keys.map(key =>
      isSet
        ? this.render(key)
        : `${this.render(key)} => ${this.render(value.mapIndex(key))}`
    );

    const body = entries.length > 0 ? ` { ${entries.join(', ')} }` : ' {}';
    return `${isSet ? 'Set' : 'Map'}(${keys.length})${body}`;
  }
}

/**
 * Renders a value as a one-line, JavaScript-flavoured literal:
 * `nil`, `true`, `42`, `(1+2i)`, `"text"`, `[1, 2]`, `{ x: 1 }`,
 * `Point { x: 1 }`, `Map(1) { "a" => 1 }`, `&42` (explicit pointer),
 * `[Function: name]`, `Symbol(tag)`.
 */
export function render(value: InspectedValue): string {
  return new Renderer().render(value);
}
