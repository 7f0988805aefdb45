import { UnsupportedKindError } from '../errors';
import { identical, typeName } from '../inspect/types';
import { InspectedValue } from '../inspect/value';
import { render } from '../format/render';

import { AddressBook, CycleGuard } from './cycle-guard';
import { partitionKeys } from './key-matcher';
import { indexSegment, keySegment, relabel, withLabel } from './path-label';
import {
  LineCollector,
  LogfPrinter,
  PinoPrinter,
  StreamPrinter
} from './sinks';
import type {
  DiffLogger,
  LineWriter,
  Logfer,
  PinoDiffOptions,
  Printfer
} from './types';

/**
 * State of one top-level comparison, threaded through every recursive call.
 * Created fresh per call; nothing is shared between calls.
 */
type DiffContext = {
  readonly printer: Printfer;
  readonly addresses: AddressBook;
  readonly guard: CycleGuard;
};

function createContext(printer: Printfer): DiffContext {
  const addresses = new AddressBook();
  return { printer, addresses, guard: new CycleGuard(addresses) };
}

/**
 * Emits one diff line: `<label>: <body>`, or just `<body>` at the root.
 * Every body is a `%s`-only template whose arguments are pre-rendered strings.
 */
function emit(
  context: DiffContext,
  label: string,
  template: string,
  ...args: string[]
): void {
  context.printer.printf(withLabel(label, template), ...args);
}

/**
 * Registers an addressable pair with the cycle guard.
 *
 * @returns `true` when the walk should continue into the pair, `false` when
 *          the pair (or one of its sides) was already visited.
 */
function enterPair(
  context: DiffContext,
  label: string,
  left: InspectedValue,
  right: InspectedValue
): boolean {
  const leftIdentity = context.guard.identify(left);
  const rightIdentity = context.guard.identify(right);
  if (!leftIdentity || !rightIdentity) return true;

  switch (context.guard.visit(leftIdentity, rightIdentity)) {
    case 'first':
      return true;
    case 'revisit':
      return false;
    case 'left-rebound':
      emit(
        context,
        label,
        '%s (previously visited) != %s',
        render(left),
        render(right)
      );
      return false;
    case 'right-rebound':
      emit(
        context,
        label,
        '%s != %s (previously visited)',
        render(left),
        render(right)
      );
      return false;
  }
}

function diffMaps(
  context: DiffContext,
  label: string,
  left: InspectedValue,
  right: InspectedValue
): void {
  const { onlyLeft, both, onlyRight } = partitionKeys(
    left.mapKeys(),
    right.mapKeys()
  );

  for (const key of onlyLeft) {
    const keyLabel = relabel(label, keySegment(render(key)));
    emit(context, keyLabel, '%s != (missing)', render(left.mapIndex(key)));
  }

  for (const [leftKey, rightKey] of both) {
    const keyLabel = relabel(label, keySegment(render(leftKey)));
    diffValues(
      context,
      keyLabel,
      left.mapIndex(leftKey),
      right.mapIndex(rightKey)
    );
  }

  for (const key of onlyRight) {
    const keyLabel = relabel(label, keySegment(render(key)));
    emit(context, keyLabel, '(missing) != %s', render(right.mapIndex(key)));
  }
}

/**
 * The recursive walker. Compares one pair of values reached by `label` and
 * emits a line for every disagreement found at or below it.
 *
 * Steps:
 * 1. Absence: one side absent emits `nil != X` / `X != nil`; both absent is
 *    equal.
 * 2. Types: differing types emit `<left type> != <right type>` and stop.
 * 3. Cycles: addressable pairs are registered with the cycle guard; a
 *    revisit stops silently, a changed pairing is reported and stops.
 * 4. Kind dispatch: scalars compare directly, containers recurse with a
 *    derived label, references compare by identity.
 *
 * @throws {UnsupportedKindError} For a descriptor kind outside the taxonomy.
 */
function diffValues(
  context: DiffContext,
  label: string,
  left: InspectedValue,
  right: InspectedValue
): void {
  const leftType = left.type;
  const rightType = right.type;

  if (!leftType && rightType) {
    emit(context, label, 'nil != %s', render(right));
    return;
  }
  if (leftType && !rightType) {
    emit(context, label, '%s != nil', render(left));
    return;
  }
  if (!leftType || !rightType) return;

  if (!identical(leftType, rightType)) {
    emit(context, label, '%s != %s', typeName(leftType), typeName(rightType));
    return;
  }

  if (!enterPair(context, label, left, right)) return;

  switch (leftType.kind) {
    case 'bool': {
      const a = left.bool();
      const b = right.bool();
      if (a !== b) emit(context, label, '%s != %s', String(a), String(b));
      return;
    }
    case 'int':
    case 'uint': {
      const a = leftType.kind === 'int' ? left.int() : left.uint();
      const b = leftType.kind === 'int' ? right.int() : right.uint();
      if (a !== b) emit(context, label, '%s != %s', String(a), String(b));
      return;
    }
    case 'float':
      // exact comparison: NaN differs from itself
      if (left.float() !== right.float()) {
        emit(context, label, '%s != %s', render(left), render(right));
      }
      return;
    case 'complex': {
      const a = left.complex();
      const b = right.complex();
      if (a.real !== b.real || a.imag !== b.imag) {
        emit(context, label, '%s != %s', render(left), render(right));
      }
      return;
    }
    case 'string':
      if (left.string() !== right.string()) {
        emit(context, label, '%s != %s', render(left), render(right));
      }
      return;
    case 'array':
      for (let i = 0; i < left.len(); i++) {
        diffValues(
          context,
          relabel(label, indexSegment(i)),
          left.index(i),
          right.index(i)
        );
      }
      return;
    case 'slice': {
      const leftLength = left.len();
      const rightLength = right.len();
      if (leftLength !== rightLength) {
        const name = typeName(leftType);
        emit(
          context,
          label,
          '%s (length %s) != %s (length %s)',
          name,
          String(leftLength),
          name,
          String(rightLength)
        );
        return;
      }
      for (let i = 0; i < leftLength; i++) {
        diffValues(
          context,
          relabel(label, indexSegment(i)),
          left.index(i),
          right.index(i)
        );
      }
      return;
    }
    case 'struct':
      for (let i = 0; i < left.numField(); i++) {
        diffValues(
          context,
          relabel(label, left.fieldName(i)),
          left.field(i),
          right.field(i)
        );
      }
      return;
    case 'pointer': {
      const leftNil = left.isNil();
      const rightNil = right.isNil();
      if (leftNil && !rightNil) {
        emit(context, label, 'nil != %s', render(right));
      } else if (!leftNil && rightNil) {
        emit(context, label, '%s != nil', render(left));
      } else if (!leftNil && !rightNil) {
        diffValues(context, label, left.elem(), right.elem());
      }
      return;
    }
    case 'interface':
      diffValues(context, label, left.elem(), right.elem());
      return;
    case 'map':
      diffMaps(context, label, left, right);
      return;
    case 'func':
    case 'chan':
    case 'opaque': {
      const a = left.raw ?? null;
      const b = right.raw ?? null;
      if (a !== b) {
        emit(
          context,
          label,
          '%s != %s',
          formatAddress(context, left),
          formatAddress(context, right)
        );
      }
      return;
    }
    default:
      throw new UnsupportedKindError(String(Reflect.get(leftType, 'kind')));
  }
}

function formatAddress(context: DiffContext, value: InspectedValue): string {
  const { raw } = value;
  if (raw === null || raw === undefined) return '0x0';
  return context.addresses.format(value.pointer());
}

/**
 * Passes a description of every difference between `a` and `b` to `printer`,
 * one `printf` call per difference, without trailing newlines.
 *
 * This is the general form; `diff`, `writeDiff`, `logDiff` and `pinoDiff`
 * are built on it with the matching sink adapter.
 */
export function printDiff(printer: Printfer, a: unknown, b: unknown): void {
  diffValues(
    createContext(printer),
    '',
    InspectedValue.of(a),
    InspectedValue.of(b)
  );
}

/**
 * Returns one line per difference between `a` and `b`.
 *
 * Each line has the form `[<path>: ]<left> != <right>`, e.g.
 * `items[1].name: "a" != "b"`. Equal inputs produce an empty array.
 *
 * @example
 * ```ts
 * diff({ X: 1 }, { X: 2 }); // ['X: 1 != 2']
 * diff([1, 2], [1]);        // ['unknown[] (length 2) != unknown[] (length 1)']
 * ```
 */
export function diff(a: unknown, b: unknown): string[] {
  const collector = new LineCollector();
  printDiff(collector, a, b);
  return collector.lines;
}

/**
 * Writes each difference between `a` and `b` to `writer`, followed by a
 * newline.
 */
export function writeDiff(writer: LineWriter, a: unknown, b: unknown): void {
  printDiff(new StreamPrinter(writer), a, b);
}

/**
 * Forwards each difference between `a` and `b` to an external `Logfer`.
 */
export function logDiff(sink: Logfer, a: unknown, b: unknown): void {
  printDiff(new LogfPrinter(sink), a, b);
}

/**
 * Logs each difference between `a` and `b` as one pino record.
 */
export function pinoDiff(
  logger: DiffLogger,
  a: unknown,
  b: unknown,
  options: Partial<PinoDiffOptions> = {}
): void {
  printDiff(new PinoPrinter(logger, options), a, b);
}
