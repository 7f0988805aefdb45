import { format } from 'node:util';

import type {
  DiffLogger,
  LineWriter,
  Logfer,
  PinoDiffOptions,
  Printfer
} from './types';

/**
 * Collects each rendered line, without a trailing newline, in call order.
 */
export class LineCollector implements Printfer {
  readonly lines: string[] = [];

  printf(template: string, ...args: unknown[]): void {
    this.lines.push(format(template, ...args));
  }
}

/**
 * Writes each rendered line followed by `\n` to a stream.
 */
export class StreamPrinter implements Printfer {
  constructor(private readonly writer: LineWriter) {}

  printf(template: string, ...args: unknown[]): void {
    this.writer.write(`${format(template, ...args)}\n`);
  }
}

/**
 * Forwards the template and its arguments unchanged to a `Logfer`, which is
 * expected to apply the same printf-style substitution.
 */
export class LogfPrinter implements Printfer {
  constructor(private readonly sink: Logfer) {}

  printf(template: string, ...args: unknown[]): void {
    this.sink.logf(template, ...args);
  }
}

/**
 * Merges partial pino adapter options with the defaults.
 *
 * Default settings:
 * - `level`: `'info'`.
 * - `bindings`: `{}`.
 */
export function normalizePinoOptions(
  options: Partial<PinoDiffOptions>
): PinoDiffOptions {
  return {
    level: 'info',
    bindings: {},
    ...options
  };
}

/**
 * Logs each rendered line as one pino record.
 *
 * The line is rendered here, with the same substitution as the other
 * adapters, and passed as the record message; pino receives no format
 * arguments, so its own interpolation never runs.
 */
export class PinoPrinter implements Printfer {
  private readonly options: PinoDiffOptions;

  constructor(
    private readonly logger: DiffLogger,
    options: Partial<PinoDiffOptions> = {}
  ) {
    this.options = normalizePinoOptions(options);
  }

  printf(template: string, ...args: unknown[]): void {
    const { level, bindings } = this.options;
    this.logger[level]({ ...bindings, diff: true }, format(template, ...args));
  }
}
