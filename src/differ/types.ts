import type { Level, Logger } from 'pino';

/**
 * Destination of diff lines.
 *
 * `printf` is called once per difference with a printf-style template and
 * its arguments; the template carries no trailing newline.
 */
export interface Printfer {
  printf(format: string, ...args: unknown[]): void;
}

/**
 * An external log sink with a formatted-record method, the shape of most
 * test-runner loggers.
 */
export interface Logfer {
  logf(format: string, ...args: unknown[]): void;
}

/**
 * The part of a writable stream the stream adapter needs.
 * `process.stdout` and any `stream.Writable` fit.
 */
export interface LineWriter {
  write(chunk: string): unknown;
}

/**
 * The pino logger surface used by the structured-log adapter.
 */
export type DiffLogger = Pick<Logger, Level>;

export type PinoDiffOptions = {
  /**
   * Level each diff line is logged at.
   * @default 'info'
   */
  level: Level;

  /**
   * Extra fields merged into every record, next to `diff: true`.
   * @default {}
   */
  bindings: Readonly<Record<string, unknown>>;
};
