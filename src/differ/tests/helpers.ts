import { diff } from '..';

/**
 * Diff Input
 * The two roots of one comparison.
 */
export type DiffInput = {
  /**
   * The left-hand value.
   */
  left: unknown;

  /**
   * The right-hand value.
   */
  right: unknown;
};

/**
 * Diff Runner
 * Executes one comparison and returns its lines.
 */
export type DiffRunner = (input: DiffInput) => string[];

/**
 * Creates a diff runner that collects lines with the default collector sink.
 */
export function createDiffRunner(): DiffRunner {
  return input => diff(input.left, input.right);
}
