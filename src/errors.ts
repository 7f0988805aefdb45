/**
 * Base class for the fatal conditions raised by the difference engine.
 *
 * None of these describe a disagreement between the compared values; those
 * are reported as ordinary diff lines. An error from this hierarchy means the
 * inputs (or their type descriptors) fall outside what the engine supports.
 */
export class DiffError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a type descriptor carries a kind the walker does not handle.
 * The kind taxonomy must be extended; there is no fallback.
 */
export class UnsupportedKindError extends DiffError {
  constructor(readonly kind: string) {
    super(`Unsupported value kind: ${kind}`);
  }
}

/**
 * Raised when map keys of a kind that cannot act as a map key
 * (slice, map, func) reach the key matcher.
 */
export class InvalidMapKeyError extends DiffError {
  constructor(readonly typeName: string) {
    super(`Invalid map key type: ${typeName}`);
  }
}

/**
 * Raised when a runtime value does not fit the descriptor it was declared
 * with (e.g. a struct descriptor over a string).
 */
export class InspectionError extends DiffError {}
