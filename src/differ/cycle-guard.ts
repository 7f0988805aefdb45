import type { Handle, InspectedValue, Location } from '../inspect/value';
import type { Type } from '../inspect/types';

/**
 * Hands out small, stable integer addresses for heap objects and symbols.
 *
 * One book lives for one top-level comparison, so addresses are only
 * meaningful within that call (and identical across both sides of it).
 */
export class AddressBook {
  private readonly objects = new WeakMap<object, number>();
  private readonly symbols = new Map<symbol, number>();
  private next = 1;

  addressOf(handle: Handle): number {
    if (typeof handle === 'symbol') {
      let address = this.symbols.get(handle);
      if (address === undefined) {
        address = this.next++;
        this.symbols.set(handle, address);
      }
      return address;
    }

    let address = this.objects.get(handle);
    if (address === undefined) {
      address = this.next++;
      this.objects.set(handle, address);
    }
    return address;
  }

  /**
   * Address-style rendering, e.g. `0x1f`.
   */
  format(handle: Handle): string {
    return `0x${this.addressOf(handle).toString(16)}`;
  }
}

/**
 * The identity of an addressable value: where it is stored and as what type.
 * Used only to detect revisits, never to compare content.
 */
export type Identity = {
  readonly address: number;
  readonly slot: Location['slot'];
  readonly type: Type;
};

/**
 * Per-side mapping from an identity key to the counterpart identity it was
 * first compared against.
 */
export type VisitedSet = Map<string, Identity>;

/**
 * Outcome of registering a pair of addressable values.
 *
 * - `first`: neither side seen before; both are now recorded.
 * - `revisit`: this exact pairing was recorded earlier.
 * - `left-rebound`: the left value was recorded with another counterpart.
 * - `right-rebound`: the right value was recorded with another counterpart.
 */
export type VisitOutcome =
  | 'first'
  | 'revisit'
  | 'left-rebound'
  | 'right-rebound';

function identityKey(identity: Identity): string {
  const slot =
    typeof identity.slot === 'symbol' ? '@' : JSON.stringify(identity.slot);
  return `${identity.address}/${slot}/${identity.type.id}`;
}

function sameIdentity(left: Identity, right: Identity): boolean {
  return identityKey(left) === identityKey(right);
}

/**
 * Breaks comparison cycles through addressable storage.
 *
 * Keeps one `VisitedSet` per input. A pair seen for the first time is
 * recorded on both sides as mutual counterparts; meeting either side again
 * tells the walker to stop descending, and whether the pairing changed.
 */
export class CycleGuard {
  readonly leftVisited: VisitedSet = new Map();
  readonly rightVisited: VisitedSet = new Map();

  constructor(private readonly addresses: AddressBook) {}

  /**
   * Identity of an addressable value, or `undefined` when it has no location
   * or no type.
   */
  identify(value: InspectedValue): Identity | undefined {
    if (!value.location || !value.type) return undefined;
    return {
      address: this.addresses.addressOf(value.location.holder),
      slot: value.location.slot,
      type: value.type
    };
  }

  visit(left: Identity, right: Identity): VisitOutcome {
    const leftKey = identityKey(left);
    const rightKey = identityKey(right);

    const leftCounterpart = this.leftVisited.get(leftKey);
    if (leftCounterpart) {
      return sameIdentity(leftCounterpart, right) ? 'revisit' : 'left-rebound';
    }

    // Both maps are written together, so a right-side hit here always
    // carries a different left counterpart.
    if (this.rightVisited.has(rightKey)) return 'right-rebound';

    this.leftVisited.set(leftKey, right);
    this.rightVisited.set(rightKey, left);
    return 'first';
  }
}
