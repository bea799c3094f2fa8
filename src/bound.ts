import type { Bound, Item } from "./types.ts";

/** Largest unsigned 64-bit value. Reserved for the infinity bound. */
export const MAX_TIMESTAMP = 0xffff_ffff_ffff_ffffn;

export const MIN_BOUND: Bound = {
  timestamp: 0n,
  idPrefix: new Uint8Array(0),
};

/** The end of the item space. Every item sorts before it. */
export const INFINITY_BOUND: Bound = {
  timestamp: MAX_TIMESTAMP,
  idPrefix: new Uint8Array(0),
};

export function isInfinity(bound: Bound): boolean {
  return bound.timestamp === MAX_TIMESTAMP;
}

function compareTimestamps(a: bigint, b: bigint): number {
  if (a > b) {
    return 1;
  } else if (a < b) {
    return -1;
  } else {
    return 0;
  }
}

/** Byte-wise comparison. A shorter array compares as if padded with zero bytes. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.max(a.length, b.length);

  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;

    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }

  return 0;
}

export function compareItems(a: Item, b: Item): number {
  return compareTimestamps(a.timestamp, b.timestamp) ||
    compareBytes(a.id, b.id);
}

export function compareBounds(a: Bound, b: Bound): number {
  return compareTimestamps(a.timestamp, b.timestamp) ||
    compareBytes(a.idPrefix, b.idPrefix);
}

export function compareItemToBound(item: Item, bound: Bound): number {
  return compareTimestamps(item.timestamp, bound.timestamp) ||
    compareBytes(item.id, bound.idPrefix);
}

/** The bound sorting before every item with this timestamp, and after every earlier one. */
export function timestampBound(timestamp: bigint): Bound {
  return { timestamp, idPrefix: new Uint8Array(0) };
}

export function boundsEqual(a: Bound, b: Bound): boolean {
  return compareBounds(a, b) === 0;
}

/**
 * The smallest bound that sorts after `prev` and at or before `curr`.
 * `prev` must sort strictly before `curr`.
 */
export function minimalBound(prev: Item, curr: Item): Bound {
  if (curr.timestamp !== prev.timestamp) {
    return { timestamp: curr.timestamp, idPrefix: new Uint8Array(0) };
  }

  let sharedPrefixBytes = 0;

  while (
    sharedPrefixBytes < curr.id.length &&
    curr.id[sharedPrefixBytes] === prev.id[sharedPrefixBytes]
  ) {
    sharedPrefixBytes++;
  }

  return {
    timestamp: curr.timestamp,
    idPrefix: curr.id.slice(0, sharedPrefixBytes + 1),
  };
}
