import { bytesToHex } from "@noble/hashes/utils";
import { MAX_TIMESTAMP } from "../bound.ts";
import { IndexOutOfRangeError, InvalidItemError } from "../errors.ts";
import type { Bound, Item } from "../types.ts";

/** The capabilities a reconciliation session needs from an item store. */
export interface Storage {
  /** Length in bytes of every id held by this store. */
  readonly idSize: number;
  readonly sealed: boolean;

  insert(timestamp: number | bigint, id: Uint8Array): void;
  /** Sort and freeze the store. No inserts are accepted afterwards. */
  seal(): void;

  size(): number;
  itemAt(index: number): Item;
  /** Visit items in [begin, end) in order. Returning `false` stops the walk. */
  iterate(
    begin: number,
    end: number,
    cb: (item: Item, index: number) => boolean | void,
  ): void;
  /** Index of the first item in [begin, end) that is not below `bound`, or `end`. */
  findLowerBound(begin: number, end: number, bound: Bound): number;
  /** Fingerprint of the items in [begin, end). */
  fingerprint(begin: number, end: number): Uint8Array;
}

export const DEFAULT_ID_SIZE = 32;
export const MIN_ID_SIZE = 8;
export const MAX_ID_SIZE = 32;

export function checkIdSize(idSize: number) {
  if (
    !Number.isInteger(idSize) || idSize < MIN_ID_SIZE || idSize > MAX_ID_SIZE
  ) {
    throw new InvalidItemError(
      `Id size ${idSize} is outside [${MIN_ID_SIZE}, ${MAX_ID_SIZE}]`,
    );
  }
}

/** Builds an item from caller input, rejecting ids of the wrong size and reserved timestamps. */
export function makeItem(
  timestamp: number | bigint,
  id: Uint8Array,
  idSize: number,
): Item {
  if (typeof timestamp === "number" && !Number.isSafeInteger(timestamp)) {
    throw new InvalidItemError(`Timestamp ${timestamp} is not a safe integer`);
  }

  const ts = BigInt(timestamp);

  if (ts < 0n || ts >= MAX_TIMESTAMP) {
    throw new InvalidItemError(`Timestamp ${ts} is out of range`);
  }

  if (id.length !== idSize) {
    throw new InvalidItemError(
      `Id ${bytesToHex(id)} is ${id.length} bytes, expected ${idSize}`,
    );
  }

  return { timestamp: ts, id: id.slice() };
}

export function itemKey(item: Item): string {
  return `${item.timestamp}:${bytesToHex(item.id)}`;
}

export function checkIndex(index: number, size: number) {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new IndexOutOfRangeError(
      `Index ${index} is outside [0, ${size})`,
    );
  }
}

export function checkRange(begin: number, end: number, size: number) {
  if (
    !Number.isInteger(begin) || !Number.isInteger(end) || begin < 0 ||
    end > size || begin > end
  ) {
    throw new IndexOutOfRangeError(
      `Range [${begin}, ${end}) is outside [0, ${size})`,
    );
  }
}
