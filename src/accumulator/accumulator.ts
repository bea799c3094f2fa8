import { sha256 } from "@noble/hashes/sha2";
import { concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import { encodeVarInt } from "../codec/varint.ts";
import type { LiftingMonoid } from "../lifting_monoid.ts";
import type { Item } from "../types.ts";

/** Width of the running sum, and the largest supported id size. */
export const ACCUMULATOR_SIZE = 32;

export const FINGERPRINT_SIZE = 16;

const ITEM_DOMAIN = utf8ToBytes("range-sync/item/v1");

/** SHA-256 over the domain tag, the big-endian timestamp and the id. */
export function itemDigest(item: Item): Uint8Array {
  const timestamp = new Uint8Array(8);
  new DataView(timestamp.buffer).setBigUint64(0, item.timestamp);

  return sha256(concatBytes(ITEM_DOMAIN, timestamp, item.id));
}

/**
 * Sums 32-byte values modulo 2^256, read as little-endian integers padded
 * with zero bytes. Items enter as the digest of their timestamp and id.
 * Addition commutes, so peers enumerating the same set in any order reach
 * the same state.
 */
export class Accumulator {
  private buf = new Uint8Array(ACCUMULATOR_SIZE);

  add(id: Uint8Array): this {
    let carry = 0;

    for (let i = 0; i < ACCUMULATOR_SIZE; i++) {
      const sum = this.buf[i] + (id[i] ?? 0) + carry;
      this.buf[i] = sum & 0xff;
      carry = sum >> 8;
    }

    return this;
  }

  addItem(item: Item): this {
    return this.add(itemDigest(item));
  }

  /** Fold another accumulator into this one. */
  merge(other: Accumulator): this {
    return this.add(other.buf);
  }

  clone(): Accumulator {
    const copy = new Accumulator();
    copy.buf.set(this.buf);

    return copy;
  }

  toBytes(): Uint8Array {
    return this.buf.slice();
  }

  /** Hashes the sum together with the number of items it covers. */
  getFingerprint(count: number): Uint8Array {
    const hash = sha256(concatBytes(this.buf, encodeVarInt(count)));

    return hash.slice(0, FINGERPRINT_SIZE);
  }
}

/** Lifts each item into an accumulator holding only its digest, and combines by summing. */
export const accumulatorMonoid: LiftingMonoid<Item, Accumulator> = {
  lift: (item: Item) => new Accumulator().addItem(item),
  combine: (a: Accumulator, b: Accumulator) => a.clone().merge(b),
  neutral: new Accumulator(),
};
