import { MAX_TIMESTAMP } from "../bound.ts";
import { ProtocolError } from "../errors.ts";

/**
 * Encodes an unsigned integer of up to 64 bits as base-128 groups, most
 * significant group first, with the high bit set on every byte but the last.
 */
export function encodeVarInt(value: number | bigint): Uint8Array {
  let n = BigInt(value);

  if (n < 0n || n > MAX_TIMESTAMP) {
    throw new RangeError(`Varint out of range: ${n}`);
  }

  if (n === 0n) {
    return new Uint8Array([0]);
  }

  const groups: number[] = [];

  while (n > 0n) {
    groups.push(Number(n & 0x7fn));
    n >>= 7n;
  }

  groups.reverse();

  for (let i = 0; i < groups.length - 1; i++) {
    groups[i] |= 0x80;
  }

  return new Uint8Array(groups);
}

/** Encoded length of a varint, without allocating it. */
export function varIntByteLength(value: number | bigint): number {
  let n = BigInt(value);
  let length = 1;

  while (n >= 0x80n) {
    n >>= 7n;
    length++;
  }

  return length;
}

/** Reads primitives off a message, failing on anything truncated or malformed. */
export class ByteReader {
  private offset = 0;

  constructor(private bytes: Uint8Array) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readVarInt(): bigint {
    const start = this.offset;
    let result = 0n;

    while (true) {
      if (this.offset >= this.bytes.length) {
        throw new ProtocolError("Premature end of varint", start);
      }

      const byte = this.bytes[this.offset++];

      if (this.offset - 1 === start && byte === 0x80) {
        throw new ProtocolError("Varint has a redundant leading group", start);
      }

      result = (result << 7n) | BigInt(byte & 0x7f);

      if (result > MAX_TIMESTAMP) {
        throw new ProtocolError("Varint exceeds 64 bits", start);
      }

      if ((byte & 0x80) === 0) {
        return result;
      }
    }
  }

  /** Reads a varint that must fit in a JavaScript number no larger than `max`. */
  readSmallVarInt(max: number): number {
    const start = this.offset;
    const value = this.readVarInt();

    if (value > BigInt(max)) {
      throw new ProtocolError(`Value ${value} exceeds limit ${max}`, start);
    }

    return Number(value);
  }

  readBytes(length: number): Uint8Array {
    if (length > this.remaining) {
      throw new ProtocolError("Message ends prematurely", this.offset);
    }

    const bytes = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;

    return bytes;
  }
}
