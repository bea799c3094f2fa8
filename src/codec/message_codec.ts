import { bytesToHex, concatBytes } from "@noble/hashes/utils";
import {
  boundsEqual,
  compareBounds,
  isInfinity,
  MAX_TIMESTAMP,
  MIN_BOUND,
} from "../bound.ts";
import { FINGERPRINT_SIZE } from "../accumulator/accumulator.ts";
import { InvalidItemError, ProtocolError } from "../errors.ts";
import type {
  Bound,
  Message,
  RangeDescriptor,
  RangeMode,
} from "../types.ts";
import { ByteReader, encodeVarInt, varIntByteLength } from "./varint.ts";

export const MODE_TAGS: Record<RangeMode, number> = {
  skip: 0,
  fingerprint: 1,
  idList: 2,
};

function modeFromTag(tag: bigint, offset: number): RangeMode {
  switch (tag) {
    case 0n:
      return "skip";
    case 1n:
      return "fingerprint";
    case 2n:
      return "idList";
    default:
      throw new ProtocolError(`Unexpected mode: ${tag}`, offset);
  }
}

/** The varint written for a bound's timestamp, given the previous one in the same message. */
function timestampDelta(timestamp: bigint, lastTimestamp: bigint): bigint {
  if (timestamp === MAX_TIMESTAMP) {
    return 0n;
  }

  const delta = timestamp > lastTimestamp ? timestamp - lastTimestamp : 0n;

  return delta + 1n;
}

/** Encoded size of a range, given the timestamp of the bound written before it. */
export function rangeByteLength(
  range: RangeDescriptor,
  lastTimestamp: bigint,
  idSize: number,
): number {
  const { upperBound } = range;

  let length = varIntByteLength(
    timestampDelta(upperBound.timestamp, lastTimestamp),
  ) +
    varIntByteLength(upperBound.idPrefix.length) +
    upperBound.idPrefix.length +
    varIntByteLength(MODE_TAGS[range.mode]);

  switch (range.mode) {
    case "skip":
      break;
    case "fingerprint":
      length += FINGERPRINT_SIZE;
      break;
    case "idList":
      length += varIntByteLength(range.ids.length) + range.ids.length * idSize;
      break;
  }

  return length;
}

/** Appends ranges to a message, delta-encoding bound timestamps as it goes. */
export class MessageWriter {
  private chunks: Uint8Array[] = [];
  private length = 0;
  private lastTimestamp = 0n;

  constructor(private idSize: number) {}

  get byteLength(): number {
    return this.length;
  }

  /** The timestamp the next bound will be delta-encoded against. */
  get previousTimestamp(): bigint {
    return this.lastTimestamp;
  }

  private push(chunk: Uint8Array) {
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  private writeBound(bound: Bound) {
    if (bound.idPrefix.length > this.idSize) {
      throw new InvalidItemError(
        `Bound prefix of ${bound.idPrefix.length} bytes exceeds id size ${this.idSize}`,
      );
    }

    this.push(encodeVarInt(timestampDelta(bound.timestamp, this.lastTimestamp)));
    this.lastTimestamp = bound.timestamp;

    this.push(encodeVarInt(bound.idPrefix.length));
    this.push(bound.idPrefix);
  }

  writeRange(range: RangeDescriptor) {
    this.writeBound(range.upperBound);
    this.push(encodeVarInt(MODE_TAGS[range.mode]));

    switch (range.mode) {
      case "skip":
        break;
      case "fingerprint": {
        if (range.fingerprint.length !== FINGERPRINT_SIZE) {
          throw new InvalidItemError(
            `Fingerprint must be ${FINGERPRINT_SIZE} bytes`,
          );
        }

        this.push(range.fingerprint);
        break;
      }
      case "idList": {
        this.push(encodeVarInt(range.ids.length));

        for (const id of range.ids) {
          if (id.length !== this.idSize) {
            throw new InvalidItemError(
              `Id ${bytesToHex(id)} is not ${this.idSize} bytes`,
            );
          }

          this.push(id);
        }
        break;
      }
    }
  }

  finish(): Uint8Array {
    return concatBytes(...this.chunks);
  }
}

/** Throws unless the ranges tile the item space with strictly increasing bounds. */
export function assertTiling(message: Message) {
  let prev = MIN_BOUND;

  for (let i = 0; i < message.length; i++) {
    const range = message[i];

    if (!boundsEqual(range.lowerBound, prev)) {
      throw new ProtocolError(
        `Range ${i} does not start where range ${i - 1} ends`,
      );
    }

    if (compareBounds(range.upperBound, range.lowerBound) <= 0) {
      throw new ProtocolError(`Range ${i} is empty or inverted`);
    }

    prev = range.upperBound;
  }

  if (message.length > 0 && !isInfinity(prev)) {
    throw new ProtocolError("Message does not extend to infinity");
  }
}

export function encodeMessage(message: Message, idSize: number): Uint8Array {
  assertTiling(message);

  const writer = new MessageWriter(idSize);

  for (const range of message) {
    writer.writeRange(range);
  }

  return writer.finish();
}

/** Decodes a message and checks that its ranges tile the item space. */
export function decodeMessage(bytes: Uint8Array, idSize: number): Message {
  const reader = new ByteReader(bytes);
  const message: Message = [];

  let lowerBound = MIN_BOUND;
  let lastTimestamp = 0n;

  while (reader.remaining > 0) {
    const boundOffset = reader.position;
    const delta = reader.readVarInt();

    let timestamp: bigint;

    if (delta === 0n) {
      timestamp = MAX_TIMESTAMP;
    } else {
      timestamp = lastTimestamp + delta - 1n;

      if (timestamp >= MAX_TIMESTAMP) {
        throw new ProtocolError("Bound timestamp overflows", boundOffset);
      }
    }

    lastTimestamp = timestamp;

    const prefixLength = reader.readSmallVarInt(idSize);

    if (timestamp === MAX_TIMESTAMP && prefixLength > 0) {
      throw new ProtocolError("Infinity bound carries an id prefix", boundOffset);
    }

    const upperBound: Bound = {
      timestamp,
      idPrefix: reader.readBytes(prefixLength),
    };

    if (compareBounds(upperBound, lowerBound) <= 0) {
      throw new ProtocolError("Bounds are not strictly increasing", boundOffset);
    }

    const modeOffset = reader.position;
    const mode = modeFromTag(reader.readVarInt(), modeOffset);

    switch (mode) {
      case "skip": {
        message.push({ mode, lowerBound, upperBound });
        break;
      }
      case "fingerprint": {
        message.push({
          mode,
          lowerBound,
          upperBound,
          fingerprint: reader.readBytes(FINGERPRINT_SIZE),
        });
        break;
      }
      case "idList": {
        const count = reader.readSmallVarInt(
          Math.floor(reader.remaining / idSize),
        );
        const ids: Uint8Array[] = [];

        for (let i = 0; i < count; i++) {
          ids.push(reader.readBytes(idSize));
        }

        message.push({ mode, lowerBound, upperBound, ids });
        break;
      }
    }

    lowerBound = upperBound;
  }

  if (message.length > 0 && !isInfinity(lowerBound)) {
    throw new ProtocolError(
      "Message does not extend to infinity",
      reader.position,
    );
  }

  return message;
}
