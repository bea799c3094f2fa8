import { boundsEqual, INFINITY_BOUND, isInfinity, MIN_BOUND } from "../bound.ts";
import { InvalidStateError } from "../errors.ts";
import type { Bound, Message, RangeDescriptor } from "../types.ts";
import { MessageWriter, rangeByteLength } from "./message_codec.ts";

type SkipRange = Extract<RangeDescriptor, { mode: "skip" }>;

/**
 * Collects the ranges of an outgoing message in order, merging runs of skips
 * so that a converged stretch of the item space costs a single range.
 */
export class MessageBuilder {
  private writer: MessageWriter;
  private ranges: RangeDescriptor[] = [];
  private pendingSkip: SkipRange | null = null;
  private end: Bound = MIN_BOUND;
  private hasWork = false;

  constructor(private idSize: number) {
    this.writer = new MessageWriter(idSize);
  }

  /** Where the next range must begin. */
  get currentBound(): Bound {
    return this.end;
  }

  /** Bytes committed so far, not counting a pending skip. */
  get byteLength(): number {
    return this.writer.byteLength;
  }

  private checkContiguous(lowerBound: Bound) {
    if (!boundsEqual(lowerBound, this.end)) {
      throw new InvalidStateError("Ranges must be appended contiguously");
    }
  }

  skip(lowerBound: Bound, upperBound: Bound) {
    this.checkContiguous(lowerBound);

    if (this.pendingSkip) {
      this.pendingSkip.upperBound = upperBound;
    } else {
      this.pendingSkip = { mode: "skip", lowerBound, upperBound };
    }

    this.end = upperBound;
  }

  push(range: RangeDescriptor) {
    if (range.mode === "skip") {
      this.skip(range.lowerBound, range.upperBound);
      return;
    }

    this.checkContiguous(range.lowerBound);
    this.flushSkip();

    this.writer.writeRange(range);
    this.ranges.push(range);
    this.end = range.upperBound;
    this.hasWork = true;
  }

  /** How many bytes appending these ranges would add, including a pending skip. */
  measure(ranges: RangeDescriptor[]): number {
    let lastTimestamp = this.writer.previousTimestamp;
    let length = 0;
    let skip = this.pendingSkip;

    for (const range of ranges) {
      if (range.mode === "skip") {
        skip = skip
          ? { ...skip, upperBound: range.upperBound }
          : { ...range };
        continue;
      }

      if (skip) {
        length += rangeByteLength(skip, lastTimestamp, this.idSize);
        lastTimestamp = skip.upperBound.timestamp;
        skip = null;
      }

      length += rangeByteLength(range, lastTimestamp, this.idSize);
      lastTimestamp = range.upperBound.timestamp;
    }

    return length;
  }

  private flushSkip() {
    if (this.pendingSkip) {
      this.writer.writeRange(this.pendingSkip);
      this.ranges.push(this.pendingSkip);
      this.pendingSkip = null;
    }
  }

  /** Closes the message with a skip to infinity. A message with nothing but skips comes out empty. */
  finish(): { message: Message; bytes: Uint8Array } {
    if (!this.hasWork) {
      return { message: [], bytes: new Uint8Array(0) };
    }

    if (!isInfinity(this.end)) {
      this.skip(this.end, INFINITY_BOUND);
    }

    this.flushSkip();

    return { message: this.ranges, bytes: this.writer.finish() };
  }
}
