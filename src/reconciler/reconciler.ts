import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import {
  compareBounds,
  INFINITY_BOUND,
  MIN_BOUND,
  minimalBound,
  timestampBound,
} from "../bound.ts";
import { MessageBuilder } from "../codec/message_builder.ts";
import { decodeMessage } from "../codec/message_codec.ts";
import {
  AlreadyConvergedError,
  InvalidStateError,
  ProtocolError,
} from "../errors.ts";
import { type Logger, noopLogger } from "../logger.ts";
import type { Storage } from "../storage/storage.ts";
import type {
  Bound,
  Interval,
  Message,
  RangeDescriptor,
  ReconcileResult,
  Role,
  SessionState,
  SessionStatus,
} from "../types.ts";
import {
  FRAME_SIZE_RESERVE,
  parseReconcilerConfig,
  type ReconcilerConfig,
  type ReconcilerOptions,
} from "./reconciler_config.ts";

type IdListRange = Extract<RangeDescriptor, { mode: "idList" }>;

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }

  return true;
}

/**
 * One side of a reconciliation session over a sealed store.
 *
 * The initiator opens with `initiate`, and both sides then answer each other's
 * messages with `reconcile` until one of them produces an empty message. Ids
 * this side holds which the peer lacks collect in `haveIds`, and ids only the
 * peer holds collect in `needIds`. Both roles learn both sets.
 *
 * ```ts
 * const a = new Reconciler(storeA);
 * const b = new Reconciler(storeB);
 *
 * let msg = a.initiate();
 *
 * while (msg.length > 0) {
 *   msg = b.reconcile(msg);
 *   msg = a.reconcile(msg);
 * }
 * ```
 */
export class Reconciler {
  readonly config: ReconcilerConfig;

  private storage: Storage;
  private logger: Logger;
  private state: SessionState = { status: "initial" };

  private have = new Map<string, Uint8Array>();
  private need = new Map<string, Uint8Array>();

  constructor(storage: Storage, options: ReconcilerOptions = {}) {
    const { logger = noopLogger, ...configInput } = options;

    this.config = parseReconcilerConfig(configInput);
    this.logger = logger;

    if (!storage.sealed) {
      throw new InvalidStateError("Storage must be sealed before reconciling");
    }

    if (storage.idSize !== this.config.idSize) {
      throw new InvalidStateError(
        `Storage holds ${storage.idSize}-byte ids but the session expects ${this.config.idSize}`,
      );
    }

    this.storage = storage;
  }

  get status(): SessionStatus {
    return this.state.status;
  }

  get role(): Role | null {
    return this.state.status === "initial" ? null : this.state.role;
  }

  get isConverged(): boolean {
    return this.state.status === "converged";
  }

  /** Ids held locally that the peer lacks, so far. */
  get haveIds(): Uint8Array[] {
    return Array.from(this.have.values());
  }

  /** Ids the peer holds that are missing locally, so far. */
  get needIds(): Uint8Array[] {
    return Array.from(this.need.values());
  }

  /** Opens a session as the initiator, returning the first message to send. */
  initiate(): Uint8Array {
    if (this.state.status !== "initial") {
      throw new InvalidStateError(
        `Cannot initiate a session which is ${this.state.status}`,
      );
    }

    const builder = new MessageBuilder(this.config.idSize);
    const size = this.storage.size();

    this.append(
      builder,
      this.splitRange(0, size, MIN_BOUND, INFINITY_BOUND),
      0,
    );

    const { message, bytes } = builder.finish();

    this.state = {
      status: "awaitingPeer",
      role: "initiator",
      outstanding: this.idListIntervals(message),
    };

    this.logger.debug("Initiated session", {
      items: size,
      ranges: message.length,
      bytes: bytes.length,
    });

    return bytes;
  }

  /** Answers a message from the peer. An empty reply means the session has converged. */
  reconcile(bytes: Uint8Array): Uint8Array {
    const state = this.state;

    switch (state.status) {
      case "failed":
        throw new InvalidStateError(
          `Session failed earlier: ${state.error.message}`,
        );
      case "converged":
        if (bytes.length > 0) {
          throw new AlreadyConvergedError();
        }

        return new Uint8Array(0);
    }

    const role: Role = state.status === "initial" ? "responder" : state.role;

    if (bytes.length === 0) {
      this.converge(role);

      return new Uint8Array(0);
    }

    let incoming: Message;

    try {
      incoming = decodeMessage(bytes, this.config.idSize);
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.state = { status: "failed", role, error: err };
        this.logger.error("Rejected malformed message", err, {
          role,
          bytes: bytes.length,
        });
      }

      throw err;
    }

    const outstanding = state.status === "initial" ? [] : state.outstanding;

    const builder = new MessageBuilder(this.config.idSize);
    const size = this.storage.size();

    let prevIndex = 0;

    for (const range of incoming) {
      const lower = prevIndex;
      const upper = this.storage.findLowerBound(lower, size, range.upperBound);

      prevIndex = upper;

      const reply = this.replyTo(range, lower, upper, outstanding);

      if (!this.append(builder, reply, lower)) {
        break;
      }
    }

    const { message, bytes: out } = builder.finish();

    if (message.length === 0) {
      this.converge(role);
    } else if (role === "initiator") {
      this.state = {
        status: "awaitingPeer",
        role,
        outstanding: this.idListIntervals(message),
      };
    } else {
      this.state = {
        status: "responding",
        role,
        outstanding: this.idListIntervals(message),
      };
    }

    this.logger.debug("Reconciled message", {
      role,
      rangesIn: incoming.length,
      rangesOut: message.length,
      bytesIn: bytes.length,
      bytesOut: out.length,
      have: this.have.size,
      need: this.need.size,
    });

    return out;
  }

  /** Like `reconcile`, but also hands over the ids learned so far and forgets them. */
  reconcileWithIds(bytes: Uint8Array): ReconcileResult {
    const message = this.reconcile(bytes);

    const result = {
      message,
      haveIds: this.haveIds,
      needIds: this.needIds,
    };

    this.have.clear();
    this.need.clear();

    return result;
  }

  private converge(role: Role) {
    this.state = { status: "converged", role };
    this.logger.debug("Session converged", {
      role,
      have: this.have.size,
      need: this.need.size,
    });
  }

  private idListIntervals(message: Message): Interval[] {
    return message
      .filter((range) => range.mode === "idList")
      .map((range): Interval => [range.lowerBound, range.upperBound]);
  }

  private isOutstanding(range: RangeDescriptor, outstanding: Interval[]) {
    return outstanding.some(([lower, upper]) =>
      compareBounds(range.lowerBound, lower) >= 0 &&
      compareBounds(range.upperBound, upper) <= 0
    );
  }

  private localIds(lower: number, upper: number): Uint8Array[] {
    const ids: Uint8Array[] = [];

    this.storage.iterate(lower, upper, (item) => {
      ids.push(item.id);
    });

    return ids;
  }

  private replyTo(
    range: RangeDescriptor,
    lower: number,
    upper: number,
    outstanding: Interval[],
  ): RangeDescriptor[] {
    const { lowerBound, upperBound } = range;

    switch (range.mode) {
      case "skip":
        return [{ mode: "skip", lowerBound, upperBound }];
      case "fingerprint": {
        const local = this.storage.fingerprint(lower, upper);

        if (bytesEqual(local, range.fingerprint)) {
          return [{ mode: "skip", lowerBound, upperBound }];
        }

        return this.splitRange(lower, upper, lowerBound, upperBound);
      }
      case "idList": {
        const ours = this.localIds(lower, upper);
        const theirs = new Set(range.ids.map((id) => bytesToHex(id)));

        let shared = 0;

        for (const id of ours) {
          const hex = bytesToHex(id);

          if (theirs.has(hex)) {
            theirs.delete(hex);
            shared++;
          } else {
            this.have.set(hex, id);
          }
        }

        for (const hex of theirs) {
          this.need.set(hex, hexToBytes(hex));
        }

        const equal = theirs.size === 0 && shared === ours.length;

        if (
          this.isOutstanding(range, outstanding) ||
          (equal && ours.length === 0)
        ) {
          return [{ mode: "skip", lowerBound, upperBound }];
        }

        // Same ids, but possibly under other timestamps.
        if (equal) {
          return this.splitByTimestamp(lower, upper, lowerBound, upperBound);
        }

        return [{ mode: "idList", lowerBound, upperBound, ids: ours }];
      }
    }
  }

  /** Describes local items in [lower, upper) as one id list, or as fingerprinted buckets. */
  private splitRange(
    lower: number,
    upper: number,
    lowerBound: Bound,
    upperBound: Bound,
  ): RangeDescriptor[] {
    const count = upper - lower;
    const { buckets, idListThreshold } = this.config;

    if (count < Math.max(idListThreshold, buckets)) {
      return [{
        mode: "idList",
        lowerBound,
        upperBound,
        ids: this.localIds(lower, upper),
      }];
    }

    const perBucket = Math.floor(count / buckets);
    const extra = count % buckets;
    const ranges: RangeDescriptor[] = [];

    let begin = lower;
    let bucketLower = lowerBound;

    for (let i = 0; i < buckets; i++) {
      const end = begin + perBucket + (i < extra ? 1 : 0);
      const bucketUpper = i === buckets - 1 ? upperBound : minimalBound(
        this.storage.itemAt(end - 1),
        this.storage.itemAt(end),
      );

      ranges.push({
        mode: "fingerprint",
        lowerBound: bucketLower,
        upperBound: bucketUpper,
        fingerprint: this.storage.fingerprint(begin, end),
      });

      begin = end;
      bucketLower = bucketUpper;
    }

    return ranges;
  }

  /**
   * Fingerprints the items of each timestamp in [lower, upper) in a range of
   * their own, with a range for each gap between them. An item the peer holds
   * under another timestamp then lands in a range which differs.
   */
  private splitByTimestamp(
    lower: number,
    upper: number,
    lowerBound: Bound,
    upperBound: Bound,
  ): RangeDescriptor[] {
    const edges: Bound[] = [lowerBound];

    const addEdge = (bound: Bound) => {
      if (
        compareBounds(bound, edges[edges.length - 1]) > 0 &&
        compareBounds(bound, upperBound) < 0
      ) {
        edges.push(bound);
      }
    };

    this.storage.iterate(lower, upper, (item) => {
      addEdge(timestampBound(item.timestamp));
      addEdge(timestampBound(item.timestamp + 1n));
    });

    edges.push(upperBound);

    const ranges: RangeDescriptor[] = [];
    let begin = lower;

    for (let i = 0; i < edges.length - 1; i++) {
      const end = i === edges.length - 2
        ? upper
        : this.storage.findLowerBound(begin, upper, edges[i + 1]);

      ranges.push({
        mode: "fingerprint",
        lowerBound: edges[i],
        upperBound: edges[i + 1],
        fingerprint: this.storage.fingerprint(begin, end),
      });

      begin = end;
    }

    return ranges;
  }

  /**
   * Appends a reply to the outgoing message. Past the frame-size limit, the
   * reply is cut short or dropped, and one fingerprint covering the rest of
   * the item space closes the message. Returns false once that has happened.
   */
  private append(
    builder: MessageBuilder,
    reply: RangeDescriptor[],
    lower: number,
  ): boolean {
    const { frameSizeLimit } = this.config;

    if (frameSizeLimit === 0) {
      for (const range of reply) {
        builder.push(range);
      }

      return true;
    }

    const budget = frameSizeLimit - FRAME_SIZE_RESERVE;

    if (builder.byteLength + builder.measure(reply) <= budget) {
      for (const range of reply) {
        builder.push(range);
      }

      return true;
    }

    const [first] = reply;
    const head = reply.length === 1 && first.mode === "idList"
      ? this.cutIdList(builder, first, lower, budget)
      : null;

    if (head) {
      builder.push(head.range);
      this.pushRemainder(builder, head.range.upperBound, lower + head.count);
    } else {
      this.pushRemainder(builder, builder.currentBound, lower);
    }

    this.logger.warn("Frame size limit reached, deferring the rest", {
      limit: frameSizeLimit,
      bytes: builder.byteLength,
      deferredFrom: lower + (head ? head.count : 0),
    });

    return false;
  }

  /** The longest prefix of an id list that fits the budget, if it holds at least one id. */
  private cutIdList(
    builder: MessageBuilder,
    range: IdListRange,
    lower: number,
    budget: number,
  ): { range: IdListRange; count: number } | null {
    if (range.ids.length < 2) {
      return null;
    }

    const idSize = this.config.idSize;
    const make = (count: number): IdListRange => ({
      mode: "idList",
      lowerBound: range.lowerBound,
      upperBound: minimalBound(
        this.storage.itemAt(lower + count - 1),
        this.storage.itemAt(lower + count),
      ),
      ids: range.ids.slice(0, count),
    });
    const fits = (count: number) =>
      builder.byteLength + builder.measure([make(count)]) <= budget;

    const overhead = builder.measure([{ ...make(1), ids: [] }]);
    let count = Math.min(
      range.ids.length - 1,
      Math.floor((budget - builder.byteLength - overhead) / idSize),
    );

    while (count >= 1 && !fits(count)) {
      count--;
    }

    return count >= 1 ? { range: make(count), count } : null;
  }

  private pushRemainder(builder: MessageBuilder, from: Bound, lower: number) {
    const size = this.storage.size();

    builder.push({
      mode: "fingerprint",
      lowerBound: from,
      upperBound: INFINITY_BOUND,
      fingerprint: this.storage.fingerprint(lower, size),
    });
  }
}
