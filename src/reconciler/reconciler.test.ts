import { bytesToHex } from "@noble/hashes/utils";
import { assert, expect, test } from "vitest";
import { INFINITY_BOUND } from "../bound.ts";
import { decodeMessage } from "../codec/message_codec.ts";
import {
  AlreadyConvergedError,
  InvalidConfigError,
  InvalidStateError,
  ProtocolError,
} from "../errors.ts";
import { createLogger, type LogEntry } from "../logger.ts";
import { StorageTree } from "../storage/storage_tree.ts";
import { StorageVector } from "../storage/storage_vector.ts";
import { filledId, fillStore, idFromNumber } from "../test_util.ts";
import { Reconciler } from "./reconciler.ts";
import { parseReconcilerConfig } from "./reconciler_config.ts";

function hex(ids: Uint8Array[]): string[] {
  return ids.map((id) => bytesToHex(id)).sort();
}

function sequentialStore(count: number) {
  const items: [number, Uint8Array][] = [];

  for (let n = 1; n <= count; n++) {
    items.push([n, idFromNumber(n)]);
  }

  return fillStore(new StorageVector(), items);
}

function capture(entries: LogEntry[]) {
  return createLogger({
    level: "debug",
    context: "Reconciler",
    enabled: true,
    handler: (entry) => entries.push(entry),
  });
}

test("Small sets are exchanged as id lists", () => {
  const x = new Reconciler(
    fillStore(new StorageVector(), [[0, filledId(0xaa)], [1, filledId(0xbb)]]),
  );
  const y = new Reconciler(
    fillStore(new StorageTree(), [
      [0, filledId(0xaa)],
      [2, filledId(0xcc)],
      [3, filledId(0x11)],
      [5, filledId(0x22)],
      [10, filledId(0x33)],
    ]),
  );

  const opening = x.initiate();

  assert.equal(opening.length, 68);
  assert.deepEqual(opening.slice(0, 4), new Uint8Array([0, 0, 2, 2]));
  assert.deepEqual(opening.slice(4, 36), filledId(0xaa));
  assert.deepEqual(opening.slice(36), filledId(0xbb));
  assert.equal(x.status, "awaitingPeer");
  assert.equal(x.role, "initiator");

  const reply = y.reconcileWithIds(opening);

  assert.equal(reply.message.length, 164);
  assert.deepEqual(reply.message.slice(0, 4), new Uint8Array([0, 0, 2, 5]));
  assert.deepEqual(hex(reply.haveIds), hex([
    filledId(0xcc),
    filledId(0x11),
    filledId(0x22),
    filledId(0x33),
  ]));
  assert.deepEqual(hex(reply.needIds), hex([filledId(0xbb)]));
  assert.equal(y.status, "responding");
  assert.equal(y.role, "responder");

  const last = x.reconcileWithIds(reply.message);

  assert.equal(last.message.length, 0);
  assert.deepEqual(hex(last.haveIds), hex([filledId(0xbb)]));
  assert.deepEqual(
    hex(last.needIds),
    hex([filledId(0xcc), filledId(0x11), filledId(0x22), filledId(0x33)]),
  );
  assert.equal(x.isConverged, true);

  const closing = y.reconcileWithIds(last.message);

  assert.equal(closing.message.length, 0);
  assert.deepEqual(closing.haveIds, []);
  assert.deepEqual(closing.needIds, []);
  assert.equal(y.isConverged, true);
});

test("Two empty stores converge after one reply", () => {
  const a = new Reconciler(fillStore(new StorageVector(), []));
  const b = new Reconciler(fillStore(new StorageTree(), []));

  const opening = a.initiate();

  assert.deepEqual(opening, new Uint8Array([0, 0, 2, 0]));
  assert.equal(b.reconcile(opening).length, 0);
  assert.equal(b.isConverged, true);
  assert.equal(a.reconcile(new Uint8Array(0)).length, 0);
  assert.equal(a.isConverged, true);
});

test("Identical stores agree on the first fingerprints", () => {
  const a = new Reconciler(sequentialStore(100));
  const b = new Reconciler(sequentialStore(100));

  const opening = a.initiate();

  // 16 fingerprint ranges: a bound, a mode byte and 16 bytes each.
  assert.isAbove(opening.length, 16 * 18);

  const reply = b.reconcileWithIds(opening);

  assert.equal(reply.message.length, 0);
  assert.deepEqual(reply.haveIds, []);
  assert.deepEqual(reply.needIds, []);
});

test("Matching id lists are confirmed per timestamp", () => {
  const a = new Reconciler(sequentialStore(3));
  const b = new Reconciler(sequentialStore(3));

  const reply = b.reconcileWithIds(a.initiate());
  const ranges = decodeMessage(reply.message, 32);

  // Gaps before 1 and after 3, and one range for each of 1, 2 and 3.
  assert.deepEqual(ranges.map((range) => range.mode), [
    "fingerprint",
    "fingerprint",
    "fingerprint",
    "fingerprint",
    "fingerprint",
  ]);
  assert.deepEqual(ranges.map((range) => range.upperBound.timestamp), [
    1n,
    2n,
    3n,
    4n,
    INFINITY_BOUND.timestamp,
  ]);
  assert.deepEqual(reply.haveIds, []);
  assert.deepEqual(reply.needIds, []);

  const last = a.reconcileWithIds(reply.message);

  assert.equal(last.message.length, 0);
  assert.deepEqual(last.haveIds, []);
  assert.deepEqual(last.needIds, []);
});

test("An empty store learns everything its peer has", () => {
  const a = new Reconciler(fillStore(new StorageVector(), []));
  const b = new Reconciler(sequentialStore(50));

  const reply = b.reconcileWithIds(a.initiate());

  assert.equal(reply.haveIds.length, 50);
  assert.deepEqual(reply.needIds, []);

  const last = a.reconcileWithIds(reply.message);

  assert.equal(last.message.length, 0);
  assert.equal(last.needIds.length, 50);
  assert.deepEqual(last.haveIds, []);
});

test("Stays within the frame size limit", () => {
  const entries: LogEntry[] = [];
  const a = new Reconciler(sequentialStore(400), {
    frameSizeLimit: 4096,
    logger: capture(entries),
  });
  const b = new Reconciler(fillStore(new StorageVector(), []), {
    frameSizeLimit: 4096,
  });

  const have = new Set<string>();
  const need = new Set<string>();

  let message = a.initiate();
  let rounds = 0;

  while (message.length > 0 && rounds < 20) {
    const reply = b.reconcileWithIds(message);

    for (const id of reply.needIds) {
      need.add(bytesToHex(id));
    }

    assert.isAtMost(reply.message.length, 4096);

    const next = a.reconcileWithIds(reply.message);

    for (const id of next.haveIds) {
      have.add(bytesToHex(id));
    }

    assert.isAtMost(next.message.length, 4096);

    message = next.message;
    rounds++;
  }

  assert.equal(a.isConverged, true);
  assert.isAbove(rounds, 1);
  assert.equal(have.size, 400);
  assert.equal(need.size, 400);
  assert.isTrue(
    entries.some((entry) =>
      entry.level === "warn" &&
      entry.message === "Frame size limit reached, deferring the rest"
    ),
  );
});

test("Rejects misuse of a session", () => {
  const unsealed = new StorageVector();

  expect(() => new Reconciler(unsealed)).toThrow(InvalidStateError);
  expect(() => new Reconciler(fillStore(new StorageVector(8), []))).toThrow(
    InvalidStateError,
  );

  const a = new Reconciler(sequentialStore(100));
  const b = new Reconciler(sequentialStore(100));

  assert.equal(a.status, "initial");
  assert.equal(a.role, null);

  const opening = a.initiate();

  expect(() => a.initiate()).toThrow(InvalidStateError);

  assert.equal(b.reconcile(opening).length, 0);
  assert.equal(b.role, "responder");
  expect(() => b.initiate()).toThrow(InvalidStateError);
  expect(() => b.reconcile(opening)).toThrow(AlreadyConvergedError);
  assert.equal(b.reconcile(new Uint8Array(0)).length, 0);

  const after = b.reconcileWithIds(new Uint8Array(0));

  assert.equal(after.message.length, 0);
});

test("A malformed message fails the session", () => {
  const entries: LogEntry[] = [];
  const session = new Reconciler(sequentialStore(3), {
    logger: capture(entries),
  });

  expect(() => session.reconcile(new Uint8Array([0x00, 0x00, 0x03]))).toThrow(
    ProtocolError,
  );
  assert.equal(session.status, "failed");
  assert.equal(session.role, "responder");
  expect(() => session.reconcile(new Uint8Array([0, 0, 2, 0]))).toThrow(
    InvalidStateError,
  );

  const logged = entries.find((entry) => entry.level === "error");

  assert.equal(logged?.message, "Rejected malformed message");
  assert.instanceOf(logged?.error, ProtocolError);
  assert.equal(logged?.context, "Reconciler");
});

test("Config defaults and validation", () => {
  assert.deepEqual(parseReconcilerConfig(), {
    idSize: 32,
    buckets: 16,
    idListThreshold: 32,
    frameSizeLimit: 0,
  });

  const invalid = [
    { buckets: 1 },
    { idListThreshold: 0 },
    { idSize: 4 },
    { idSize: 33 },
    { frameSizeLimit: 100 },
    { buckets: 2.5 },
  ];

  for (const input of invalid) {
    expect(() => parseReconcilerConfig(input), JSON.stringify(input)).toThrow(
      InvalidConfigError,
    );
  }

  expect(() => new Reconciler(sequentialStore(1), { buckets: 1 })).toThrow(
    InvalidConfigError,
  );

  try {
    parseReconcilerConfig({ buckets: 1 });
  } catch (err) {
    expect(err).toBeInstanceOf(InvalidConfigError);
    expect(err).toHaveProperty("issues", [
      "buckets: Number must be greater than or equal to 2",
    ]);
  }
});
