import { assert, expect, test } from "vitest";
import { INFINITY_BOUND, MIN_BOUND } from "../bound.ts";
import { InvalidStateError } from "../errors.ts";
import type { Bound, RangeDescriptor } from "../types.ts";
import { MessageBuilder } from "./message_builder.ts";
import { encodeMessage } from "./message_codec.ts";

const ID_SIZE = 8;

function bound(timestamp: bigint): Bound {
  return { timestamp, idPrefix: new Uint8Array(0) };
}

test("Only skips make an empty message", () => {
  const builder = new MessageBuilder(ID_SIZE);

  builder.skip(MIN_BOUND, bound(5n));
  builder.skip(bound(5n), INFINITY_BOUND);

  const { message, bytes } = builder.finish();

  assert.deepEqual(message, []);
  assert.equal(bytes.length, 0);
});

test("Merges adjacent skips and closes with a skip to infinity", () => {
  const builder = new MessageBuilder(ID_SIZE);
  const idList: RangeDescriptor = {
    mode: "idList",
    lowerBound: bound(20n),
    upperBound: bound(30n),
    ids: [new Uint8Array(ID_SIZE).fill(1)],
  };

  builder.skip(MIN_BOUND, bound(10n));
  builder.push({ mode: "skip", lowerBound: bound(10n), upperBound: bound(20n) });
  builder.push(idList);

  const { message, bytes } = builder.finish();

  assert.deepEqual(message, [
    { mode: "skip", lowerBound: MIN_BOUND, upperBound: bound(20n) },
    idList,
    { mode: "skip", lowerBound: bound(30n), upperBound: INFINITY_BOUND },
  ]);
  assert.deepEqual(bytes, encodeMessage(message, ID_SIZE));
});

test("Measures what a push would add", () => {
  const builder = new MessageBuilder(ID_SIZE);
  const fingerprint: RangeDescriptor = {
    mode: "fingerprint",
    lowerBound: bound(300n),
    upperBound: INFINITY_BOUND,
    fingerprint: new Uint8Array(16),
  };

  builder.skip(MIN_BOUND, bound(300n));

  assert.equal(builder.byteLength, 0);

  // The pending skip: delta 301 (2 bytes), prefix length, mode.
  // The fingerprint: delta, prefix length, mode, 16 bytes.
  const expected = 4 + 19;

  assert.equal(builder.measure([fingerprint]), expected);

  builder.push(fingerprint);

  assert.equal(builder.byteLength, expected);
});

test("Refuses ranges which leave a gap", () => {
  const builder = new MessageBuilder(ID_SIZE);

  builder.skip(MIN_BOUND, bound(10n));

  expect(() => builder.skip(bound(11n), INFINITY_BOUND)).toThrow(
    InvalidStateError,
  );
});
