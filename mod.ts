/**
 * Tools for efficient reconciliation of sets of timestamped ids, using range-based set reconciliation: peers compare fingerprints of ranges of their sorted items, and narrow down on the ranges which differ.
 *
 * At the broadest level:
 * 1. For each set you wish to reconcile, fill a StorageVector or StorageTree with its items and seal it.
 * 2. Create a Reconciler for each sealed store.
 * 3. Call `initiate` on one Reconciler, then pass messages back and forth through `reconcile` until one side produces an empty message.
 *
 * Reconciliation can be conducted locally or over a network.
 * This library does not have any opinion on transport. Messages are plain byte arrays.
 *
 * @module
 */

export * from "./src/types.ts";
export * from "./src/bound.ts";
export * from "./src/errors.ts";
export * from "./src/logger.ts";
export * from "./src/lifting_monoid.ts";
export * from "./src/accumulator/accumulator.ts";
export * from "./src/codec/varint.ts";
export * from "./src/codec/message_codec.ts";
export * from "./src/codec/message_builder.ts";
export * from "./src/fingerprint_tree/fingerprint_tree.ts";
export * from "./src/storage/storage.ts";
export * from "./src/storage/storage_vector.ts";
export * from "./src/storage/storage_tree.ts";
export * from "./src/reconciler/reconciler_config.ts";
export * from "./src/reconciler/reconciler.ts";
export * from "./src/util.ts";
