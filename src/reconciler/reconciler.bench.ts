import { bench, describe } from "vitest";
import { StorageTree } from "../storage/storage_tree.ts";
import { StorageVector } from "../storage/storage_vector.ts";
import { fillStore, idFromNumber, makeSets, seededRandom } from "../test_util.ts";
import { runExchange } from "../util.ts";
import { Reconciler } from "./reconciler.ts";

const sizes = [1000, 10000];

for (const size of sizes) {
  const { shared, onlyA, onlyB } = makeSets(seededRandom(size), size, 0.02);

  const itemsA = [...shared, ...onlyA].map((n): [number, Uint8Array] => [
    n,
    idFromNumber(n),
  ]);
  const itemsB = [...shared, ...onlyB].map((n): [number, Uint8Array] => [
    n,
    idFromNumber(n),
  ]);

  const vectorA = fillStore(new StorageVector(), itemsA);
  const vectorB = fillStore(new StorageVector(), itemsB);
  const treeA = fillStore(new StorageTree(), itemsA);
  const treeB = fillStore(new StorageTree(), itemsB);

  describe(`reconcile (${size} items)`, () => {
    bench("StorageVector", () => {
      runExchange(new Reconciler(vectorA), new Reconciler(vectorB));
    });

    bench("StorageTree", () => {
      runExchange(new Reconciler(treeA), new Reconciler(treeB));
    });
  });

  describe(`seal (${size} items)`, () => {
    bench("StorageVector", () => {
      fillStore(new StorageVector(), itemsA);
    });

    bench("StorageTree", () => {
      fillStore(new StorageTree(), itemsA);
    });
  });
}
