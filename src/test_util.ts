import type { Storage } from "./storage/storage.ts";

/** A small deterministic PRNG (mulberry32), so randomised tests repeat exactly. */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;

  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);

    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** An id whose first four bytes hold `n` big-endian, the rest zero. */
export function idFromNumber(n: number, idSize = 32): Uint8Array {
  const id = new Uint8Array(idSize);
  new DataView(id.buffer).setUint32(0, n);

  return id;
}

/** An id made of one repeated byte. */
export function filledId(byte: number, idSize = 32): Uint8Array {
  return new Uint8Array(idSize).fill(byte);
}

export function fillStore(
  storage: Storage,
  items: Iterable<[number, Uint8Array]>,
): Storage {
  for (const [timestamp, id] of items) {
    storage.insert(timestamp, id);
  }

  storage.seal();

  return storage;
}

/** Splits numbers into three disjoint groups: shared, only on A, only on B. */
export function makeSets(
  random: () => number,
  size: number,
  divergence: number,
): { shared: number[]; onlyA: number[]; onlyB: number[] } {
  const shared: number[] = [];
  const onlyA: number[] = [];
  const onlyB: number[] = [];

  for (let n = 1; n <= size; n++) {
    const roll = random();

    if (roll < divergence / 2) {
      onlyA.push(n);
    } else if (roll < divergence) {
      onlyB.push(n);
    } else {
      shared.push(n);
    }
  }

  return { shared, onlyA, onlyB };
}
