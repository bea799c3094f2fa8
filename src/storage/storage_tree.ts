import { bytesToHex } from "@noble/hashes/utils";
import { OrderedSet } from "js-sdsl";
import {
  type Accumulator,
  accumulatorMonoid,
} from "../accumulator/accumulator.ts";
import { compareItems, compareItemToBound } from "../bound.ts";
import {
  AlreadySealedError,
  DuplicateItemError,
  InvalidStateError,
} from "../errors.ts";
import { FingerprintTree } from "../fingerprint_tree/fingerprint_tree.ts";
import type { Bound, Item } from "../types.ts";
import {
  checkIdSize,
  checkIndex,
  checkRange,
  DEFAULT_ID_SIZE,
  makeItem,
  type Storage,
} from "./storage.ts";

/**
 * A store which keeps items ordered as they are inserted, then freezes them
 * into a labelled tree. Fingerprints of any range cost O(log n) once sealed.
 */
export class StorageTree implements Storage {
  readonly idSize: number;

  private pending = new OrderedSet<Item>([], compareItems);
  private tree: FingerprintTree<Item, Accumulator> | null = null;

  constructor(idSize: number = DEFAULT_ID_SIZE) {
    checkIdSize(idSize);
    this.idSize = idSize;
  }

  get sealed(): boolean {
    return this.tree !== null;
  }

  insert(timestamp: number | bigint, id: Uint8Array) {
    if (this.tree) {
      throw new InvalidStateError("Cannot insert into a sealed store");
    }

    const item = makeItem(timestamp, id, this.idSize);

    if (!this.pending.find(item).equals(this.pending.end())) {
      throw new DuplicateItemError(item.timestamp, bytesToHex(item.id));
    }

    this.pending.insert(item);
  }

  seal() {
    if (this.tree) {
      throw new AlreadySealedError();
    }

    this.tree = new FingerprintTree(
      accumulatorMonoid,
      compareItems,
      Array.from(this.pending),
    );
    this.pending.clear();
  }

  private sealedTree(): FingerprintTree<Item, Accumulator> {
    if (!this.tree) {
      throw new InvalidStateError("Store is not sealed");
    }

    return this.tree;
  }

  size(): number {
    return this.sealedTree().size;
  }

  itemAt(index: number): Item {
    const tree = this.sealedTree();
    checkIndex(index, tree.size);

    return tree.valueAt(index);
  }

  iterate(
    begin: number,
    end: number,
    cb: (item: Item, index: number) => boolean | void,
  ) {
    const tree = this.sealedTree();
    checkRange(begin, end, tree.size);

    for (let i = begin; i < end; i++) {
      if (cb(tree.valueAt(i), i) === false) {
        break;
      }
    }
  }

  findLowerBound(begin: number, end: number, bound: Bound): number {
    const tree = this.sealedTree();
    checkRange(begin, end, tree.size);

    const index = tree.countBelow((item) => compareItemToBound(item, bound) < 0);

    return Math.min(Math.max(index, begin), end);
  }

  fingerprint(begin: number, end: number): Uint8Array {
    const tree = this.sealedTree();
    checkRange(begin, end, tree.size);

    return tree.aggregate(begin, end).getFingerprint(end - begin);
  }
}
