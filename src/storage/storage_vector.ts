import { bytesToHex } from "@noble/hashes/utils";
import { Accumulator } from "../accumulator/accumulator.ts";
import { compareItems, compareItemToBound } from "../bound.ts";
import {
  AlreadySealedError,
  DuplicateItemError,
  InvalidStateError,
} from "../errors.ts";
import type { Bound, Item } from "../types.ts";
import {
  checkIdSize,
  checkIndex,
  checkRange,
  DEFAULT_ID_SIZE,
  itemKey,
  makeItem,
  type Storage,
} from "./storage.ts";

/** The reference store: a plain array, sorted once on seal. */
export class StorageVector implements Storage {
  readonly idSize: number;

  private items: Item[] = [];
  private keys = new Set<string>();
  private isSealed = false;

  constructor(idSize: number = DEFAULT_ID_SIZE) {
    checkIdSize(idSize);
    this.idSize = idSize;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  insert(timestamp: number | bigint, id: Uint8Array) {
    if (this.isSealed) {
      throw new InvalidStateError("Cannot insert into a sealed store");
    }

    const item = makeItem(timestamp, id, this.idSize);
    const key = itemKey(item);

    if (this.keys.has(key)) {
      throw new DuplicateItemError(item.timestamp, bytesToHex(item.id));
    }

    this.keys.add(key);
    this.items.push(item);
  }

  seal() {
    if (this.isSealed) {
      throw new AlreadySealedError();
    }

    this.items.sort(compareItems);
    this.keys.clear();
    this.isSealed = true;
  }

  private checkSealed() {
    if (!this.isSealed) {
      throw new InvalidStateError("Store is not sealed");
    }
  }

  size(): number {
    this.checkSealed();

    return this.items.length;
  }

  itemAt(index: number): Item {
    this.checkSealed();
    checkIndex(index, this.items.length);

    return this.items[index];
  }

  iterate(
    begin: number,
    end: number,
    cb: (item: Item, index: number) => boolean | void,
  ) {
    this.checkSealed();
    checkRange(begin, end, this.items.length);

    for (let i = begin; i < end; i++) {
      if (cb(this.items[i], i) === false) {
        break;
      }
    }
  }

  findLowerBound(begin: number, end: number, bound: Bound): number {
    this.checkSealed();
    checkRange(begin, end, this.items.length);

    let low = begin;
    let high = end;

    while (low < high) {
      const mid = low + Math.floor((high - low) / 2);

      if (compareItemToBound(this.items[mid], bound) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return low;
  }

  fingerprint(begin: number, end: number): Uint8Array {
    this.checkSealed();
    checkRange(begin, end, this.items.length);

    const acc = new Accumulator();

    for (let i = begin; i < end; i++) {
      acc.addItem(this.items[i]);
    }

    return acc.getFingerprint(end - begin);
  }
}
