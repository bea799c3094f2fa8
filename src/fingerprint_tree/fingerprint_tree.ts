import { combineMonoid, type LiftingMonoid, sizeMonoid } from "../lifting_monoid.ts";

/** Lifted type of a subtree, and the number of values in it. */
type CombinedLabel<L> = [L, number];

/** A node for a FingerprintTree, augmented with a label and lifted value. */
export class FingerprintNode<ValueType, LiftType> {
  left: FingerprintNode<ValueType, LiftType> | null = null;
  right: FingerprintNode<ValueType, LiftType> | null = null;

  label: LiftType;
  liftedValue: LiftType;

  constructor(
    readonly value: ValueType,
    private monoid: LiftingMonoid<ValueType, LiftType>,
  ) {
    this.liftedValue = monoid.lift(value);
    this.label = this.liftedValue;
  }

  updateLabel() {
    if (this.left !== null && this.right === null) {
      this.label = this.monoid.combine(this.left.label, this.liftedValue);
    } else if (this.left === null && this.right !== null) {
      this.label = this.monoid.combine(this.liftedValue, this.right.label);
    } else if (this.left && this.right) {
      this.label = this.monoid.combine(
        this.left.label,
        this.monoid.combine(this.liftedValue, this.right.label),
      );
    } else {
      this.label = this.liftedValue;
    }
  }
}

type NodeType<V, L> = FingerprintNode<V, CombinedLabel<L>>;

/**
 * A perfectly balanced tree built once from sorted values. Every node is
 * labelled with the combination of all lifted values beneath it, so the
 * aggregate of any index range is found in logarithmic time.
 */
export class FingerprintTree<ValueType, LiftedType> {
  private root: NodeType<ValueType, LiftedType> | null;

  readonly monoid: LiftingMonoid<ValueType, CombinedLabel<LiftedType>>;

  constructor(
    /** The lifting monoid which is used to label nodes and derive fingerprints from ranges. */
    monoid: LiftingMonoid<ValueType, LiftedType>,
    compare: (a: ValueType, b: ValueType) => number,
    values: ValueType[],
  ) {
    for (let i = 1; i < values.length; i++) {
      if (compare(values[i - 1], values[i]) >= 0) {
        throw new RangeError("Values must be strictly ascending");
      }
    }

    this.monoid = combineMonoid<ValueType, LiftedType, number>(
      monoid,
      sizeMonoid,
    );
    this.root = this.build(values, 0, values.length);
  }

  private build(
    values: ValueType[],
    begin: number,
    end: number,
  ): NodeType<ValueType, LiftedType> | null {
    if (begin >= end) {
      return null;
    }

    const mid = begin + Math.floor((end - begin) / 2);
    const node = new FingerprintNode(values[mid], this.monoid);

    node.left = this.build(values, begin, mid);
    node.right = this.build(values, mid + 1, end);
    node.updateLabel();

    return node;
  }

  get size(): number {
    return this.root ? this.root.label[1] : 0;
  }

  /** The value at a position in sorted order. */
  valueAt(index: number): ValueType {
    let node = this.root;
    let offset = index;

    while (node) {
      const leftSize = node.left ? node.left.label[1] : 0;

      if (offset < leftSize) {
        node = node.left;
      } else if (offset === leftSize) {
        return node.value;
      } else {
        offset -= leftSize + 1;
        node = node.right;
      }
    }

    throw new RangeError(`No value at index ${index}`);
  }

  /** The number of values for which `isBelow` holds. Values must be partitioned by it. */
  countBelow(isBelow: (value: ValueType) => boolean): number {
    let node = this.root;
    let count = 0;

    while (node) {
      if (isBelow(node.value)) {
        count += (node.left ? node.left.label[1] : 0) + 1;
        node = node.right;
      } else {
        node = node.left;
      }
    }

    return count;
  }

  /** Combines the lifted values of every value in [begin, end). */
  aggregate(begin: number, end: number): LiftedType {
    return this.aggregateNode(this.root, 0, begin, end)[0];
  }

  private aggregateNode(
    node: NodeType<ValueType, LiftedType> | null,
    offset: number,
    begin: number,
    end: number,
  ): CombinedLabel<LiftedType> {
    if (node === null) {
      return this.monoid.neutral;
    }

    const nodeStart = offset;
    const nodeEnd = offset + node.label[1];

    if (end <= nodeStart || begin >= nodeEnd) {
      return this.monoid.neutral;
    }

    if (begin <= nodeStart && nodeEnd <= end) {
      return node.label;
    }

    const leftSize = node.left ? node.left.label[1] : 0;
    const index = offset + leftSize;

    const leftLabel = this.aggregateNode(node.left, offset, begin, end);
    const ownLabel = begin <= index && index < end
      ? node.liftedValue
      : this.monoid.neutral;
    const rightLabel = this.aggregateNode(node.right, index + 1, begin, end);

    return this.monoid.combine(
      leftLabel,
      this.monoid.combine(ownLabel, rightLabel),
    );
  }
}
