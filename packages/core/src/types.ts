/**
 * @fileoverview Houses shared type definitions for histokit: histogram
 *   options, the ranked entry shape returned by ranking and top-k queries, the
 *   structural map contract used by the free-function operations, and the
 *   `HistogramHandle` surface implemented by `Histogram`.
 */

export type MeasureKindName = 'count' | 'weight';

/**
 * Orders two labels. Negative when `a` sorts first, positive when `b` does,
 * zero when they are equal or have no mutual order.
 */
export type LabelComparator<L> = (a: L, b: L) => number;

export type HistogramOptions<L> = {
  /** Measure kind; defaults to `'count'`. */
  kind?: MeasureKindName;
  /**
   * Maps a label to the value used for equality. Without it labels are
   * compared with `Map` key semantics, so two structurally equal objects are
   * distinct labels.
   */
  key?: (label: L) => unknown;
  /** Copies a label when it is first stored. */
  clone?: (label: L) => L;
  /** Secondary ordering for ranking ties; defaults to `naturalOrder`. */
  compare?: LabelComparator<L>;
  debug?: boolean;
};

export type RankedEntry<L> = {
  key: L;
  value: number;
};

/**
 * The structural subset of `Map` that the free-function operations need.
 * `Map` satisfies it directly; so does any wrapper exposing the same three
 * methods.
 */
export interface MapLike<K, V> {
  get(key: K): V | undefined;
  set(key: K, value: V): unknown;
  entries(): Iterable<[K, V]>;
}

export interface HistogramHandle<L> extends Iterable<[L, number]> {
  readonly size: number;

  increment(label: L, amount?: number): this;
  /** All-or-nothing batch of increments; returns the number of pairs applied. */
  incrementAll(pairs: Iterable<readonly [L, number]>): number;
  lookup(label: L): number;
  has(label: L): boolean;
  total(): number;

  /**
   * A label holding the maximum measure, or `undefined` when empty.
   *
   * Which label wins among equal maxima is not guaranteed.
   */
  mode(): L | undefined;

  /**
   * Every label by descending measure. Equal measures list the label that
   * sorts later first; labels without a natural order tie in unspecified
   * order.
   */
  ranking(): L[];
  rankedEntries(): Array<RankedEntry<L>>;

  top(k: number): Array<RankedEntry<L>>;
  bottom(k: number): Array<RankedEntry<L>>;

  allLabels(): Set<L>;
  entries(): IterableIterator<[L, number]>;
  toMap(): Map<L, number>;
}
