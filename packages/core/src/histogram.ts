import { naturalOrder } from './labels';
import { describeOverflow, describeRejection, measureKind, type MeasureKind } from './measure';
import { pickMode, rankEntries, sumMeasures } from './reduce/rank';
import { computeTopK } from './reduce/top-k';
import type { HistogramHandle, HistogramOptions, LabelComparator, RankedEntry } from './types';
import { createLogger, type Logger } from './utils/logger';

type Slot<L> = {
  label: L;
  measure: number;
};

const identity = <T>(value: T): T => value;

/**
 * Map-backed histogram from labels to a count or weight.
 *
 * Labels are only ever added: increments never remove or decrease a measure,
 * and a label incremented by zero is still present. Reads of absent labels
 * return the kind's zero.
 */
export class Histogram<L> implements HistogramHandle<L> {
  readonly kind: MeasureKind;

  private readonly slots = new Map<unknown, Slot<L>>();
  private readonly keyOf: (label: L) => unknown;
  private readonly cloneLabel: (label: L) => L;
  private readonly compareLabels: LabelComparator<L>;
  private readonly logger: Logger;

  constructor(options: HistogramOptions<L> = {}) {
    this.kind = measureKind(options.kind ?? 'count');
    this.keyOf = options.key ?? identity;
    this.cloneLabel = options.clone ?? identity;
    this.compareLabels = options.compare ?? naturalOrder;
    this.logger = createLogger(`histokit:${this.kind.name}`, options.debug);
    this.logger.log('created histogram', { keyed: options.key !== undefined });
  }

  get size(): number {
    return this.slots.size;
  }

  /**
   * Adds `amount` to the label's measure, inserting a clone of the label when
   * it is absent.
   *
   * @throws RangeError when the amount, or the measure it would produce, is
   *   outside the measure kind's domain; the histogram is left unchanged.
   */
  increment(label: L, amount: number = this.kind.unit): this {
    const key = this.keyOf(label);
    const slot = this.slots.get(key);
    const measure = this.nextMeasure(label, slot?.measure ?? this.kind.zero, amount);
    if (slot) {
      slot.measure = measure;
    } else {
      this.slots.set(key, { label: this.cloneLabel(label), measure });
    }
    return this;
  }

  /**
   * Applies every `(label, amount)` pair, or none of them: all amounts and
   * resulting measures are checked before the histogram changes.
   *
   * @returns the number of pairs applied
   */
  incrementAll(pairs: Iterable<readonly [L, number]>): number {
    const staged = new Map<unknown, Slot<L>>();
    let folded = 0;
    for (const [label, amount] of pairs) {
      const key = this.keyOf(label);
      const current = staged.get(key) ?? this.slots.get(key);
      const measure = this.nextMeasure(label, current?.measure ?? this.kind.zero, amount);
      staged.set(key, { label: current ? current.label : this.cloneLabel(label), measure });
      folded++;
    }

    for (const [key, slot] of staged) {
      this.slots.set(key, slot);
    }
    this.logger.log('folded batch', { folded, distinct: this.size });
    return folded;
  }

  lookup(label: L): number {
    return this.slots.get(this.keyOf(label))?.measure ?? this.kind.zero;
  }

  has(label: L): boolean {
    return this.slots.has(this.keyOf(label));
  }

  total(): number {
    return sumMeasures(this.entries(), this.kind);
  }

  mode(): L | undefined {
    return pickMode(this.entries());
  }

  ranking(): L[] {
    return this.rankedEntries().map((entry) => entry.key);
  }

  rankedEntries(): Array<RankedEntry<L>> {
    return rankEntries(this.entries(), this.compareLabels);
  }

  top(k: number): Array<RankedEntry<L>> {
    return computeTopK(this.entries(), k, this.compareLabels);
  }

  bottom(k: number): Array<RankedEntry<L>> {
    return computeTopK(this.entries(), k, this.compareLabels, true);
  }

  allLabels(): Set<L> {
    const labels = new Set<L>();
    for (const slot of this.slots.values()) {
      labels.add(slot.label);
    }
    return labels;
  }

  *entries(): IterableIterator<[L, number]> {
    for (const slot of this.slots.values()) {
      yield [slot.label, slot.measure];
    }
  }

  [Symbol.iterator](): IterableIterator<[L, number]> {
    return this.entries();
  }

  toMap(): Map<L, number> {
    return new Map(this.entries());
  }

  private nextMeasure(label: L, current: number, amount: number): number {
    if (!this.kind.accepts(amount)) {
      this.reject(label, amount, describeRejection(this.kind, amount));
    }
    const measure = this.kind.add(current, amount);
    if (!this.kind.accepts(measure)) {
      this.reject(label, amount, describeOverflow(this.kind, current, amount));
    }
    return measure;
  }

  private reject(label: L, amount: number, message: string): never {
    this.logger.log('rejected increment', { label, amount });
    throw new RangeError(message);
  }
}
