import type { MeasureKind } from '../measure';
import type { LabelComparator, RankedEntry } from '../types';

export type Entry<L> = readonly [label: L, measure: number];

/** Orders entries by measure, then by label. */
export function entryOrder<L>(compareLabels: LabelComparator<L>) {
  return (a: Entry<L>, b: Entry<L>): number => a[1] - b[1] || compareLabels(a[0], b[0]);
}

export function sumMeasures<L>(entries: Iterable<Entry<L>>, kind: MeasureKind): number {
  let total = kind.zero;
  for (const [, measure] of entries) {
    total = kind.add(total, measure);
  }
  return total;
}

/**
 * Returns the label of the last entry holding the maximum measure, in the
 * iteration order of `entries`.
 */
export function pickMode<L>(entries: Iterable<Entry<L>>): L | undefined {
  let best: Entry<L> | undefined;
  for (const entry of entries) {
    if (best === undefined || entry[1] >= best[1]) {
      best = entry;
    }
  }
  return best?.[0];
}

/**
 * Sorts `(measure, label)` ascending and reverses the result: descending by
 * measure, and among equal measures the later label first.
 */
export function rankEntries<L>(
  entries: Iterable<Entry<L>>,
  compareLabels: LabelComparator<L>
): Array<RankedEntry<L>> {
  const sorted = Array.from(entries).sort(entryOrder(compareLabels));
  sorted.reverse();
  return sorted.map(([key, value]) => ({ key, value }));
}
