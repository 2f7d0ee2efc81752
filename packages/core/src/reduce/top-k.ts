import { BinaryHeap } from './heap';
import { entryOrder, type Entry } from './rank';
import type { LabelComparator, RankedEntry } from '../types';

export function assertValidK(k: number): void {
  if (!Number.isSafeInteger(k) || k < 0) {
    throw new RangeError(`k must be a non-negative integer; received ${k}.`);
  }
}

/**
 * Selects the `k` highest entries (descending, matching the ranking order) or,
 * with `isBottom`, the `k` lowest (ascending).
 */
export function computeTopK<L>(
  entries: Iterable<Entry<L>>,
  k: number,
  compareLabels: LabelComparator<L>,
  isBottom: boolean = false
): Array<RankedEntry<L>> {
  assertValidK(k);

  // Use min-heap for top-k, max-heap for bottom-k
  const heap = new BinaryHeap<Entry<L>>(k, entryOrder(compareLabels), !isBottom);

  // Single pass - O(N log k)
  for (const entry of entries) {
    heap.insert(entry);
  }

  return heap.extract().map(([key, value]) => ({ key, value }));
}
