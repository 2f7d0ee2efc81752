/**
 * @fileoverview Histogram operations as free functions over any `MapLike`
 *   container, for callers that keep their counts in a plain `Map` (or any
 *   object exposing `get`, `set` and `entries`). Measures are not validated
 *   here: a bare container carries no measure kind.
 */
import { naturalOrder } from './labels';
import { countKind } from './measure';
import { pickMode, rankEntries, sumMeasures } from './reduce/rank';
import type { LabelComparator, MapLike, RankedEntry } from './types';

export function bump<K>(map: MapLike<K, number>, key: K, amount = 1): void {
  const current = map.get(key);
  map.set(key, current === undefined ? amount : current + amount);
}

export function count<K>(map: MapLike<K, number>, key: K): number {
  return map.get(key) ?? 0;
}

export function total<K>(map: MapLike<K, number>): number {
  return sumMeasures(map.entries(), countKind);
}

export function mode<K>(map: MapLike<K, number>): K | undefined {
  return pickMode(map.entries());
}

export function ranking<K>(
  map: MapLike<K, number>,
  compare: LabelComparator<K> = naturalOrder
): Array<RankedEntry<K>> {
  return rankEntries(map.entries(), compare);
}

export function collectInto<K, M extends MapLike<K, number>>(keys: Iterable<K>, map: M): M {
  for (const key of keys) {
    bump(map, key);
  }
  return map;
}

export function collectWeightedInto<K, M extends MapLike<K, number>>(
  pairs: Iterable<readonly [K, number]>,
  map: M
): M {
  for (const [key, amount] of pairs) {
    bump(map, key, amount);
  }
  return map;
}
