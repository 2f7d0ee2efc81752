import { Histogram } from './histogram';

/**
 * Folds observed labels into `into` (a fresh count histogram by default),
 * incrementing each by the histogram's unit.
 */
export function collectFrom<L>(labels: Iterable<L>, into: Histogram<L> = new Histogram<L>()): Histogram<L> {
  into.incrementAll(withUnit(labels, into.kind.unit));
  return into;
}

/**
 * Folds `(label, amount)` pairs into `into` (a fresh weight histogram by
 * default). A rejected pair aborts the whole fold and leaves `into` as it was.
 */
export function collectFromWeighted<L>(
  pairs: Iterable<readonly [L, number]>,
  into: Histogram<L> = new Histogram<L>({ kind: 'weight' })
): Histogram<L> {
  into.incrementAll(pairs);
  return into;
}

function* withUnit<L>(labels: Iterable<L>, unit: number): Generator<readonly [L, number]> {
  for (const label of labels) {
    yield [label, unit];
  }
}
