import { Histogram } from './histogram';
import type { HistogramOptions } from './types';

export { Histogram } from './histogram';
export { collectFrom, collectFromWeighted } from './collect';
export { naturalOrder } from './labels';
export { countKind, measureKind, weightKind, type MeasureKind } from './measure';
export { createLogger, Logger } from './utils/logger';
export * as maps from './maplike';
export type {
  HistogramHandle,
  HistogramOptions,
  LabelComparator,
  MapLike,
  MeasureKindName,
  RankedEntry
} from './types';

export function histogram<L>(options?: HistogramOptions<L>): Histogram<L> {
  return new Histogram<L>(options);
}

export function countHistogram<L>(options: Omit<HistogramOptions<L>, 'kind'> = {}): Histogram<L> {
  return new Histogram<L>({ ...options, kind: 'count' });
}

export function weightHistogram<L>(options: Omit<HistogramOptions<L>, 'kind'> = {}): Histogram<L> {
  return new Histogram<L>({ ...options, kind: 'weight' });
}
