import type { MeasureKindName } from './types';

/**
 * Arithmetic for one kind of measure. A histogram holds exactly one kind for
 * its whole life; the two kinds share every operation except validation.
 */
export interface MeasureKind {
  readonly name: MeasureKindName;
  /** Measure of an absent label, and the total of an empty histogram. */
  readonly zero: number;
  /** Amount used by `increment` when none is given. */
  readonly unit: number;
  add(measure: number, amount: number): number;
  accepts(amount: number): boolean;
}

export const countKind: MeasureKind = {
  name: 'count',
  zero: 0,
  unit: 1,
  add: (measure, amount) => measure + amount,
  accepts: (amount) => Number.isSafeInteger(amount) && amount >= 0
};

export const weightKind: MeasureKind = {
  name: 'weight',
  zero: 0,
  unit: 1,
  add: (measure, amount) => measure + amount,
  accepts: (amount) => Number.isFinite(amount) && amount >= 0
};

export function measureKind(name: MeasureKindName): MeasureKind {
  switch (name) {
    case 'count':
      return countKind;
    case 'weight':
      return weightKind;
    default: {
      const unknown: never = name;
      throw new Error(`Unknown measure kind: ${String(unknown)}`);
    }
  }
}

export function describeRejection(kind: MeasureKind, amount: number): string {
  return kind.name === 'count'
    ? `Count increments must be non-negative safe integers; received ${amount}.`
    : `Weight increments must be finite and non-negative; received ${amount}.`;
}

export function describeOverflow(kind: MeasureKind, current: number, amount: number): string {
  return kind.name === 'count'
    ? `Adding ${amount} to a count of ${current} exceeds Number.MAX_SAFE_INTEGER.`
    : `Adding ${amount} to a weight of ${current} overflows to Infinity.`;
}
