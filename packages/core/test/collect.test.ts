import { describe, expect, it } from 'vitest';

import { collectFrom, collectFromWeighted } from '../src/collect';
import { Histogram } from '../src/histogram';

describe('collectFrom', () => {
  it('counts a sequence into a fresh histogram', () => {
    const values = [100, 200, -100, 200, 300, 200, 100, 200, 100, 300];
    const hist = collectFrom(values);

    expect(hist.kind.name).toBe('count');
    expect(hist.total()).toBe(values.length);
    expect(hist.toMap()).toEqual(
      new Map([
        [100, 3],
        [200, 4],
        [-100, 1],
        [300, 2]
      ])
    );
    expect(hist.lookup(400)).toBe(0);
  });

  it('folds into a pre-populated histogram', () => {
    const into = new Histogram<string>().increment('a', 10);
    const hist = collectFrom('abacb', into);

    expect(hist).toBe(into);
    expect(hist.lookup('a')).toBe(12);
    expect(hist.lookup('b')).toBe(2);
    expect(hist.lookup('c')).toBe(1);
    expect(hist.ranking()).toEqual(['a', 'b', 'c']);
  });
});

describe('collectFromWeighted', () => {
  it('sums weights per label', () => {
    const hist = collectFromWeighted<number>([
      [1, 0.4],
      [2, 0.4],
      [1, 1.6],
      [3, 0.8]
    ]);

    expect(hist.kind.name).toBe('weight');
    expect(hist.lookup(1)).toBe(2);
    expect(hist.lookup(2)).toBe(0.4);
    expect(hist.lookup(3)).toBe(0.8);
    expect(hist.total()).toBeCloseTo(3.2);
    expect(hist.mode()).toBe(1);
    expect(hist.rankedEntries()).toEqual([
      { key: 1, value: 2 },
      { key: 3, value: 0.8 },
      { key: 2, value: 0.4 }
    ]);
  });

  it('folds weighted counts into a count histogram', () => {
    const hist = collectFromWeighted(
      [
        ['a', 2],
        ['b', 3],
        ['a', 4]
      ],
      new Histogram<string>()
    );
    expect(hist.lookup('a')).toBe(6);
    expect(hist.total()).toBe(9);
  });

  it('leaves the histogram untouched when any pair is rejected', () => {
    const hist = new Histogram<string>({ kind: 'weight' });
    expect(() =>
      collectFromWeighted(
        [
          ['a', 1.2],
          ['b', -1],
          ['c', 0.5]
        ],
        hist
      )
    ).toThrow(RangeError);
    expect(hist.has('a')).toBe(false);
    expect(hist.has('b')).toBe(false);
    expect(hist.has('c')).toBe(false);
    expect(hist.size).toBe(0);
  });

  it('rejects a fold whose running count would leave the safe range', () => {
    const hist = new Histogram<string>().increment('a', Number.MAX_SAFE_INTEGER - 1);
    expect(() => collectFrom(['b', 'a', 'a'], hist)).toThrow(RangeError);
    expect(hist.lookup('a')).toBe(Number.MAX_SAFE_INTEGER - 1);
    expect(hist.has('b')).toBe(false);
  });
});
