/**
 * Natural ordering for label values, used to break ranking ties.
 *
 * Numbers, bigints, strings, booleans and dates compare with their own kind.
 * Arrays compare element-wise, then by length, so tuple labels order the way
 * their components do. Anything else, including values of mixed kinds, has no
 * natural order and compares as equal.
 */
export function naturalOrder(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return compareScalars(a, b);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return compareScalars(a, b);
  }
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return compareScalars(a, b);
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return compareScalars(Number(a), Number(b));
  }
  if (a instanceof Date && b instanceof Date) {
    return compareScalars(a.getTime(), b.getTime());
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return compareSequences(a, b);
  }
  return 0;
}

function compareScalars<T extends number | string | bigint>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareSequences(a: readonly unknown[], b: readonly unknown[]): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const order = naturalOrder(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}
