/** A sort key; tuples compare element by element. */
export type SortKey = string | number | readonly (string | number)[];

/**
 * Sort an array by a key function. Returns a new array; equal keys keep
 * their input order.
 */
export function sortBy<T>(arr: readonly T[], keyFn: (item: T) => SortKey): T[] {
  return [...arr].sort((a, b) => compareKeys(keyFn(a), keyFn(b)));
}

function compareKeys(a: SortKey, b: SortKey): number {
  const left = typeof a === 'object' ? a : [a];
  const right = typeof b === 'object' ? b : [b];
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const ka = left[i];
    const kb = right[i];
    if (ka === undefined || kb === undefined || ka === kb) continue;
    if (typeof ka === 'number' && typeof kb === 'number') return ka - kb;
    return String(ka) < String(kb) ? -1 : 1;
  }
  return left.length - right.length;
}
