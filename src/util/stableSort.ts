/**
 * Sort arrays deterministically. Uses localeCompare with "en" for strings.
 */
export function sortStrings(arr: Iterable<string>): string[] {
  return [...arr].sort((a, b) => a.localeCompare(b, "en"));
}

/** Insert `value` into an ascending numeric array, keeping it sorted. */
export function insertSorted(arr: number[], value: number): void {
  let lo = 0;
  let hi = arr.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (arr[mid] < value) lo = mid + 1;
    else hi = mid;
  }
  arr.splice(lo, 0, value);
}
