/**
 * Index of the first element of `sorted` that is greater than `target`, or
 * `sorted.length` if there is none. Equivalently, the number of elements
 * `<= target`.
 *
 * `sorted` must be in ascending order.
 */
export function upperBound(sorted: readonly number[], target: number): number {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (sorted[mid] <= target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

export function prefixSums(sorted: readonly number[]): number[] {
  const sums: number[] = new Array(sorted.length);
  let total = 0;
  for (let i = 0; i < sorted.length; i++) {
    total += sorted[i];
    sums[i] = total;
  }
  return sums;
}
