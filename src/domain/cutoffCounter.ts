/**
 * Cutoff counting over ascending timestamp arrays.
 * Timestamps are epoch milliseconds, so every value is already UTC.
 */

/**
 * Rightmost insertion point for `cutoff`: every entry before the returned
 * index is <= cutoff, every entry from it onward is > cutoff.
 */
export function upperBound(sortedTimestamps: readonly number[], cutoff: number): number {
  let low = 0;
  let high = sortedTimestamps.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (sortedTimestamps[mid] <= cutoff) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Number of entries strictly greater than `cutoff`. Ties are not new.
 */
export function countAfter(sortedTimestamps: readonly number[], cutoff: number): number {
  return sortedTimestamps.length - upperBound(sortedTimestamps, cutoff);
}

/**
 * Number of entries in the half-open window (after, upTo].
 */
export function countInWindow(
  sortedTimestamps: readonly number[],
  after: number,
  upTo: number
): number {
  if (upTo <= after) {
    return 0;
  }
  return countAfter(sortedTimestamps, after) - countAfter(sortedTimestamps, upTo);
}

export interface FileCounts {
  totalFiles: number;
  historicalFiles: number;
  newFiles: number;
  /** Files modified after the capture time, left for the next pass */
  deferredFiles: number;
}

/**
 * Splits a snapshot into historical, new and deferred files around a cutoff
 * and the snapshot's capture time.
 */
export function splitAtCutoff(
  sortedTimestamps: readonly number[],
  cutoff: number,
  captureTime: number
): FileCounts {
  const totalFiles = sortedTimestamps.length;
  const deferredFiles = countAfter(sortedTimestamps, Math.max(cutoff, captureTime));
  const newFiles = countInWindow(sortedTimestamps, cutoff, captureTime);

  return {
    totalFiles,
    historicalFiles: totalFiles - newFiles - deferredFiles,
    newFiles,
    deferredFiles,
  };
}
