import type { Bucket, BucketBounds, Snapshot } from "./schema";

export function isBucketComplete(bounds: BucketBounds, now: number): boolean {
  return bounds.includesEnd ? bounds.endTime < now : bounds.endTime <= now;
}

// Index of the first snapshot past `time` (at or past it when `inclusive` is false).
function searchAfter(snapshots: readonly Snapshot[], time: number, inclusive: boolean): number {
  let low = 0;
  let high = snapshots.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const value = snapshots[mid].monotonicTime;
    const before = inclusive ? value <= time : value < time;
    if (before) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/** Latest snapshot inside the bucket's span, or null when none falls there. */
export function findRepresentative(
  bounds: BucketBounds,
  snapshots: readonly Snapshot[],
): Snapshot | null {
  const index = searchAfter(snapshots, bounds.endTime, bounds.includesEnd) - 1;
  if (index < 0) {
    return null;
  }
  const candidate = snapshots[index];
  return candidate.monotonicTime >= bounds.startTime ? candidate : null;
}

export function reduceBuckets(
  bounds: readonly BucketBounds[],
  snapshots: readonly Snapshot[],
  now: number,
): Bucket[] {
  return bounds.map((entry) => {
    const representative = findRepresentative(entry, snapshots);
    return {
      startTime: entry.startTime,
      endTime: entry.endTime,
      includesEnd: entry.includesEnd,
      representative,
      isEmpty: representative === null,
      isComplete: isBucketComplete(entry, now),
    };
  });
}
