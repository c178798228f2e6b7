import type { Bucket, BucketBounds, CellValue } from "./schema";
import { DEFAULT_COLUMN_COUNT } from "./interval-model";

export type ViewState = "live" | "scrolled";

export function maxScrollOffset(totalBuckets: number, columnCount: number): number {
  return Math.max(0, totalBuckets - columnCount);
}

function clampOffset(offset: number, totalBuckets: number, columnCount: number): number {
  const normalized = Number.isFinite(offset) ? Math.floor(offset) : 0;
  return Math.min(Math.max(0, normalized), maxScrollOffset(totalBuckets, columnCount));
}

/**
 * The `columnCount` buckets ending `scrollOffset` buckets before the live
 * edge. Out-of-range offsets clamp instead of throwing.
 */
export function visibleBuckets<T>(
  allBuckets: readonly T[],
  scrollOffset: number,
  columnCount: number,
): T[] {
  const count = Math.max(0, Math.floor(columnCount));
  const offset = clampOffset(scrollOffset, allBuckets.length, count);
  const end = allBuckets.length - offset;
  const start = Math.max(0, end - count);
  return allBuckets.slice(start, end);
}

export function columnValue(
  bucket: Bucket,
  previousBucket: Bucket | null,
  fieldName: string,
  deltaMode: boolean,
): CellValue {
  if (!bucket.representative) {
    return { status: "empty" };
  }
  const value: number | undefined = bucket.representative.values[fieldName];
  if (value === undefined) {
    return { status: "absent" };
  }
  if (!deltaMode) {
    return { status: "value", value };
  }
  const previous: number | undefined = previousBucket?.representative?.values[fieldName];
  if (previous === undefined) {
    return { status: "no-prior" };
  }
  return { status: "value", value: value - previous };
}

/**
 * Horizontal scroll cursor. Offset 0 is the live edge; a positive offset
 * counts buckets back in time. While scrolled, an anchor on the rightmost
 * visible bucket keeps the view frozen as new buckets close.
 */
export class ViewWindow {
  private offset = 0;
  private columns: number;
  private anchorStart: number | null = null;

  constructor(columnCount = DEFAULT_COLUMN_COUNT) {
    this.columns = Math.max(1, Math.floor(columnCount));
  }

  get scrollOffset(): number {
    return this.offset;
  }

  get columnCount(): number {
    return this.columns;
  }

  get state(): ViewState {
    return this.offset === 0 ? "live" : "scrolled";
  }

  get anchor(): number | null {
    return this.anchorStart;
  }

  setColumnCount(count: number): void {
    this.columns = Math.max(1, Math.floor(count));
  }

  scroll(delta: number, totalBuckets: number): number {
    this.offset = clampOffset(this.offset + delta, totalBuckets, this.columns);
    if (this.offset === 0) {
      this.anchorStart = null;
    }
    return this.offset;
  }

  jumpToLive(): void {
    this.offset = 0;
    this.anchorStart = null;
  }

  jumpToOldest(totalBuckets: number): void {
    this.offset = maxScrollOffset(totalBuckets, this.columns);
    if (this.offset === 0) {
      this.anchorStart = null;
    }
  }

  clamp(totalBuckets: number): number {
    return this.scroll(0, totalBuckets);
  }

  anchorTo(startTime: number | null): void {
    this.anchorStart = this.offset === 0 ? null : startTime;
  }

  /** Re-derives the offset from the anchor, then clamps to the bucket count. */
  resolveOffset(buckets: readonly BucketBounds[]): number {
    if (this.anchorStart !== null) {
      const anchor = this.anchorStart;
      const index = buckets.findIndex((bucket) => bucket.startTime === anchor);
      if (index === -1) {
        this.anchorStart = null;
      } else {
        this.offset = buckets.length - 1 - index;
      }
    }
    return this.clamp(buckets.length);
  }

  visible<T>(buckets: readonly T[]): T[] {
    return visibleBuckets(buckets, this.offset, this.columns);
  }
}
