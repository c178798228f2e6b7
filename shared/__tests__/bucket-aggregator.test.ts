import test from "node:test";
import assert from "node:assert/strict";
import type { Snapshot } from "../schema";
import { computeFixedBounds } from "../interval-model";
import { findRepresentative, isBucketComplete, reduceBuckets } from "../bucket-aggregator";

function series(points: Array<[number, number]>): Snapshot[] {
  return points.map(([monotonicTime, memFree]) => ({
    monotonicTime,
    wallTime: 1_700_000_000_000 + monotonicTime * 1000,
    values: { MemFree: memFree },
  }));
}

const snapshots = series([
  [0, 400],
  [5, 390],
  [10, 410],
  [15, 405],
  [20, 402],
]);

test("each bucket is represented by its latest snapshot", () => {
  const buckets = reduceBuckets(computeFixedBounds(0, 10, 0, 20), snapshots, 20);

  assert.deepEqual(
    buckets.map((bucket) => bucket.representative?.values.MemFree),
    [390, 405, 402],
  );
  assert.deepEqual(
    buckets.map((bucket) => bucket.isComplete),
    [true, true, false],
  );
});

test("closed buckets keep their representative while the open bucket follows new data", () => {
  const before = reduceBuckets(computeFixedBounds(0, 10, 0, 21), snapshots, 21);
  const grown = [
    ...snapshots,
    ...series([
      [22, 398],
      [24, 396],
    ]),
  ];
  const after = reduceBuckets(computeFixedBounds(0, 10, 0, 24.5), grown, 24.5);

  assert.deepEqual(after.slice(0, 2), before.slice(0, 2));
  assert.equal(before[2].representative?.monotonicTime, 20);
  assert.equal(after[2].representative?.monotonicTime, 24);
  assert.equal(after[2].representative?.values.MemFree, 396);
  assert.equal(after[2].isComplete, false);
});

test("a bucket with no snapshot is empty", () => {
  const sparse = series([
    [0, 1],
    [12, 2],
  ]);
  const buckets = reduceBuckets(computeFixedBounds(0, 5, 0, 12), sparse, 12);

  assert.deepEqual(
    buckets.map((bucket) => [bucket.startTime, bucket.isEmpty]),
    [
      [0, false],
      [5, true],
      [10, false],
    ],
  );
  assert.equal(buckets[1].representative, null);
});

test("only the final adaptive bucket includes its end time", () => {
  const closed = { startTime: 10, endTime: 20, includesEnd: true };
  const open = { startTime: 10, endTime: 20, includesEnd: false };

  assert.equal(findRepresentative(closed, snapshots)?.monotonicTime, 20);
  assert.equal(findRepresentative(open, snapshots)?.monotonicTime, 15);
  assert.equal(findRepresentative({ startTime: 21, endTime: 30, includesEnd: false }, snapshots), null);
});

test("a bucket is complete once now reaches its end", () => {
  assert.equal(isBucketComplete({ startTime: 0, endTime: 10, includesEnd: false }, 10), true);
  assert.equal(isBucketComplete({ startTime: 0, endTime: 10, includesEnd: false }, 9.9), false);
  assert.equal(isBucketComplete({ startTime: 0, endTime: 10, includesEnd: true }, 10), false);
  assert.equal(isBucketComplete({ startTime: 0, endTime: 10, includesEnd: true }, 10.5), true);
});
