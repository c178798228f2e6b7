import test from "node:test";
import assert from "node:assert/strict";
import type { Bucket, BucketBounds } from "../schema";
import { ViewWindow, columnValue, maxScrollOffset, visibleBuckets } from "../view-window";

function bucket(startTime: number, values: Record<string, number> | null): Bucket {
  return {
    startTime,
    endTime: startTime + 10,
    includesEnd: false,
    representative: values
      ? { monotonicTime: startTime + 5, wallTime: (startTime + 5) * 1000, values }
      : null,
    isEmpty: values === null,
    isComplete: true,
  };
}

const bounds = (starts: number[]): BucketBounds[] =>
  starts.map((startTime) => ({ startTime, endTime: startTime + 10, includesEnd: false }));

const ten = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

test("visibleBuckets ends scrollOffset buckets before the live edge", () => {
  assert.deepEqual(visibleBuckets(ten, 0, 3), [7, 8, 9]);
  assert.deepEqual(visibleBuckets(ten, 2, 3), [5, 6, 7]);
});

test("visibleBuckets clamps out-of-range offsets", () => {
  assert.deepEqual(visibleBuckets(ten, 100, 3), [0, 1, 2]);
  assert.deepEqual(visibleBuckets(ten, -4, 3), [7, 8, 9]);
  assert.deepEqual(visibleBuckets([0, 1], 5, 4), [0, 1]);
  assert.deepEqual(visibleBuckets([], 0, 4), []);
});

test("maxScrollOffset is zero when every bucket fits", () => {
  assert.equal(maxScrollOffset(4, 4), 0);
  assert.equal(maxScrollOffset(10, 3), 7);
});

test("scrolling cannot move past either end", () => {
  const view = new ViewWindow(4);
  assert.equal(view.scroll(5, 4), 0);
  assert.equal(view.state, "live");

  const wide = new ViewWindow(3);
  assert.equal(wide.scroll(2, 10), 2);
  assert.equal(wide.state, "scrolled");
  assert.equal(wide.scroll(-5, 10), 0);
  assert.equal(wide.state, "live");

  wide.jumpToOldest(10);
  assert.equal(wide.scrollOffset, 7);
  wide.jumpToLive();
  assert.equal(wide.scrollOffset, 0);
});

test("an anchored view stays on the same buckets as new ones arrive", () => {
  const view = new ViewWindow(2);
  view.scroll(2, 5);
  view.anchorTo(20);

  assert.equal(view.resolveOffset(bounds([0, 10, 20, 30, 40, 50])), 3);
  assert.deepEqual(view.visible([0, 10, 20, 30, 40, 50]), [10, 20]);
});

test("the anchor is dropped once its bucket leaves the history", () => {
  const view = new ViewWindow(2);
  view.scroll(2, 5);
  view.anchorTo(0);

  assert.equal(view.resolveOffset(bounds([10, 20, 30, 40])), 2);
  assert.equal(view.anchor, null);
});

test("anchoring at the live edge is a no-op", () => {
  const view = new ViewWindow(2);
  view.anchorTo(30);
  assert.equal(view.anchor, null);
});

test("columnValue reports absolute values and deltas", () => {
  const previous = bucket(0, { MemFree: 100 });
  const current = bucket(10, { MemFree: 137 });

  assert.deepEqual(columnValue(current, previous, "MemFree", false), { status: "value", value: 137 });
  assert.deepEqual(columnValue(current, previous, "MemFree", true), { status: "value", value: 37 });
});

test("columnValue distinguishes empty, absent and missing prior values", () => {
  const current = bucket(10, { MemFree: 137 });

  assert.deepEqual(columnValue(bucket(10, null), null, "MemFree", false), { status: "empty" });
  assert.deepEqual(columnValue(current, null, "Buffers", false), { status: "absent" });
  assert.deepEqual(columnValue(current, null, "MemFree", true), { status: "no-prior" });
  assert.deepEqual(columnValue(current, bucket(0, null), "MemFree", true), { status: "no-prior" });
  assert.deepEqual(columnValue(current, bucket(0, { Buffers: 1 }), "MemFree", true), {
    status: "no-prior",
  });
});
