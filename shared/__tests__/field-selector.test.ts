import test from "node:test";
import assert from "node:assert/strict";
import { FieldRegistry, FieldSelector } from "../field-selector";

const FIELDS = ["MemTotal", "MemFree", "MemAvailable", "KernelStack", "Zero"];

function observed(selector: FieldSelector): FieldSelector {
  selector.observe({
    monotonicTime: 0,
    wallTime: 0,
    values: { MemTotal: 10, MemFree: 5, MemAvailable: 3, KernelStack: 2, Zero: 0 },
  });
  return selector;
}

test("registry fixes the field set from the first snapshot", () => {
  const registry = new FieldRegistry();
  assert.equal(registry.isInitialized, false);

  registry.normalize({ monotonicTime: 0, wallTime: 0, values: { A: 1, B: 2 } });
  const later = registry.normalize({ monotonicTime: 1, wallTime: 1000, values: { A: 5, C: 9 } });

  assert.deepEqual(registry.fields, ["A", "B"]);
  assert.deepEqual(later.values, { A: 5 });
});

test("default partition pins totals and hides noisy fields", () => {
  const selector = observed(new FieldSelector());

  assert.deepEqual(selector.partition(FIELDS), {
    pinned: ["MemTotal", "MemAvailable"],
    normal: ["MemFree"],
  });
});

test("showZeros lists fields that have never been non-zero", () => {
  const selector = observed(new FieldSelector({ showZeros: true }));
  assert.deepEqual(selector.partition(FIELDS).normal, ["MemFree", "Zero"]);
});

test("a field is listed once it becomes non-zero", () => {
  const selector = observed(new FieldSelector());
  selector.observe({ monotonicTime: 1, wallTime: 1000, values: { Zero: 4 } });

  assert.deepEqual(selector.partition(FIELDS).normal, ["MemFree", "Zero"]);
});

test("pinning a hidden field unhides it and the reverse", () => {
  const selector = new FieldSelector({ pinned: [], hidden: [] });
  selector.toggleHidden("MemFree");
  selector.togglePinned("MemFree");

  assert.equal(selector.isPinned("MemFree"), true);
  assert.equal(selector.isHidden("MemFree"), false);

  selector.toggleHidden("MemFree");
  assert.equal(selector.isPinned("MemFree"), false);
  assert.equal(selector.isHidden("MemFree"), true);
});

test("reset clears pinned and hidden fields", () => {
  const selector = observed(new FieldSelector());
  selector.reset();

  assert.deepEqual(selector.partition(FIELDS), {
    pinned: [],
    normal: ["MemTotal", "MemFree", "MemAvailable", "KernelStack"],
  });
});
