import test from "node:test";
import assert from "node:assert/strict";
import { SamplerEngine } from "../sampler-engine";
import { fixedIntervalMode } from "../interval-model";
import {
  applyControlCommand,
  buildCapabilitiesPayload,
  buildRenderTable,
  parseControlCommand,
} from "../protocol-utils";

function engineWithTwoBuckets(): SamplerEngine {
  const engine = new SamplerEngine({ mode: fixedIntervalMode(10), columnCount: 2 });
  engine.ingest({ monotonicTime: 0, wallTime: 0, values: { MemTotal: 2048, MemFree: 1024 } });
  engine.ingest({ monotonicTime: 10, wallTime: 10_000, values: { MemTotal: 2048, MemFree: 512 } });
  return engine;
}

test("capabilities list every control command", () => {
  assert.deepEqual(buildCapabilitiesPayload(), {
    protocolVersion: "1",
    commands: [
      "get_frame",
      "set_interval_mode",
      "next_interval_mode",
      "set_delta_mode",
      "set_column_count",
      "scroll",
      "toggle_pinned",
      "toggle_hidden",
      "set_show_zeros",
      "reset_fields",
      "get_capabilities",
    ],
    responses: ["frame", "error", "capabilities", "fields"],
  });
});

test("parseControlCommand accepts well-formed commands", () => {
  assert.deepEqual(parseControlCommand({ type: "scroll", command: "<" }), {
    ok: true,
    command: { type: "scroll", command: "<" },
  });
});

test("parseControlCommand reports the failing path and keeps the request id", () => {
  const parsed = parseControlCommand({ type: "scroll", command: "x", request_id: "r1" });
  assert.equal(parsed.ok, false);
  if (!parsed.ok) {
    assert.equal(parsed.requestId, "r1");
    assert.ok(parsed.error.startsWith("command: "));
  }

  const unknown = parseControlCommand({ type: "nope" });
  assert.equal(unknown.ok, false);
  if (!unknown.ok) {
    assert.ok(unknown.error.startsWith("type: "));
    assert.equal(unknown.requestId, undefined);
  }

  assert.deepEqual(parseControlCommand("hello"), {
    ok: false,
    error: "command: Expected object, received string",
    requestId: undefined,
  });
  assert.equal(parseControlCommand({ type: "set_column_count", count: 0 }).ok, false);
});

test("set_interval_mode switches the engine and replies with a frame", () => {
  const engine = engineWithTwoBuckets();
  const response = applyControlCommand(
    engine,
    { type: "set_interval_mode", mode: "1m", request_id: "r2" },
    10,
  );

  assert.equal(response.type, "frame");
  assert.equal(response.request_id, "r2");
  assert.deepEqual(engine.mode, { kind: "fixed", label: "1m", width: 60 });
  assert.deepEqual(response.payload, engine.getDisplayColumns(10));
});

test("next_interval_mode advances from adaptive to the first preset", () => {
  const engine = new SamplerEngine();
  applyControlCommand(engine, { type: "next_interval_mode" });
  assert.deepEqual(engine.mode, { kind: "fixed", label: "5s", width: 5 });
});

test("field commands reply with the new partition", () => {
  const engine = engineWithTwoBuckets();
  engine.ingest({ monotonicTime: 11, wallTime: 11_000, values: { MemTotal: 2048, MemFree: 500 } });

  assert.deepEqual(applyControlCommand(engine, { type: "toggle_hidden", field: "MemFree", request_id: "r3" }), {
    type: "fields",
    request_id: "r3",
    payload: { pinned: ["MemTotal"], normal: [] },
  });
  assert.deepEqual(applyControlCommand(engine, { type: "reset_fields", request_id: "r4" }), {
    type: "fields",
    request_id: "r4",
    payload: { pinned: [], normal: ["MemTotal", "MemFree"] },
  });
});

test("buildRenderTable renders pinned rows first in the chosen unit", () => {
  const engine = engineWithTwoBuckets();
  const table = buildRenderTable(engine.getDisplayColumns(10), engine.partitionFields(), "MiB");

  assert.deepEqual(table, {
    unit: "MiB",
    columns: ["0s", "10s"],
    rows: [
      { field: "MemTotal", pinned: true, cells: ["2.0", "2.0"] },
      { field: "MemFree", pinned: false, cells: ["1.0", "0.5"] },
    ],
  });
});

test("buildRenderTable signs deltas and blanks cells without a prior value", () => {
  const engine = engineWithTwoBuckets();
  engine.setDeltaMode(true);
  const table = buildRenderTable(engine.getDisplayColumns(10), engine.partitionFields(), "MiB");

  assert.deepEqual(table.rows, [
    { field: "MemTotal", pinned: true, cells: ["—", "+0.0"] },
    { field: "MemFree", pinned: false, cells: ["—", "-0.5"] },
  ]);
});
