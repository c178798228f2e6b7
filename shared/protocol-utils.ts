import type {
  CapabilitiesPayload,
  ControlCommand,
  ControlResponse,
  DisplayFrame,
  DisplayUnit,
  FieldPartition,
  RenderTable,
} from "./schema";
import { controlCommandSchema } from "./schema";
import { EMPTY_CELL, formatKilobytes } from "./format";
import { nextIntervalMode, parseIntervalMode } from "./interval-model";
import type { SamplerEngine } from "./sampler-engine";

export const PROTOCOL_VERSION = "1";

const RESPONSE_TYPES: ControlResponse["type"][] = [
  "frame",
  "error",
  "capabilities",
  "fields",
];

export function buildCapabilitiesPayload(): CapabilitiesPayload {
  return {
    protocolVersion: PROTOCOL_VERSION,
    commands: controlCommandSchema.options.map((option) => option.shape.type.value),
    responses: [...RESPONSE_TYPES],
  };
}

export type ParsedControlCommand =
  | { ok: true; command: ControlCommand }
  | { ok: false; error: string; requestId?: string };

export function parseControlCommand(raw: unknown): ParsedControlCommand {
  const result = controlCommandSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, command: result.data };
  }
  const error = result.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "command"}: ${issue.message}`)
    .join("; ");
  const requestId =
    raw && typeof raw === "object" && "request_id" in raw && typeof raw.request_id === "string"
      ? raw.request_id
      : undefined;
  return { ok: false, error, requestId };
}

export function buildRenderTable(
  frame: DisplayFrame,
  partition: FieldPartition,
  unit: DisplayUnit,
): RenderTable {
  const renderRow = (field: string, pinned: boolean) => ({
    field,
    pinned,
    cells: frame.columns.map((column) => {
      const cell = column.perField[field];
      if (!cell || cell.value === null) {
        return EMPTY_CELL;
      }
      return formatKilobytes(cell.value, unit, { signed: cell.isDelta });
    }),
  });

  return {
    unit,
    columns: frame.columns.map((column) => column.timestampLabel),
    rows: [
      ...partition.pinned.map((field) => renderRow(field, true)),
      ...partition.normal.map((field) => renderRow(field, false)),
    ],
  };
}

/** Applies one control command to the engine and builds the reply. */
export function applyControlCommand(
  engine: SamplerEngine,
  command: ControlCommand,
  now?: number,
): ControlResponse {
  const request_id = command.request_id;
  const frame = (): ControlResponse => ({
    type: "frame",
    request_id,
    payload: engine.getDisplayColumns(now),
  });
  const fields = (): ControlResponse => ({
    type: "fields",
    request_id,
    payload: engine.partitionFields(),
  });

  switch (command.type) {
    case "get_frame":
      return frame();
    case "set_interval_mode": {
      const mode = parseIntervalMode(command.mode);
      if (!mode) {
        return { type: "error", request_id, error: `Unknown interval mode: ${command.mode}` };
      }
      engine.setIntervalMode(mode);
      return frame();
    }
    case "next_interval_mode":
      engine.setIntervalMode(nextIntervalMode(engine.mode));
      return frame();
    case "set_delta_mode":
      engine.setDeltaMode(command.enabled);
      return frame();
    case "set_column_count":
      engine.setColumnCount(command.count);
      return frame();
    case "scroll":
      engine.scroll(command.command, now);
      return frame();
    case "toggle_pinned":
      engine.selector.togglePinned(command.field);
      return fields();
    case "toggle_hidden":
      engine.selector.toggleHidden(command.field);
      return fields();
    case "set_show_zeros":
      engine.selector.showZeros = command.enabled;
      return fields();
    case "reset_fields":
      engine.selector.reset();
      return fields();
    case "get_capabilities":
      return { type: "capabilities", request_id, payload: buildCapabilitiesPayload() };
  }
}
