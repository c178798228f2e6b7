import { z } from "zod";

export const snapshotSchema = z.object({
  monotonicTime: z.number().finite().nonnegative(),
  wallTime: z.number().finite(),
  values: z.record(z.number().int()),
});

export type Snapshot = z.infer<typeof snapshotSchema>;

export type Reading = Snapshot;

export type HistoryPolicy = "ring" | "compact";

export const INTERVAL_PRESETS = {
  "5s": 5,
  "15s": 15,
  "30s": 30,
  "1m": 60,
  "5m": 300,
  "15m": 900,
  "1h": 3600,
} as const;

export type FixedIntervalLabel = keyof typeof INTERVAL_PRESETS;

export type IntervalMode =
  | { kind: "fixed"; label: string; width: number }
  | { kind: "adaptive" };

export type IntervalLabel = FixedIntervalLabel | "adaptive";

export interface BucketBounds {
  startTime: number;
  endTime: number;
  /** True only for the final Adaptive bucket, whose span is [startTime, endTime]. */
  includesEnd: boolean;
}

export interface Bucket extends BucketBounds {
  representative: Snapshot | null;
  isEmpty: boolean;
  isComplete: boolean;
}

export type CellValue =
  | { status: "value"; value: number }
  | { status: "empty" }
  | { status: "absent" }
  | { status: "no-prior" };

export type CellStatus = CellValue["status"];

export interface ColumnCell {
  value: number | null;
  status: CellStatus;
  isDelta: boolean;
  isPartialBucket: boolean;
}

export interface DisplayColumn {
  timestampLabel: string;
  startTime: number;
  endTime: number;
  wallTime: number | null;
  isPartialBucket: boolean;
  isEmpty: boolean;
  perField: Record<string, ColumnCell>;
}

export interface DisplayFrame {
  columns: DisplayColumn[];
  isScrolled: boolean;
  scrollOffset: number;
  bucketCount: number;
  columnCount: number;
  mode: string;
  deltaMode: boolean;
  fields: string[];
}

export const SCROLL_COMMANDS = ["<", ">", "{", "}", "[", "]"] as const;

export type ScrollCommand = (typeof SCROLL_COMMANDS)[number];

export const DISPLAY_UNITS = ["KiB", "MB", "MiB", "GB", "GiB", "human"] as const;

export type DisplayUnit = (typeof DISPLAY_UNITS)[number];

export interface FieldPartition {
  pinned: string[];
  normal: string[];
}

export interface HistoryInfo {
  count: number;
  maxSamples: number;
  policy: HistoryPolicy;
  resolutionSec: number;
  earliest: number | null;
  latest: number | null;
}

export interface RenderTable {
  unit: DisplayUnit;
  columns: string[];
  rows: Array<{ field: string; pinned: boolean; cells: string[] }>;
}

export interface CapabilitiesPayload {
  protocolVersion: string;
  commands: string[];
  responses: string[];
}

const intervalLabelSchema = z.enum(["adaptive", "5s", "15s", "30s", "1m", "5m", "15m", "1h"]);

const requestIdSchema = { request_id: z.string().optional() };

export const controlCommandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("get_frame"), ...requestIdSchema }),
  z.object({ type: z.literal("set_interval_mode"), mode: intervalLabelSchema, ...requestIdSchema }),
  z.object({ type: z.literal("next_interval_mode"), ...requestIdSchema }),
  z.object({ type: z.literal("set_delta_mode"), enabled: z.boolean(), ...requestIdSchema }),
  z.object({ type: z.literal("set_column_count"), count: z.number().int().min(1).max(1000), ...requestIdSchema }),
  z.object({ type: z.literal("scroll"), command: z.enum(SCROLL_COMMANDS), ...requestIdSchema }),
  z.object({ type: z.literal("toggle_pinned"), field: z.string().min(1), ...requestIdSchema }),
  z.object({ type: z.literal("toggle_hidden"), field: z.string().min(1), ...requestIdSchema }),
  z.object({ type: z.literal("set_show_zeros"), enabled: z.boolean(), ...requestIdSchema }),
  z.object({ type: z.literal("reset_fields"), ...requestIdSchema }),
  z.object({ type: z.literal("get_capabilities"), ...requestIdSchema }),
]);

export type ControlCommand = z.infer<typeof controlCommandSchema>;

export interface ControlResponse {
  type: "frame" | "error" | "capabilities" | "fields";
  request_id?: string;
  payload?: unknown;
  error?: string;
}
