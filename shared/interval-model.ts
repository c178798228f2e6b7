import type {
  BucketBounds,
  FixedIntervalLabel,
  IntervalLabel,
  IntervalMode,
  Snapshot,
} from "./schema";
import { INTERVAL_PRESETS } from "./schema";

export const DEFAULT_COLUMN_COUNT = 12;

function isFixedLabel(label: string): label is FixedIntervalLabel {
  return Object.prototype.hasOwnProperty.call(INTERVAL_PRESETS, label);
}

export const INTERVAL_LABELS: readonly IntervalLabel[] = [
  "adaptive",
  ...Object.keys(INTERVAL_PRESETS).filter(isFixedLabel),
];

export type HistoryView = {
  isEmpty(): boolean;
  earliest(): Snapshot;
  latest(): Snapshot;
};

export function parseIntervalMode(label: string): IntervalMode | null {
  if (label === "adaptive") {
    return { kind: "adaptive" };
  }
  if (isFixedLabel(label)) {
    return { kind: "fixed", label, width: INTERVAL_PRESETS[label] };
  }
  return null;
}

export function fixedIntervalMode(width: number): IntervalMode {
  if (!Number.isFinite(width) || width <= 0) {
    throw new RangeError(`Interval width must be a positive number of seconds (got ${width})`);
  }
  const preset = Object.entries(INTERVAL_PRESETS).find(([, presetWidth]) => presetWidth === width);
  return { kind: "fixed", label: preset ? preset[0] : `${width}s`, width };
}

export function intervalModeLabel(mode: IntervalMode): string {
  return mode.kind === "adaptive" ? "adaptive" : mode.label;
}

/** Cycles adaptive, then each preset; a custom width moves back to adaptive. */
export function nextIntervalMode(mode: IntervalMode): IntervalMode {
  const label = intervalModeLabel(mode);
  const index = INTERVAL_LABELS.findIndex((entry) => entry === label);
  const next = INTERVAL_LABELS[(index + 1) % INTERVAL_LABELS.length];
  return parseIntervalMode(next) ?? { kind: "adaptive" };
}

/**
 * Buckets aligned to `runStart + k * width`, from the one holding `earliest`
 * to the one holding `now`. Boundaries depend only on these inputs, so a
 * closed bucket keeps its bounds across calls.
 */
export function computeFixedBounds(
  runStart: number,
  width: number,
  earliest: number,
  now: number,
): BucketBounds[] {
  const first = Math.floor((earliest - runStart) / width);
  const last = Math.floor((now - runStart) / width);
  const bounds: BucketBounds[] = [];
  for (let k = first; k <= last; k += 1) {
    bounds.push({
      startTime: runStart + k * width,
      endTime: runStart + (k + 1) * width,
      includesEnd: false,
    });
  }
  return bounds;
}

/**
 * `columnCount` equal buckets over [earliest, end]. Every boundary moves
 * whenever either edge does; the last bucket includes `end`.
 */
export function computeAdaptiveBounds(
  earliest: number,
  end: number,
  columnCount: number,
): BucketBounds[] {
  const span = end - earliest;
  if (span <= 0) {
    return [{ startTime: earliest, endTime: earliest, includesEnd: true }];
  }
  const width = span / columnCount;
  const bounds: BucketBounds[] = [];
  for (let k = 0; k < columnCount; k += 1) {
    const isLast = k === columnCount - 1;
    bounds.push({
      startTime: earliest + k * width,
      endTime: isLast ? end : earliest + (k + 1) * width,
      includesEnd: isLast,
    });
  }
  return bounds;
}

export interface IntervalModelOptions {
  runStart?: number;
  columnCount?: number;
  mode?: IntervalMode;
}

export class IntervalModel {
  readonly runStart: number;
  private currentMode: IntervalMode;
  private columns: number;

  constructor(options: IntervalModelOptions = {}) {
    this.runStart = options.runStart ?? 0;
    this.currentMode = options.mode ?? { kind: "adaptive" };
    this.columns = normalizeColumnCount(options.columnCount ?? DEFAULT_COLUMN_COUNT);
  }

  get mode(): IntervalMode {
    return this.currentMode;
  }

  get columnCount(): number {
    return this.columns;
  }

  setMode(mode: IntervalMode): void {
    this.currentMode = mode;
  }

  setColumnCount(count: number): void {
    this.columns = normalizeColumnCount(count);
  }

  computeBuckets(history: HistoryView, now: number): BucketBounds[] {
    if (history.isEmpty()) {
      return [];
    }
    const earliest = history.earliest().monotonicTime;
    const end = Math.max(now, history.latest().monotonicTime);
    if (this.currentMode.kind === "fixed") {
      return computeFixedBounds(this.runStart, this.currentMode.width, earliest, end);
    }
    return computeAdaptiveBounds(earliest, end, this.columns);
  }
}

function normalizeColumnCount(count: number): number {
  return Number.isFinite(count) ? Math.max(1, Math.floor(count)) : DEFAULT_COLUMN_COUNT;
}
