import type {
  Bucket,
  ColumnCell,
  DisplayColumn,
  DisplayFrame,
  FieldPartition,
  HistoryInfo,
  IntervalMode,
  Reading,
  ScrollCommand,
  Snapshot,
} from "./schema";
import { snapshotSchema } from "./schema";
import { InvalidSnapshotError } from "./errors";
import { HistoryStore, type HistoryStoreOptions } from "./history-store";
import { IntervalModel, intervalModeLabel } from "./interval-model";
import { reduceBuckets } from "./bucket-aggregator";
import { ViewWindow, columnValue, type ViewState } from "./view-window";
import { FieldRegistry, FieldSelector, type FieldSelectorOptions } from "./field-selector";
import { formatAgo } from "./format";

export interface SamplerEngineOptions {
  history?: HistoryStoreOptions;
  runStart?: number;
  columnCount?: number;
  mode?: IntervalMode;
  deltaMode?: boolean;
  selector?: FieldSelectorOptions;
}

/** Buckets moved by `{` and `}`: about an eighth of the span, at least one. */
export function scrollJumpSize(totalBuckets: number): number {
  return Math.max(1, Math.round(totalBuckets / 8));
}

export class SamplerEngine {
  readonly history: HistoryStore;
  readonly intervals: IntervalModel;
  readonly view: ViewWindow;
  readonly registry = new FieldRegistry();
  readonly selector: FieldSelector;
  private delta: boolean;

  constructor(options: SamplerEngineOptions = {}) {
    this.history = new HistoryStore(options.history);
    this.intervals = new IntervalModel({
      runStart: options.runStart,
      columnCount: options.columnCount,
      mode: options.mode,
    });
    this.view = new ViewWindow(this.intervals.columnCount);
    this.selector = new FieldSelector(options.selector);
    this.delta = options.deltaMode ?? false;
  }

  get deltaMode(): boolean {
    return this.delta;
  }

  get mode(): IntervalMode {
    return this.intervals.mode;
  }

  get fields(): readonly string[] {
    return this.registry.fields;
  }

  /**
   * Validates, normalizes and stores a reading. Throws InvalidSnapshotError for
   * malformed readings and OutOfOrderError for stale ones.
   */
  ingest(reading: Reading): Snapshot {
    const parsed = snapshotSchema.safeParse(reading);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new InvalidSnapshotError(`Invalid reading: ${details}`);
    }
    const snapshot = this.registry.normalize(parsed.data);
    this.history.append(snapshot);
    this.selector.observe(snapshot);
    return snapshot;
  }

  getBuckets(now = this.defaultNow()): Bucket[] {
    const bounds = this.intervals.computeBuckets(this.history, now);
    return reduceBuckets(bounds, this.history.toArray(), now);
  }

  getDisplayColumns(now = this.defaultNow()): DisplayFrame {
    const buckets = this.getBuckets(now);
    this.syncOffset(buckets);
    const indices = this.view.visible(buckets.map((_bucket, index) => index));
    const fields = [...this.registry.fields];

    const columns = indices.map((index) =>
      this.buildColumn(buckets[index], index > 0 ? buckets[index - 1] : null, fields),
    );

    return {
      columns,
      isScrolled: this.view.state === "scrolled",
      scrollOffset: this.view.scrollOffset,
      bucketCount: buckets.length,
      columnCount: this.view.columnCount,
      mode: intervalModeLabel(this.intervals.mode),
      deltaMode: this.delta,
      fields,
    };
  }

  setIntervalMode(mode: IntervalMode): void {
    this.intervals.setMode(mode);
    this.view.anchorTo(null);
  }

  setDeltaMode(enabled: boolean): void {
    this.delta = enabled;
  }

  setColumnCount(count: number): void {
    this.intervals.setColumnCount(count);
    this.view.setColumnCount(this.intervals.columnCount);
  }

  scroll(command: ScrollCommand, now = this.defaultNow()): ViewState {
    const buckets = this.getBuckets(now);
    this.syncOffset(buckets);
    const total = buckets.length;

    switch (command) {
      case "<":
        this.view.scroll(1, total);
        break;
      case ">":
        this.view.scroll(-1, total);
        break;
      case "{":
        this.view.scroll(scrollJumpSize(total), total);
        break;
      case "}":
        this.view.scroll(-scrollJumpSize(total), total);
        break;
      case "[":
        this.view.jumpToOldest(total);
        break;
      case "]":
        this.view.jumpToLive();
        break;
    }

    if (this.intervals.mode.kind === "fixed") {
      const visible = this.view.visible(buckets);
      const rightmost = visible[visible.length - 1];
      this.view.anchorTo(rightmost ? rightmost.startTime : null);
    }
    return this.view.state;
  }

  dumpAll(): Snapshot[] {
    return this.history.dumpAll();
  }

  partitionFields(): FieldPartition {
    return this.selector.partition(this.registry.fields);
  }

  historyInfo(): HistoryInfo {
    return this.history.info();
  }

  private defaultNow(): number {
    return this.history.isEmpty() ? this.intervals.runStart : this.history.latest().monotonicTime;
  }

  private syncOffset(buckets: Bucket[]): void {
    if (this.intervals.mode.kind === "fixed") {
      this.view.resolveOffset(buckets);
      return;
    }
    this.view.anchorTo(null);
    this.view.clamp(buckets.length);
  }

  private buildColumn(bucket: Bucket, previous: Bucket | null, fields: string[]): DisplayColumn {
    const isPartialBucket = !bucket.isComplete;
    const perField: Record<string, ColumnCell> = {};
    fields.forEach((field) => {
      const cell = columnValue(bucket, previous, field, this.delta);
      perField[field] = {
        value: cell.status === "value" ? cell.value : null,
        status: cell.status,
        isDelta: this.delta,
        isPartialBucket,
      };
    });

    const labelTime = bucket.representative?.monotonicTime ?? bucket.startTime;
    return {
      timestampLabel: formatAgo(labelTime - this.intervals.runStart),
      startTime: bucket.startTime,
      endTime: bucket.endTime,
      wallTime: bucket.representative?.wallTime ?? null,
      isPartialBucket,
      isEmpty: bucket.isEmpty,
      perField,
    };
  }
}
