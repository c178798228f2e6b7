import type { HistoryInfo, HistoryPolicy, Snapshot } from "./schema";
import { EmptyHistoryError, InvalidSnapshotError, OutOfOrderError } from "./errors";

export const DEFAULT_MAX_SAMPLES = 600;
export const DEFAULT_RETENTION_SEC = 24 * 60 * 60;
export const COMPRESSION_MULTIPLIERS = [5, 3, 2, 2, 5, 3, 2, 2, 4, 3, 2, 2, 2, 2] as const;

export interface HistoryStoreOptions {
  maxSamples?: number;
  policy?: HistoryPolicy;
  sampleIntervalSec?: number;
  retentionSec?: number;
}

/**
 * Keeps the oldest Snapshot, then the newest Snapshot of each slot
 * `resolution` seconds wide.
 */
export function coarsenSnapshots(entries: readonly Snapshot[], resolution: number): Snapshot[] {
  if (entries.length === 0) {
    return [];
  }
  const kept: Snapshot[] = [entries[0]];
  for (let index = 1; index < entries.length; index += 1) {
    const entry = entries[index];
    const next: Snapshot | undefined = entries[index + 1];
    if (!next || slotOf(next, resolution) !== slotOf(entry, resolution)) {
      kept.push(entry);
    }
  }
  return kept;
}

function slotOf(snapshot: Snapshot, resolution: number): number {
  return Math.floor(snapshot.monotonicTime / resolution);
}

/**
 * Capacity-bounded, time-ordered Snapshot history.
 *
 * `ring` evicts the oldest Snapshot on overflow. `compact` first drops
 * Snapshots past `retentionSec`, then coarsens the history to a wider
 * resolution. Once coarsened, a Snapshot that lands in the same slot as the
 * newest stored one replaces it, so the history stays uniform and coverage can
 * outlast `maxSamples` sampling intervals.
 */
export class HistoryStore {
  readonly maxSamples: number;
  readonly policy: HistoryPolicy;
  readonly retentionSec: number;
  private buf: Array<Snapshot | undefined>;
  private head = 0;
  private count = 0;
  private version = 0;
  private cachedArray: Snapshot[] | null = null;
  private cachedVersion = -1;
  private readonly baseResolution: number;
  private resolution: number;
  private compressionIndex = 0;

  constructor(options: HistoryStoreOptions = {}) {
    const maxSamples = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
    const policy = options.policy ?? "ring";
    const minimum = policy === "compact" ? 2 : 1;
    if (!Number.isInteger(maxSamples) || maxSamples < minimum) {
      throw new RangeError(`maxSamples must be an integer >= ${minimum} (got ${maxSamples})`);
    }
    this.maxSamples = maxSamples;
    this.policy = policy;
    this.retentionSec = options.retentionSec ?? DEFAULT_RETENTION_SEC;
    this.baseResolution = options.sampleIntervalSec ?? 1;
    this.resolution = this.baseResolution;
    // compact lets the buffer overflow by one so the whole set can be rebuilt
    this.buf = new Array<Snapshot | undefined>(policy === "compact" ? maxSamples + 1 : maxSamples);
  }

  get size(): number {
    return this.count;
  }

  get resolutionSec(): number {
    return this.resolution;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  append(snapshot: Snapshot): void {
    if (!Number.isFinite(snapshot.monotonicTime)) {
      throw new InvalidSnapshotError(`monotonicTime must be finite (got ${snapshot.monotonicTime})`);
    }
    if (this.count > 0) {
      const last = this.at(this.count - 1);
      if (snapshot.monotonicTime <= last.monotonicTime) {
        throw new OutOfOrderError(snapshot.monotonicTime, last.monotonicTime);
      }
      const sameSlot = slotOf(snapshot, this.resolution) === slotOf(last, this.resolution);
      if (this.isCoarsened && this.count > 1 && sameSlot) {
        this.replaceLatest(snapshot);
        return;
      }
    }

    const capacity = this.buf.length;
    this.buf[this.head] = snapshot;
    this.head = (this.head + 1) % capacity;
    if (this.count < capacity) this.count++;
    this.version++;

    if (this.policy === "compact" && this.count > this.maxSamples) {
      this.compact(snapshot.monotonicTime);
    }
  }

  /** Snapshots with monotonicTime in [fromTime, toTime), oldest first. */
  range(fromTime: number, toTime: number): Iterable<Snapshot> {
    const store = this;
    return {
      *[Symbol.iterator]() {
        for (let index = store.lowerBound(fromTime); index < store.count; index += 1) {
          const snapshot = store.at(index);
          if (snapshot.monotonicTime >= toTime) {
            return;
          }
          yield snapshot;
        }
      },
    };
  }

  earliest(): Snapshot {
    if (this.count === 0) {
      throw new EmptyHistoryError();
    }
    return this.at(0);
  }

  latest(): Snapshot {
    if (this.count === 0) {
      throw new EmptyHistoryError();
    }
    return this.at(this.count - 1);
  }

  /** Read-only view, rebuilt only after the history changes. */
  toArray(): readonly Snapshot[] {
    if (this.count === 0) return [];
    if (this.cachedArray && this.cachedVersion === this.version) {
      return this.cachedArray;
    }
    const result: Snapshot[] = [];
    for (let index = 0; index < this.count; index += 1) {
      result.push(this.at(index));
    }
    this.cachedArray = result;
    this.cachedVersion = this.version;
    return result;
  }

  dumpAll(): Snapshot[] {
    return [...this.toArray()];
  }

  clear(): void {
    this.resolution = this.baseResolution;
    this.compressionIndex = 0;
    this.load([]);
  }

  info(): HistoryInfo {
    return {
      count: this.count,
      maxSamples: this.maxSamples,
      policy: this.policy,
      resolutionSec: this.resolution,
      earliest: this.count > 0 ? this.at(0).monotonicTime : null,
      latest: this.count > 0 ? this.at(this.count - 1).monotonicTime : null,
    };
  }

  private get isCoarsened(): boolean {
    return this.compressionIndex > 0;
  }

  private replaceLatest(snapshot: Snapshot): void {
    const capacity = this.buf.length;
    this.buf[(this.head - 1 + capacity) % capacity] = snapshot;
    this.version++;
  }

  private at(index: number): Snapshot {
    const capacity = this.buf.length;
    const start = (this.head - this.count + capacity) % capacity;
    const snapshot = this.buf[(start + index) % capacity];
    if (!snapshot) {
      throw new RangeError(`History index ${index} out of range (size ${this.count})`);
    }
    return snapshot;
  }

  private lowerBound(time: number): number {
    let low = 0;
    let high = this.count;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.at(mid).monotonicTime < time) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  private compact(newestTime: number): void {
    let entries = this.dumpAll();
    const cutoff = newestTime - this.retentionSec;
    let expired = 0;
    while (entries.length - expired > this.maxSamples && entries[expired].monotonicTime < cutoff) {
      expired += 1;
    }
    entries = entries.slice(expired);

    while (entries.length > this.maxSamples) {
      const factor = COMPRESSION_MULTIPLIERS[this.compressionIndex % COMPRESSION_MULTIPLIERS.length];
      this.compressionIndex += 1;
      this.resolution *= factor;
      entries = coarsenSnapshots(entries, this.resolution);
    }
    this.load(entries);
  }

  private load(entries: Snapshot[]): void {
    const capacity = this.buf.length;
    this.buf = new Array<Snapshot | undefined>(capacity);
    entries.forEach((entry, index) => {
      this.buf[index] = entry;
    });
    this.count = entries.length;
    this.head = entries.length % capacity;
    this.version++;
  }
}
