import type { FieldPartition, Snapshot } from "./schema";

export const DEFAULT_PINNED_FIELDS = ["MemTotal", "MemAvailable"];
export const DEFAULT_HIDDEN_FIELDS = ["KernelStack", "Active(file)"];

/**
 * Fixed field schema for a run, taken from the first snapshot seen. Later
 * snapshots keep only registered fields; a missing field stays absent rather
 * than becoming 0.
 */
export class FieldRegistry {
  private order: string[] | null = null;

  get fields(): readonly string[] {
    return this.order ?? [];
  }

  get isInitialized(): boolean {
    return this.order !== null;
  }

  normalize(snapshot: Snapshot): Snapshot {
    if (!this.order) {
      this.order = Object.keys(snapshot.values);
      return { ...snapshot, values: { ...snapshot.values } };
    }
    const values: Record<string, number> = {};
    for (const field of this.order) {
      const value: number | undefined = snapshot.values[field];
      if (value !== undefined) {
        values[field] = value;
      }
    }
    return { ...snapshot, values };
  }
}

export interface FieldSelectorOptions {
  pinned?: Iterable<string>;
  hidden?: Iterable<string>;
  showZeros?: boolean;
}

export class FieldSelector {
  private pinned: Set<string>;
  private hidden: Set<string>;
  private nonZero = new Set<string>();
  showZeros: boolean;

  constructor(options: FieldSelectorOptions = {}) {
    this.pinned = new Set(options.pinned ?? DEFAULT_PINNED_FIELDS);
    this.hidden = new Set(options.hidden ?? DEFAULT_HIDDEN_FIELDS);
    this.showZeros = options.showZeros ?? false;
  }

  /** Remembers which fields have ever been non-zero. */
  observe(snapshot: Snapshot): void {
    Object.entries(snapshot.values).forEach(([field, value]) => {
      if (value !== 0) {
        this.nonZero.add(field);
      }
    });
  }

  isPinned(field: string): boolean {
    return this.pinned.has(field);
  }

  isHidden(field: string): boolean {
    return this.hidden.has(field);
  }

  togglePinned(field: string): void {
    if (this.pinned.has(field)) {
      this.pinned.delete(field);
    } else {
      this.pinned.add(field);
    }
    this.hidden.delete(field);
  }

  toggleHidden(field: string): void {
    if (this.hidden.has(field)) {
      this.hidden.delete(field);
    } else {
      this.hidden.add(field);
    }
    this.pinned.delete(field);
  }

  reset(): void {
    this.pinned.clear();
    this.hidden.clear();
  }

  partition(fields: readonly string[]): FieldPartition {
    const pinned: string[] = [];
    const normal: string[] = [];
    fields.forEach((field) => {
      if (this.pinned.has(field)) {
        pinned.push(field);
        return;
      }
      if (this.hidden.has(field)) {
        return;
      }
      if (!this.showZeros && !this.nonZero.has(field)) {
        return;
      }
      normal.push(field);
    });
    return { pinned, normal };
  }
}
