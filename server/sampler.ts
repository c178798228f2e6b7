import type { Snapshot } from "@shared/schema";
import type { SamplerEngine } from "@shared/sampler-engine";
import { InvalidSnapshotError, OutOfOrderError, SourceUnavailableError } from "@shared/errors";
import type { SnapshotSource } from "./meminfo-source";
import { log, logError } from "./log";

export type TickOutcome = "accepted" | "skipped" | "discarded" | "busy";

export type SampleListener = (snapshot: Snapshot) => void;

export interface SamplerStatus {
  running: boolean;
  intervalSec: number;
  startedAt: string | null;
  lastSampleAt: string | null;
  acceptedCount: number;
  skippedCount: number;
  discardedCount: number;
  consecutiveFailures: number;
  lastError: string | null;
}

export interface SamplerLoopOptions {
  intervalSec: number;
  now?: () => number;
}

/**
 * Drives acquisition at a fixed cadence. Reads never overlap; an unreadable
 * source skips the tick and the next one is scheduled as usual.
 */
export class SamplerLoop {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private isPolling = false;
  private generation = 0;
  private listeners = new Set<SampleListener>();
  private startedAt: string | null = null;
  private lastSampleAt: string | null = null;
  private acceptedCount = 0;
  private skippedCount = 0;
  private discardedCount = 0;
  private consecutiveFailures = 0;
  private lastError: string | null = null;
  private readonly now: () => number;

  constructor(
    private readonly engine: SamplerEngine,
    private readonly source: SnapshotSource,
    private readonly options: SamplerLoopOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.generation += 1;
    this.startedAt = new Date(this.now()).toISOString();
    this.schedule(0, this.generation);
  }

  stop(): void {
    this.running = false;
    this.generation += 1;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  onSample(listener: SampleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async tick(): Promise<TickOutcome> {
    if (this.isPolling) {
      return "busy";
    }
    this.isPolling = true;

    try {
      const reading = await this.source.read();
      const snapshot = this.engine.ingest(reading);
      this.acceptedCount += 1;
      this.consecutiveFailures = 0;
      this.lastError = null;
      this.lastSampleAt = new Date(snapshot.wallTime).toISOString();
      this.listeners.forEach((listener) => {
        try {
          listener(snapshot);
        } catch (error) {
          logError("listener failed", error, "sampler");
        }
      });
      return "accepted";
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        this.skippedCount += 1;
        this.consecutiveFailures += 1;
        this.lastError = error.message;
        log(`tick skipped (${this.consecutiveFailures} in a row): ${error.message}`, "sampler");
        return "skipped";
      }
      if (error instanceof OutOfOrderError || error instanceof InvalidSnapshotError) {
        this.discardedCount += 1;
        this.lastError = error.message;
        log(`snapshot discarded: ${error.message}`, "sampler");
        return "discarded";
      }
      throw error;
    } finally {
      this.isPolling = false;
    }
  }

  status(): SamplerStatus {
    return {
      running: this.running,
      intervalSec: this.options.intervalSec,
      startedAt: this.startedAt,
      lastSampleAt: this.lastSampleAt,
      acceptedCount: this.acceptedCount,
      skippedCount: this.skippedCount,
      discardedCount: this.discardedCount,
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError,
    };
  }

  // Only the chain started by the current start() may reschedule.
  private schedule(delayMs: number, generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      const tickStart = this.now();
      this.tick()
        .finally(() => {
          if (!this.running || generation !== this.generation) {
            return;
          }
          const elapsed = this.now() - tickStart;
          this.schedule(Math.max(0, this.options.intervalSec * 1000 - elapsed), generation);
        })
        .catch((error) => {
          logError("tick failed", error, "sampler");
        });
    }, delayMs);
  }
}
