import * as fs from "fs";
import { performance } from "perf_hooks";
import type { Reading } from "@shared/schema";
import { SourceUnavailableError } from "@shared/errors";

const MEMINFO_LINE = /^([^:]+):\s*(\d+)\s*(kB)?$/;

export interface Clock {
  /** Seconds since the clock was created. */
  monotonic(): number;
  /** Epoch milliseconds. */
  wall(): number;
}

export function createClock(): Clock {
  const origin = performance.now();
  return {
    monotonic: () => (performance.now() - origin) / 1000,
    wall: () => Date.now(),
  };
}

export interface SnapshotSource {
  read(): Promise<Reading>;
}

export function parseMeminfo(
  content: string,
  options: { includeVmallocTotal?: boolean } = {},
): Record<string, number> {
  const values: Record<string, number> = {};
  for (const line of content.split("\n")) {
    const match = MEMINFO_LINE.exec(line.trimEnd());
    if (!match) {
      continue;
    }
    const [, key, rawValue] = match;
    if (key === "VmallocTotal" && !options.includeVmallocTotal) {
      continue;
    }
    values[key] = Number.parseInt(rawValue, 10);
  }
  return values;
}

export interface MeminfoSourceOptions {
  path: string;
  clock: Clock;
  readTimeoutMs: number;
  includeVmallocTotal?: boolean;
}

export class MeminfoSource implements SnapshotSource {
  constructor(private readonly options: MeminfoSourceOptions) {}

  async read(): Promise<Reading> {
    const { path, clock, readTimeoutMs, includeVmallocTotal } = this.options;
    const monotonicTime = clock.monotonic();
    const wallTime = clock.wall();

    let content: string;
    try {
      content = await fs.promises.readFile(path, {
        encoding: "utf-8",
        signal: AbortSignal.timeout(readTimeoutMs),
      });
    } catch (error) {
      throw new SourceUnavailableError(`Cannot read ${path}`, error);
    }

    const values = parseMeminfo(content, { includeVmallocTotal });
    if (Object.keys(values).length === 0) {
      throw new SourceUnavailableError(`No counters found in ${path}`);
    }
    return { monotonicTime, wallTime, values };
  }
}
