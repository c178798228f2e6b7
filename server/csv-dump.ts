import * as fs from "fs";
import * as path from "path";
import type { Snapshot } from "@shared/schema";

function escapeCell(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * One row per snapshot, oldest first. Values stay in kilobytes; an absent
 * field is an empty cell.
 */
export function buildHistoryCsv(snapshots: readonly Snapshot[], fields: readonly string[]): string {
  const header = ["wallTime", "monotonicTime", ...fields].map(escapeCell).join(",");
  const rows = snapshots.map((snapshot) => {
    const cells = [
      new Date(snapshot.wallTime).toISOString(),
      snapshot.monotonicTime.toFixed(3),
      ...fields.map((field) => {
        const value: number | undefined = snapshot.values[field];
        return value === undefined ? "" : String(value);
      }),
    ];
    return cells.map(escapeCell).join(",");
  });
  return `${[header, ...rows].join("\n")}\n`;
}

export async function dumpHistoryToFile(
  filePath: string,
  snapshots: readonly Snapshot[],
  fields: readonly string[],
): Promise<string> {
  if (snapshots.length === 0) {
    return "No samples to dump yet.";
  }
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, buildHistoryCsv(snapshots, fields), "utf-8");
  return `Dumped ${snapshots.length} samples to ${filePath} (units: kB).`;
}
