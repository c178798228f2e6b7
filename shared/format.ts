import type { DisplayUnit } from "./schema";

const AGO_DIVISORS = [60, 24, 7, 52, Number.MAX_SAFE_INTEGER];
const AGO_UNITS = ["s", "m", "h", "d", "w", "y"];

const UNIT_DIVISORS: Record<Exclude<DisplayUnit, "human">, { divisor: number; precision: number }> = {
  KiB: { divisor: 1024, precision: 0 },
  MB: { divisor: 1000 * 1000, precision: 1 },
  MiB: { divisor: 1024 * 1024, precision: 1 },
  GB: { divisor: 1000 * 1000 * 1000, precision: 1 },
  GiB: { divisor: 1024 * 1024 * 1024, precision: 1 },
};

export const EMPTY_CELL = "—";

/** Two-unit elapsed time, e.g. `1m30s` or `3h5m`. */
export function formatAgo(deltaSecs: number, options: { signed?: boolean } = {}): string {
  const ago = Math.max(0, Math.round(Math.abs(deltaSecs)));
  let low = ago % 60;
  let high = Math.floor(ago / 60);
  let unitIndex = 1;
  for (const divisor of AGO_DIVISORS) {
    if (high < divisor) {
      break;
    }
    low = high % divisor;
    high = Math.floor(high / divisor);
    unitIndex += 1;
  }
  const sign = options.signed && deltaSecs < 0 ? "-" : "";
  const major = high ? `${high}${AGO_UNITS[unitIndex]}` : "";
  return `${sign}${major}${low}${AGO_UNITS[unitIndex - 1]}`;
}

function humanBytes(bytes: number): string {
  if (bytes < 0) {
    return `-${humanBytes(-bytes)}`;
  }
  const suffixes = ["K", "M", "G", "T"];
  let value = bytes;
  for (let index = 0; index < suffixes.length; index += 1) {
    value /= 1024;
    if (value < 999.95 || index === suffixes.length - 1) {
      return `${value.toFixed(1)}${suffixes[index]}`;
    }
  }
  return `${bytes}`;
}

export function formatKilobytes(
  kilobytes: number,
  unit: DisplayUnit,
  options: { signed?: boolean } = {},
): string {
  const bytes = kilobytes * 1024;
  const plus = options.signed && bytes >= 0 ? "+" : "";
  if (unit === "human") {
    return `${plus}${humanBytes(bytes)}`;
  }
  const { divisor, precision } = UNIT_DIVISORS[unit];
  const text = (bytes / divisor).toLocaleString("en-US", {
    minimumFractionDigits: precision,
    maximumFractionDigits: precision,
  });
  return `${plus}${text}`;
}
