import { z } from "zod";
import { DEFAULT_MAX_SAMPLES, DEFAULT_RETENTION_SEC } from "@shared/history-store";
import { DEFAULT_COLUMN_COUNT, INTERVAL_LABELS } from "@shared/interval-model";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const intervalLabel = z.string().refine((value) => INTERVAL_LABELS.some((label) => label === value), {
  message: `expected one of ${INTERVAL_LABELS.join(", ")}`,
});

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5050),
  HOST: z.string().min(1).default("127.0.0.1"),
  SAMPLE_INTERVAL_SEC: z.coerce
    .number()
    .finite()
    .default(1)
    .transform((value) => Math.min(Math.max(value, 0.5), 3600)),
  MAX_SAMPLES: z.coerce.number().int().min(2).default(DEFAULT_MAX_SAMPLES),
  HISTORY_POLICY: z.enum(["ring", "compact"]).default("ring"),
  RETENTION_SEC: z.coerce.number().positive().default(DEFAULT_RETENTION_SEC),
  COLUMN_COUNT: z.coerce.number().int().min(1).max(1000).default(DEFAULT_COLUMN_COUNT),
  INTERVAL_MODE: intervalLabel.default("adaptive"),
  MEMINFO_PATH: z.string().min(1).default("/proc/meminfo"),
  DUMP_PATH: z.string().min(1).default("/tmp/memtrend.csv"),
  INCLUDE_VMALLOC_TOTAL: booleanFlag.default("false"),
  READ_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  LOG_API_BODY: booleanFlag.default("false"),
});

export type AppConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Reads configuration from the environment; empty variables count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}
