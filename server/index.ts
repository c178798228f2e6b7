import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { SamplerEngine } from "@shared/sampler-engine";
import { parseIntervalMode } from "@shared/interval-model";
import { loadConfig, type AppConfig } from "./config";
import { createClock, MeminfoSource } from "./meminfo-source";
import { SamplerLoop } from "./sampler";
import { registerRoutes } from "./routes";
import { log } from "./log";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const SUMMARY_KEYS = [
  "success",
  "error",
  "message",
  "type",
  "mode",
  "deltaMode",
  "isScrolled",
  "scrollOffset",
  "bucketCount",
  "count",
] as const;

function summarizeResponseBody(body: unknown): Record<string, unknown> {
  const summary: Record<string, unknown> = {};
  if (!isRecord(body)) {
    return summary;
  }
  SUMMARY_KEYS.forEach((key) => {
    const value = body[key];
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      summary[key] = value;
    }
  });
  if (Array.isArray(body.columns)) {
    summary.columnsCount = body.columns.length;
  }
  if (Array.isArray(body.rows)) {
    summary.rowsCount = body.rows.length;
  }
  return summary;
}

function errorStatus(err: unknown): number {
  if (isRecord(err)) {
    if (typeof err.status === "number") return err.status;
    if (typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

function start(config: AppConfig) {
  const app = express();
  const httpServer = createServer(app);
  const clock = createClock();

  const engine = new SamplerEngine({
    history: {
      maxSamples: config.MAX_SAMPLES,
      policy: config.HISTORY_POLICY,
      sampleIntervalSec: config.SAMPLE_INTERVAL_SEC,
      retentionSec: config.RETENTION_SEC,
    },
    columnCount: config.COLUMN_COUNT,
    mode: parseIntervalMode(config.INTERVAL_MODE) ?? undefined,
  });
  const source = new MeminfoSource({
    path: config.MEMINFO_PATH,
    clock,
    readTimeoutMs: config.READ_TIMEOUT_MS,
    includeVmallocTotal: config.INCLUDE_VMALLOC_TOTAL,
  });
  const sampler = new SamplerLoop(engine, source, { intervalSec: config.SAMPLE_INTERVAL_SEC });

  app.use(express.json());

  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store");
    next();
  });

  app.use((req, res, next) => {
    const startedAt = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = function (bodyJson) {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - startedAt;
      if (!path.startsWith("/api")) {
        return;
      }
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        if (config.LOG_API_BODY) {
          let serialized = "";
          try {
            serialized = JSON.stringify(capturedJsonResponse);
          } catch {
            serialized = "[unserializable json]";
          }
          const limit = 2000;
          logLine += ` :: ${
            serialized.length > limit
              ? `${serialized.slice(0, limit)}... (${serialized.length} chars)`
              : serialized
          }`;
        } else {
          const summary = summarizeResponseBody(capturedJsonResponse);
          if (Object.keys(summary).length > 0) {
            logLine += ` :: ${JSON.stringify(summary)}`;
          }
        }
      }
      log(logLine);
    });

    next();
  });

  let shuttingDown = false;

  function scheduleShutdown(source: "signal" | "api") {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log(`shutting down (${source})`);
    sampler.stop();
    wss.clients.forEach((client) => client.terminate());
    wss.close();
    httpServer.close(() => {
      process.exit(0);
    });
    setTimeout(() => process.exit(0), 2000).unref();
  }

  const wss = registerRoutes(httpServer, app, {
    engine,
    sampler,
    now: () => clock.monotonic(),
    dumpPath: config.DUMP_PATH,
    scheduleShutdown,
    isShuttingDown: () => shuttingDown,
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = err instanceof Error ? err.message : "Internal Server Error";
    console.error("[express] Unhandled error:", err);
    res.status(status).json({ message });
  });

  process.on("SIGINT", () => scheduleShutdown("signal"));
  process.on("SIGTERM", () => scheduleShutdown("signal"));

  sampler.start();
  httpServer.listen({ port: config.PORT, host: config.HOST }, () => {
    log(`sampling ${config.MEMINFO_PATH} every ${config.SAMPLE_INTERVAL_SEC}s`, "sampler");
    log(`serving on ${config.HOST}:${config.PORT}`);
  });
}

try {
  start(loadConfig());
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
