import type { Express } from "express";
import type { Server } from "http";
import { WebSocketServer, WebSocket } from "ws";
import type { ControlResponse, DisplayUnit } from "@shared/schema";
import { DISPLAY_UNITS } from "@shared/schema";
import type { SamplerEngine } from "@shared/sampler-engine";
import {
  applyControlCommand,
  buildCapabilitiesPayload,
  buildRenderTable,
  parseControlCommand,
} from "@shared/protocol-utils";
import type { SamplerLoop } from "./sampler";
import { buildHistoryCsv, dumpHistoryToFile } from "./csv-dump";
import { log, logError } from "./log";

export const COLUMNS_WS_PATH = "/ws/columns";
const DEFAULT_UNIT: DisplayUnit = "MiB";

type RegisterRoutesOptions = {
  engine: SamplerEngine;
  sampler: SamplerLoop;
  /** Monotonic seconds on the engine's timeline. */
  now: () => number;
  dumpPath: string;
  scheduleShutdown: (source: "signal" | "api") => void;
  isShuttingDown: () => boolean;
};

function parseUnit(value: unknown): DisplayUnit | null {
  return DISPLAY_UNITS.find((unit) => unit === value) ?? null;
}

export function registerRoutes(
  httpServer: Server,
  app: Express,
  { engine, sampler, now, dumpPath, scheduleShutdown, isShuttingDown }: RegisterRoutesOptions,
): WebSocketServer {
  const clients = new Set<WebSocket>();
  const wss = new WebSocketServer({ noServer: true });

  function send(ws: WebSocket, message: ControlResponse) {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  function broadcastFrame(except?: WebSocket) {
    if (clients.size === 0) {
      return;
    }
    const message: ControlResponse = { type: "frame", payload: engine.getDisplayColumns(now()) };
    clients.forEach((client) => {
      if (client !== except) {
        send(client, message);
      }
    });
  }

  sampler.onSample(() => broadcastFrame());

  httpServer.on("upgrade", (req, socket, head) => {
    if (!req.url?.startsWith(COLUMNS_WS_PATH)) {
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws) => {
    clients.add(ws);
    log(`client connected, total: ${clients.size}`, "ws");
    send(ws, { type: "frame", payload: engine.getDisplayColumns(now()) });

    ws.on("message", (data) => {
      let message: unknown;
      try {
        message = JSON.parse(data.toString());
      } catch {
        send(ws, { type: "error", error: "Invalid message format" });
        return;
      }

      const parsed = parseControlCommand(message);
      if (!parsed.ok) {
        send(ws, { type: "error", error: parsed.error, request_id: parsed.requestId });
        return;
      }

      const response = applyControlCommand(engine, parsed.command, now());
      send(ws, response);
      if (response.type === "frame") {
        broadcastFrame(ws);
      }
    });

    ws.on("close", () => {
      clients.delete(ws);
      log(`client disconnected, remaining: ${clients.size}`, "ws");
    });

    ws.on("error", (err) => {
      logError("socket error", err, "ws");
    });
  });

  app.get("/api/frame", (_req, res) => {
    res.json(engine.getDisplayColumns(now()));
  });

  app.get("/api/table", (req, res) => {
    const unit = req.query.unit === undefined ? DEFAULT_UNIT : parseUnit(req.query.unit);
    if (!unit) {
      return res.status(400).json({ error: `unit must be one of ${DISPLAY_UNITS.join(", ")}` });
    }
    const frame = engine.getDisplayColumns(now());
    return res.json(buildRenderTable(frame, engine.partitionFields(), unit));
  });

  app.get("/api/fields", (_req, res) => {
    res.json({
      fields: engine.fields,
      ...engine.partitionFields(),
      showZeros: engine.selector.showZeros,
    });
  });

  app.get("/api/history", (_req, res) => {
    res.json(engine.historyInfo());
  });

  app.get("/api/history.csv", (_req, res) => {
    res.type("text/csv").send(buildHistoryCsv(engine.dumpAll(), engine.fields));
  });

  app.post("/api/history/dump", async (_req, res) => {
    try {
      const message = await dumpHistoryToFile(dumpPath, engine.dumpAll(), engine.fields);
      res.json({ success: true, message });
    } catch (error) {
      logError("history dump failed", error);
      res.status(500).json({ error: `Failed to write ${dumpPath}` });
    }
  });

  app.post("/api/control", (req, res) => {
    const parsed = parseControlCommand(req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.error, request_id: parsed.requestId });
    }
    const response = applyControlCommand(engine, parsed.command, now());
    if (response.type === "error") {
      return res.status(400).json(response);
    }
    if (response.type === "frame") {
      broadcastFrame();
    }
    return res.json(response);
  });

  app.get("/api/status", (_req, res) => {
    res.json({
      sampler: sampler.status(),
      history: engine.historyInfo(),
      clients: clients.size,
    });
  });

  app.get("/api/capabilities", (_req, res) => {
    res.json(buildCapabilitiesPayload());
  });

  app.post("/api/shutdown", (_req, res) => {
    res.status(isShuttingDown() ? 202 : 200).json({ success: true, shuttingDown: true });
    if (!isShuttingDown()) {
      scheduleShutdown("api");
    }
  });

  return wss;
}
