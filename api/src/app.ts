// api/src/app.ts
import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import { PlacementExecutor } from "./lib/panels/executor";
import type { PanelStore } from "./lib/panels/store";
import { flagOrphanedWires, type WiringGuard } from "./lib/panels/wiringGuard";

/* Routers */
import devicesRouter from "./routes/devices";
import panelsRouter from "./routes/panels";
import templatesRouter from "./routes/templates";
import wiringRouter from "./routes/wiring";

export interface AppOptions {
  store: PanelStore;
  guard?: WiringGuard;
  /** Browser origins allowed to call the API. Empty allows same-origin and non-browser callers only. */
  webOrigins?: readonly string[];
}

function normalizeOrigin(origin: string) {
  return origin.replace(/^https?:\/\//, "").replace(/\/$/, "");
}

export function createApp({ store, guard = flagOrphanedWires, webOrigins = [] }: AppOptions) {
  const app = express();
  const executor = new PlacementExecutor(store, guard);

  /** ---------- CORS (configured origins + localhost outside production) ---------- */
  const allowed = new Set(webOrigins.map(normalizeOrigin));
  const corsOptions: cors.CorsOptions = {
    origin(origin, cb) {
      if (!origin) return cb(null, true); // same-origin / curl
      const norm = normalizeOrigin(origin);
      if (allowed.has(norm)) return cb(null, true);

      const isProd = process.env.NODE_ENV === "production";
      if (!isProd && (norm.startsWith("localhost") || norm.startsWith("127.0.0.1"))) {
        return cb(null, true);
      }

      cb(new Error(`CORS: origin not allowed: ${origin}`));
    },
    credentials: true,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Requested-With"],
  };
  app.use(cors(corsOptions));

  /** Parsers */
  app.use(express.json({ limit: "1mb" }));

  /** Healthchecks */
  app.get("/healthz", (_req, res) => res.send("ok"));

  app.use("/panels", panelsRouter(store));
  app.use("/devices", devicesRouter(executor));
  app.use("/templates", templatesRouter(store));
  app.use("/wiring", wiringRouter(store));

  app.use((_req, res) => {
    res.status(404).json({ error: "not_found" });
  });

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    if (err instanceof SyntaxError) return res.status(400).json({ error: "invalid_json" });
    console.error(`[server] unhandled error on ${req.method} ${req.path}:`, err);
    res.status(500).json({ error: "internal_error" });
  };
  app.use(onError);

  return app;
}
