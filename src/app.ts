import express, { type Express } from "express";
import cors from "cors";
import { requireAuth } from "./middleware/auth";
import { authRouter } from "./routes/auth";
import { alertsRouter } from "./routes/alerts";
import { researchRouter, type Broadcaster } from "./routes/research";
import { watchlistRouter } from "./routes/watchlist";
import type { AlertLog } from "./services/alertStore";
import type { ResearchRunner } from "./services/pipeline";
import type { WritableWatchlistStore } from "./services/watchlist";

export interface AppDeps {
  jwtSecret: string;
  passwordHash: string;
  pipeline: ResearchRunner;
  alerts: AlertLog;
  watchlist: WritableWatchlistStore;
  hub: Broadcaster;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());

  const auth = requireAuth(deps.jwtSecret);

  // ── Routes ──────────────────────────────────────────────────────────────
  app.use("/api/auth", authRouter({ jwtSecret: deps.jwtSecret, passwordHash: deps.passwordHash }));
  app.use("/api/research", auth, researchRouter(deps.pipeline, deps.hub));
  app.use("/api/alerts", auth, alertsRouter(deps.alerts));
  app.use("/api/watchlist", auth, watchlistRouter(deps.watchlist));

  // Health check
  app.get("/api/health", (_req, res) => res.json({ ok: true }));

  return app;
}
