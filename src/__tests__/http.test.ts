import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from "vitest";
import http from "http";
import bcrypt from "bcryptjs";
import { createApp } from "../app";
import { signToken } from "../middleware/auth";
import type { AlertLog } from "../services/alertStore";
import type { PipelineResult, ResearchRunner, RunOptions } from "../services/pipeline";
import { REFUSAL_MESSAGE } from "../services/report";
import type { WritableWatchlistStore } from "../services/watchlist";
import type { Alert } from "../types";

const SECRET = "test-secret";
const PASSWORD = "test-password";

const alerts: Alert[] = [
  { timestamp: "2024-03-15T15:00:02.000Z", type: "NEWS", symbol: "MSFT", message: "news", details: {} },
  { timestamp: "2024-03-15T15:00:01.000Z", type: "MARKET", symbol: "AAPL", message: "up", details: {} },
];

class MemoryAlertLog implements AlertLog {
  async append(alert: Alert): Promise<void> {
    alerts.unshift(alert);
  }
  async list(limit = 100): Promise<Alert[]> {
    return alerts.slice(0, limit);
  }
}

class MemoryWatchlist implements WritableWatchlistStore {
  symbols: string[] | null = ["AAPL"];
  async read(): Promise<string[] | null> {
    return this.symbols;
  }
  async write(symbols: readonly string[]): Promise<string[]> {
    this.symbols = symbols.map((s) => s.trim().toUpperCase());
    return this.symbols;
  }
}

class StubRunner implements ResearchRunner {
  async run(task: string, options: RunOptions = {}): Promise<PipelineResult> {
    options.onStage?.({ stage: "extract_intent", status: "started" });
    const report = { kind: "refusal" as const, text: REFUSAL_MESSAGE, insights: "", charts: [], skippedCharts: [] };
    return { state: { task, intent: { timeRange: "INTRADAY" }, report }, report };
  }
}

const hub = { broadcast: vi.fn() };
const watchlist = new MemoryWatchlist();
let server: http.Server;
let baseUrl: string;
const token = signToken("dashboard", SECRET);

function api(pathname: string, init: RequestInit = {}, auth = true): Promise<Response> {
  return fetch(`${baseUrl}${pathname}`, {
    ...init,
    headers: {
      "Content-Type": "application/json",
      ...(auth ? { Authorization: `Bearer ${token}` } : {}),
    },
  });
}

beforeAll(async () => {
  const app = createApp({
    jwtSecret: SECRET,
    passwordHash: bcrypt.hashSync(PASSWORD, 4),
    pipeline: new StubRunner(),
    alerts: new MemoryAlertLog(),
    watchlist,
    hub,
  });
  server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  hub.broadcast.mockClear();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

describe("HTTP API", () => {
  it("answers the health check without auth", async () => {
    const res = await api("/api/health", {}, false);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("rejects requests without a bearer token", async () => {
    const res = await api("/api/alerts", {}, false);
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "Unauthorized" });
  });

  it("issues a token for the dashboard password", async () => {
    const wrong = await api("/api/auth/login", { method: "POST", body: JSON.stringify({ password: "nope" }) }, false);
    expect(wrong.status).toBe(401);

    const res = await api("/api/auth/login", { method: "POST", body: JSON.stringify({ password: PASSWORD }) }, false);
    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toEqual({ token: expect.any(String) });
  });

  it("lists alerts newest first with an optional symbol filter", async () => {
    const all = await api("/api/alerts?limit=1");
    expect(await all.json()).toEqual([alerts[0]]);

    const aapl = await api("/api/alerts?symbol=aapl");
    expect(await aapl.json()).toEqual([alerts[1]]);

    const bad = await api("/api/alerts?limit=0");
    expect(bad.status).toBe(400);
  });

  it("reads and replaces the watchlist", async () => {
    const before = await api("/api/watchlist");
    expect(await before.json()).toEqual({ exists: true, symbols: ["AAPL"] });

    const put = await api("/api/watchlist", { method: "PUT", body: JSON.stringify({ symbols: ["tsla", "nvda"] }) });
    expect(await put.json()).toEqual({ exists: true, symbols: ["TSLA", "NVDA"] });

    const invalid = await api("/api/watchlist", { method: "PUT", body: JSON.stringify({ symbols: "TSLA" }) });
    expect(invalid.status).toBe(400);
  });

  it("runs research and streams stage events to the research channel", async () => {
    const res = await api("/api/research", { method: "POST", body: JSON.stringify({ task: "Analyze nothing" }) });

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ runId: expect.any(String), report: { kind: "refusal", text: REFUSAL_MESSAGE } });
    expect(hub.broadcast).toHaveBeenCalledWith(
      "research",
      expect.objectContaining({ type: "stage", stage: "extract_intent", status: "started" })
    );
    expect(hub.broadcast).toHaveBeenCalledWith(
      "research",
      expect.objectContaining({ type: "report", kind: "refusal" })
    );
  });

  it("rejects an empty research task", async () => {
    const res = await api("/api/research", { method: "POST", body: JSON.stringify({ task: "  " }) });
    expect(res.status).toBe(400);
  });
});
