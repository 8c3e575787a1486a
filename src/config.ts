import dotenv from "dotenv";
dotenv.config();

type Env = Record<string, string | undefined>;

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function float(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? "");
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** Which process owns the watchlist monitor, and with it every write to the alert log. */
const MONITOR_HOSTS = ["server", "standalone", "off"] as const;
type MonitorHost = (typeof MONITOR_HOSTS)[number];

function monitorHost(value: string | undefined): MonitorHost {
  return MONITOR_HOSTS.find((h) => h === value?.trim().toLowerCase()) ?? "server";
}

export function loadConfig(env: Env = process.env) {
  return {
    port: int(env.PORT, 3001),
    nodeEnv: env.NODE_ENV ?? "development",
    jwtSecret: env.JWT_SECRET ?? "dev_secret_change_me",
    dashboardPasswordHash: env.DASHBOARD_PASSWORD_HASH ?? "",
    // Request router in front of the research, market-data and portfolio backends
    gatewayUrl: env.GATEWAY_URL ?? "http://127.0.0.1:8000/route_agent_request",
    marketDataTimeoutMs: int(env.MARKET_DATA_TIMEOUT_MS, 30_000),
    researchTimeoutMs: int(env.RESEARCH_TIMEOUT_MS, 30_000),
    // Portfolio questions go through a local text-to-SQL model, which is slow
    portfolioTimeoutMs: int(env.PORTFOLIO_TIMEOUT_MS, 180_000),
    // Anthropic integration
    anthropicApiKey: env.ANTHROPIC_API_KEY ?? "",
    reportModel: env.REPORT_MODEL ?? "claude-3-5-haiku-latest",
    llmTimeoutMs: int(env.LLM_TIMEOUT_MS, 60_000),
    // Shared stores
    watchlistFile: env.WATCHLIST_FILE ?? "data/watchlist.json",
    alertsFile: env.ALERTS_FILE ?? "data/alerts.json",
    alertLogLimit: int(env.ALERT_LOG_LIMIT, 100),
    // Watchlist monitor
    // One writer per alert file: the API server and `npm run monitor` never both run it
    monitorHost: monitorHost(env.MONITOR_HOST),
    monitorSchedule: env.MONITOR_SCHEDULE ?? "*/10 * * * * *",
    priceAlertThresholdPct: float(env.PRICE_ALERT_THRESHOLD_PCT, 0.5),
    fanoutConcurrency: Math.max(1, int(env.FANOUT_CONCURRENCY, 4)),
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
