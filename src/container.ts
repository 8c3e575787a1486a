/**
 * Wires every service from one AppConfig. Both entry points (API server and
 * standalone monitor) build from here so they share the same stores.
 */
import type { AppConfig } from "./config";
import { FanoutAlertSink, FileAlertStore, type AlertSink } from "./services/alertStore";
import { AnalysisPipeline } from "./services/analysis";
import { HttpGateway } from "./services/gateway";
import { IntentExtractor } from "./services/intent";
import { AnthropicLlm } from "./services/llm";
import { MarketDataClient } from "./services/marketData";
import { WatchlistMonitor } from "./services/monitor";
import { NewsClient } from "./services/news";
import { ResearchPipeline } from "./services/pipeline";
import { PortfolioClient } from "./services/portfolio";
import { ReportWriter } from "./services/report";
import { WebResearchClient } from "./services/research";
import { ScanEngine } from "./services/scanner";
import { FileWatchlistStore } from "./services/watchlist";

export function buildServices(config: AppConfig, extraSinks: AlertSink[] = []) {
  const gateway = new HttpGateway(config.gatewayUrl);
  const llm = new AnthropicLlm({
    apiKey: config.anthropicApiKey,
    model: config.reportModel,
    timeoutMs: config.llmTimeoutMs,
  });

  const marketData = new MarketDataClient(gateway, { timeoutMs: config.marketDataTimeoutMs });
  const research = new WebResearchClient(gateway, config.researchTimeoutMs);
  const portfolio = new PortfolioClient(gateway, config.portfolioTimeoutMs);
  const watchlist = new FileWatchlistStore(config.watchlistFile);
  const alerts = new FileAlertStore(config.alertsFile, config.alertLogLimit);
  const scanner = new ScanEngine(marketData, config.fanoutConcurrency);

  const pipeline = new ResearchPipeline({
    intent: new IntentExtractor(llm),
    research,
    marketData,
    portfolio,
    scanner,
    watchlist,
    analysis: new AnalysisPipeline(llm),
    reports: new ReportWriter(llm),
  });

  const monitor = new WatchlistMonitor(
    {
      watchlist,
      marketData,
      news: new NewsClient(research),
      sink: extraSinks.length > 0 ? new FanoutAlertSink([alerts, ...extraSinks]) : alerts,
    },
    {
      schedule: config.monitorSchedule,
      thresholdPct: config.priceAlertThresholdPct,
      concurrency: config.fanoutConcurrency,
    }
  );

  return { pipeline, monitor, watchlist, alerts };
}
