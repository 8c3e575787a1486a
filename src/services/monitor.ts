/**
 * Watchlist monitor
 *
 * On every scheduler tick: read the watchlist, then run one task per symbol
 * through a bounded pool. Each task does two independent checks:
 *   MARKET — intraday move from ~15 minutes ago (3 bars back) to the latest bar
 *   NEWS   — top headline matched against a keyword list
 * A failure in one symbol, or one check, never touches the others.
 */
import cron, { type ScheduledTask } from "node-cron";
import type { Alert } from "../types";
import type { AlertSink } from "./alertStore";
import type { MarketDataSource } from "./marketData";
import type { NewsSource, Headline } from "./news";
import { matchNewsKeyword } from "./news";
import type { WatchlistStore } from "./watchlist";
import { mapWithConcurrency } from "../utils/pool";
import { errorMessage } from "../utils/text";

/** 3 bars back at 5-minute spacing ≈ 15 minutes */
export const BASELINE_OFFSET = 3;

export interface MarketMove {
  price: number;
  change: number;
  timestamp: string;
}

export interface MonitorOptions {
  schedule: string;
  thresholdPct: number;
  concurrency: number;
  now?: () => Date;
}

export interface MonitorDeps {
  watchlist: WatchlistStore;
  marketData: MarketDataSource;
  news: NewsSource;
  sink: AlertSink;
}

export interface CycleSummary {
  symbols: number;
  alerts: number;
  failures: number;
}

export class WatchlistMonitor {
  private task: ScheduledTask | null = null;
  private readonly now: () => Date;
  // Last alerted bar timestamp and headline url per symbol
  private readonly lastMarketBar = new Map<string, string>();
  private readonly lastHeadline = new Map<string, string>();

  constructor(
    private readonly deps: MonitorDeps,
    private readonly options: MonitorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.task) return;
    if (!cron.validate(this.options.schedule)) {
      throw new Error(`Invalid monitor schedule "${this.options.schedule}"`);
    }
    this.task = cron.schedule(this.options.schedule, () => {
      this.tick().catch((err: unknown) => console.error("[Monitor] Cycle error:", errorMessage(err)));
    });
    console.log(
      `[Monitor] Started — schedule "${this.options.schedule}", price threshold ${this.options.thresholdPct}%`
    );
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  async tick(): Promise<CycleSummary> {
    const watchlist = (await this.deps.watchlist.read()) ?? [];
    if (watchlist.length === 0) {
      console.log("[Monitor] Watchlist is empty. Waiting...");
      return { symbols: 0, alerts: 0, failures: 0 };
    }

    const perSymbol = await mapWithConcurrency(watchlist, this.options.concurrency, (symbol) =>
      this.checkSymbol(symbol)
    );

    const summary = perSymbol.reduce<CycleSummary>(
      (acc, r) => ({ symbols: acc.symbols + 1, alerts: acc.alerts + r.alerts, failures: acc.failures + r.failures }),
      { symbols: 0, alerts: 0, failures: 0 }
    );
    console.log(`[Monitor] Cycle complete: ${summary.symbols} symbols, ${summary.alerts} alerts, ${summary.failures} failures`);
    return summary;
  }

  private async checkSymbol(symbol: string): Promise<{ alerts: number; failures: number }> {
    let alerts = 0;
    let failures = 0;

    try {
      const move = await this.checkMarket(symbol);
      const fresh = move !== null && this.lastMarketBar.get(symbol) !== move.timestamp;
      if (move && fresh && Math.abs(move.change) > this.options.thresholdPct) {
        await this.deps.sink.append(this.marketAlert(symbol, move));
        this.lastMarketBar.set(symbol, move.timestamp);
        alerts++;
      }
    } catch (err) {
      failures++;
      console.error(`[Monitor] Market check failed for ${symbol}:`, errorMessage(err));
    }

    try {
      const headline = await this.deps.news.topHeadline(symbol);
      if (headline && matchNewsKeyword(headline.title) && this.lastHeadline.get(symbol) !== headline.url) {
        await this.deps.sink.append(this.newsAlert(symbol, headline));
        this.lastHeadline.set(symbol, headline.url);
        alerts++;
      }
    } catch (err) {
      failures++;
      console.error(`[Monitor] News check failed for ${symbol}:`, errorMessage(err));
    }

    return { alerts, failures };
  }

  async checkMarket(symbol: string): Promise<MarketMove | null> {
    const series = await this.deps.marketData.fetch(symbol, "INTRADAY");
    const bars = series.bars;
    if (bars.length < BASELINE_OFFSET + 1) return null;

    const latest = bars[bars.length - 1];
    const baseline = bars[bars.length - 1 - BASELINE_OFFSET];
    if (baseline.close === 0) return null;

    return {
      price: latest.close,
      change: ((latest.close - baseline.close) / baseline.close) * 100,
      timestamp: latest.timestamp,
    };
  }

  private marketAlert(symbol: string, move: MarketMove): Alert {
    const direction = move.change > 0 ? "📈 UP" : "📉 DOWN";
    const sign = move.change > 0 ? "+" : "";
    const message = `${direction} ALERT: ${symbol} moved ${sign}${move.change.toFixed(2)}% to $${move.price.toFixed(2)}`;
    console.log(`[Monitor] ${message}`);
    return {
      timestamp: this.now().toISOString(),
      type: "MARKET",
      symbol,
      message,
      details: { ...move },
    };
  }

  private newsAlert(symbol: string, headline: Headline): Alert {
    const message = `📰 NEWS ALERT: ${symbol} - ${headline.title}`;
    console.log(`[Monitor] ${message}`);
    return {
      timestamp: this.now().toISOString(),
      type: "NEWS",
      symbol,
      message,
      details: { ...headline },
    };
  }
}
