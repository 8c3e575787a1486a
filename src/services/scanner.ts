/**
 * Scan engine
 * Runs the market data client across the watchlist, computes each symbol's
 * move over the fetched window and filters by direction.
 *
 * changePct is (last close − first open) / first open over whatever window
 * came back, not a true open-to-close daily change.
 */
import type { ScanIntent, ScanResult, TimeRange, TimeSeries } from "../types";
import type { MarketDataSource } from "./marketData";
import type { WatchlistStore } from "./watchlist";
import { mapWithConcurrency } from "../utils/pool";
import { errorMessage } from "../utils/text";

export interface ScanOutcome {
  status: string;
  intent: ScanIntent;
  results: ScanResult[];
}

const FILTERS: Record<ScanIntent, (changePct: number) => boolean> = {
  UPWARD: (c) => c > 0,
  DOWNWARD: (c) => c < 0,
  ALL: () => true,
};

/** Window change for a series, or null when there's nothing usable to measure. */
export function windowChange(series: TimeSeries): ScanResult | null {
  const first = series.bars[0];
  const last = series.bars[series.bars.length - 1];
  if (!first || !last || !(first.open > 0)) return null;

  const changePct = ((last.close - first.open) / first.open) * 100;
  if (!Number.isFinite(changePct)) return null;

  return {
    symbol: series.symbol,
    price: last.close,
    changePct,
    source: series.provenance.source,
  };
}

export class ScanEngine {
  constructor(
    private readonly marketData: MarketDataSource,
    private readonly concurrency = 4
  ) {}

  async scan(
    watchlist: readonly string[],
    intent: ScanIntent,
    timeRange: TimeRange = "INTRADAY"
  ): Promise<ScanResult[]> {
    const measured = await mapWithConcurrency(watchlist, this.concurrency, async (symbol) => {
      try {
        const result = windowChange(await this.marketData.fetch(symbol, timeRange));
        if (!result) console.warn(`[Scanner] ${symbol}: no usable bars — excluded`);
        return result;
      } catch (err) {
        console.error(`[Scanner] ${symbol}: ${errorMessage(err)} — excluded`);
        return null;
      }
    });

    const filter = FILTERS[intent];
    return measured
      .filter((r): r is ScanResult => r !== null && filter(r.changePct))
      .sort((a, b) => b.changePct - a.changePct);
  }

  async scanWatchlist(
    store: WatchlistStore,
    intent: ScanIntent,
    timeRange: TimeRange = "INTRADAY"
  ): Promise<ScanOutcome> {
    const watchlist = await store.read().catch((err: unknown) => {
      console.error("[Scanner] Watchlist read failed:", errorMessage(err));
      return null;
    });

    if (watchlist === null) return { status: "Watchlist not found.", intent, results: [] };
    if (watchlist.length === 0) return { status: "Watchlist is empty.", intent, results: [] };

    const results = await this.scan(watchlist, intent, timeRange);
    console.log(`[Scanner] ${intent}: ${results.length}/${watchlist.length} symbols matched`);
    return {
      status: `Scanned ${watchlist.length} symbols; ${results.length} matched ${intent}.`,
      intent,
      results,
    };
  }
}
