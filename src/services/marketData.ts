/**
 * Market data client
 * - Fetches an OHLCV series for one symbol through the gateway
 * - Trims oversized daily histories to the requested window
 * - Never fails: any error falls back to the mock series synthesizer
 */
import { z } from "zod";
import type { Bar, Provenance, TimeRange, TimeSeries } from "../types";
import type { Gateway } from "./gateway";
import { synthesizeSeries } from "./mockSeries";
import { errorMessage } from "../utils/text";

export interface MarketDataSource {
  fetch(symbol: string, timeRange: TimeRange): Promise<TimeSeries>;
}

const RANGE_DAYS: Record<Exclude<TimeRange, "INTRADAY">, number> = {
  "1D": 1,
  "3D": 3,
  "1W": 7,
  "1M": 30,
  "3M": 90,
  "1Y": 365,
};

export function rangeToDays(timeRange: TimeRange): number {
  return timeRange === "INTRADAY" ? 1 : RANGE_DAYS[timeRange];
}

// ── Collaborator response ──────────────────────────────────────────────────

const RawBarSchema = z.record(z.string(), z.union([z.string(), z.number()]));

const MetaSchema = z
  .object({
    Source: z.string().optional(),
    Information: z.string().optional(),
  })
  .passthrough();

export const MarketDataResponseSchema = z.object({
  status: z.string(),
  data: z.record(z.string(), RawBarSchema),
  meta_data: MetaSchema.optional(),
  meta: MetaSchema.optional(),
});

export type MarketDataResponse = z.infer<typeof MarketDataResponseSchema>;
type RawBar = z.infer<typeof RawBarSchema>;

// ── Parsing helpers ────────────────────────────────────────────────────────

function field(raw: RawBar, name: string): number {
  // Alpha Vantage style keys ("4. close"), with bare names accepted too
  const key = Object.keys(raw).find((k) => k === name || k.endsWith(`. ${name}`));
  if (key === undefined) return NaN;
  const value = raw[key];
  return typeof value === "number" ? value : parseFloat(value);
}

export function toBars(data: Record<string, RawBar>): Bar[] {
  const bars: Bar[] = [];
  for (const [timestamp, raw] of Object.entries(data)) {
    const bar: Bar = {
      timestamp,
      open: field(raw, "open"),
      high: field(raw, "high"),
      low: field(raw, "low"),
      close: field(raw, "close"),
      volume: Math.trunc(field(raw, "volume")),
    };
    if ([bar.open, bar.high, bar.low, bar.close, bar.volume].every(Number.isFinite)) {
      bars.push(bar);
    }
  }

  bars.sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
  return bars.filter((bar, i) => i === 0 || bar.timestamp !== bars[i - 1].timestamp);
}

/**
 * Keeps entries dated on or after `now - days`. Keys that don't parse as a
 * date are kept rather than dropped.
 */
export function filterByCutoff<T>(
  data: Record<string, T>,
  timeRange: TimeRange,
  now: Date
): Record<string, T> {
  const cutoff = now.getTime() - rangeToDays(timeRange) * 24 * 60 * 60 * 1000;
  const filtered: Record<string, T> = {};
  for (const [timestamp, value] of Object.entries(data)) {
    const ts = Date.parse(timestamp);
    if (Number.isNaN(ts) || ts >= cutoff) filtered[timestamp] = value;
  }
  return filtered;
}

function provenanceOf(response: MarketDataResponse): Provenance {
  const meta = response.meta_data ?? response.meta ?? {};
  const label = meta.Source ?? "Live API";
  if (/simulated|mock/i.test(label)) {
    return { source: "simulated", label, reason: meta.Information ?? "backend served simulated data" };
  }
  return { source: "live", label };
}

// ── Client ─────────────────────────────────────────────────────────────────

export interface MarketDataClientOptions {
  timeoutMs: number;
  now?: () => Date;
}

export class MarketDataClient implements MarketDataSource {
  private readonly now: () => Date;

  constructor(
    private readonly gateway: Gateway,
    private readonly options: MarketDataClientOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async fetch(symbol: string, timeRange: TimeRange): Promise<TimeSeries> {
    try {
      return await this.fetchLive(symbol, timeRange);
    } catch (err) {
      console.warn(`[MarketData] ${symbol} ${timeRange} failed (${errorMessage(err)}) — using simulated series`);
      return synthesizeSeries(symbol, timeRange, this.now(), errorMessage(err));
    }
  }

  private async fetchLive(symbol: string, timeRange: TimeRange): Promise<TimeSeries> {
    const raw = await this.gateway.call(
      "alpha_vantage_market_data",
      { symbol, time_range: timeRange },
      this.options.timeoutMs
    );

    const parsed = MarketDataResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`malformed market data response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    const response = parsed.data;
    if (response.status !== "success") {
      throw new Error(`market data status "${response.status}"`);
    }
    if (Object.keys(response.data).length === 0) {
      throw new Error("market data response was empty");
    }

    const data = timeRange === "INTRADAY"
      ? response.data
      : filterByCutoff(response.data, timeRange, this.now());

    return {
      symbol,
      timeRange,
      bars: toBars(data),
      provenance: provenanceOf(response),
    };
  }
}
