/**
 * Mock series synthesizer
 *
 * Deterministic stand-in for the market-data backend. Seeded from
 * "<symbol>_<YYYY-MM-DD>", so a symbol/range pair returns the same series
 * all day and a different one tomorrow.
 */
import type { Bar, TimeRange, TimeSeries } from "../types";
import { hashString, seededRandom, uniform } from "../utils/random";

const FIVE_MINUTES_MS = 5 * 60 * 1000;
const ONE_DAY_MS = 24 * 60 * 60 * 1000;

const POINT_COUNTS: Record<TimeRange, number> = {
  INTRADAY: 100,
  "1D": 1,
  "3D": 3,
  "1W": 7,
  "1M": 30,
  "3M": 90,
  "1Y": 365,
};

// Substring match, so share classes like GOOGL pick up the GOOG price
const BASE_PRICE_OVERRIDES: Array<[string, number]> = [
  ["AAPL", 150],
  ["TSLA", 250],
  ["NVDA", 450],
  ["MSFT", 350],
  ["GOOG", 130],
  ["AMZN", 140],
];

export const SIMULATED_LABEL = "Simulated (Fallback)";

export function charCodeSum(symbol: string): number {
  let sum = 0;
  for (let i = 0; i < symbol.length; i++) sum += symbol.charCodeAt(i);
  return sum;
}

export function basePriceFor(symbol: string): number {
  let base = (charCodeSum(symbol) % 500) + 50;
  for (const [ticker, price] of BASE_PRICE_OVERRIDES) {
    if (symbol.includes(ticker)) base = price;
  }
  return base;
}

export function utcDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function formatTimestamp(date: Date, intraday: boolean): string {
  const iso = date.toISOString();
  return intraday ? `${iso.slice(0, 10)} ${iso.slice(11, 19)}` : iso.slice(0, 10);
}

const round2 = (n: number) => Math.round(n * 100) / 100;

export function synthesizeSeries(
  symbol: string,
  timeRange: TimeRange,
  now: Date,
  cause = "market data unavailable"
): TimeSeries {
  const day = utcDateString(now);
  const rand = seededRandom(`${symbol}_${day}`);

  const checksum = charCodeSum(symbol);
  // Shifts the whole day's level by [0, 10)
  const dailyOffset = (hashString(day) % 100) / 10;
  const basePrice = basePriceFor(symbol) + dailyOffset;
  const trendDirection = checksum % 2 === 0 ? 1 : -1;
  const volatility = basePrice * 0.02;
  const trendStrength = basePrice * 0.001;

  const intraday = timeRange === "INTRADAY";
  const count = POINT_COUNTS[timeRange];
  const step = intraday ? FIVE_MINUTES_MS : ONE_DAY_MS;
  const anchor = intraday
    ? Math.floor(now.getTime() / FIVE_MINUTES_MS) * FIVE_MINUTES_MS
    : Date.parse(day);

  const bars: Bar[] = [];
  let price = basePrice;

  for (let i = 0; i < count; i++) {
    const noise = uniform(rand, -volatility, volatility);
    // Two cycles layered on the walk keep short ranges from looking linear
    const slowCycle = basePrice * 0.02 * Math.sin(i / 8);
    const fastCycle = basePrice * 0.01 * Math.sin(i / 3);
    price += noise + trendDirection * trendStrength;
    const level = Math.max(1, price + slowCycle + fastCycle);

    const close = Math.max(1, round2(level + uniform(rand, -0.1, 0.1)));
    const volume = Math.floor(uniform(rand, 100_000, 5_000_000));

    bars.push({
      timestamp: formatTimestamp(new Date(anchor - step * (count - i - 1)), intraday),
      open: round2(level),
      high: round2(level + volatility * 0.3),
      low: round2(Math.max(0.01, level - volatility * 0.3)),
      close,
      volume,
    });
  }

  return {
    symbol,
    timeRange,
    bars,
    provenance: {
      source: "simulated",
      label: SIMULATED_LABEL,
      reason: `Mock data (${timeRange}) generated because ${cause}`,
    },
  };
}
