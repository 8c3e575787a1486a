/**
 * Shared data model for the research pipeline, scan engine and monitor.
 */

export const TIME_RANGES = ["INTRADAY", "1D", "3D", "1W", "1M", "3M", "1Y"] as const;
export type TimeRange = (typeof TIME_RANGES)[number];

export const SCAN_INTENTS = ["UPWARD", "DOWNWARD", "ALL"] as const;
export type ScanIntent = (typeof SCAN_INTENTS)[number];

export interface Intent {
  symbol?: string;
  scanIntent?: ScanIntent;
  timeRange: TimeRange;
}

// ── Time series ────────────────────────────────────────────────────────────

export interface Bar {
  /** "YYYY-MM-DD" for daily bars, "YYYY-MM-DD HH:mm:ss" for intraday */
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface Provenance {
  source: "live" | "simulated";
  label: string;
  reason?: string;
}

export interface TimeSeries {
  symbol: string;
  timeRange: TimeRange;
  bars: Bar[];
  provenance: Provenance;
}

export interface ScanResult {
  symbol: string;
  price: number;
  changePct: number;
  source: Provenance["source"];
}

// ── Alerts ─────────────────────────────────────────────────────────────────

export type AlertType = "MARKET" | "NEWS";

export interface Alert {
  timestamp: string;
  type: AlertType;
  symbol: string;
  message: string;
  details: Record<string, unknown>;
}
