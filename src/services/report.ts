/**
 * Report synthesis
 *
 * The market-data outcome decides the report shape once (ReportInput):
 *   marketScan   — table of watchlist movers
 *   singleSymbol — the full "Alpha Report", guarded by a fixed refusal when
 *                  there is nothing to report on
 * Every external text block is truncated before it goes into a prompt.
 */
import type { Provenance, TimeSeries } from "../types";
import type { AnalysisResult, Chart, SkippedChart } from "./analysis";
import type { LlmClient } from "./llm";
import type { PortfolioResponse } from "./portfolio";
import { hasResearchContent, type ResearchResponse } from "./research";
import type { ScanOutcome } from "./scanner";
import { errorMessage, truncate } from "../utils/text";

export const REFUSAL_MESSAGE = "I am not sure about this company as I could not find sufficient data.";
export const REPORT_UNAVAILABLE_MESSAGE =
  "The report could not be generated because the language model did not respond. The collected data is attached below.";

export const REPORT_BUDGETS = {
  web: 3000,
  market: 2000,
  portfolio: 2000,
  scan: 4000,
} as const;

// ── Stage outcomes ─────────────────────────────────────────────────────────

export interface Skipped {
  kind: "skipped";
  reason: string;
}

export type ResearchOutcome = Skipped | { kind: "results"; response: ResearchResponse };
export type PortfolioOutcome = Skipped | { kind: "results"; response: PortfolioResponse };
export type MarketDataOutcome =
  | Skipped
  | { kind: "series"; series: TimeSeries }
  | { kind: "scan"; scan: ScanOutcome };

export type ReportInput =
  | { kind: "marketScan"; task: string; scan: ScanOutcome }
  | {
      kind: "singleSymbol";
      task: string;
      symbol?: string;
      webResearch?: ResearchOutcome;
      series?: TimeSeries;
      portfolio?: PortfolioOutcome;
      analysis?: AnalysisResult;
    };

export interface Report {
  kind: "singleSymbol" | "marketScan" | "refusal" | "unavailable";
  text: string;
  insights: string;
  charts: Chart[];
  skippedCharts: SkippedChart[];
  dataSource?: Provenance;
}

// ── Formatting ─────────────────────────────────────────────────────────────

const pct = (n: number) => `${n > 0 ? "+" : ""}${n.toFixed(2)}%`;

export function summarizeSeries(series: TimeSeries): string {
  const { bars, provenance } = series;
  const source = `Source: ${provenance.label} [${provenance.source}]${provenance.reason ? ` — ${provenance.reason}` : ""}`;
  if (bars.length === 0) {
    return [`Symbol: ${series.symbol} (${series.timeRange})`, source, "No market data points returned."].join("\n");
  }

  const first = bars[0];
  const last = bars[bars.length - 1];
  const high = Math.max(...bars.map((b) => b.high));
  const low = Math.min(...bars.map((b) => b.low));
  const avgVolume = bars.reduce((s, b) => s + b.volume, 0) / bars.length;
  const change = first.open > 0 ? ((last.close - first.open) / first.open) * 100 : 0;

  return [
    `Symbol: ${series.symbol} (${series.timeRange})`,
    source,
    `Points: ${bars.length} (${first.timestamp} → ${last.timestamp})`,
    `First open: ${first.open.toFixed(2)}`,
    `Last close: ${last.close.toFixed(2)}`,
    `Window change: ${pct(change)}`,
    `High: ${high.toFixed(2)}`,
    `Low: ${low.toFixed(2)}`,
    `Average volume: ${Math.round(avgVolume)}`,
  ].join("\n");
}

export function formatResearch(outcome: ResearchOutcome | undefined): string {
  if (!outcome) return "Not available.";
  if (outcome.kind === "skipped") return outcome.reason;
  const { response } = outcome;
  if (response.status !== "success") return `Web research unavailable: ${response.error ?? response.status}`;

  return response.data
    .map((q) =>
      [`Query: ${q.query}`, ...q.results.map((hit) => `- ${hit.title} (${hit.url}): ${hit.content}`)].join("\n")
    )
    .join("\n\n");
}

export function formatPortfolio(outcome: PortfolioOutcome | undefined): string {
  if (!outcome) return "Not available.";
  if (outcome.kind === "skipped") return outcome.reason;
  const { response } = outcome;
  if (response.status !== "success") return `Portfolio data unavailable: ${response.error ?? response.status}`;
  if (response.data.length === 0) return "No holdings found for this symbol.";
  return JSON.stringify(response.data);
}

export function provenanceFooter(provenance: Provenance): string {
  const reason = provenance.reason ? ` (${provenance.reason})` : "";
  return `\n\n---\n_Market data source: ${provenance.label}${reason}._`;
}

// ── Prompts ────────────────────────────────────────────────────────────────

export function buildScanPrompt(task: string, scan: ScanOutcome): string {
  const results = scan.results.map((r) => ({
    symbol: r.symbol,
    price: Number(r.price.toFixed(2)),
    change_pct: Number(r.changePct.toFixed(2)),
  }));

  return `You are a senior financial analyst. The user requested a market scan: "${task}".

Scan status: ${scan.status}
Scan Results (from Watchlist, sorted by % change):
${truncate(results, REPORT_BUDGETS.scan)}

Generate a "Market Scan Report".
1. Summary: briefly explain the criteria (${scan.intent}) and the overall market status based on these results.
2. Results Table: a markdown table with columns Symbol | Price | % Change.
3. Conclusion: highlight the most significant movers.`;
}

export function buildAlphaPrompt(input: Extract<ReportInput, { kind: "singleSymbol" }>): string {
  const web = truncate(formatResearch(input.webResearch), REPORT_BUDGETS.web);
  const market = truncate(input.series ? summarizeSeries(input.series) : "Not available.", REPORT_BUDGETS.market);
  const portfolio = truncate(formatPortfolio(input.portfolio), REPORT_BUDGETS.portfolio);
  const insights = input.analysis?.insights || "Not available.";

  return `You are a senior financial analyst writing a comprehensive "Alpha Report".
Synthesize all available information into a structured report.

Original User Task: ${input.task}
Target Symbol: ${input.symbol ?? "Unknown"}
---
Available Information:
- Web Intelligence: ${web}
- Market Data Summary: ${market}
- Deep-Dive Data Analysis Insights: ${insights}
- Internal Portfolio Context: ${portfolio}
---

CRITICAL INSTRUCTION:
If the Web Intelligence and Market Data contain no meaningful information about the company, respond with exactly:
"${REFUSAL_MESSAGE}"
and nothing else.

Otherwise write the "Alpha Report" with these sections, concise and citing sources:
1. Summary: key findings and the current situation.
2. Internal Context: the firm's current exposure. If the firm holds shares, show a markdown table (Symbol | Shares | Average Cost); if it holds none, say so in one sentence and do not draw a table.
3. Market Data: key data points as a markdown table (Metric | Value | Implication). Say whether the data is live or simulated.
4. Real-Time Intelligence: significant news and any relevant filings, with sources.
5. Sentiment Analysis: "Positive", "Negative" or "Neutral" with a brief explanation.
6. Synthesis: actionable insights and conclusions.`;
}

// ── Input selection ────────────────────────────────────────────────────────

export function toReportInput(state: {
  task: string;
  intent?: { symbol?: string };
  webResearch?: ResearchOutcome;
  marketData?: MarketDataOutcome;
  portfolio?: PortfolioOutcome;
  analysis?: AnalysisResult;
}): ReportInput {
  if (state.marketData?.kind === "scan") {
    return { kind: "marketScan", task: state.task, scan: state.marketData.scan };
  }
  return {
    kind: "singleSymbol",
    task: state.task,
    symbol: state.intent?.symbol,
    webResearch: state.webResearch,
    series: state.marketData?.kind === "series" ? state.marketData.series : undefined,
    portfolio: state.portfolio,
    analysis: state.analysis,
  };
}

export function hasSufficientData(input: Extract<ReportInput, { kind: "singleSymbol" }>): boolean {
  if (!input.symbol) return false;
  const webContent = input.webResearch?.kind === "results" && hasResearchContent(input.webResearch.response);
  const marketContent = (input.series?.bars.length ?? 0) > 0;
  return webContent || marketContent;
}

// ── Writer ─────────────────────────────────────────────────────────────────

export class ReportWriter {
  constructor(private readonly llm: LlmClient) {}

  async write(input: ReportInput): Promise<Report> {
    return input.kind === "marketScan" ? this.writeScan(input) : this.writeAlpha(input);
  }

  private async writeScan(input: Extract<ReportInput, { kind: "marketScan" }>): Promise<Report> {
    const base = { insights: "", charts: [], skippedCharts: [] };
    const simulated = input.scan.results.filter((r) => r.source === "simulated").map((r) => r.symbol);
    const footer = simulated.length > 0
      ? `\n\n---\n_Market data source: simulated (fallback) series for ${simulated.join(", ")}._`
      : "";

    try {
      const text = await this.llm.complete(buildScanPrompt(input.task, input.scan), { maxTokens: 1500 });
      return { ...base, kind: "marketScan", text: text + footer };
    } catch (err) {
      console.error("[Report] Scan report failed:", errorMessage(err));
      return { ...base, kind: "unavailable", text: `${REPORT_UNAVAILABLE_MESSAGE}\n\n${input.scan.status}${footer}` };
    }
  }

  private async writeAlpha(input: Extract<ReportInput, { kind: "singleSymbol" }>): Promise<Report> {
    const base = {
      insights: input.analysis?.insights ?? "",
      charts: input.analysis?.charts ?? [],
      skippedCharts: input.analysis?.skipped ?? [],
      dataSource: input.series?.provenance,
    };

    if (!hasSufficientData(input)) {
      console.warn(`[Report] Insufficient data for "${input.task}" — refusing`);
      return { kind: "refusal", text: REFUSAL_MESSAGE, insights: "", charts: [], skippedCharts: [] };
    }

    const footer = input.series ? provenanceFooter(input.series.provenance) : "";
    let text: string;
    try {
      text = await this.llm.complete(buildAlphaPrompt(input), { maxTokens: 2500 });
    } catch (err) {
      console.error("[Report] Alpha report failed:", errorMessage(err));
      const market = input.series ? summarizeSeries(input.series) : "";
      return { ...base, kind: "unavailable", text: `${REPORT_UNAVAILABLE_MESSAGE}\n\n${market}`.trim() };
    }

    if (text.trim() === REFUSAL_MESSAGE) {
      return { kind: "refusal", text: REFUSAL_MESSAGE, insights: "", charts: [], skippedCharts: [] };
    }
    return { ...base, kind: "singleSymbol", text: text + footer };
  }
}
