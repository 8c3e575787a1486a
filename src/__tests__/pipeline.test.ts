import { describe, it, expect, vi, beforeEach } from "vitest";
import { AnalysisPipeline, DEFAULT_PLAN_INSIGHTS, EMPTY_ANALYSIS, EMPTY_FRAME } from "../services/analysis";
import { IntentExtractor } from "../services/intent";
import { ResearchPipeline, STAGE_NAMES, type StageEvent } from "../services/pipeline";
import type { PortfolioResponse } from "../services/portfolio";
import { REFUSAL_MESSAGE, ReportWriter } from "../services/report";
import type { ResearchResponse } from "../services/research";
import { ScanEngine } from "../services/scanner";
import type { TimeSeries } from "../types";
import { FakeLlm, FakeMarketData, FakePortfolio, FakeResearch, liveSeries, researchHits, StaticWatchlist } from "./fakes";

const HOLDINGS: PortfolioResponse = {
  status: "success",
  generatedQuery: "SELECT symbol, shares FROM holdings WHERE symbol = 'AAPL'",
  data: [{ symbol: "AAPL", shares: 100 }],
};

function replies(intentJson: string) {
  return (prompt: string): string => {
    if (prompt.startsWith("Analyze the user's request")) return intentJson;
    if (prompt.includes("Market Scan Report")) return "SCAN REPORT";
    if (prompt.includes("expert financial data scientist")) return "no plan today";
    if (prompt.includes("Alpha Report")) return "ALPHA REPORT";
    return "";
  };
}

function setup(options: {
  intentJson: string;
  series?: Record<string, TimeSeries | Error>;
  watchlist?: string[] | null;
  research?: ResearchResponse;
}) {
  const llm = new FakeLlm(replies(options.intentJson));
  const marketData = new FakeMarketData(
    options.series ?? {
      AAPL: liveSeries("AAPL", [100, 101, 102, 103, 104]),
      A: liveSeries("A", [100, 105]),
      B: liveSeries("B", [100, 97]),
      C: liveSeries("C", [100, 100]),
    }
  );
  const research = new FakeResearch(options.research ?? researchHits("Apple beats earnings"));
  const portfolio = new FakePortfolio(HOLDINGS);
  const pipeline = new ResearchPipeline({
    intent: new IntentExtractor(llm),
    research,
    marketData,
    portfolio,
    scanner: new ScanEngine(marketData),
    watchlist: new StaticWatchlist(options.watchlist === undefined ? ["A", "B", "C"] : options.watchlist),
    analysis: new AnalysisPipeline(llm),
    reports: new ReportWriter(llm),
  });
  return { llm, marketData, research, portfolio, pipeline };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("ResearchPipeline — single symbol", () => {
  const task = "Give me an alpha report on Apple";

  it("runs every stage and writes an alpha report with its data source", async () => {
    const { pipeline, research, portfolio, marketData } = setup({
      intentJson: '{"symbol": "AAPL", "scan_intent": null, "time_range": "INTRADAY"}',
    });

    const { state, report } = await pipeline.run(task);

    expect(state.intent).toEqual({ symbol: "AAPL", timeRange: "INTRADAY" });
    expect(research.requests).toEqual([{ queries: [task], depth: "basic" }]);
    expect(marketData.requests).toEqual([{ symbol: "AAPL", timeRange: "INTRADAY" }]);
    expect(portfolio.questions).toEqual(["What is the current exposure to AAPL?"]);
    expect(state.frame?.rows).toHaveLength(5);

    expect(report.kind).toBe("singleSymbol");
    expect(report.text).toBe("ALPHA REPORT\n\n---\n_Market data source: Live API._");
    expect(report.insights).toBe(DEFAULT_PLAN_INSIGHTS);
    expect(report.charts).toHaveLength(2);
  });

  it("feeds the collected data into the alpha prompt", async () => {
    const { pipeline, llm } = setup({ intentJson: '{"symbol": "AAPL"}' });
    await pipeline.run(task);

    const alphaPrompt = llm.prompts[llm.prompts.length - 1];
    expect(alphaPrompt).toContain("Target Symbol: AAPL");
    expect(alphaPrompt).toContain("Apple beats earnings");
    expect(alphaPrompt).toContain('"shares":100');
    expect(alphaPrompt).toContain("Last close: 104.00");
  });

  it("reports started and completed for each stage in order", async () => {
    const { pipeline } = setup({ intentJson: '{"symbol": "AAPL"}' });
    const events: StageEvent[] = [];

    await pipeline.run(task, { onStage: (e) => events.push(e) });

    expect(events).toHaveLength(STAGE_NAMES.length * 2);
    expect(events[0]).toEqual({ stage: "extract_intent", status: "started" });
    expect(events.filter((e) => e.status === "completed").map((e) => e.stage)).toEqual([...STAGE_NAMES]);
  });

  it("refuses without a report call when no symbol is resolved", async () => {
    const { pipeline, llm, research, marketData, portfolio } = setup({
      intentJson: '{"symbol": null, "scan_intent": null, "time_range": "INTRADAY"}',
    });

    const { state, report } = await pipeline.run("Tell me about the weather");

    expect(report.text).toBe(REFUSAL_MESSAGE);
    expect(report.kind).toBe("refusal");
    // Intent extraction is the only model call
    expect(llm.prompts).toHaveLength(1);
    expect(research.requests).toHaveLength(1);
    expect(marketData.requests).toHaveLength(0);
    expect(portfolio.questions).toHaveLength(0);
    expect(state.marketData).toEqual({ kind: "skipped", reason: "No symbol resolved." });
    expect(state.portfolio).toEqual({ kind: "skipped", reason: "No symbol provided." });
  });

  it("refuses when both web research and market data come back empty", async () => {
    const { pipeline, llm } = setup({
      intentJson: '{"symbol": "ZZZZ"}',
      series: { ZZZZ: liveSeries("ZZZZ", []) },
      research: { status: "success", data: [] },
    });

    const { report } = await pipeline.run("What about ZZZZ?");

    expect(report.text).toBe(REFUSAL_MESSAGE);
    expect(llm.prompts).toHaveLength(1);
  });

  it("reports a failing stage and rethrows", async () => {
    const { pipeline } = setup({ intentJson: '{"symbol": "XYZ"}', series: { XYZ: new Error("backend down") } });
    const events: StageEvent[] = [];

    await expect(pipeline.run("XYZ?", { onStage: (e) => events.push(e) })).rejects.toThrow("backend down");
    expect(events[events.length - 1]).toMatchObject({ stage: "market_data", status: "failed", error: "backend down" });
  });
});

describe("ResearchPipeline — market scan", () => {
  it("scans the watchlist and skips the single-symbol stages", async () => {
    const { pipeline, llm, research, portfolio } = setup({
      intentJson: '{"symbol": null, "scan_intent": "UPWARD", "time_range": "INTRADAY"}',
    });

    const { state, report } = await pipeline.run("Which companies are going up?");

    expect(research.requests).toHaveLength(0);
    expect(portfolio.questions).toHaveLength(0);
    expect(state.webResearch).toEqual({
      kind: "skipped",
      reason: "Market scan initiated. Web research skipped for individual stock.",
    });
    expect(state.frame).toEqual(EMPTY_FRAME);
    expect(state.analysis).toEqual(EMPTY_ANALYSIS);

    expect(report.kind).toBe("marketScan");
    expect(report.text).toBe("SCAN REPORT");
    expect(llm.prompts).toHaveLength(2);
    expect(llm.prompts[1]).toContain('[{"symbol":"A","price":105,"change_pct":5}]');
  });

  it("passes the watchlist status to the report when the list is missing", async () => {
    const { pipeline, llm } = setup({ intentJson: '{"scan_intent": "ALL"}', watchlist: null });

    const { state } = await pipeline.run("scan the market");

    expect(state.marketData).toEqual({
      kind: "scan",
      scan: { status: "Watchlist not found.", intent: "ALL", results: [] },
    });
    expect(llm.prompts[1]).toContain("Scan status: Watchlist not found.");
  });
});
