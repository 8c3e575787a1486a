import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  AnalysisPipeline,
  decodePlan,
  defaultPlan,
  DEFAULT_PLAN_INSIGHTS,
  EMPTY_FRAME,
  frameFromSeries,
  histogram,
  profileFrame,
  renderCharts,
} from "../services/analysis";
import { FakeLlm, liveSeries } from "./fakes";

const frame = frameFromSeries(liveSeries("AAPL", [100, 101, 102.5, 103, 104]));

const PLAN = JSON.stringify({
  insights: ["Price rose steadily.", "Volume was flat."],
  visualizations: [
    { type: "line", columns: ["timestamp", "close"], title: "Close" },
    { type: "histogram", columns: ["volume"], title: "Volume" },
    { type: "scatter", columns: ["open", "sentiment"], title: "Sentiment" },
  ],
});

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("profileFrame", () => {
  it("types the OHLCV columns", () => {
    const profile = profileFrame(frame);
    expect(profile.rowCount).toBe(5);
    expect(profile.columnTypes).toEqual({
      timestamp: "datetime",
      open: "float",
      high: "float",
      low: "float",
      close: "float",
      volume: "integer",
    });
    expect(profile.datetimeColumns).toEqual(["timestamp"]);
    expect(profile.numericColumns).toEqual(["open", "high", "low", "close", "volume"]);
  });
});

describe("decodePlan", () => {
  it("accepts either type or chart_type and names untitled charts", () => {
    const plan = decodePlan(
      '```json\n{"insights": [], "visualizations": [{"chart_type": "LINE", "columns": ["close"]}]}\n```'
    );
    expect(plan?.visualizations).toEqual([{ chartType: "line", columns: ["close"], title: "Chart 1" }]);
  });

  it("drops malformed entries without losing the rest", () => {
    const plan = decodePlan(
      '{"insights": ["x"], "visualizations": [{"type": "bar", "columns": ["volume"], "title": "Vol"}, {"type": "line"}]}'
    );
    expect(plan?.visualizations).toHaveLength(1);
    expect(plan?.dropped).toEqual([{ title: "Chart 2", reason: "malformed plan entry" }]);
  });

  it("returns null for unparseable output", () => {
    expect(decodePlan("I could not produce a plan.")).toBeNull();
    expect(decodePlan('{"insights": "not a list", "visualizations": []}')).toBeNull();
  });
});

describe("renderCharts", () => {
  it("skips a chart with a missing column and renders the others", () => {
    const { charts, skipped } = renderCharts(frame, [
      { chartType: "line", columns: ["timestamp", "close"], title: "Close" },
      { chartType: "scatter", columns: ["open", "sentiment"], title: "Sentiment" },
    ]);
    expect(charts).toHaveLength(1);
    expect(skipped).toEqual([{ title: "Sentiment", reason: "missing column(s): sentiment" }]);
  });

  it("plots a single-column line over the datetime column", () => {
    const { charts } = renderCharts(frame, [{ chartType: "bar", columns: ["CLOSE"], title: "Close" }]);
    expect(charts[0]).toEqual({
      type: "bar",
      title: "Close",
      x: "timestamp",
      y: "close",
      points: [
        { x: "2024-03-15 10:00:00", y: 100 },
        { x: "2024-03-15 10:05:00", y: 101 },
        { x: "2024-03-15 10:10:00", y: 102.5 },
        { x: "2024-03-15 10:15:00", y: 103 },
        { x: "2024-03-15 10:20:00", y: 104 },
      ],
    });
  });

  it("records unsupported types, wrong arity and non-numeric columns", () => {
    const { charts, skipped } = renderCharts(frame, [
      { chartType: "pie", columns: ["close"], title: "Pie" },
      { chartType: "scatter", columns: ["close"], title: "Lonely" },
      { chartType: "histogram", columns: ["timestamp"], title: "Times" },
    ]);
    expect(charts).toEqual([]);
    expect(skipped).toEqual([
      { title: "Pie", reason: 'unsupported chart type "pie"' },
      { title: "Lonely", reason: "scatter takes 2 columns, got 1" },
      { title: "Times", reason: 'column "timestamp" is not numeric' },
    ]);
  });
});

describe("histogram", () => {
  it("splits the range into equal-width bins", () => {
    expect(histogram([1, 2, 3, 4], 2)).toEqual([
      { start: 1, end: 2.5, count: 2 },
      { start: 2.5, end: 4, count: 2 },
    ]);
  });

  it("uses one bin when every value is equal", () => {
    expect(histogram([1000, 1000, 1000])).toEqual([{ start: 1000, end: 1000, count: 3 }]);
  });

  it("defaults to 20 bins", () => {
    expect(histogram([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10])).toHaveLength(20);
  });
});

describe("AnalysisPipeline", () => {
  it("renders the planned charts and bullets the insights", async () => {
    const result = await new AnalysisPipeline(new FakeLlm(() => PLAN)).run(frame);

    expect(result.insights).toBe("* Price rose steadily.\n* Volume was flat.");
    expect(result.visualizations).toHaveLength(3);
    expect(result.charts.map((c) => c.title)).toEqual(["Close", "Volume"]);
    expect(result.skipped).toEqual([{ title: "Sentiment", reason: "missing column(s): sentiment" }]);
  });

  it("falls back to the default plan when the planner output is garbage", async () => {
    const result = await new AnalysisPipeline(new FakeLlm(() => "Sorry, no JSON today.")).run(frame);

    expect(result.insights).toBe(DEFAULT_PLAN_INSIGHTS);
    expect(result.charts.map((c) => c.title)).toEqual([
      "Closing Price Over Time (Default)",
      "Trading Volume (Default)",
    ]);
    expect(result.skipped).toEqual([]);
  });

  it("falls back to the default plan when the planner call fails", async () => {
    const llm = new FakeLlm(() => {
      throw new Error("timeout");
    });
    const result = await new AnalysisPipeline(llm).run(frame);
    expect(result.charts).toHaveLength(2);
  });

  it("skips the planner for an empty frame", async () => {
    const llm = new FakeLlm(() => PLAN);
    const result = await new AnalysisPipeline(llm).run(EMPTY_FRAME);

    expect(result).toEqual({ insights: "No data available for analysis.", visualizations: [], charts: [], skipped: [] });
    expect(llm.prompts).toHaveLength(0);
  });

  it("default plan draws close over the first datetime column", () => {
    expect(defaultPlan(profileFrame(frame)).visualizations[0].columns).toEqual(["timestamp", "close"]);
  });
});
