/**
 * Analysis sub-pipeline
 *
 * Profile → Plan → Render over a tabular view of one time series.
 * The planner is a single LLM call returning insights plus a chart plan;
 * if its output can't be decoded a fixed default plan is used instead.
 * Rendering produces plain chart objects (data only, no drawing) and skips
 * any entry it can't honour without failing the rest.
 */
import { z } from "zod";
import type { TimeSeries } from "../types";
import type { LlmClient } from "./llm";
import { extractJsonObject } from "./jsonExtract";
import { errorMessage } from "../utils/text";

// ── Frame & profile ────────────────────────────────────────────────────────

export type CellValue = number | string;

export interface SeriesFrame {
  columns: string[];
  rows: Array<Record<string, CellValue>>;
}

export type ColumnType = "datetime" | "integer" | "float" | "string";

export interface DatasetProfile {
  rowCount: number;
  columnCount: number;
  columns: string[];
  columnTypes: Record<string, ColumnType>;
  numericColumns: string[];
  datetimeColumns: string[];
}

export const EMPTY_FRAME: SeriesFrame = { columns: [], rows: [] };

export function frameFromSeries(series: TimeSeries): SeriesFrame {
  return {
    columns: ["timestamp", "open", "high", "low", "close", "volume"],
    rows: series.bars.map((b) => ({
      timestamp: b.timestamp,
      open: b.open,
      high: b.high,
      low: b.low,
      close: b.close,
      volume: b.volume,
    })),
  };
}

function columnType(values: CellValue[]): ColumnType {
  if (values.length > 0 && values.every((v) => typeof v === "number")) {
    return values.every((v) => Number.isInteger(v)) ? "integer" : "float";
  }
  if (values.length > 0 && values.every((v) => typeof v === "string" && !Number.isNaN(Date.parse(v)))) {
    return "datetime";
  }
  return "string";
}

export function profileFrame(frame: SeriesFrame): DatasetProfile {
  const columnTypes: Record<string, ColumnType> = {};
  for (const col of frame.columns) {
    columnTypes[col] = columnType(frame.rows.map((r) => r[col]).filter((v) => v !== undefined));
  }

  return {
    rowCount: frame.rows.length,
    columnCount: frame.columns.length,
    columns: [...frame.columns],
    columnTypes,
    numericColumns: frame.columns.filter((c) => columnTypes[c] === "integer" || columnTypes[c] === "float"),
    datetimeColumns: frame.columns.filter((c) => columnTypes[c] === "datetime"),
  };
}

// ── Plan ───────────────────────────────────────────────────────────────────

export interface PlannedChart {
  chartType: string;
  columns: string[];
  title: string;
}

export interface SkippedChart {
  title: string;
  reason: string;
}

export interface AnalysisPlan {
  insights: string[];
  visualizations: PlannedChart[];
  dropped: SkippedChart[];
}

const PlanEntrySchema = z.object({
  chart_type: z.string().trim().min(1),
  columns: z.array(z.string().trim().min(1)).min(1),
  title: z.string().default(""),
});

const PlannerResponseSchema = z.object({
  insights: z.array(z.string()),
  visualizations: z.array(z.unknown()),
});

function withChartType(entry: unknown): unknown {
  if (typeof entry !== "object" || entry === null || Array.isArray(entry)) return entry;
  const record: Record<string, unknown> = { ...entry };
  return { ...record, chart_type: record.chart_type ?? record.type };
}

export function decodePlan(raw: string): AnalysisPlan | null {
  const json = extractJsonObject(raw);
  if (json === null) return null;

  const parsed = PlannerResponseSchema.safeParse(json);
  if (!parsed.success) return null;

  const visualizations: PlannedChart[] = [];
  const dropped: SkippedChart[] = [];
  parsed.data.visualizations.forEach((entry, i) => {
    const chart = PlanEntrySchema.safeParse(withChartType(entry));
    if (chart.success) {
      visualizations.push({
        chartType: chart.data.chart_type.toLowerCase(),
        columns: chart.data.columns,
        title: chart.data.title || `Chart ${i + 1}`,
      });
    } else {
      dropped.push({ title: `Chart ${i + 1}`, reason: "malformed plan entry" });
    }
  });

  return { insights: parsed.data.insights, visualizations, dropped };
}

export const DEFAULT_PLAN_INSIGHTS = "Analysis generated, but detailed insights could not be parsed.";

export function defaultPlan(profile: DatasetProfile): AnalysisPlan {
  const timeCol = profile.datetimeColumns[0] ?? profile.columns[0] ?? "timestamp";
  return {
    insights: [],
    visualizations: [
      { chartType: "line", columns: [timeCol, "close"], title: "Closing Price Over Time (Default)" },
      { chartType: "histogram", columns: ["volume"], title: "Trading Volume (Default)" },
    ],
    dropped: [],
  };
}

export function formatInsights(insights: readonly string[]): string {
  return insights.map((i) => `* ${i}`).join("\n");
}

export function buildPlannerPrompt(profile: DatasetProfile): string {
  const timeCol = profile.datetimeColumns[0] ?? profile.columns[0] ?? "timestamp";
  return `You are an expert financial data scientist. Based on the following profile of a time-series stock dataset, generate key insights and plan effective visualizations.

Data Profile: ${JSON.stringify(profile, null, 2)}

Your response MUST be ONLY a single valid JSON object with two keys, "insights" and "visualizations".
- "insights": a list of 3-5 concise bullet-style strings about trends, correlations and anomalies.
- "visualizations": a list of 3 chart plans, each {"type": "line" | "histogram" | "scatter" | "bar", "columns": [...], "title": "..."}:
  - a line chart of "close" over "${timeCol}"
  - a histogram of "volume"
  - one other relevant chart of your choice

Example:
{
  "insights": ["The closing price trends upward over the period.", "Volume spikes cluster around the largest price moves."],
  "visualizations": [
    {"type": "line", "columns": ["${timeCol}", "close"], "title": "Closing Price Over Time"},
    {"type": "histogram", "columns": ["volume"], "title": "Trading Volume Distribution"},
    {"type": "scatter", "columns": ["open", "close"], "title": "Opening vs. Closing Price"}
  ]
}`;
}

// ── Render ─────────────────────────────────────────────────────────────────

export interface XYChart {
  type: "line" | "bar" | "scatter";
  title: string;
  x: string;
  y: string;
  points: Array<{ x: CellValue; y: number }>;
}

export interface HistogramChart {
  type: "histogram";
  title: string;
  column: string;
  bins: Array<{ start: number; end: number; count: number }>;
}

export type Chart = XYChart | HistogramChart;

const HISTOGRAM_BINS = 20;

function numbers(frame: SeriesFrame, column: string): number[] {
  return frame.rows.map((r) => r[column]).filter((v): v is number => typeof v === "number");
}

export function histogram(values: readonly number[], binCount = HISTOGRAM_BINS): HistogramChart["bins"] {
  if (values.length === 0) return [];
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (min === max) return [{ start: min, end: max, count: values.length }];

  const width = (max - min) / binCount;
  const bins = Array.from({ length: binCount }, (_, i) => ({
    start: min + i * width,
    end: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const v of values) {
    bins[Math.min(binCount - 1, Math.floor((v - min) / width))].count++;
  }
  return bins;
}

function lowerCaseFrame(frame: SeriesFrame): SeriesFrame {
  return {
    columns: frame.columns.map((c) => c.toLowerCase()),
    rows: frame.rows.map((row) =>
      Object.fromEntries(Object.entries(row).map(([k, v]) => [k.toLowerCase(), v]))
    ),
  };
}

type RenderOutcome = { chart: Chart } | { reason: string };

function renderOne(frame: SeriesFrame, profile: DatasetProfile, plan: PlannedChart): RenderOutcome {
  const columns = plan.columns.map((c) => c.toLowerCase());
  const missing = columns.filter((c) => !frame.columns.includes(c));
  if (missing.length > 0) return { reason: `missing column(s): ${missing.join(", ")}` };

  const isNumeric = (c: string) => profile.numericColumns.includes(c);
  const timeCol: string | undefined = profile.datetimeColumns[0];

  switch (plan.chartType) {
    case "line":
    case "bar": {
      if (columns.length > 2) return { reason: `${plan.chartType} takes 1 or 2 columns, got ${columns.length}` };
      const x = columns.length === 2 ? columns[0] : timeCol;
      const y = columns.length === 2 ? columns[1] : columns[0];
      if (x === undefined) return { reason: "no datetime column for the x axis" };
      if (!isNumeric(y)) return { reason: `column "${y}" is not numeric` };
      return {
        chart: {
          type: plan.chartType === "bar" ? "bar" : "line",
          title: plan.title,
          x,
          y,
          points: frame.rows.flatMap((r) => {
            const yv = r[y];
            return typeof yv === "number" ? [{ x: r[x], y: yv }] : [];
          }),
        },
      };
    }
    case "scatter": {
      if (columns.length !== 2) return { reason: `scatter takes 2 columns, got ${columns.length}` };
      const [x, y] = columns;
      const nonNumeric = columns.find((c) => !isNumeric(c));
      if (nonNumeric) return { reason: `column "${nonNumeric}" is not numeric` };
      return {
        chart: {
          type: "scatter",
          title: plan.title,
          x,
          y,
          points: frame.rows.flatMap((r) => {
            const xv = r[x];
            const yv = r[y];
            return typeof xv === "number" && typeof yv === "number" ? [{ x: xv, y: yv }] : [];
          }),
        },
      };
    }
    case "histogram": {
      if (columns.length !== 1) return { reason: `histogram takes 1 column, got ${columns.length}` };
      const [column] = columns;
      if (!isNumeric(column)) return { reason: `column "${column}" is not numeric` };
      return { chart: { type: "histogram", title: plan.title, column, bins: histogram(numbers(frame, column)) } };
    }
    default:
      return { reason: `unsupported chart type "${plan.chartType}"` };
  }
}

export function renderCharts(
  frame: SeriesFrame,
  plan: readonly PlannedChart[]
): { charts: Chart[]; skipped: SkippedChart[] } {
  const normalized = lowerCaseFrame(frame);
  const profile = profileFrame(normalized);
  const charts: Chart[] = [];
  const skipped: SkippedChart[] = [];

  for (const entry of plan) {
    try {
      const outcome = renderOne(normalized, profile, entry);
      if ("chart" in outcome) charts.push(outcome.chart);
      else skipped.push({ title: entry.title, reason: outcome.reason });
    } catch (err) {
      console.error(`[Analysis] Chart "${entry.title}" failed:`, errorMessage(err));
      skipped.push({ title: entry.title, reason: `render failed: ${errorMessage(err)}` });
    }
  }

  return { charts, skipped };
}

// ── Sub-pipeline ───────────────────────────────────────────────────────────

export interface AnalysisResult {
  insights: string;
  visualizations: PlannedChart[];
  charts: Chart[];
  skipped: SkippedChart[];
}

export const EMPTY_ANALYSIS: AnalysisResult = { insights: "", visualizations: [], charts: [], skipped: [] };

export class AnalysisPipeline {
  constructor(private readonly llm: LlmClient) {}

  async run(frame: SeriesFrame): Promise<AnalysisResult> {
    if (frame.rows.length === 0) {
      console.warn("[Analysis] Empty frame — skipping analysis");
      return { ...EMPTY_ANALYSIS, insights: "No data available for analysis." };
    }

    const profile = profileFrame(frame);
    const plan = await this.plan(profile);
    const { charts, skipped } = renderCharts(frame, plan.visualizations);
    console.log(`[Analysis] ${charts.length} chart(s) rendered, ${skipped.length + plan.dropped.length} skipped`);

    return {
      insights: plan.insights.length > 0 ? formatInsights(plan.insights) : DEFAULT_PLAN_INSIGHTS,
      visualizations: plan.visualizations,
      charts,
      skipped: [...plan.dropped, ...skipped],
    };
  }

  async plan(profile: DatasetProfile): Promise<AnalysisPlan> {
    let raw = "";
    try {
      raw = await this.llm.complete(buildPlannerPrompt(profile), { maxTokens: 800 });
    } catch (err) {
      console.warn("[Analysis] Planner call failed:", errorMessage(err));
    }

    const decoded = decodePlan(raw);
    if (decoded) return decoded;

    console.warn("[Analysis] Planner output unparseable — using default plan");
    return defaultPlan(profile);
  }
}
