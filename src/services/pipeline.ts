/**
 * Research pipeline
 *
 * extract_intent → web_research → market_data → portfolio_lookup →
 * transform → analyze → synthesize_report
 *
 * Each stage reads the accumulated state and returns a partial update. Stages
 * after intent extraction branch on scanIntent themselves; no stage relies on
 * an earlier one having short-circuited.
 */
import type { Intent } from "../types";
import { EMPTY_ANALYSIS, EMPTY_FRAME, frameFromSeries, type AnalysisPipeline, type AnalysisResult, type SeriesFrame } from "./analysis";
import type { IntentExtractor } from "./intent";
import type { MarketDataSource } from "./marketData";
import { exposureQuestion, type PortfolioSource } from "./portfolio";
import type { ResearchSource, SearchDepth } from "./research";
import {
  toReportInput,
  type MarketDataOutcome,
  type PortfolioOutcome,
  type Report,
  type ReportWriter,
  type ResearchOutcome,
} from "./report";
import type { ScanEngine } from "./scanner";
import type { WatchlistStore } from "./watchlist";
import { errorMessage } from "../utils/text";

export const STAGE_NAMES = [
  "extract_intent",
  "web_research",
  "market_data",
  "portfolio_lookup",
  "transform",
  "analyze",
  "synthesize_report",
] as const;
export type StageName = (typeof STAGE_NAMES)[number];

export interface PipelineState {
  task: string;
  intent?: Intent;
  webResearch?: ResearchOutcome;
  marketData?: MarketDataOutcome;
  portfolio?: PortfolioOutcome;
  frame?: SeriesFrame;
  analysis?: AnalysisResult;
  report?: Report;
}

export interface Stage {
  name: StageName;
  run(state: Readonly<PipelineState>): Promise<Partial<PipelineState>>;
}

export type StageEvent =
  | { stage: StageName; status: "started" }
  | { stage: StageName; status: "completed"; durationMs: number }
  | { stage: StageName; status: "failed"; durationMs: number; error: string };

export interface PipelineDeps {
  intent: IntentExtractor;
  research: ResearchSource;
  marketData: MarketDataSource;
  portfolio: PortfolioSource;
  scanner: ScanEngine;
  watchlist: WatchlistStore;
  analysis: AnalysisPipeline;
  reports: ReportWriter;
  researchDepth?: SearchDepth;
}

export interface RunOptions {
  onStage?: (event: StageEvent) => void;
}

export interface PipelineResult {
  state: PipelineState;
  report: Report;
}

export interface ResearchRunner {
  run(task: string, options?: RunOptions): Promise<PipelineResult>;
}

const SCAN_SKIP_WEB = "Market scan initiated. Web research skipped for individual stock.";
const SCAN_SKIP_PORTFOLIO = "Market scan initiated. Portfolio context skipped.";

export function buildStages(deps: PipelineDeps): Stage[] {
  return [
    {
      name: "extract_intent",
      run: async (state) => ({ intent: await deps.intent.extract(state.task) }),
    },
    {
      name: "web_research",
      run: async (state) => {
        if (state.intent?.scanIntent) return { webResearch: { kind: "skipped", reason: SCAN_SKIP_WEB } };
        const response = await deps.research.research([state.task], deps.researchDepth ?? "basic");
        return { webResearch: { kind: "results", response } };
      },
    },
    {
      name: "market_data",
      run: async (state) => {
        const intent = state.intent;
        if (intent?.scanIntent) {
          const scan = await deps.scanner.scanWatchlist(deps.watchlist, intent.scanIntent, intent.timeRange);
          return { marketData: { kind: "scan", scan } };
        }
        if (!intent?.symbol) return { marketData: { kind: "skipped", reason: "No symbol resolved." } };
        const series = await deps.marketData.fetch(intent.symbol, intent.timeRange);
        return { marketData: { kind: "series", series } };
      },
    },
    {
      name: "portfolio_lookup",
      run: async (state) => {
        if (state.intent?.scanIntent) return { portfolio: { kind: "skipped", reason: SCAN_SKIP_PORTFOLIO } };
        const symbol = state.intent?.symbol;
        if (!symbol) return { portfolio: { kind: "skipped", reason: "No symbol provided." } };
        const response = await deps.portfolio.query(exposureQuestion(symbol));
        return { portfolio: { kind: "results", response } };
      },
    },
    {
      name: "transform",
      run: async (state) => {
        if (state.intent?.scanIntent || state.marketData?.kind !== "series") return { frame: EMPTY_FRAME };
        return { frame: frameFromSeries(state.marketData.series) };
      },
    },
    {
      name: "analyze",
      run: async (state) => {
        if (state.intent?.scanIntent) return { analysis: EMPTY_ANALYSIS };
        return { analysis: await deps.analysis.run(state.frame ?? EMPTY_FRAME) };
      },
    },
    {
      name: "synthesize_report",
      run: async (state) => ({ report: await deps.reports.write(toReportInput(state)) }),
    },
  ];
}

export class ResearchPipeline implements ResearchRunner {
  private readonly stages: Stage[];

  constructor(deps: PipelineDeps) {
    this.stages = buildStages(deps);
  }

  async run(task: string, options: RunOptions = {}): Promise<PipelineResult> {
    const emit = options.onStage ?? (() => undefined);
    let state: PipelineState = { task };

    for (const stage of this.stages) {
      const started = Date.now();
      emit({ stage: stage.name, status: "started" });
      try {
        state = { ...state, ...(await stage.run(state)) };
      } catch (err) {
        const error = errorMessage(err);
        console.error(`[Pipeline] Stage ${stage.name} failed:`, error);
        emit({ stage: stage.name, status: "failed", durationMs: Date.now() - started, error });
        throw err;
      }
      emit({ stage: stage.name, status: "completed", durationMs: Date.now() - started });
    }

    if (!state.report) throw new Error("Pipeline finished without a report");
    console.log(`[Pipeline] "${state.task}" → ${state.report.kind} report`);
    return { state, report: state.report };
  }
}
