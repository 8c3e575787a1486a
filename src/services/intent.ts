/**
 * Intent extraction
 *
 * One LLM call turns the user's request into { symbol | scanIntent, timeRange }.
 * The response is decoded in two tiers:
 *   decodeIntent   — outermost {...}, decoded field by field
 *   fallbackIntent — keyword heuristic, only for replies with no braces at all
 */
import { z } from "zod";
import { SCAN_INTENTS, TIME_RANGES, type Intent, type ScanIntent } from "../types";
import type { LlmClient } from "./llm";
import { extractJsonObject } from "./jsonExtract";
import { errorMessage } from "../utils/text";

const upper = (v: unknown) => (typeof v === "string" ? v.trim().toUpperCase() : v);
const blankToNull = (v: unknown) => (typeof v === "string" && v.trim() === "" ? null : v);

// A bad field drops only itself
export const IntentSchema = z.object({
  symbol: z.preprocess((v) => upper(blankToNull(v)), z.string().nullish()).catch(undefined),
  scan_intent: z.preprocess((v) => upper(blankToNull(v)), z.enum(SCAN_INTENTS).nullish()).catch(undefined),
  time_range: z.preprocess((v) => upper(blankToNull(v)), z.enum(TIME_RANGES).nullish()).catch("INTRADAY"),
});

const BRACES = /\{[\s\S]*\}/;

/**
 * Returns null only when the reply has no `{...}`. Malformed JSON inside
 * braces decodes to an empty intent rather than reaching the heuristic,
 * which would read the `scan_intent` key itself as a scan request.
 */
export function decodeIntent(raw: string): Intent | null {
  if (!BRACES.test(raw)) return null;

  const parsed = IntentSchema.safeParse(extractJsonObject(raw));
  if (!parsed.success) {
    console.warn("[Intent] Unparseable JSON in response → empty intent");
    return { timeRange: "INTRADAY" };
  }

  const { symbol, scan_intent, time_range } = parsed.data;
  const intent: Intent = { timeRange: time_range ?? "INTRADAY" };
  if (symbol) intent.symbol = symbol;
  if (scan_intent) intent.scanIntent = scan_intent;
  return intent;
}

const SCAN_KEYWORDS = ["SCAN", "GAINERS", "LOSERS"];

export function fallbackIntent(raw: string): Intent {
  const text = raw.trim().toUpperCase();

  if (SCAN_KEYWORDS.some((k) => text.includes(k))) {
    const command = /SCAN:\s*(UPWARD|DOWNWARD|ALL)\b/.exec(text);
    const scanIntent: ScanIntent = SCAN_INTENTS.find((i) => i === command?.[1]) ?? "ALL";
    return { scanIntent, timeRange: "INTRADAY" };
  }

  const ticker = /^\$?([A-Z]{1,5})$/.exec(text);
  if (ticker && ticker[1] !== "NONE") {
    return { symbol: ticker[1], timeRange: "INTRADAY" };
  }

  return { timeRange: "INTRADAY" };
}

export function buildIntentPrompt(task: string): string {
  return `Analyze the user's request: "${task}"

1. If the user wants to analyze a specific stock, put its ticker symbol (e.g. AAPL) in "symbol".
2. If the user wants to SCAN the watchlist for companies matching a criterion (e.g. "companies that are going down", "top gainers", "market scan"), set "scan_intent" to UPWARD, DOWNWARD or ALL and leave "symbol" null.
3. Pick the time window the user asked about for "time_range": one of ${TIME_RANGES.join(", ")}. Use INTRADAY when no window is mentioned.

Respond with a single JSON object and nothing else:
{"symbol": "AAPL" | null, "scan_intent": "UPWARD" | "DOWNWARD" | "ALL" | null, "time_range": "INTRADAY"}
If nothing matches, respond with {"symbol": null, "scan_intent": null, "time_range": "INTRADAY"}.`;
}

export class IntentExtractor {
  constructor(private readonly llm: LlmClient) {}

  async extract(task: string): Promise<Intent> {
    let raw = "";
    try {
      raw = await this.llm.complete(buildIntentPrompt(task), { maxTokens: 100 });
    } catch (err) {
      console.warn("[Intent] LLM call failed:", errorMessage(err));
    }

    const decoded = decodeIntent(raw);
    if (decoded) return decoded;

    const fallback = fallbackIntent(raw);
    console.warn(`[Intent] Unstructured response ${JSON.stringify(raw.slice(0, 80))} → heuristic`, fallback);
    return fallback;
  }
}
