/**
 * Portfolio client
 * Natural-language questions against the internal holdings database. The
 * backend translates them to SQL; this side only ever asks read questions.
 */
import { z } from "zod";
import type { Gateway } from "./gateway";
import { errorMessage } from "../utils/text";

const PortfolioResponseSchema = z
  .object({
    status: z.string(),
    generated_query: z.string().optional(),
    generated_sql: z.string().optional(),
    data: z.array(z.record(z.string(), z.unknown())).catch([]),
  })
  .transform(({ generated_query, generated_sql, ...rest }) => ({
    ...rest,
    generatedQuery: generated_query ?? generated_sql ?? "",
  }));

export type PortfolioResponse = z.infer<typeof PortfolioResponseSchema> & { error?: string };

export interface PortfolioSource {
  query(question: string): Promise<PortfolioResponse>;
}

const WRITE_SHAPED = /\b(insert|update|delete|drop|alter|create|truncate|replace|grant)\b/i;

export function isReadOnlyQuestion(question: string): boolean {
  return !WRITE_SHAPED.test(question);
}

export function exposureQuestion(symbol: string): string {
  return `What is the current exposure to ${symbol}?`;
}

export class PortfolioClient implements PortfolioSource {
  constructor(
    private readonly gateway: Gateway,
    private readonly timeoutMs: number
  ) {}

  async query(question: string): Promise<PortfolioResponse> {
    if (!isReadOnlyQuestion(question)) {
      console.warn(`[Portfolio] Refusing write-shaped question: "${question}"`);
      return { status: "rejected", generatedQuery: "", data: [], error: "Only read-only questions are allowed" };
    }

    try {
      const raw = await this.gateway.call("internal_portfolio_data", { question }, this.timeoutMs);
      const parsed = PortfolioResponseSchema.safeParse(raw);
      if (!parsed.success) throw new Error("malformed portfolio response");
      return parsed.data;
    } catch (err) {
      console.error("[Portfolio] Query failed:", errorMessage(err));
      return { status: "error", generatedQuery: "", data: [], error: errorMessage(err) };
    }
  }
}
