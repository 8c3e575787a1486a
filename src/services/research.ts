/**
 * Web research client (search backend behind the gateway).
 * Failures come back as an "error" response instead of throwing.
 */
import { z } from "zod";
import type { Gateway } from "./gateway";
import { errorMessage } from "../utils/text";

export type SearchDepth = "basic" | "advanced";

const SearchHitSchema = z.object({
  title: z.string().catch(""),
  url: z.string().catch(""),
  content: z.string().catch(""),
});

export const ResearchResponseSchema = z.object({
  status: z.string(),
  data: z.array(
    z.object({
      query: z.string(),
      results: z.array(SearchHitSchema).catch([]),
    })
  ),
});

export type SearchHit = z.infer<typeof SearchHitSchema>;
export type ResearchResponse = z.infer<typeof ResearchResponseSchema> & { error?: string };

export interface ResearchSource {
  research(queries: string[], depth?: SearchDepth): Promise<ResearchResponse>;
}

/** True when at least one hit carries a title or body. */
export function hasResearchContent(response: ResearchResponse): boolean {
  return (
    response.status === "success" &&
    response.data.some((q) => q.results.some((hit) => hit.title.trim() || hit.content.trim()))
  );
}

export class WebResearchClient implements ResearchSource {
  constructor(
    private readonly gateway: Gateway,
    private readonly timeoutMs: number
  ) {}

  async research(queries: string[], depth: SearchDepth = "basic"): Promise<ResearchResponse> {
    try {
      const raw = await this.gateway.call(
        "tavily_research",
        { queries, search_depth: depth },
        this.timeoutMs
      );
      const parsed = ResearchResponseSchema.safeParse(raw);
      if (!parsed.success) throw new Error("malformed research response");
      return parsed.data;
    } catch (err) {
      console.error("[Research] Query failed:", errorMessage(err));
      return { status: "error", data: [], error: errorMessage(err) };
    }
  }
}
