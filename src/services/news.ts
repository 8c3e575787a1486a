/**
 * News client for the watchlist monitor: one search per symbol, top hit only.
 */
import type { ResearchSource } from "./research";

export interface Headline {
  title: string;
  url: string;
  content: string;
}

export interface NewsSource {
  topHeadline(symbol: string): Promise<Headline | null>;
}

export const SIGNIFICANT_NEWS_KEYWORDS = [
  "acquisition", "merger", "earnings", "crash", "surge", "plunge",
  "fda", "lawsuit", "sec", "filing", "8-k", "10-k", "insider",
  "partnership", "deal", "bankruptcy", "recall", "investigation",
  "upgrade", "downgrade", "target", "buyback", "dividend",
];

/** Plain substring match on the lower-cased title. */
export function matchNewsKeyword(title: string, keywords: readonly string[] = SIGNIFICANT_NEWS_KEYWORDS): string | null {
  const lower = title.toLowerCase();
  return keywords.find((k) => lower.includes(k)) ?? null;
}

export class NewsClient implements NewsSource {
  constructor(private readonly research: ResearchSource) {}

  async topHeadline(symbol: string): Promise<Headline | null> {
    const response = await this.research.research([`breaking news ${symbol} stock today`], "basic");
    if (response.status !== "success") return null;

    const hit = response.data[0]?.results[0];
    if (!hit || !hit.title) return null;

    return {
      title: hit.title,
      url: hit.url,
      content: hit.content.length > 200 ? `${hit.content.slice(0, 200)}...` : hit.content,
    };
  }
}
