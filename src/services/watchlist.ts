/**
 * Watchlist store
 * A JSON array of symbols on disk, read before every scan and monitor
 * cycle. `null` from read() means the file does not exist at all.
 */
import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";

export interface WatchlistStore {
  read(): Promise<string[] | null>;
}

export interface WritableWatchlistStore extends WatchlistStore {
  write(symbols: readonly string[]): Promise<string[]>;
}

export const WatchlistSchema = z.array(z.string().trim().min(1).max(10).transform((s) => s.toUpperCase()));

export function normalizeWatchlist(symbols: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const sym of WatchlistSchema.parse(symbols)) seen.add(sym);
  return [...seen];
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileWatchlistStore implements WritableWatchlistStore {
  constructor(private readonly filePath: string) {}

  async read(): Promise<string[] | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    try {
      return normalizeWatchlist(z.array(z.string()).parse(JSON.parse(raw)));
    } catch (err) {
      console.error(`[Watchlist] Unreadable ${this.filePath}:`, err instanceof Error ? err.message : err);
      return [];
    }
  }

  async write(symbols: readonly string[]): Promise<string[]> {
    const normalized = normalizeWatchlist(symbols);
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(normalized, null, 2));
    return normalized;
  }
}
