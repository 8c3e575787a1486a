import { Router, Response } from "express";
import { z } from "zod";
import type { AuthRequest } from "../middleware/auth";
import type { WritableWatchlistStore } from "../services/watchlist";

const UpdateSchema = z.object({
  symbols: z.array(z.string().trim().min(1).max(10)).max(200),
});

export function watchlistRouter(store: WritableWatchlistStore): Router {
  const router = Router();

  router.get("/", async (_req: AuthRequest, res: Response) => {
    try {
      const symbols = await store.read();
      res.json({ exists: symbols !== null, symbols: symbols ?? [] });
    } catch (err) {
      console.error("[Watchlist] Read failed:", err instanceof Error ? err.message : err);
      res.status(500).json({ error: "Could not read watchlist" });
    }
  });

  router.put("/", async (req: AuthRequest, res: Response) => {
    const body = UpdateSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "symbols must be an array of tickers" });
      return;
    }
    try {
      const symbols = await store.write(body.data.symbols);
      console.log(`[Watchlist] Updated by ${req.userId ?? "unknown"}: ${symbols.join(", ")}`);
      res.json({ exists: true, symbols });
    } catch (err) {
      console.error("[Watchlist] Write failed:", err instanceof Error ? err.message : err);
      res.status(500).json({ error: "Could not save watchlist" });
    }
  });

  return router;
}
