import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AlertLog } from "../services/alertStore";

const QuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  symbol: z.string().trim().min(1).optional(),
});

export function alertsRouter(log: AlertLog): Router {
  const router = Router();

  // Newest first
  router.get("/", async (req: Request, res: Response) => {
    const query = QuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: "limit must be an integer between 1 and 100" });
      return;
    }
    try {
      const { limit, symbol } = query.data;
      const alerts = await log.list();
      const filtered = symbol ? alerts.filter((a) => a.symbol === symbol.toUpperCase()) : alerts;
      res.json(filtered.slice(0, limit ?? filtered.length));
    } catch (err) {
      console.error("[Alerts] List failed:", err instanceof Error ? err.message : err);
      res.status(500).json({ error: "Could not read alerts" });
    }
  });

  return router;
}
