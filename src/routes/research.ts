import { randomUUID } from "node:crypto";
import { Router, Response } from "express";
import { z } from "zod";
import type { AuthRequest } from "../middleware/auth";
import type { ResearchRunner } from "../services/pipeline";
import type { Channel } from "../ws/clientHub";

export interface Broadcaster {
  broadcast(channel: Channel, payload: object): void;
}

const ResearchSchema = z.object({
  task: z.string().trim().min(1).max(2000),
});

export function researchRouter(pipeline: ResearchRunner, hub: Broadcaster): Router {
  const router = Router();

  router.post("/", async (req: AuthRequest, res: Response) => {
    const body = ResearchSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "task is required" });
      return;
    }

    const runId = randomUUID();
    const { task } = body.data;
    console.log(`[Research] ${runId} started: "${task}"`);

    try {
      const { state, report } = await pipeline.run(task, {
        onStage: (event) => hub.broadcast("research", { type: "stage", runId, ...event }),
      });
      hub.broadcast("research", { type: "report", runId, kind: report.kind });
      res.json({ runId, intent: state.intent, report });
    } catch (err) {
      console.error(`[Research] ${runId} failed:`, err instanceof Error ? err.message : err);
      hub.broadcast("research", { type: "error", runId });
      res.status(500).json({ runId, error: "Research run failed" });
    }
  });

  return router;
}
