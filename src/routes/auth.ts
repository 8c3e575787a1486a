import { Router, Request, Response } from "express";
import bcrypt from "bcryptjs";
import { z } from "zod";
import { DASHBOARD_USER, signToken } from "../middleware/auth";

export interface AuthRouterOptions {
  jwtSecret: string;
  passwordHash: string;
}

const LoginSchema = z.object({ password: z.string().min(1) });

export function authRouter({ jwtSecret, passwordHash }: AuthRouterOptions): Router {
  const router = Router();

  router.post("/login", async (req: Request, res: Response) => {
    const body = LoginSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "Password required" });
      return;
    }
    if (!passwordHash) {
      res.status(403).json({ error: "Dashboard password not configured" });
      return;
    }
    try {
      const valid = await bcrypt.compare(body.data.password, passwordHash);
      if (!valid) {
        res.status(401).json({ error: "Wrong password" });
        return;
      }
      res.json({ token: signToken(DASHBOARD_USER, jwtSecret) });
    } catch (err) {
      console.error("[Auth] Login failed:", err instanceof Error ? err.message : err);
      res.status(500).json({ error: "Login failed" });
    }
  });

  router.get("/status", (_req: Request, res: Response) => {
    res.json({ configured: passwordHash !== "" });
  });

  return router;
}
