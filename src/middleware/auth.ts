import type { Request, Response, NextFunction, RequestHandler } from "express";
import jwt from "jsonwebtoken";

export interface AuthRequest extends Request {
  userId?: string;
}

export const DASHBOARD_USER = "dashboard";

export function signToken(userId: string, secret: string): string {
  return jwt.sign({ sub: userId }, secret, { expiresIn: "30d" });
}

/** Subject of a dashboard token, or null when the token is invalid. */
export function verifyToken(token: string, secret: string): string | null {
  try {
    const payload = jwt.verify(token, secret);
    return typeof payload === "object" && typeof payload.sub === "string" ? payload.sub : null;
  } catch {
    return null;
  }
}

export function requireAuth(jwtSecret: string): RequestHandler {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header?.startsWith("Bearer ")) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    const userId = verifyToken(header.slice(7), jwtSecret);
    if (!userId) {
      res.status(401).json({ error: "Invalid token" });
      return;
    }
    req.userId = userId;
    next();
  };
}
