/**
 * Alert log
 * Bounded, newest-first list of alerts persisted as JSON. Appends are
 * read-modify-write, so they are chained through a single promise queue:
 * the monitor fans out across symbols and can append concurrently.
 */
import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { Alert } from "../types";

const AlertSchema = z.object({
  timestamp: z.string(),
  type: z.enum(["MARKET", "NEWS"]),
  symbol: z.string(),
  message: z.string(),
  details: z.record(z.string(), z.unknown()),
});

export interface AlertSink {
  append(alert: Alert): Promise<void>;
}

export interface AlertLog extends AlertSink {
  list(limit?: number): Promise<Alert[]>;
}

export class FileAlertStore implements AlertLog {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly limit = 100
  ) {}

  async list(limit = this.limit): Promise<Alert[]> {
    const alerts = await this.load();
    return alerts.slice(0, limit);
  }

  append(alert: Alert): Promise<void> {
    const next = this.tail.then(() => this.prepend(alert));
    // The caller sees the failure via `next`; the queue itself keeps going
    this.tail = next.catch((err: unknown) => {
      console.error("[AlertStore] Append failed:", err instanceof Error ? err.message : err);
    });
    return next;
  }

  private async prepend(alert: Alert): Promise<void> {
    const alerts = await this.load();
    alerts.unshift(alert);
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(alerts.slice(0, this.limit), null, 2));
  }

  private async load(): Promise<Alert[]> {
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.filePath, "utf-8"));
      if (!Array.isArray(parsed)) return [];
      return parsed.flatMap((entry) => {
        const alert = AlertSchema.safeParse(entry);
        return alert.success ? [alert.data] : [];
      });
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
        console.error(`[AlertStore] Unreadable ${this.filePath}, starting fresh:`, err instanceof Error ? err.message : err);
      }
      return [];
    }
  }
}

/** Forwards each alert to several sinks; one failing sink does not stop the others. */
export class FanoutAlertSink implements AlertSink {
  constructor(private readonly sinks: AlertSink[]) {}

  async append(alert: Alert): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((s) => s.append(alert)));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
    if (failed) throw failed.reason;
  }
}
