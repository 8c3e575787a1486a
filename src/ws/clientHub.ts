import { WebSocket } from "ws";
import { z } from "zod";
import type { Alert } from "../types";
import type { AlertSink } from "../services/alertStore";
import { verifyToken } from "../middleware/auth";

export const CHANNELS = ["research", "alerts"] as const;
export type Channel = (typeof CHANNELS)[number];

export interface DashClient {
  ws: WebSocket;
  userId: string;
  subscriptions: Set<Channel>;
}

const AuthMessageSchema = z.object({ type: z.literal("auth"), token: z.string().min(1) });

const ClientMessageSchema = z.object({
  type: z.enum(["subscribe", "unsubscribe"]),
  channel: z.enum(CHANNELS),
});

function parseJson(raw: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return null;
  }
}

export class ClientHub implements AlertSink {
  private readonly clients = new Map<WebSocket, DashClient>();

  constructor(private readonly jwtSecret: string) {}

  get size(): number {
    return this.clients.size;
  }

  addClient(ws: WebSocket): void {
    // First message must be auth
    ws.once("message", (raw) => {
      const auth = AuthMessageSchema.safeParse(parseJson(raw.toString()));
      if (!auth.success) {
        ws.close(4001, "Auth required");
        return;
      }
      const userId = verifyToken(auth.data.token, this.jwtSecret);
      if (!userId) {
        ws.close(4001, "Invalid token");
        return;
      }

      const client: DashClient = { ws, userId, subscriptions: new Set() };
      this.clients.set(ws, client);
      ws.send(JSON.stringify({ type: "connected", channels: CHANNELS }));

      ws.on("message", (data) => this.handleMessage(client, data.toString()));
      ws.on("close", () => this.clients.delete(ws));
    });
  }

  private handleMessage(client: DashClient, raw: string): void {
    const msg = ClientMessageSchema.safeParse(parseJson(raw));
    if (!msg.success) return; // unknown or malformed client messages are ignored

    if (msg.data.type === "subscribe") client.subscriptions.add(msg.data.channel);
    else client.subscriptions.delete(msg.data.channel);
  }

  /** Broadcast a message to all authenticated clients subscribed to a channel */
  broadcast(channel: Channel, payload: object): void {
    const message = JSON.stringify({ channel, ...payload });
    for (const [ws, client] of this.clients) {
      if (ws.readyState === WebSocket.OPEN && client.subscriptions.has(channel)) {
        ws.send(message);
      }
    }
  }

  async append(alert: Alert): Promise<void> {
    this.broadcast("alerts", { type: "alert", alert });
  }
}
