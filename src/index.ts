import http from "http";
import { WebSocketServer } from "ws";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { buildServices } from "./container";
import { ClientHub } from "./ws/clientHub";

const config = loadConfig();
const hub = new ClientHub(config.jwtSecret);
const { pipeline, monitor, watchlist, alerts } = buildServices(config, [hub]);

const app = createApp({
  jwtSecret: config.jwtSecret,
  passwordHash: config.dashboardPasswordHash,
  pipeline,
  alerts,
  watchlist,
  hub,
});

// ── HTTP + WebSocket server ───────────────────────────────────────────────
const server = http.createServer(app);
const wss = new WebSocketServer({ server, path: "/ws" });

wss.on("connection", (ws) => hub.addClient(ws));

server.listen(config.port, () => {
  console.log(`[Server] Listening on :${config.port}`);
  if (config.monitorHost === "server") monitor.start();
});

function shutdown() {
  console.log("[Server] Shutting down");
  monitor.stop();
  wss.close();
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
