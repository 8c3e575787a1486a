// Standalone watchlist monitor: same stores as the API server, no HTTP.
import { loadConfig } from "./config";
import { buildServices } from "./container";

const config = loadConfig();
if (config.monitorHost !== "standalone") {
  console.error(`[Monitor] MONITOR_HOST is "${config.monitorHost}"; set it to "standalone" to run the monitor here`);
  process.exit(1);
}

const { monitor } = buildServices(config);

monitor.start();

function shutdown() {
  console.log("[Monitor] Stopping");
  monitor.stop();
  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
