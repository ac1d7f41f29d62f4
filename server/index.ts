import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { log } from "./log";
import { MemDashboardSessionStore } from "./session/sessionStore";

const config = loadConfig();
const sessions = new MemDashboardSessionStore({ maxEntries: config.sessionStoreMaxEntries });
const app = createApp({ config, sessions });
const httpServer = createServer(app);

// Serve the API on the port specified in the environment variable PORT (default 5000)
httpServer.listen(
  {
    port: config.port,
    host: "0.0.0.0",
  },
  () => {
    log(`serving on port ${config.port} (${config.nodeEnv})`);
  },
);
