import http from "http";
import { loadConfig } from "./config";
import { createHttpApp } from "./http";
import { ModeratorRoster, ensureSettings } from "./settings";
import { MatchStore } from "./store";
import { DuelGateway } from "./ws";

// Bootstrap that wires the in-memory store to HTTP + WebSocket layers.

const config = loadConfig();
const settings = ensureSettings(config.settingsFile);
const moderators = ModeratorRoster.fromSources(settings, config.moderators);

const store = new MatchStore();
const app = createHttpApp(store);
const server = http.createServer(app);

const gateway = new DuelGateway(store, {
  moderators,
  limits: { challengeTimeoutMs: config.challengeTimeoutMs, roundTimeoutMs: config.roundTimeoutMs }
});
gateway.attach(server);

server.listen(config.port, () => {
  console.log(`Duel server running on port ${config.port}`);
  console.log(`Moderators: ${moderators.list().length}`);
  console.log("Health check: GET /health");
});

function shutdown(signal: string): void {
  console.log(`Received ${signal}, shutting down`);
  gateway.close();
  server.close(err => {
    if (err) {
      console.error("Error while closing server", err);
      process.exitCode = 1;
    }
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
