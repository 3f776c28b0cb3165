import express from "express";
import { stanceChart } from "../engine/stances";
import { BEST_OF_OPTIONS } from "../engine/transitions";
import { buildMatchStatus } from "../shared/messages";
import { MatchStore } from "./store";

/**
 * Minimal Express app exposing health, rules and read-only match endpoints.
 * All gameplay happens over WebSockets.
 */
export function createHttpApp(store: MatchStore) {
  const app = express();
  app.use(express.json());

  /** Liveness check with the number of matches currently held in memory. */
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", matches: store.list().length, timestamp: Date.now() });
  });

  /** Stance chart and match formats, for clients rendering a rules screen. */
  app.get("/rules", (_req, res) => {
    res.json({ stances: stanceChart(), bestOf: BEST_OF_OPTIONS });
  });

  /** Observer view of a context's match. Never includes declarations or picks still in progress. */
  app.get("/matches/:contextKey", (req, res) => {
    const match = store.get(req.params.contextKey);
    if (!match) {
      return res.status(404).json({ error: "No active match in this channel" });
    }
    return res.json(buildMatchStatus(match));
  });

  return app;
}
