/**
 * Express app: exported for testing.
 * Read-only view over the trade journal the agent writes.
 */

import express from "express";
import cors from "cors";
import sessionsRouter from "./routes/sessions.ts";
import tradesRouter from "./routes/trades.ts";
import ticksRouter from "./routes/ticks.ts";
import { getDb } from "./db.ts";

const app = express();
app.use(cors());
app.use(express.json());

app.get("/api/health", (_req, res) => {
  try {
    getDb().prepare("SELECT 1").get();
    res.json({ ok: true, env: process.env.TRADER_ENV ?? "production" });
  } catch (e) {
    res.status(500).json({ ok: false, error: e instanceof Error ? e.message : String(e) });
  }
});

app.use("/api/sessions", sessionsRouter);
app.use("/api/trades", tradesRouter);
app.use("/api/ticks", ticksRouter);

app.use("/api", (_req, res) => {
  res.status(404).json({ error: "Not found" });
});

export default app;
