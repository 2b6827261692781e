/**
 * Sessions API: one row per agent run.
 */

import { Router } from "express";
import { getDb, type SessionRow } from "../db.ts";

const router = Router();

interface StrategyTradeStats {
  strategy_id: string;
  opens: number;
  closes: number;
  volume: number;
}

/** GET /api/sessions: list sessions (most recent first) */
router.get("/", (req, res) => {
  const limit = Math.min(200, Math.max(1, Number(req.query.limit) || 50));
  try {
    const rows = getDb()
      .prepare<[number], SessionRow>("SELECT * FROM sessions ORDER BY started_at DESC LIMIT ?")
      .all(limit);
    res.json(rows);
  } catch (e) {
    res.status(500).json({ error: e instanceof Error ? e.message : String(e) });
  }
});

/** GET /api/sessions/:id: session detail with per-strategy trade counts */
router.get("/:id", (req, res) => {
  try {
    const db = getDb();
    const row = db.prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?").get(req.params.id);
    if (!row) {
      res.status(404).json({ error: "Session not found" });
      return;
    }
    const tradeStats = db
      .prepare<[string], StrategyTradeStats>(
        `SELECT
           strategy_id,
           COUNT(CASE WHEN action = 'open' THEN 1 END) as opens,
           COUNT(CASE WHEN action = 'close' THEN 1 END) as closes,
           SUM(CASE WHEN action = 'open' THEN volume ELSE 0 END) as volume
         FROM trades WHERE session_id = ?
         GROUP BY strategy_id ORDER BY strategy_id`
      )
      .all(req.params.id);
    res.json({ ...row, tradeStats });
  } catch (e) {
    res.status(500).json({ error: e instanceof Error ? e.message : String(e) });
  }
});

export default router;
