/**
 * Trades API: the append-only journal of filled opens and closes.
 */

import { Router } from "express";
import { getDb, type TradeRow } from "../db.ts";

const router = Router();

/** GET /api/trades?sessionId=&strategyId=&limit=: oldest first */
router.get("/", (req, res) => {
  const limit = Math.min(1000, Math.max(1, Number(req.query.limit) || 100));
  const { sessionId, strategyId } = req.query;

  const conditions: string[] = [];
  const values: (string | number)[] = [];
  if (typeof sessionId === "string" && sessionId) {
    conditions.push("session_id = ?");
    values.push(sessionId);
  }
  if (typeof strategyId === "string" && strategyId) {
    conditions.push("strategy_id = ?");
    values.push(strategyId);
  }
  const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
  values.push(limit);

  try {
    const rows = getDb()
      .prepare<(string | number)[], TradeRow>(`SELECT * FROM trades ${where} ORDER BY id ASC LIMIT ?`)
      .all(...values);
    res.json(
      rows.map((r) => ({
        ...r,
        warnings: r.warnings_json ? JSON.parse(r.warnings_json) : [],
      }))
    );
  } catch (e) {
    res.status(500).json({ error: e instanceof Error ? e.message : String(e) });
  }
});

export default router;
