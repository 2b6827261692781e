/**
 * Tick telemetry API.
 */

import { Router } from "express";
import { getDb, type TickRow } from "../db.ts";

const router = Router();

/** GET /api/ticks?sessionId=&limit=: latest ticks of a session, newest first */
router.get("/", (req, res) => {
  const { sessionId } = req.query;
  if (typeof sessionId !== "string" || !sessionId) {
    res.status(400).json({ error: "sessionId is required" });
    return;
  }
  const limit = Math.min(1000, Math.max(1, Number(req.query.limit) || 100));

  try {
    const rows = getDb()
      .prepare<[string, number], TickRow>("SELECT * FROM ticks WHERE session_id = ? ORDER BY seq DESC LIMIT ?")
      .all(sessionId, limit);
    res.json(
      rows.map((r) => ({
        ...r,
        positions: JSON.parse(r.positions_json),
      }))
    );
  } catch (e) {
    res.status(500).json({ error: e instanceof Error ? e.message : String(e) });
  }
});

export default router;
