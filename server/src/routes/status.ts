import { Router, Request, Response } from "express";
import type { ControlPanel } from "../services/panel";
import { sendError } from "../utils/http";

export function statusRouter(panel: ControlPanel) {
  const r = Router();

  /** Latest polled view plus the running or last batch. */
  r.get("/status", (_req: Request, res: Response) => {
    res.json({ ok: true, view: panel.view(), batch: panel.results() });
  });

  // Polls now instead of waiting for the next interval.
  r.post("/status/refresh", async (_req: Request, res: Response) => {
    try {
      const view = await panel.refresh();
      res.json({ ok: true, view });
    } catch (err) {
      sendError(res, err);
    }
  });

  r.get("/results", (_req: Request, res: Response) => {
    const batch = panel.results();
    if (!batch) return res.status(404).json({ ok: false, error: "no batch has run yet" });
    res.json({ ok: true, batch });
  });

  r.get("/logs", (_req: Request, res: Response) => {
    res.json({ ok: true, logs: panel.log.text() });
  });

  return r;
}
