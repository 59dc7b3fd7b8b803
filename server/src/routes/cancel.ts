import { Router } from "express";
import type { ControlPanel } from "../services/panel";
import { sendError } from "../utils/http";

export function cancelRouter(panel: ControlPanel) {
  const r = Router();

  // The running batch stops at its next image boundary even if this fails.
  r.post("/interrupt", async (_req, res) => {
    try {
      await panel.interrupt();
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err);
    }
  });

  return r;
}
