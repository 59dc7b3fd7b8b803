import { Router, Request, Response } from "express";
import type { PanelSettings } from "@sketch-refine/shared";
import { InvalidRequestError } from "@sketch-refine/worker";

import type { ControlPanel } from "../services/panel";
import { sendError } from "../utils/http";

function settingsPatch(body: unknown): Partial<PanelSettings> {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new InvalidRequestError("request body must be a JSON object");
  }
  const fields: Record<string, unknown> = { ...body };
  const patch: Partial<PanelSettings> = {};
  for (const key of ["sdHost", "sdPort", "outputDir"] as const) {
    const value = fields[key];
    if (value === undefined) continue;
    if (typeof value === "number") patch[key] = String(value);
    else if (typeof value === "string") patch[key] = value;
    else throw new InvalidRequestError(`${key} must be a string`);
  }
  return patch;
}

export function settingsRouter(panel: ControlPanel) {
  const r = Router();

  r.get("/settings", (_req: Request, res: Response) => {
    res.json({ ok: true, settings: panel.settings });
  });

  r.put("/settings", (req: Request, res: Response) => {
    try {
      res.json({ ok: true, settings: panel.updateSettings(settingsPatch(req.body)) });
    } catch (err) {
      sendError(res, err);
    }
  });

  r.post("/settings/reset", (_req: Request, res: Response) => {
    try {
      res.json({ ok: true, settings: panel.resetSettings() });
    } catch (err) {
      sendError(res, err);
    }
  });

  return r;
}
