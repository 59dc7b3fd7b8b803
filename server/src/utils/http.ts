import type { Response } from "express";
import { PanelError, errorMessage } from "@sketch-refine/worker";

export function statusFor(err: unknown): number {
  return err instanceof PanelError ? err.statusCode : 500;
}

export function sendError(res: Response, err: unknown) {
  const status = statusFor(err);
  if (status >= 500) console.error("[api] request failed", errorMessage(err));
  res.status(status).json({ ok: false, error: errorMessage(err) });
}
