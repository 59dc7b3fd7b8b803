import { Router, Request, Response } from "express";
import {
  DETECTOR_MODES,
  RANDOM_SEED,
  STRENGTH_LABELS,
  type BatchRequest,
  type DetectorMode,
  type StrengthLabel,
  type TaskKind,
} from "@sketch-refine/shared";
import { InvalidRequestError } from "@sketch-refine/worker";

import type { ControlPanel } from "../services/panel";
import { sendError } from "../utils/http";

function isStrengthLabel(value: unknown): value is StrengthLabel {
  return STRENGTH_LABELS.some((label) => label === value);
}

function isDetectorMode(value: unknown): value is DetectorMode {
  return DETECTOR_MODES.some((mode) => mode === value);
}

function numberField(body: Record<string, unknown>, key: string, fallback: number): number {
  const value = body[key];
  if (value === undefined || value === null || value === "") return fallback;
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(n)) throw new InvalidRequestError(`${key} must be a number`);
  return n;
}

/** Read a batch request from a JSON body; omitted fields take the panel defaults. */
export function parseBatchRequest(task: TaskKind, body: unknown): BatchRequest {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new InvalidRequestError("request body must be a JSON object");
  }
  const fields: Record<string, unknown> = { ...body };

  const strength = fields.strength ?? "medium";
  if (!isStrengthLabel(strength)) {
    throw new InvalidRequestError(`strength must be one of ${STRENGTH_LABELS.join(", ")}`);
  }
  const detectors = fields.detectors ?? "none";
  if (!isDetectorMode(detectors)) {
    throw new InvalidRequestError(`detectors must be one of ${DETECTOR_MODES.join(", ")}`);
  }

  return {
    task,
    sourceImagePath: typeof fields.sourceImagePath === "string" ? fields.sourceImagePath : "",
    hint: typeof fields.hint === "string" ? fields.hint : "",
    batchCount: numberField(fields, "batchCount", 1),
    strength,
    detectors,
    seed: numberField(fields, "seed", RANDOM_SEED),
  };
}

export function generateRouter(panel: ControlPanel) {
  const r = Router();

  const start = (task: TaskKind) => async (req: Request, res: Response) => {
    try {
      const batch = await panel.startBatch(parseBatchRequest(task, req.body));
      res.status(202).json({ ok: true, batchId: batch.batchId, batch });
    } catch (err) {
      sendError(res, err);
    }
  };

  r.post("/cleanup", start("cleanup"));
  r.post("/face-fix", start("face_fix"));
  return r;
}
