/**
 * Worker Configuration
 *
 * Centralized configuration for the generation core. Values come from the
 * environment (a local `.env` is loaded once here) with defaults that match a
 * WebUI started locally with `--api`.
 */
import dotenv from "dotenv";
import os from "os";
import path from "path";

import {
  DEFAULT_FIRST_IMAGE_GUARD_FRACTION,
  DEFAULT_PROGRESS_NOISE_THRESHOLD,
} from "@sketch-refine/shared";
import { getEnvBoolean, getEnvNumber, getEnvString } from "./utils/env";

dotenv.config();

/**
 * DEV_MODE
 *
 * When enabled, every log line reaches the panel log view, including the
 * per-image "Saved image" lines that are normally kept on the console only.
 */
export const DEV_MODE = getEnvBoolean("DEV_MODE", false);

export const SD_HOST = getEnvString("SD_HOST", "http://127.0.0.1").replace(/\/+$/, "");
export const SD_PORT = getEnvString("SD_PORT", "7860");

/** Checkpoint the batches expect; matched as a substring of the model title. */
export const SD_MODEL_KEYWORD = getEnvString("SD_MODEL_KEYWORD", "waiNSFWIllustrious");

export const SD_API_TIMEOUT_MS = getEnvNumber("SD_API_TIMEOUT_MS", 600_000);
export const SD_PROBE_TIMEOUT_MS = getEnvNumber("SD_PROBE_TIMEOUT_MS", 3_000);
export const SD_STATUS_TIMEOUT_MS = getEnvNumber("SD_STATUS_TIMEOUT_MS", 1_000);

export const POLL_INTERVAL_MS = getEnvNumber("POLL_INTERVAL_MS", 3_000);

export const OUTPUT_DIR = getEnvString(
  "OUTPUT_DIR",
  path.join(os.homedir(), "Pictures", "SketchRefine_Output")
);

export interface ProgressThresholds {
  noiseThreshold: number; // percentage points
  firstImageGuardFraction: number; // job fraction, 0..1
}

export function loadProgressThresholds(): ProgressThresholds {
  return {
    noiseThreshold: getEnvNumber("PROGRESS_NOISE_THRESHOLD", DEFAULT_PROGRESS_NOISE_THRESHOLD),
    firstImageGuardFraction: getEnvNumber("PROGRESS_FIRST_IMAGE_GUARD", DEFAULT_FIRST_IMAGE_GUARD_FRACTION),
  };
}

export function sdBaseUrl(host: string = SD_HOST, port: string = SD_PORT): string {
  return `${host.trim().replace(/\/+$/, "")}:${port.trim()}`;
}
