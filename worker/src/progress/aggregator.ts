import {
  DEFAULT_PROGRESS_NOISE_THRESHOLD,
  MAX_RUNNING_PERCENT,
  type ProgressSnapshot,
} from "@sketch-refine/shared";
import type { BatchState } from "./batchState";

export type AcceptReason = "new-image" | "advance" | "jitter-held" | "spike-recovered";

export interface AggregateResult extends ProgressSnapshot {
  rawPercent: number;
  reason: AcceptReason;
}

export function rawBatchPercent(currentImageIndex: number, imageProgress: number, totalImageCount: number): number {
  return ((currentImageIndex + imageProgress) / Math.max(1, totalImageCount)) * 100;
}

export function formatProgressLabel(currentImageIndex: number, totalImageCount: number, percent: number): string {
  return `(${currentImageIndex + 1}/${totalImageCount}) ${Math.trunc(percent)}%`;
}

/**
 * Folds one image-progress reading into the batch percentage.
 *
 * On the same image a drop under `noiseThreshold` points is jitter and the
 * previous value is kept; a larger drop means the previous reading was the
 * outlier and the lower value wins. A new image always resets.
 */
export function aggregateProgress(
  state: BatchState,
  imageProgress: number,
  noiseThreshold: number = DEFAULT_PROGRESS_NOISE_THRESHOLD
): AggregateResult {
  const index = state.currentImageIndex;
  const raw = rawBatchPercent(index, imageProgress, state.totalImageCount);

  let accepted: number;
  let reason: AcceptReason;

  if (state.lastSeenImageIndex !== index) {
    accepted = raw;
    reason = "new-image";
    state.lastSeenImageIndex = index;
  } else if (raw >= state.lastKnownPercent) {
    accepted = raw;
    reason = "advance";
  } else if (state.lastKnownPercent - raw < noiseThreshold) {
    accepted = state.lastKnownPercent;
    reason = "jitter-held";
  } else {
    accepted = raw;
    reason = "spike-recovered";
  }

  const percent = Math.min(MAX_RUNNING_PERCENT, Math.max(0, accepted));
  state.lastKnownPercent = percent;

  return {
    percent,
    label: formatProgressLabel(index, state.totalImageCount, percent),
    rawPercent: raw,
    reason,
  };
}

/** The integer shown on the progress bar: 100 once a batch has finished, 0 when idle. */
export function displayPercent(state: BatchState): number {
  if (!state.isActive) return state.lastKnownPercent > 0 ? 100 : 0;
  return Math.trunc(state.lastKnownPercent);
}
