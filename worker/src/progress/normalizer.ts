import {
  DEFAULT_FIRST_IMAGE_GUARD_FRACTION,
  type SdProgressResponse,
  type TaskKind,
} from "@sketch-refine/shared";

/** One poll of the job-status endpoint with absent fields filled in. */
export interface JobStatus {
  overallFraction: number;
  stageIndex: number;
  stageCount: number;
}

export interface NormalizeContext {
  task: TaskKind;
  currentImageIndex: number;
  expectedStageCount: number;
}

const clamp01 = (value: number) => Math.max(0, Math.min(1, value));

/** Zero and missing values read the same way the server means them. */
export function readJobStatus(raw: SdProgressResponse): JobStatus {
  return {
    overallFraction: raw.progress || 0,
    stageIndex: raw.state?.job_no || 0,
    stageCount: raw.state?.job_count || 1,
  };
}

/**
 * Right after a request is submitted the server can still report the stage
 * index of the previous job. On the first image, a nonzero stage under the
 * guard fraction is read as stage 0.
 */
export function guardStageIndex(
  status: JobStatus,
  currentImageIndex: number,
  guardFraction: number = DEFAULT_FIRST_IMAGE_GUARD_FRACTION
): number {
  if (currentImageIndex === 0 && status.overallFraction < guardFraction && status.stageIndex > 0) {
    return 0;
  }
  return status.stageIndex;
}

export function effectiveStageCount(reportedStageCount: number, expectedStageCount: number): number {
  return Math.max(1, reportedStageCount, expectedStageCount);
}

/**
 * Progress of the current image through all of its stages, in [0, 1].
 *
 * Face-fix runs a zero-denoise base pass followed by the face pass, and the
 * server's own fraction puts the face pass in its back half.
 */
export function normalizeImageProgress(
  status: JobStatus,
  ctx: NormalizeContext,
  guardFraction: number = DEFAULT_FIRST_IMAGE_GUARD_FRACTION
): number {
  const stageIndex = guardStageIndex(status, ctx.currentImageIndex, guardFraction);
  const fraction = status.overallFraction;

  if (ctx.task === "face_fix") {
    if (stageIndex === 0) return 0;
    return clamp01((fraction - 0.5) / 0.5);
  }

  const stages = effectiveStageCount(status.stageCount, ctx.expectedStageCount);
  const clampedStage = Math.min(stageIndex, stages - 1);
  return clamp01((clampedStage + fraction) / stages);
}
