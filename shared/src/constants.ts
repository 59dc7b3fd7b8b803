// shared/src/constants.ts

/** Drops smaller than this (percentage points) on the same image are held as jitter. */
export const DEFAULT_PROGRESS_NOISE_THRESHOLD = 10.0;

/**
 * Below this job fraction on the first image, a nonzero stage index is
 * treated as stale and read as stage 0.
 */
export const DEFAULT_FIRST_IMAGE_GUARD_FRACTION = 0.05;

/** Highest percent shown while a batch is still running; 100 means finished. */
export const MAX_RUNNING_PERCENT = 99;

/** `lastSeenImageIndex` before the first poll of a batch. */
export const NO_IMAGE_SEEN = -1;

/** Seed value that lets the generator pick a random seed. */
export const RANDOM_SEED = -1;

export const MAX_BATCH_COUNT = 10;

export const STRENGTH_LABELS = ["weak", "medium", "strong"] as const;
export const DETECTOR_MODES = ["none", "face", "hand", "face_and_hand"] as const;
