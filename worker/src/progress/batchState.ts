import { NO_IMAGE_SEEN, type TaskKind } from "@sketch-refine/shared";
import { BatchAlreadyRunningError, InvalidRequestError } from "../errors";

export interface BatchSnapshot {
  activeTask: TaskKind | null;
  currentImageIndex: number;
  totalImageCount: number;
  expectedStageCount: number;
  lastKnownPercent: number;
  lastSeenImageIndex: number;
  cancelRequested: boolean;
}

function assertCount(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidRequestError(`${name} must be an integer >= 1 (got ${value})`);
  }
}

/**
 * Shared state of the one batch that may run at a time.
 *
 * Written by the orchestrator, read (and its progress fields updated) by the
 * polling loop. Created idle at startup and mutated in place for every batch.
 * The cancel flag is kept apart from `activeTask` so that "nothing running"
 * and "please stop" never mean the same thing.
 */
export class BatchState {
  activeTask: TaskKind | null = null;
  currentImageIndex = 0;
  totalImageCount = 1;
  expectedStageCount = 1;
  lastKnownPercent = 0;
  lastSeenImageIndex = NO_IMAGE_SEEN;
  private cancelRequested = false;

  get isActive(): boolean {
    return this.activeTask !== null;
  }

  get isCancelRequested(): boolean {
    return this.cancelRequested;
  }

  /**
   * Idle → Running. Rejects a second start while a batch is active.
   * Clears the cancel flag, so a stop pressed before the batch is active
   * (for instance during the reachability probe) is ignored.
   */
  begin(task: TaskKind, totalImageCount: number, expectedStageCount: number) {
    if (this.activeTask !== null) throw new BatchAlreadyRunningError();
    assertCount("totalImageCount", totalImageCount);
    assertCount("expectedStageCount", expectedStageCount);

    this.activeTask = task;
    this.totalImageCount = totalImageCount;
    this.expectedStageCount = expectedStageCount;
    this.currentImageIndex = 0;
    this.cancelRequested = false;
    this.resetProgress();
  }

  setImageIndex(index: number) {
    if (!Number.isInteger(index) || index < 0 || index >= this.totalImageCount) {
      throw new RangeError(`image index ${index} outside 0..${this.totalImageCount - 1}`);
    }
    this.currentImageIndex = index;
  }

  requestCancel() {
    this.cancelRequested = true;
  }

  /**
   * Running → Idle. Returns false when already idle, so the transition is
   * observed exactly once per batch.
   */
  finish(): boolean {
    if (this.activeTask === null) return false;
    this.activeTask = null;
    return true;
  }

  /** Clears what the previous batch left on screen. */
  resetProgress() {
    this.lastKnownPercent = 0;
    this.lastSeenImageIndex = NO_IMAGE_SEEN;
  }

  snapshot(): BatchSnapshot {
    return {
      activeTask: this.activeTask,
      currentImageIndex: this.currentImageIndex,
      totalImageCount: this.totalImageCount,
      expectedStageCount: this.expectedStageCount,
      lastKnownPercent: this.lastKnownPercent,
      lastSeenImageIndex: this.lastSeenImageIndex,
      cancelRequested: this.cancelRequested,
    };
  }
}
