import type { PanelView, TaskKind } from "@sketch-refine/shared";

import type { SdApi } from "./sd/client";
import type { SystemLog } from "./logger";
import type { BatchState } from "./progress/batchState";
import type { ProgressThresholds } from "./config";
import { aggregateProgress, displayPercent } from "./progress/aggregator";
import { normalizeImageProgress, readJobStatus } from "./progress/normalizer";
import { errorMessage } from "./errors";

export interface ProgressPollerDeps {
  state: BatchState;
  api: SdApi;
  log: SystemLog;
  intervalMs: number;
  thresholds: ProgressThresholds;
  onView?: (view: PanelView) => void;
}

function stopVisibility(task: TaskKind | null): Record<TaskKind, boolean> {
  return { cleanup: task === "cleanup", face_fix: task === "face_fix" };
}

/**
 * Fixed-interval loop that turns the server's job status into the panel
 * view. It runs independently of the batch requests and only reads the
 * batch state, except for the progress fields the aggregator keeps.
 */
export class ProgressPoller {
  private readonly deps: ProgressPollerDeps;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<PanelView> | null = null;
  private latest: PanelView;

  constructor(deps: ProgressPollerDeps) {
    this.deps = deps;
    this.latest = this.render("stopped", "");
  }

  get view(): PanelView {
    return this.latest;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => console.warn("[poller] tick failed", errorMessage(err)));
    }, this.deps.intervalMs);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** One poll. Overlapping calls share the poll already in flight. */
  tick(): Promise<PanelView> {
    if (!this.inFlight) {
      this.inFlight = this.poll().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async poll(): Promise<PanelView> {
    const { api, state } = this.deps;
    const reachable = await api.probe();
    let jobInfo = "";

    if (reachable && state.isActive) {
      try {
        const status = readJobStatus(await api.getProgress());
        const task = state.activeTask;
        // the batch may have ended while the status request was out
        if (task !== null) {
          const imageProgress = normalizeImageProgress(
            status,
            {
              task,
              currentImageIndex: state.currentImageIndex,
              expectedStageCount: state.expectedStageCount,
            },
            this.deps.thresholds.firstImageGuardFraction
          );
          const result = aggregateProgress(state, imageProgress, this.deps.thresholds.noiseThreshold);
          jobInfo = ` ${result.label}`;
        }
      } catch (err) {
        console.debug("[poller] status read failed", errorMessage(err));
      }
    }

    const view = this.render(reachable ? "running" : "stopped", jobInfo);
    this.latest = view;
    this.deps.onView?.(view);
    return view;
  }

  private render(serverStatus: PanelView["serverStatus"], jobInfo: string): PanelView {
    const { state, api, log } = this.deps;
    const task = state.activeTask;
    return {
      serverStatus,
      sdUrl: api.baseUrl,
      activeTask: task,
      percent: displayPercent(state),
      progressLabel: task ? `✨ Generating...${jobInfo}` : "",
      triggersEnabled: task === null,
      stopVisible: stopVisibility(task),
      logs: log.text(),
      updatedAt: new Date().toISOString(),
    };
  }
}
