import { v4 as uuidv4 } from "uuid";

import type { BatchRequest, BatchSessionView, BatchUpdate, PanelSettings, PanelView } from "@sketch-refine/shared";
import {
  BatchState,
  ProgressPoller,
  SystemLog,
  createFileImageStore,
  errorMessage,
  interruptGeneration,
  runBatch,
  sdBaseUrl,
  type HintTranslator,
  type ImageStore,
  type SdApi,
  type StrengthTables,
} from "@sketch-refine/worker";

import { cleanSettings, defaultSettings, type SettingsStore } from "./settingsStore";

/** An SdApi whose target can move when the settings change. */
export interface RetargetableSdApi extends SdApi {
  setBaseUrl(url: string): void;
}

export interface ControlPanelDeps {
  api: RetargetableSdApi;
  state: BatchState;
  log: SystemLog;
  poller: ProgressPoller;
  settingsStore: SettingsStore;
  modelKeyword: string;
  images?: ImageStore;
  translator?: HintTranslator;
  strengthTables?: StrengthTables;
}

interface BatchSession {
  batchId: string;
  startedAt: string;
  latest: BatchUpdate;
  running: boolean;
}

/**
 * Hosts the generation core for the HTTP API: one batch at a time, drained in
 * the background, with the poller publishing the view on its own schedule.
 */
export class ControlPanel {
  private readonly deps: ControlPanelDeps;
  private readonly images: ImageStore;
  private current: PanelSettings;
  private session: BatchSession | null = null;
  private draining: Promise<void> | null = null;

  constructor(deps: ControlPanelDeps) {
    this.deps = deps;
    this.current = deps.settingsStore.load();
    this.images = deps.images ?? createFileImageStore(() => this.current.outputDir);
    deps.api.setBaseUrl(sdBaseUrl(this.current.sdHost, this.current.sdPort));
  }

  get settings(): PanelSettings {
    return { ...this.current };
  }

  get log(): SystemLog {
    return this.deps.log;
  }

  /**
   * Start a batch. Resolves once the batch is running, rejects when it could
   * not start (bad request, unreachable server, a batch already running).
   */
  async startBatch(request: BatchRequest): Promise<BatchSessionView> {
    const { api, state, log, modelKeyword, translator, strengthTables } = this.deps;
    const updates = runBatch(request, { api, state, log, images: this.images, modelKeyword, translator, strengthTables });

    const first = await updates.next();
    if (first.done) throw new Error("batch ended before it started");

    const session: BatchSession = {
      batchId: uuidv4(),
      startedAt: new Date().toISOString(),
      latest: first.value,
      running: true,
    };
    this.session = session;
    this.draining = this.drain(session, updates);
    return this.describe(session);
  }

  private async drain(session: BatchSession, updates: AsyncGenerator<BatchUpdate, void, undefined>) {
    try {
      for await (const update of updates) {
        session.latest = update;
      }
    } catch (err) {
      console.error("[panel] batch ended unexpectedly", errorMessage(err));
    } finally {
      session.running = false;
    }
  }

  /** Resolves when the batch in the background, if any, has ended. */
  async settled(): Promise<void> {
    if (this.draining) await this.draining;
  }

  interrupt(): Promise<void> {
    const { api, state, log } = this.deps;
    return interruptGeneration(api, state, log);
  }

  refresh(): Promise<PanelView> {
    return this.deps.poller.tick();
  }

  view(): PanelView {
    return this.deps.poller.view;
  }

  results(): BatchSessionView | null {
    return this.session ? this.describe(this.session) : null;
  }

  updateSettings(input: Partial<PanelSettings>): PanelSettings {
    return this.apply(cleanSettings(input, this.current));
  }

  resetSettings(defaults: PanelSettings = defaultSettings()): PanelSettings {
    return this.apply(defaults);
  }

  private apply(next: PanelSettings): PanelSettings {
    this.deps.settingsStore.save(next);
    this.current = next;
    this.deps.api.setBaseUrl(sdBaseUrl(next.sdHost, next.sdPort));
    this.deps.log.add(`Settings saved: ${sdBaseUrl(next.sdHost, next.sdPort)}`);
    return this.settings;
  }

  private describe(session: BatchSession): BatchSessionView {
    const { latest } = session;
    return {
      batchId: session.batchId,
      task: latest.task,
      startedAt: session.startedAt,
      running: session.running,
      images: latest.images,
      parameters: latest.parameters,
      total: latest.total,
      outcome: latest.outcome,
      error: latest.error,
      triggerLabel: latest.triggerLabel,
    };
  }
}
