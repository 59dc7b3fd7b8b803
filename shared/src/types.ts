export type TaskKind = "cleanup" | "face_fix";
export type StrengthLabel = "weak" | "medium" | "strong";
export type DetectorMode = "none" | "face" | "hand" | "face_and_hand";
export type BatchOutcome = "completed" | "cancelled" | "failed";
export type BatchPhase = "started" | "progress" | "finished";
export type ServerStatus = "running" | "stopped";

export type StrengthTable = Record<StrengthLabel, number>;

// ---------------------------------------------------------------------------
// Generation API wire types (Stable-Diffusion WebUI compatible, /sdapi/v1)
// ---------------------------------------------------------------------------

export interface SdProgressResponse {
  progress?: number | null; // fraction of the current job, 0..1, may be stale
  state?: {
    job_count?: number | null; // may undercount always-on refinement stages
    job_no?: number | null;
  } | null;
}

export interface RefinerSlot {
  ad_model: string; // "None" leaves the slot unused
  ad_denoising_strength?: number;
  ad_confidence?: number;
}

/** First element enables the refinement script; one slot per detector. */
export type RefinerArgs = [boolean, ...RefinerSlot[]];

export interface Img2ImgPayload {
  init_images: string[];
  prompt: string;
  negative_prompt: string;
  denoising_strength: number;
  seed: number;
  steps: number;
  width: number; // multiple of 8
  height: number; // multiple of 8
  cfg_scale: number;
  sampler_name: string;
  scheduler: string;
  batch_size: number;
  alwayson_scripts: Record<string, { args: RefinerArgs }>;
}

export interface Img2ImgResponse {
  images: string[]; // base64, optionally data-URL prefixed
  info: string; // JSON string, carries `infotexts`
}

export interface SdModel {
  title: string;
  model_name: string;
}

export interface SdOptions {
  sd_model_checkpoint?: string;
}

// ---------------------------------------------------------------------------
// Batch requests and updates
// ---------------------------------------------------------------------------

export interface BatchRequest {
  task: TaskKind;
  sourceImagePath: string;
  hint: string;
  batchCount: number;
  strength: StrengthLabel;
  detectors: DetectorMode; // ignored by face_fix, which always runs one face pass
  seed: number; // -1 lets the generator randomize
}

export interface BatchUpdate {
  phase: BatchPhase;
  task: TaskKind;
  images: string[]; // saved paths, or data URLs when saving failed
  parameters: string[]; // generation metadata, one per image
  total: number;
  outcome: BatchOutcome | null;
  error: string | null;
  triggerEnabled: boolean;
  triggerLabel: string;
}

// ---------------------------------------------------------------------------
// Panel view (what the polling loop publishes)
// ---------------------------------------------------------------------------

export interface ProgressSnapshot {
  percent: number;
  label: string; // "(i/N) P%"
}

export interface PanelView {
  serverStatus: ServerStatus;
  sdUrl: string;
  activeTask: TaskKind | null;
  percent: number; // 0 idle, 0..99 running, 100 just completed
  progressLabel: string;
  triggersEnabled: boolean;
  stopVisible: Record<TaskKind, boolean>;
  logs: string;
  updatedAt: string;
}

export interface PanelSettings {
  sdHost: string;
  sdPort: string;
  outputDir: string;
}

/** The running or most recent batch, as the results endpoint reports it. */
export interface BatchSessionView {
  batchId: string;
  task: TaskKind;
  startedAt: string;
  running: boolean;
  images: string[];
  parameters: string[];
  total: number;
  outcome: BatchOutcome | null;
  error: string | null;
  triggerLabel: string;
}
