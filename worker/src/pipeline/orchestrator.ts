import {
  MAX_BATCH_COUNT,
  DETECTOR_MODES,
  STRENGTH_LABELS,
  type BatchOutcome,
  type BatchPhase,
  type BatchRequest,
  type BatchUpdate,
  type TaskKind,
} from "@sketch-refine/shared";

import type { SdApi } from "../sd/client";
import { nLog, type SystemLog } from "../logger";
import type { BatchState } from "../progress/batchState";
import type { ImageStore } from "./imageStore";
import { ensureModel } from "../sd/models";
import { ConnectivityError, InvalidRequestError, errorMessage } from "../errors";
import { decodeBase64Image, parseInfotext, toPngDataUrl } from "../utils/images";
import { buildPrompt, passThroughTranslator, type HintTranslator } from "./prompt";
import {
  DEFAULT_STRENGTH_TABLES,
  buildImg2ImgPayload,
  planGeneration,
  seedForImage,
  type StrengthTables,
} from "./payload";

export const TASK_LABELS: Record<TaskKind, string> = {
  cleanup: "Sketch cleanup",
  face_fix: "Face fix",
};

export const IDLE_TRIGGER_LABEL = "Run ➡";

export interface OrchestratorDeps {
  api: SdApi;
  state: BatchState;
  log: SystemLog;
  images: ImageStore;
  modelKeyword: string;
  translator?: HintTranslator;
  strengthTables?: StrengthTables;
}

export function validateBatchRequest(request: BatchRequest) {
  if (request.task !== "cleanup" && request.task !== "face_fix") {
    throw new InvalidRequestError(`unknown task: ${String(request.task)}`);
  }
  if (!request.sourceImagePath || !request.sourceImagePath.trim()) {
    throw new InvalidRequestError("source image is required");
  }
  if (!Number.isInteger(request.batchCount) || request.batchCount < 1 || request.batchCount > MAX_BATCH_COUNT) {
    throw new InvalidRequestError(`batchCount must be an integer between 1 and ${MAX_BATCH_COUNT}`);
  }
  if (!Number.isInteger(request.seed) || request.seed < -1) {
    throw new InvalidRequestError("seed must be -1 or a non-negative integer");
  }
  if (!(STRENGTH_LABELS as readonly string[]).includes(request.strength)) {
    throw new InvalidRequestError(`strength must be one of ${STRENGTH_LABELS.join(", ")}`);
  }
  if (!(DETECTOR_MODES as readonly string[]).includes(request.detectors)) {
    throw new InvalidRequestError(`detectors must be one of ${DETECTOR_MODES.join(", ")}`);
  }
}

/**
 * Run one batch, one image at a time.
 *
 * Preconditions (valid request, reachable server, no batch running) are
 * checked before the state changes, so a rejected start rejects the first
 * `next()` and leaves the panel idle. After that the generator yields a
 * `started` update, one `progress` update per finished image (with every
 * result so far), and a single `finished` update once the state is idle
 * again. Failures end the batch without retrying and keep partial results.
 */
export async function* runBatch(request: BatchRequest, deps: OrchestratorDeps): AsyncGenerator<BatchUpdate, void, undefined> {
  const { api, state, log } = deps;

  validateBatchRequest(request);
  if (!(await api.probe())) {
    throw new ConnectivityError();
  }

  const plan = planGeneration(request, deps.strengthTables ?? DEFAULT_STRENGTH_TABLES);
  state.begin(request.task, request.batchCount, plan.expectedStageCount);

  const total = request.batchCount;
  const taskLabel = TASK_LABELS[request.task];
  const images: string[] = [];
  const parameters: string[] = [];
  const startedAt = Date.now();
  let outcome: BatchOutcome = "completed";
  let error: string | null = null;

  const update = (phase: BatchPhase, triggerLabel: string): BatchUpdate => ({
    phase,
    task: request.task,
    images: [...images],
    parameters: [...parameters],
    total,
    outcome: phase === "finished" ? outcome : null,
    error: phase === "finished" ? error : null,
    triggerEnabled: phase === "finished",
    triggerLabel,
  });

  const persist = async (bytes: Buffer, info: string): Promise<string> => {
    try {
      const saved = await deps.images.save(bytes, info);
      log.add(`Saved image: ${saved}`);
      return saved;
    } catch (err) {
      log.add(`Save error: ${errorMessage(err)}`);
      return toPngDataUrl(bytes);
    }
  };

  try {
    yield update("started", "⏳ Preparing...");

    await ensureModel(api, deps.modelKeyword, log);
    log.add(`${taskLabel}: generation started`);

    const { prompt, negativePrompt } = await buildPrompt(request.hint, deps.translator ?? passThroughTranslator, log);
    const source = await deps.images.prepareSource(request.sourceImagePath);

    for (let i = 0; i < total; i++) {
      state.setImageIndex(i);
      if (state.isCancelRequested) {
        outcome = "cancelled";
        log.add("⛔️ Generation stopped by user");
        break;
      }

      const payload = buildImg2ImgPayload({
        sourceBase64: source.base64,
        width: source.width,
        height: source.height,
        prompt,
        negativePrompt,
        seed: seedForImage(request.seed, i),
        plan,
      });
      nLog("orchestrator", `${request.task} image ${i + 1}/${total}`, {
        seed: payload.seed,
        size: `${payload.width}x${payload.height}`,
        denoise: payload.denoising_strength,
      });
      const response = await api.img2img(payload);

      // an interrupt may still let the in-flight request finish normally
      if (state.isCancelRequested) {
        outcome = "cancelled";
        log.add("⛔️ Generation stopped by user (in-flight result discarded)");
        break;
      }

      const info = parseInfotext(response.info);
      for (const b64 of response.images) {
        parameters.push(info);
        images.push(await persist(decodeBase64Image(b64), info));
      }

      yield update("progress", `Generating... (${i + 1}/${total})`);
    }
  } catch (err) {
    if (state.isCancelRequested) {
      outcome = "cancelled";
      log.add(`⛔️ Generation stopped by user (${errorMessage(err)})`);
    } else {
      outcome = "failed";
      error = errorMessage(err);
      log.add(`Generation aborted (error): ${error}`);
    }
  } finally {
    state.finish();
  }

  const seconds = ((Date.now() - startedAt) / 1000).toFixed(1);
  log.add(`${taskLabel}: finished ${outcome} (${seconds}s) - ${images.length} image(s)`);
  yield update("finished", IDLE_TRIGGER_LABEL);
}

/** Drive a batch to its end and return the terminal update. */
export async function runBatchToCompletion(
  request: BatchRequest,
  deps: OrchestratorDeps,
  onUpdate?: (update: BatchUpdate) => void
): Promise<BatchUpdate> {
  let last: BatchUpdate | null = null;
  for await (const update of runBatch(request, deps)) {
    onUpdate?.(update);
    last = update;
  }
  if (!last) throw new Error("batch produced no updates");
  return last;
}
