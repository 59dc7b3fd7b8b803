import type { BatchRequest, BatchUpdate } from "@sketch-refine/shared";

import { runBatch, runBatchToCompletion, type OrchestratorDeps } from "../orchestrator";
import { BatchState } from "../../progress/batchState";
import { SystemLog } from "../../logger";
import { ProgressPoller } from "../../poller";
import {
  BatchAlreadyRunningError,
  CapabilityError,
  ConnectivityError,
  InvalidRequestError,
  SdHttpError,
} from "../../errors";
import { FakeImageStore, FakeSdApi, fakeImg2ImgResponse } from "../../__tests__/helpers/fakeSdApi";

function request(overrides: Partial<BatchRequest> = {}): BatchRequest {
  return {
    task: "cleanup",
    sourceImagePath: "/tmp/sketch.png",
    hint: "red short hair",
    batchCount: 3,
    strength: "medium",
    detectors: "none",
    seed: -1,
    ...overrides,
  };
}

describe("runBatch", () => {
  let api: FakeSdApi;
  let images: FakeImageStore;
  let state: BatchState;
  let log: SystemLog;
  let deps: OrchestratorDeps;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    api = new FakeSdApi();
    images = new FakeImageStore();
    state = new BatchState();
    log = new SystemLog({ devMode: false });
    deps = { api, state, log, images, modelKeyword: "waiNSFWIllustrious" };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("generates every image in order and returns to idle", async () => {
    const indices: number[] = [];
    api.onImg2Img = async (_payload, call) => {
      indices.push(state.currentImageIndex);
      expect(state.activeTask).toBe("cleanup");
      return fakeImg2ImgResponse(call);
    };

    const updates: BatchUpdate[] = [];
    const final = await runBatchToCompletion(request(), deps, (u) => updates.push(u));

    expect(indices).toEqual([0, 1, 2]);
    expect(updates.map((u) => u.phase)).toEqual(["started", "progress", "progress", "progress", "finished"]);
    expect(updates.map((u) => u.images.length)).toEqual([0, 1, 2, 3, 3]);
    expect(final.outcome).toBe("completed");
    expect(final.error).toBeNull();
    expect(final.images).toEqual(["/out/gen_1.png", "/out/gen_2.png", "/out/gen_3.png"]);
    expect(final.parameters).toEqual(["params 0", "params 1", "params 2"]);
    expect(final.triggerEnabled).toBe(true);
    expect(final.triggerLabel).toBe("Run ➡");
    expect(state.activeTask).toBeNull();
    expect(images.preparedFrom).toEqual(["/tmp/sketch.png"]);
  });

  it("keeps the polled percentage from sliding back within an image", async () => {
    const poller = new ProgressPoller({
      state,
      api,
      log,
      intervalMs: 3000,
      thresholds: { noiseThreshold: 10, firstImageGuardFraction: 0.05 },
    });
    const percents: number[] = [];
    api.onImg2Img = async (_payload, call) => {
      for (const progress of [0.1, 0.55, 0.5, 0.8]) {
        api.progress = { progress, state: { job_count: 1, job_no: 0 } };
        await poller.tick();
        percents.push(state.lastKnownPercent);
      }
      return fakeImg2ImgResponse(call);
    };

    await runBatchToCompletion(request(), deps);

    expect(percents).toHaveLength(12);
    for (let i = 1; i < percents.length; i++) {
      expect(percents[i]).toBeGreaterThanOrEqual(percents[i - 1]);
    }
    expect(percents[0]).toBeCloseTo(3.333, 2);
    expect(percents[2]).toBeCloseTo(18.333, 2); // 16.67 reading held
    expect(percents[4]).toBeCloseTo(36.667, 2);

    const view = await poller.tick();
    expect(view.percent).toBe(100);
    expect(view.triggersEnabled).toBe(true);
  });

  it("stops at the next image boundary when cancelled", async () => {
    const updates: BatchUpdate[] = [];
    let progressCount = 0;
    for await (const update of runBatch(request({ batchCount: 5 }), deps)) {
      updates.push(update);
      if (update.phase === "progress" && ++progressCount === 2) state.requestCancel();
    }

    const final = updates[updates.length - 1];
    expect(api.payloads).toHaveLength(2);
    expect(final.phase).toBe("finished");
    expect(final.outcome).toBe("cancelled");
    expect(final.error).toBeNull();
    expect(final.images).toHaveLength(2);
    expect(state.activeTask).toBeNull();
    expect(log.text()).toContain("⛔️ Generation stopped by user");
  });

  it("discards the in-flight result when cancelled during the request", async () => {
    api.onImg2Img = async (_payload, call) => {
      if (call === 1) state.requestCancel();
      return fakeImg2ImgResponse(call);
    };

    const final = await runBatchToCompletion(request(), deps);

    expect(api.payloads).toHaveLength(2);
    expect(final.outcome).toBe("cancelled");
    expect(final.images).toEqual(["/out/gen_1.png"]);
  });

  it("advances a fixed seed per image", async () => {
    await runBatchToCompletion(request({ seed: 100 }), deps);
    expect(api.payloads.map((p) => p.seed)).toEqual([100, 101, 102]);
  });

  it("passes a random seed through unchanged", async () => {
    await runBatchToCompletion(request({ seed: -1 }), deps);
    expect(api.payloads.map((p) => p.seed)).toEqual([-1, -1, -1]);
  });

  it("aborts on a request failure and keeps what was produced", async () => {
    api.onImg2Img = async (_payload, call) => {
      if (call === 1) throw new SdHttpError(500);
      return fakeImg2ImgResponse(call);
    };

    const final = await runBatchToCompletion(request(), deps);

    expect(api.payloads).toHaveLength(2);
    expect(final.outcome).toBe("failed");
    expect(final.error).toBe("API Error: 500");
    expect(final.images).toEqual(["/out/gen_1.png"]);
    expect(state.activeTask).toBeNull();
  });

  it("reports a missing refinement extension", async () => {
    api.onImg2Img = async () => {
      throw new CapabilityError();
    };

    const final = await runBatchToCompletion(request({ detectors: "face" }), deps);

    expect(final.outcome).toBe("failed");
    expect(final.error).toBe("ADetailer not found on the SD server");
    expect(state.activeTask).toBeNull();
  });

  it("never starts when the server is unreachable", async () => {
    api.reachable = false;

    await expect(runBatchToCompletion(request(), deps)).rejects.toBeInstanceOf(ConnectivityError);
    expect(state.activeTask).toBeNull();
    expect(api.payloads).toHaveLength(0);
  });

  it("rejects a second batch while one is running", async () => {
    state.begin("face_fix", 1, 2);

    await expect(runBatchToCompletion(request(), deps)).rejects.toBeInstanceOf(BatchAlreadyRunningError);
    expect(state.activeTask).toBe("face_fix");
  });

  it("rejects invalid requests before touching the state", async () => {
    await expect(runBatchToCompletion(request({ batchCount: 0 }), deps)).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(runBatchToCompletion(request({ sourceImagePath: " " }), deps)).rejects.toBeInstanceOf(
      InvalidRequestError
    );
    expect(state.isActive).toBe(false);
  });

  it("fails the batch when the model cannot be found", async () => {
    api.options = { sd_model_checkpoint: "other.safetensors" };
    api.models = [{ title: "other.safetensors", model_name: "other" }];

    const final = await runBatchToCompletion(request(), deps);

    expect(final.outcome).toBe("failed");
    expect(final.error).toBe(
      "Model 'waiNSFWIllustrious' not found. Download it and place it in the models/Stable-diffusion folder."
    );
    expect(api.payloads).toHaveLength(0);
    expect(state.activeTask).toBeNull();
  });

  it("builds the face-fix payload with a zero-denoise base pass", async () => {
    const stageCounts: number[] = [];
    api.onImg2Img = async (_payload, call) => {
      stageCounts.push(state.expectedStageCount);
      return fakeImg2ImgResponse(call);
    };

    await runBatchToCompletion(request({ task: "face_fix", batchCount: 1, detectors: "hand" }), deps);

    const [payload] = api.payloads;
    expect(stageCounts).toEqual([2]);
    expect(payload.denoising_strength).toBe(0);
    expect(payload.alwayson_scripts).toEqual({
      ADetailer: {
        args: [
          true,
          { ad_model: "face_yolov8s.pt", ad_denoising_strength: 0.5, ad_confidence: 0.3 },
          { ad_model: "None" },
        ],
      },
    });
    expect(payload.width).toBe(512);
    expect(payload.height).toBe(768);
    expect(payload.prompt).toBe("red short hair, masterpiece, best quality");
  });

  it("falls back to a data URL when saving fails", async () => {
    images.failSaves = true;

    const final = await runBatchToCompletion(request({ batchCount: 1 }), deps);

    expect(final.outcome).toBe("completed");
    expect(final.images).toEqual([`data:image/png;base64,${Buffer.from("image-0").toString("base64")}`]);
    expect(log.text()).toContain("Save error: disk full");
  });

  it("keeps per-image save lines out of the panel log", async () => {
    await runBatchToCompletion(request({ batchCount: 1 }), deps);
    expect(log.text()).not.toContain("Saved image");
  });

  it("returns to idle when the consumer stops early", async () => {
    const updates = runBatch(request(), deps);
    const first = await updates.next();
    expect(first.value).toMatchObject({ phase: "started" });
    expect(state.isActive).toBe(true);

    await updates.return(undefined);
    expect(state.isActive).toBe(false);
  });
});
