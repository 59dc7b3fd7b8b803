import {
  RANDOM_SEED,
  type BatchRequest,
  type DetectorMode,
  type Img2ImgPayload,
  type RefinerArgs,
  type RefinerSlot,
  type StrengthTable,
  type TaskKind,
} from "@sketch-refine/shared";

export const FACE_DETECTOR_MODEL = "face_yolov8s.pt";
export const HAND_DETECTOR_MODEL = "hand_yolov8n.pt";
export const DETECTOR_CONFIDENCE = 0.3;
export const REFINER_SCRIPT = "ADetailer";
export const UNUSED_SLOT: RefinerSlot = { ad_model: "None" };

/** Cleanup: img2img denoise, also used for any detector passes. */
export const CLEANUP_STRENGTHS: StrengthTable = { weak: 0.3, medium: 0.4, strong: 0.5 };
/** Face-fix: inpaint strength of the face pass; the base pass does not denoise. */
export const FACE_FIX_STRENGTHS: StrengthTable = { weak: 0.3, medium: 0.5, strong: 0.7 };

export const GENERATION_DEFAULTS = {
  steps: 20,
  cfg_scale: 7,
  sampler_name: "Euler a",
  scheduler: "Automatic",
  batch_size: 1,
} as const;

export interface StrengthTables {
  cleanup: StrengthTable;
  faceFix: StrengthTable;
}

export const DEFAULT_STRENGTH_TABLES: StrengthTables = {
  cleanup: CLEANUP_STRENGTHS,
  faceFix: FACE_FIX_STRENGTHS,
};

export function resolveStrength(table: StrengthTable, label: string): number {
  switch (label) {
    case "weak":
    case "medium":
    case "strong":
      return table[label];
    default:
      return table.medium;
  }
}

export function refinerSlot(model: string, strength: number): RefinerSlot {
  return {
    ad_model: model,
    ad_denoising_strength: strength,
    ad_confidence: DETECTOR_CONFIDENCE,
  };
}

/** Script args for the detector passes, or null when none run. */
export function buildRefinerArgs(mode: DetectorMode, strength: number): RefinerArgs | null {
  switch (mode) {
    case "face":
      return [true, refinerSlot(FACE_DETECTOR_MODEL, strength), UNUSED_SLOT];
    case "hand":
      return [true, refinerSlot(HAND_DETECTOR_MODEL, strength), UNUSED_SLOT];
    case "face_and_hand":
      return [true, refinerSlot(FACE_DETECTOR_MODEL, strength), refinerSlot(HAND_DETECTOR_MODEL, strength)];
    case "none":
      return null;
  }
}

/** Base generation plus one stage per detector. */
export function stageCountFor(mode: DetectorMode): number {
  switch (mode) {
    case "face":
    case "hand":
      return 2;
    case "face_and_hand":
      return 3;
    case "none":
      return 1;
  }
}

/** A fixed seed advances per image so a batch never repeats itself. */
export function seedForImage(baseSeed: number, index: number): number {
  return baseSeed === RANDOM_SEED ? RANDOM_SEED : baseSeed + index;
}

export interface GenerationPlan {
  task: TaskKind;
  denoisingStrength: number;
  refinerArgs: RefinerArgs | null;
  expectedStageCount: number;
}

export function planGeneration(
  request: Pick<BatchRequest, "task" | "strength" | "detectors">,
  tables: StrengthTables = DEFAULT_STRENGTH_TABLES
): GenerationPlan {
  if (request.task === "face_fix") {
    return {
      task: "face_fix",
      denoisingStrength: 0,
      refinerArgs: buildRefinerArgs("face", resolveStrength(tables.faceFix, request.strength)),
      expectedStageCount: 2,
    };
  }

  const strength = resolveStrength(tables.cleanup, request.strength);
  return {
    task: "cleanup",
    denoisingStrength: strength,
    refinerArgs: buildRefinerArgs(request.detectors, strength),
    expectedStageCount: stageCountFor(request.detectors),
  };
}

export interface PayloadInput {
  sourceBase64: string;
  width: number;
  height: number;
  prompt: string;
  negativePrompt: string;
  seed: number;
  plan: GenerationPlan;
}

export function buildImg2ImgPayload(input: PayloadInput): Img2ImgPayload {
  const alwayson_scripts: Img2ImgPayload["alwayson_scripts"] = {};
  if (input.plan.refinerArgs) {
    alwayson_scripts[REFINER_SCRIPT] = { args: input.plan.refinerArgs };
  }

  return {
    init_images: [input.sourceBase64],
    prompt: input.prompt,
    negative_prompt: input.negativePrompt,
    denoising_strength: input.plan.denoisingStrength,
    seed: input.seed,
    width: input.width,
    height: input.height,
    ...GENERATION_DEFAULTS,
    alwayson_scripts,
  };
}
