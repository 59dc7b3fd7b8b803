export * from "./config";
export * from "./errors";
export * from "./logger";
export * from "./poller";
export * from "./progress/aggregator";
export * from "./progress/batchState";
export * from "./progress/normalizer";
export * from "./pipeline/imageStore";
export * from "./pipeline/orchestrator";
export * from "./pipeline/payload";
export * from "./pipeline/prompt";
export * from "./sd/client";
export * from "./sd/models";
export * from "./utils/cancel";
export * from "./utils/env";
export * from "./utils/images";
