// src/index.ts
export * from "./types";
export * from "./errors";
export * from "./config/pipeline-config";

export * from "./modules/deliveries/classify-delivery";
export * from "./modules/deliveries/accumulate-innings";
export * from "./modules/matches/match-schema";
export * from "./modules/matches/assemble-match";

export * from "./modules/features/group-fold";
export * from "./modules/features/rolling-window";
export * from "./modules/features/rolling-features";
export * from "./modules/features/match-context";
export * from "./modules/features/targets";
export * from "./modules/features/build-feature-table";

export * from "./modules/batch/record-source";
export * from "./modules/batch/table-sink";
export * from "./modules/batch/process-batch";

export * from "./utils/logger";
