export * from "./types";
export { diffDocuments, hasChanged, type SyncPlan } from "./diff";
export { runPool } from "./pool";
export { runIndexer, failedRunReport } from "./engine";
