export { type DiscoveredFile, type DiscoveryOptions, discoverMsgFiles } from "./discovery.js";
export {
  assignOutputNames,
  type BatchOptions,
  DEFAULT_WORKER_COUNT,
  describeResult,
  runBatch,
  summarizeBatch,
} from "./orchestrator.js";
export { runPool } from "./pool.js";
