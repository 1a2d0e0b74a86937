// Sync pipelines - Re-exports
export {
  runDeviceSync,
  tagsInRecords,
  type DeviceMutations,
  type DeviceSyncDeps,
} from "./devices.js";
export {
  runLocationSync,
  writePayloadFile,
  DEFAULT_DRY_RUN_OUTPUT,
  type LocationMutations,
  type LocationSyncDeps,
  type LocationSyncResult,
} from "./locations.js";
export { OutcomeRecorder, exitCodeFor } from "./outcome.js";
