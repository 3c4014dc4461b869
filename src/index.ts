// Export the monitor and its collaborators
export { IntegrityMonitor, IntegrityMonitorDeps } from "./monitor/IntegrityMonitor";
export { DigestWatcher, DigestWatcherOptions } from "./monitor/DigestWatcher";
export { FileSelector, FileSelectorOptions } from "./selector/FileSelector";
export { SidecarStore, SidecarReadResult } from "./storage/SidecarStore";
export { LocalSidecarStore, LocalSidecarStoreOptions } from "./storage/LocalSidecarStore";
export { digestBytes, digestFile, DigestOptions, FileDigest } from "./hash/HashEngine";
export {
  StateProbe,
  ProbeResult,
  CommandOutputProbe,
  CommandRunner,
} from "./probe/StateProbe";
export { RunProgress, ProgressEvent } from "./utils/RunProgress";

export {
  MonitorConfig,
  MonitorConfigSchema,
  DEFAULT_PATTERNS,
  resolveConfig,
} from "./config";
export * from "./errors";
export * from "./types";
export { runCli, ExitCodes } from "./cli";
