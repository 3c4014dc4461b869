/**
 * A data file selected for integrity tracking. Rebuilt on every run;
 * the content is read on demand and never kept.
 */
export interface TrackedFile {
  absolutePath: string;
  /** Path relative to the data root, always with "/" separators */
  relativePath: string;
}

export type ViolationKind = "MissingSidecar" | "DigestMismatch";

export interface Violation {
  kind: ViolationKind;
  relativePath: string;
  absolutePath: string;
  /** Digest stored in the sidecar, absent for MissingSidecar */
  expected?: string;
  /** Live digest of the file */
  actual: string;
}

export interface UpdateReport {
  /** Number of sidecars written */
  written: number;
  files: string[];
  bytesHashed: number;
}

export interface VerifyReport {
  checked: number;
  /** Sorted by relative path */
  violations: Violation[];
  ok: boolean;
}

export type MonitorMode = "update" | "verify";
