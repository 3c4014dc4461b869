import { MonitorConfig } from "../config";
import { VerificationFailedError } from "../errors";
import { digestFile } from "../hash/HashEngine";
import { FileSelector, sortByRelativePath } from "../selector/FileSelector";
import { LocalSidecarStore } from "../storage/LocalSidecarStore";
import { SidecarStore } from "../storage/SidecarStore";
import {
  MonitorMode,
  TrackedFile,
  UpdateReport,
  Violation,
  VerifyReport,
} from "../types";
import { mapWithConcurrency } from "../utils/concurrency";
import { createModuleLogger } from "../utils/logger";
import { RunProgress } from "../utils/RunProgress";

const log = createModuleLogger("monitor");

/**
 * Collaborators the monitor can be given instead of the defaults
 */
export interface IntegrityMonitorDeps {
  store?: SidecarStore;
  selector?: FileSelector;
  progress?: RunProgress;
}

interface HashedFile {
  file: TrackedFile;
  digest: string;
  bytes: number;
}

/**
 * Keeps sidecar digests in step with data files (update) and checks
 * them (verify). Holds no state between runs; each call is a fresh pass
 * over the current file set.
 */
export class IntegrityMonitor {
  readonly store: SidecarStore;
  readonly selector: FileSelector;
  readonly progress: RunProgress;

  constructor(
    private readonly config: MonitorConfig,
    deps: IntegrityMonitorDeps = {},
  ) {
    this.store =
      deps.store ?? new LocalSidecarStore({ algorithm: config.algorithm });
    this.selector =
      deps.selector ??
      new FileSelector({ root: config.root, patterns: config.patterns });
    this.progress = deps.progress ?? new RunProgress();
  }

  /**
   * Writes a fresh sidecar for every selected file, whether or not one
   * existed or matched.
   *
   * @param paths - Files passed by a hook runner; the whole root is scanned when omitted
   */
  async update(paths?: string[]): Promise<UpdateReport> {
    const files = await this.resolveFiles(paths);
    log.info(`Updating sidecars for ${files.length} file(s)`);

    const hashed = await this.runPass("update", files, async (file) => {
      const result = await this.hash(file);
      await this.store.write(file.absolutePath, result.digest);
      log.debug(`${file.relativePath} -> ${result.digest}`);
      return result;
    });

    return {
      written: hashed.length,
      files: hashed.map((h) => h.file.relativePath),
      bytesHashed: hashed.reduce((sum, h) => sum + h.bytes, 0),
    };
  }

  /**
   * Compares every selected file with its sidecar. All violations are
   * collected before returning; sidecars are never modified.
   *
   * @param paths - Files passed by a hook runner; the whole root is scanned when omitted
   */
  async verify(paths?: string[]): Promise<VerifyReport> {
    const files = await this.resolveFiles(paths);
    log.info(`Verifying ${files.length} file(s)`);

    const outcomes = await this.runPass("verify", files, (file) =>
      this.check(file),
    );

    const violations = sortByRelativePath(
      outcomes.filter((v): v is Violation => v !== null),
    );
    for (const violation of violations) {
      log.debug(`${violation.kind} ${violation.relativePath}`);
    }

    return {
      checked: files.length,
      violations,
      ok: violations.length === 0,
    };
  }

  /**
   * Runs verify and throws VerificationFailedError when anything is off
   */
  async assertVerified(paths?: string[]): Promise<VerifyReport> {
    const report = await this.verify(paths);
    if (!report.ok) {
      throw new VerificationFailedError(report.violations);
    }
    return report;
  }

  private async resolveFiles(paths?: string[]): Promise<TrackedFile[]> {
    return paths ? this.selector.filter(paths) : this.selector.select();
  }

  private async runPass<R>(
    mode: MonitorMode,
    files: TrackedFile[],
    worker: (file: TrackedFile) => Promise<R>,
  ): Promise<R[]> {
    this.progress.start(mode, files.length);
    try {
      return await mapWithConcurrency(
        files,
        this.config.concurrency,
        async (file) => {
          const result = await worker(file);
          this.progress.fileDone(file.relativePath);
          return result;
        },
      );
    } finally {
      this.progress.finish();
    }
  }

  private async check(file: TrackedFile): Promise<Violation | null> {
    const stored = await this.store.read(file.absolutePath);
    const { digest: actual } = await this.hash(file);

    if (stored.status === "not_found") {
      return {
        kind: "MissingSidecar",
        relativePath: file.relativePath,
        absolutePath: file.absolutePath,
        actual,
      };
    }
    if (stored.digest !== actual) {
      return {
        kind: "DigestMismatch",
        relativePath: file.relativePath,
        absolutePath: file.absolutePath,
        expected: stored.digest,
        actual,
      };
    }
    return null;
  }

  private async hash(file: TrackedFile): Promise<HashedFile> {
    const { digest, bytes } = await digestFile(file.absolutePath, {
      algorithm: this.config.algorithm,
      chunkSize: this.config.chunkSize,
    });
    return { file, digest, bytes };
  }
}
