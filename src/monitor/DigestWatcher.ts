import type { FSWatcher } from "fs";
import fs from "fs-extra";
import path from "path";
import { MonitorConfig } from "../config";
import { digestFile } from "../hash/HashEngine";
import { errorMessage } from "../errors";
import { FileSelector } from "../selector/FileSelector";
import { LocalSidecarStore } from "../storage/LocalSidecarStore";
import { SidecarStore } from "../storage/SidecarStore";
import { createModuleLogger } from "../utils/logger";

const log = createModuleLogger("watcher");

export interface DigestWatcherOptions {
  /**
   * Quiet period after the last change event before a file is hashed
   * @default 250
   */
  debounceMs?: number;
  store?: SidecarStore;
  selector?: FileSelector;
}

/**
 * Rewrites a file's sidecar shortly after the file stops changing.
 * Errors on one file are logged and the watcher keeps running.
 */
export class DigestWatcher {
  private readonly store: SidecarStore;
  private readonly selector: FileSelector;
  private readonly debounceMs: number;
  private readonly pending = new Map<string, NodeJS.Timeout>();
  private watcher: FSWatcher | null = null;

  constructor(
    private readonly config: MonitorConfig,
    options: DigestWatcherOptions = {},
  ) {
    this.store =
      options.store ?? new LocalSidecarStore({ algorithm: config.algorithm });
    this.selector =
      options.selector ??
      new FileSelector({ root: config.root, patterns: config.patterns });
    this.debounceMs = options.debounceMs ?? 250;
  }

  start(): void {
    if (this.watcher) return;

    this.watcher = fs.watch(
      this.config.root,
      { recursive: true },
      (_event, fileName) => {
        if (fileName) {
          this.schedule(fileName.toString());
        }
      },
    );
    this.watcher.on("error", (error: Error) => {
      log.error(`Watcher error: ${error.message}`);
    });
    log.info(`Watching ${this.config.root} for changes`);
  }

  stop(): void {
    for (const timer of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
    this.watcher?.close();
    this.watcher = null;
  }

  /**
   * Queues a root-relative path, restarting its quiet period
   */
  schedule(relativePath: string): void {
    const existing = this.pending.get(relativePath);
    if (existing) {
      clearTimeout(existing);
    }
    this.pending.set(
      relativePath,
      setTimeout(() => {
        this.pending.delete(relativePath);
        this.handleChange(relativePath).catch((error: unknown) => {
          log.error(
            `Could not hash ${relativePath}: ${errorMessage(error)}`,
          );
        });
      }, this.debounceMs),
    );
  }

  /**
   * Hashes a changed file and rewrites its sidecar.
   * Returns the new digest, or null when the path is not tracked or gone.
   */
  async handleChange(relativePath: string): Promise<string | null> {
    const file = this.selector.toTrackedFile(
      path.resolve(this.config.root, relativePath),
    );
    if (!file || !this.selector.matches(file.relativePath)) {
      return null;
    }
    // Deleted or renamed away before the quiet period ended
    if (!(await fs.pathExists(file.absolutePath))) {
      return null;
    }

    const { digest } = await digestFile(file.absolutePath, {
      algorithm: this.config.algorithm,
      chunkSize: this.config.chunkSize,
    });
    await this.store.write(file.absolutePath, digest);
    log.info(`${file.relativePath} -> ${digest}`);
    return digest;
  }
}
