import { SidecarReadResult, SidecarStore } from "./SidecarStore";
import { HashAlgorithm } from "../config";
import { errorCode, ioFailure } from "../errors";
import { createModuleLogger } from "../utils/logger";
import fs from "fs-extra";
import path from "path";
import crypto from "crypto";

const log = createModuleLogger("sidecar-store");

/**
 * Suffix of in-flight sidecar writes; never picked up as data files
 */
export const TEMP_SUFFIX = ".tmp";

/**
 * Options for the on-disk sidecar store
 */
export interface LocalSidecarStoreOptions {
  /**
   * Hash algorithm; also the sidecar extension
   * @default "sha256"
   */
  algorithm?: HashAlgorithm;
}

/**
 * Stores each digest in a `<file>.<algorithm>` text file next to the data file
 */
export class LocalSidecarStore implements SidecarStore {
  private extension: string;

  constructor(options: LocalSidecarStoreOptions = {}) {
    this.extension = `.${options.algorithm ?? "sha256"}`;
  }

  sidecarPath(filePath: string): string {
    return `${filePath}${this.extension}`;
  }

  async read(filePath: string): Promise<SidecarReadResult> {
    const sidecar = this.sidecarPath(filePath);

    try {
      const content = await fs.readFile(sidecar, "utf8");
      return { status: "found", digest: content.trim().toLowerCase() };
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return { status: "not_found" };
      }
      throw ioFailure("read sidecar", sidecar, error);
    }
  }

  /**
   * Writes to a temp file in the same directory, then renames over the
   * sidecar so an interrupted run never leaves a half-written digest.
   */
  async write(filePath: string, digest: string): Promise<void> {
    const sidecar = this.sidecarPath(filePath);
    const tempPath = path.join(
      path.dirname(sidecar),
      `.${path.basename(sidecar)}.${crypto.randomBytes(6).toString("hex")}${TEMP_SUFFIX}`,
    );

    try {
      await fs.writeFile(tempPath, `${digest.toLowerCase()}\n`, "ascii");
      await fs.rename(tempPath, sidecar);
    } catch (error: unknown) {
      await fs.remove(tempPath).catch((cleanupError: unknown) => {
        log.warn(`Could not remove temp file ${tempPath}`, {
          error: String(cleanupError),
        });
      });
      throw ioFailure("write sidecar", sidecar, error);
    }
  }
}

function isNotFound(error: unknown): boolean {
  const code = errorCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}
