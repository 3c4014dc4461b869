import fs from "fs-extra";
import path from "path";
import { TrackedFile } from "../types";
import { ioFailure } from "../errors";

/**
 * Directories never descended into while scanning the root
 */
const IGNORED_DIRS = new Set([".git", "node_modules"]);

export interface FileSelectorOptions {
  /** Directory the patterns are matched against */
  root: string;
  /** Regular expression sources matched against root-relative POSIX paths */
  patterns: string[];
}

/**
 * Decides which files under the data root are tracked
 */
export class FileSelector {
  private readonly root: string;
  private readonly patterns: RegExp[];

  constructor(options: FileSelectorOptions) {
    this.root = path.resolve(options.root);
    this.patterns = options.patterns.map((source) => new RegExp(source));
  }

  /**
   * Whether a root-relative POSIX path is tracked
   */
  matches(relativePath: string): boolean {
    const name = path.posix.basename(relativePath);
    // Editor swap files
    if (name.startsWith(".~")) {
      return false;
    }
    return this.patterns.some((pattern) => pattern.test(relativePath));
  }

  /**
   * Walks the root and returns every tracked file, sorted by relative path
   */
  async select(): Promise<TrackedFile[]> {
    const found: TrackedFile[] = [];
    await this.walk(this.root, found);
    return sortByRelativePath(found);
  }

  /**
   * Keeps the given paths (absolute or relative to the root) that are
   * tracked. Paths outside the root are dropped, duplicates collapse.
   */
  filter(paths: string[]): TrackedFile[] {
    const byRelative = new Map<string, TrackedFile>();

    for (const candidate of paths) {
      const file = this.toTrackedFile(path.resolve(this.root, candidate));
      if (file && this.matches(file.relativePath)) {
        byRelative.set(file.relativePath, file);
      }
    }

    return sortByRelativePath([...byRelative.values()]);
  }

  /**
   * Builds a TrackedFile for an absolute path, or null when it lies outside the root
   */
  toTrackedFile(absolutePath: string): TrackedFile | null {
    const relative = path.relative(this.root, absolutePath);
    if (
      relative === "" ||
      relative.startsWith("..") ||
      path.isAbsolute(relative)
    ) {
      return null;
    }
    return {
      absolutePath,
      relativePath: relative.split(path.sep).join(path.posix.sep),
    };
  }

  private async walk(dirPath: string, found: TrackedFile[]): Promise<void> {
    const entries = await fs
      .readdir(dirPath, { withFileTypes: true })
      .catch((error: unknown) => {
        throw ioFailure("list directory", dirPath, error);
      });

    for (const entry of entries) {
      const entryPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORED_DIRS.has(entry.name)) {
          await this.walk(entryPath, found);
        }
      } else if (entry.isFile()) {
        const file = this.toTrackedFile(entryPath);
        if (file && this.matches(file.relativePath)) {
          found.push(file);
        }
      }
    }
  }
}

export function sortByRelativePath<T extends { relativePath: string }>(
  items: T[],
): T[] {
  return [...items].sort((a, b) => {
    if (a.relativePath === b.relativePath) return 0;
    return a.relativePath < b.relativePath ? -1 : 1;
  });
}
