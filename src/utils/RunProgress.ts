import { EventEmitter } from "events";
import { MonitorMode } from "../types";

export interface ProgressEvent {
  mode: MonitorMode;
  relativePath: string;
  /** Files finished so far, including this one */
  completed: number;
  total: number;
  percentage: number;
}

/**
 * Per-run progress for an update or verify pass
 */
export class RunProgress extends EventEmitter {
  private mode: MonitorMode | null = null;
  private total: number = 0;
  private completed: number = 0;

  /**
   * Start tracking a new pass over `total` files
   */
  public start(mode: MonitorMode, total: number): void {
    this.mode = mode;
    this.total = total;
    this.completed = 0;
  }

  /**
   * Record one finished file
   */
  public fileDone(relativePath: string): void {
    if (!this.mode) return;

    this.completed++;
    const event: ProgressEvent = {
      mode: this.mode,
      relativePath,
      completed: this.completed,
      total: this.total,
      percentage: this.total === 0 ? 100 : (this.completed / this.total) * 100,
    };
    this.emit("progress", event);
  }

  /**
   * Complete the current pass
   */
  public finish(): void {
    this.mode = null;
    this.total = 0;
    this.completed = 0;
  }

  onProgress(callback: (event: ProgressEvent) => void): void {
    this.on("progress", callback);
  }

  offProgress(callback: (event: ProgressEvent) => void): void {
    this.off("progress", callback);
  }

  /**
   * Format bytes to human readable string
   */
  public static formatBytes(bytes: number): string {
    const units = ["B", "KB", "MB", "GB", "TB"];
    let size = bytes;
    let unitIndex = 0;

    while (size >= 1024 && unitIndex < units.length - 1) {
      size /= 1024;
      unitIndex++;
    }

    return `${size.toFixed(1)} ${units[unitIndex]}`;
  }
}
