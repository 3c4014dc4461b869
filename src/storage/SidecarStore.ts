export type SidecarReadResult =
  | { status: "found"; digest: string }
  | { status: "not_found" };

/**
 * Interface for sidecar digest storage
 */
export interface SidecarStore {
  /**
   * Path of the sidecar guarding a data file
   *
   * @param filePath - Absolute path of the data file
   */
  sidecarPath(filePath: string): string;

  /**
   * Reads the stored digest for a data file.
   * A missing sidecar is reported as a status, never thrown.
   *
   * @param filePath - Absolute path of the data file
   */
  read(filePath: string): Promise<SidecarReadResult>;

  /**
   * Replaces the stored digest for a data file atomically
   *
   * @param filePath - Absolute path of the data file
   * @param digest - Lowercase hex digest
   */
  write(filePath: string, digest: string): Promise<void>;
}
