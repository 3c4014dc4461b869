import crypto from "crypto";
import fs from "fs-extra";
import { DEFAULT_CHUNK_SIZE, HashAlgorithm } from "../config";
import { ioFailure } from "../errors";

export interface DigestOptions {
  algorithm?: HashAlgorithm;
  /**
   * Bytes read per chunk; bounds peak memory regardless of file size
   * @default 8 MiB
   */
  chunkSize?: number;
  /**
   * Called after every chunk with the running byte count
   */
  onChunk?: (bytesRead: number) => void;
}

export interface FileDigest {
  digest: string;
  bytes: number;
}

/**
 * Digest of an in-memory buffer, lowercase hex
 */
export function digestBytes(
  bytes: Buffer | string,
  algorithm: HashAlgorithm = "sha256",
): string {
  return crypto.createHash(algorithm).update(bytes).digest("hex");
}

/**
 * Streams a file through the hash in bounded chunks.
 * Rejects with IOFailureError if any read fails.
 */
export async function digestFile(
  filePath: string,
  options: DigestOptions = {},
): Promise<FileDigest> {
  const hash = crypto.createHash(options.algorithm ?? "sha256");
  let bytes = 0;

  try {
    const stream = fs.createReadStream(filePath, {
      highWaterMark: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
    });
    for await (const chunk of stream) {
      // Stream has no encoding set, so chunks are Buffers
      const buffer: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      hash.update(buffer);
      bytes += buffer.length;
      options.onChunk?.(bytes);
    }
  } catch (error: unknown) {
    throw ioFailure("read", filePath, error);
  }

  return { digest: hash.digest("hex"), bytes };
}
