import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { FileHasher, FileHash } from "../ports/file-hasher";

export const DEFAULT_HASH_CHUNK_SIZE = 64 * 1024;

/** Streams the file through SHA-256; memory use stays at one chunk. */
export class NodeFileHasher implements FileHasher {
  constructor(private readonly chunkSize: number = DEFAULT_HASH_CHUNK_SIZE) {}

  async hashFile(absolutePath: string): Promise<FileHash> {
    const hash = createHash("sha256");
    let sizeBytes = 0;

    for await (const chunk of createReadStream(absolutePath, { highWaterMark: this.chunkSize })) {
      if (!Buffer.isBuffer(chunk)) continue;
      hash.update(chunk);
      sizeBytes += chunk.length;
    }

    return { algorithm: "sha256", value: hash.digest("hex"), sizeBytes };
  }
}
