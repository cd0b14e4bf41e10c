import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NodeFileHasher } from "./node-file-hasher";

describe("NodeFileHasher", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "pairsync-hasher-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns the sha256 hex digest of the file bytes", async () => {
    const file = path.join(dir, "a.txt");
    await fs.writeFile(file, "abc");

    const hash = await new NodeFileHasher().hashFile(file);

    expect(hash).toEqual({
      algorithm: "sha256",
      value: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
      sizeBytes: 3,
    });
  });

  it("hashes files larger than one read chunk", async () => {
    const file = path.join(dir, "big.bin");
    await fs.writeFile(file, Buffer.alloc(200 * 1024, 7));
    const other = path.join(dir, "big-2.bin");
    const changed = Buffer.alloc(200 * 1024, 7);
    changed[150 * 1024] = 8;
    await fs.writeFile(other, changed);

    const hasher = new NodeFileHasher(16 * 1024);
    const a = await hasher.hashFile(file);
    const b = await hasher.hashFile(other);

    expect(a.value).toHaveLength(64);
    expect(a.sizeBytes).toBe(200 * 1024);
    expect(a.value).not.toBe(b.value);
  });

  it("rejects when the file does not exist", async () => {
    await expect(new NodeFileHasher().hashFile(path.join(dir, "missing"))).rejects.toMatchObject({
      code: "ENOENT",
    });
  });
});
