import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadDefaultConfig } from "./load-config";
import type { PairSyncConfig } from "./schema";
import { titleTemplateWarnings, validateConfig } from "./validate-config";

describe("validateConfig", () => {
  let root: string;
  let config: PairSyncConfig;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "pairsync-validate-"));
    await fs.mkdir(path.join(root, "summaries"));
    await fs.mkdir(path.join(root, "transcripts"));

    const defaults = await loadDefaultConfig();
    config = {
      ...defaults,
      directories: {
        ...defaults.directories,
        summaryDir: path.join(root, "summaries"),
        transcriptDir: path.join(root, "transcripts"),
      },
      service: { ...defaults.service, stateFile: path.join(root, "state", "state.json") },
    };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("accepts existing folders and creates the state folder", async () => {
    expect(await validateConfig(config)).toEqual([]);
    expect((await fs.stat(path.join(root, "state"))).isDirectory()).toBe(true);
  });

  it("fails when a folder is missing", async () => {
    const missing = path.join(root, "nope");
    config.directories.transcriptDir = missing;

    await expect(validateConfig(config)).rejects.toThrow(`Transcript directory does not exist: ${missing}`);
  });

  it("fails when a folder is a file", async () => {
    const file = path.join(root, "file.pdf");
    await fs.writeFile(file, "x");
    config.directories.summaryDir = file;

    await expect(validateConfig(config)).rejects.toThrow(`Summary directory is not a directory: ${file}`);
  });

  it("warns about a short interval and a title without a date", async () => {
    config.service.intervalSeconds = 30;
    config.note.titleTemplate = "{name}";

    expect(await validateConfig(config)).toEqual([
      "Title template does not contain {date} placeholder",
      "Sleep interval is less than 60 seconds",
    ]);
  });
});

describe("titleTemplateWarnings", () => {
  it("flags a missing name and unknown placeholders", () => {
    expect(titleTemplateWarnings("{date} {room}")).toEqual([
      "Title template does not contain meeting name placeholder",
      "Title template has unknown placeholders: room",
    ]);
  });
});
