import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "./errors";
import { DEFAULT_CONFIG_PATH, expandHome, loadConfig } from "./load-config";

describe("loadConfig", () => {
  let root: string;
  let cwd: string;
  let userConfigDir: string;
  let homeDir: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "pairsync-config-"));
    cwd = path.join(root, "project");
    userConfigDir = path.join(root, "user");
    homeDir = path.join(root, "home");
    await fs.mkdir(path.join(cwd, ".pairsync"), { recursive: true });
    await fs.mkdir(userConfigDir);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const writeJson = (file: string, value: unknown) => fs.writeFile(file, JSON.stringify(value), "utf-8");

  it("falls back to the built-in defaults", async () => {
    const { config, sources } = await loadConfig({ cwd, userConfigDir, homeDir });

    expect(sources).toEqual([DEFAULT_CONFIG_PATH]);
    expect(config.note.titleTemplate).toBe("{date} - {meeting_name}");
    expect(config.note.separator).toBe("--==RAW NOTES==--");
    expect(config.service.intervalSeconds).toBe(300);
    expect(config.service.backupCount).toBe(3);
    expect(config.service.stateFile).toBe(path.join(cwd, ".pairsync", "state.json"));
    expect(config.directories.summaryDir).toBe(path.join(homeDir, "Documents", "Meetings", "Summaries"));
    expect(config.directories.extensions).toEqual([".pdf"]);
  });

  it("layers user, project and --config files in that order", async () => {
    await writeJson(path.join(userConfigDir, "config.json"), {
      service: { intervalSeconds: 120 },
      note: { tags: "standup" },
    });
    await writeJson(path.join(cwd, ".pairsync", "config.json"), { service: { intervalSeconds: 90 } });
    await writeJson(path.join(cwd, "custom.json"), { logging: { level: "debug" } });

    const { config, sources } = await loadConfig({ cwd, userConfigDir, homeDir, custom: "custom.json" });

    expect(config.service.intervalSeconds).toBe(90);
    expect(config.service.backupCount).toBe(3);
    expect(config.note.tags).toBe("standup");
    expect(config.logging.level).toBe("debug");
    expect(sources).toHaveLength(4);
  });

  it("rejects values outside the allowed range", async () => {
    await writeJson(path.join(cwd, ".pairsync", "config.json"), { service: { backupCount: 0 } });

    await expect(loadConfig({ cwd, userConfigDir, homeDir })).rejects.toThrow(
      /service\.backupCount: Backup count must be at least 1/
    );
  });

  it("rejects unknown sections", async () => {
    await writeJson(path.join(cwd, ".pairsync", "config.json"), { schedule: {} });

    await expect(loadConfig({ cwd, userConfigDir, homeDir })).rejects.toBeInstanceOf(ConfigError);
  });

  it("reports a config file that is not JSON", async () => {
    const file = path.join(cwd, ".pairsync", "config.json");
    await fs.writeFile(file, "directories = here", "utf-8");

    await expect(loadConfig({ cwd, userConfigDir, homeDir })).rejects.toThrow(
      `Config file ${file} is not valid JSON`
    );
  });

  it("fails when an explicit config path does not exist", async () => {
    await expect(loadConfig({ cwd, userConfigDir, homeDir, custom: "missing.json" })).rejects.toThrow(
      `Config file not found: ${path.join(cwd, "missing.json")}`
    );
  });
});

describe("expandHome", () => {
  it("replaces a leading tilde only", () => {
    expect(expandHome("~", "/home/u")).toBe("/home/u");
    expect(expandHome("~/notes", "/home/u")).toBe(path.join("/home/u", "notes"));
    expect(expandHome("/data/~x", "/home/u")).toBe("/data/~x");
  });
});
