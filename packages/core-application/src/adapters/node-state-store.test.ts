import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createPairKey } from "@pairsync/core-domain";

import { NodeStateStore } from "./node-state-store";
import { NodeFileHasher } from "./node-file-hasher";
import type { Clock } from "../ports/clock";
import type { PairRecordUpdate } from "../ports/state-store";
import { createRecordingLogger, LEVEL, messagesAt } from "../test-support/recording-logger";

function steppingClock(startIso: string, stepMs: number): Clock {
  let next = new Date(startIso).getTime();
  return () => {
    const now = new Date(next);
    next += stepMs;
    return now;
  };
}

function entry(name: string, noteId = ""): PairRecordUpdate {
  return {
    summaryPath: `/in/summaries/${name}-summary.pdf`,
    transcriptPath: `/in/transcripts/${name}-transcript.pdf`,
    summaryHash: `s-${name}`,
    transcriptHash: `t-${name}`,
    noteId,
  };
}

const keyOf = (name: string) => createPairKey(`${name}-summary.pdf`, `${name}-transcript.pdf`);

describe("NodeStateStore", () => {
  let dir: string;
  let stateFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "pairsync-state-"));
    stateFile = path.join(dir, "state.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function store(options: { backupCount?: number; clock?: Clock } = {}) {
    const { logger, entries } = createRecordingLogger();
    const s = new NodeStateStore({ stateFile, hasher: new NodeFileHasher(), logger, ...options });
    return { store: s, entries };
  }

  const backupNames = async (s: NodeStateStore) => (await s.listBackups()).map((p) => path.basename(p));

  it("starts empty when there is no state file", async () => {
    const { store: s, entries } = store();
    await s.load();

    expect(s.list()).toEqual([]);
    expect(messagesAt(entries, LEVEL.warn)).toEqual([]);
  });

  it("rejects a backup count below one", () => {
    expect(() => store({ backupCount: 0 })).toThrow("backupCount must be a whole number of at least 1, got 0");
  });

  it("persists records so a new instance sees them", async () => {
    const clock = steppingClock("2024-03-04T10:00:00.000Z", 1000);
    const { store: first } = store({ clock });
    await first.load();

    const saved = await first.update(keyOf("alpha"), entry("alpha", "NOTE-1"));
    await first.update(keyOf("beta"), entry("beta"));

    expect(saved.lastProcessedIso).toBe("2024-03-04T10:00:00.000Z");

    const { store: second } = store();
    await second.load();

    expect(second.list().map((r) => r.pairKey)).toEqual([keyOf("alpha"), keyOf("beta")]);
    expect(second.get(keyOf("alpha"))).toEqual(saved);
    expect(second.getForPair("/elsewhere/beta-summary.pdf", "/x/beta-transcript.pdf")?.noteId).toBe("");
  });

  it("keeps an updated record in its original position", async () => {
    const { store: s } = store();
    await s.load();
    await s.update(keyOf("alpha"), entry("alpha"));
    await s.update(keyOf("beta"), entry("beta"));
    await s.update(keyOf("alpha"), entry("alpha", "NOTE-9"));

    expect(s.list().map((r) => r.noteId)).toEqual(["NOTE-9", ""]);
  });

  it("keeps only the newest backups", async () => {
    const { store: s } = store({ backupCount: 2, clock: steppingClock("2024-03-04T10:00:00.000Z", 1000) });
    await s.load();

    for (const name of ["a", "b", "c", "d"]) {
      await s.update(keyOf(name), entry(name));
    }

    expect(await backupNames(s)).toEqual(["state.20240304T100007000.bak", "state.20240304T100005000.bak"]);
  });

  it("numbers backups taken within the same millisecond", async () => {
    const fixed: Clock = () => new Date("2024-03-04T10:00:00.000Z");
    const { store: s } = store({ backupCount: 3, clock: fixed });
    await s.load();

    for (const name of ["a", "b", "c"]) {
      await s.update(keyOf(name), entry(name));
    }

    expect(await backupNames(s)).toEqual(["state.20240304T100000000-1.bak", "state.20240304T100000000.bak"]);
  });

  it("restores from the newest backup when the state file is corrupt", async () => {
    const clock = steppingClock("2024-03-04T10:00:00.000Z", 1000);
    const { store: writer } = store({ clock });
    await writer.load();
    await writer.update(keyOf("alpha"), entry("alpha"));
    await writer.update(keyOf("beta"), entry("beta"));
    await fs.writeFile(stateFile, "{ not json", "utf-8");

    const { store: reader, entries } = store();
    await reader.load();

    expect(reader.list().map((r) => r.pairKey)).toEqual([keyOf("alpha")]);
    expect(messagesAt(entries, LEVEL.warn)).toEqual(["State file is corrupt", "Restored state from backup"]);

    const repaired = JSON.parse(await fs.readFile(stateFile, "utf-8")) as { records: unknown[] };
    expect(repaired.records).toHaveLength(1);
  });

  it("falls back to an older backup when the newest is corrupt too", async () => {
    const { store: writer } = store({ clock: steppingClock("2024-03-04T10:00:00.000Z", 1000) });
    await writer.load();
    for (const name of ["alpha", "beta", "gamma"]) {
      await writer.update(keyOf(name), entry(name));
    }
    const [newest] = await writer.listBackups();
    if (newest === undefined) throw new Error("expected a backup");
    await fs.writeFile(newest, "[]", "utf-8");
    await fs.writeFile(stateFile, "", "utf-8");

    const { store: reader, entries } = store();
    await reader.load();

    expect(reader.list().map((r) => r.pairKey)).toEqual([keyOf("alpha")]);
    expect(messagesAt(entries, LEVEL.warn)).toEqual([
      "State file is corrupt",
      "Backup is corrupt",
      "Restored state from backup",
    ]);
  });

  it("treats a snapshot with the wrong shape as corrupt", async () => {
    await fs.writeFile(stateFile, JSON.stringify({ version: 2, records: [] }), "utf-8");

    const { store: s, entries } = store();
    await s.load();

    expect(s.list()).toEqual([]);
    expect(messagesAt(entries, LEVEL.warn)).toEqual([
      "State file is corrupt",
      "No usable backup, starting with empty state",
    ]);
  });

  it("starts empty when neither the state file nor its folder can be read", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "not a directory", "utf-8");
    stateFile = path.join(blocker, "state.json");

    const { store: s, entries } = store();
    await expect(s.load()).resolves.toBeUndefined();

    expect(s.list()).toEqual([]);
    expect(messagesAt(entries, LEVEL.warn)).toEqual([
      "Could not read state file",
      "Could not list backups",
      "No usable backup, starting with empty state",
    ]);
  });

  it("removes records and reports whether one existed", async () => {
    const { store: s } = store();
    await s.load();
    await s.update(keyOf("alpha"), entry("alpha"));

    expect(await s.remove(keyOf("alpha"))).toBe(true);
    expect(await s.remove(keyOf("alpha"))).toBe(false);

    const { store: reloaded } = store();
    await reloaded.load();
    expect(reloaded.list()).toEqual([]);
  });

  it("detects content changes by hash", async () => {
    const summaryPath = path.join(dir, "m-summary.pdf");
    const transcriptPath = path.join(dir, "m-transcript.pdf");
    await fs.writeFile(summaryPath, "summary v1");
    await fs.writeFile(transcriptPath, "transcript v1");

    const { store: s, entries } = store();
    await s.load();
    expect(await s.hasChanged(summaryPath, transcriptPath)).toBe(true);

    const hashes = await s.hashPair(summaryPath, transcriptPath);
    expect(entries.filter((e) => e.msg === "Hashed pair").at(-1)).toMatchObject({
      summaryBytes: 10,
      transcriptBytes: 13,
    });
    await s.update(createPairKey(summaryPath, transcriptPath), {
      summaryPath,
      transcriptPath,
      ...hashes,
      noteId: "NOTE-1",
    });
    expect(await s.hasChanged(summaryPath, transcriptPath)).toBe(false);

    await fs.writeFile(transcriptPath, "transcript v2");
    expect(await s.hasChanged(summaryPath, transcriptPath)).toBe(true);

    await fs.rm(transcriptPath);
    expect(await s.hasChanged(summaryPath, transcriptPath)).toBe(true);
  });
});
