import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  STATE_SNAPSHOT_VERSION,
  type PairKey,
  type PairRecord,
  type StateSnapshot,
  createPairKey,
} from "@pairsync/core-domain";

import { PairSyncError, errorCode } from "../application/errors";
import { systemClock, type Clock } from "../ports/clock";
import type { FileHasher } from "../ports/file-hasher";
import type { Logger } from "../ports/logger";
import type { PairHashes, PairRecordUpdate, StateStore } from "../ports/state-store";

export const DEFAULT_BACKUP_COUNT = 3;

const pairRecordSchema = z.object({
  pairKey: z.string().min(1),
  summaryPath: z.string(),
  summaryHash: z.string(),
  transcriptPath: z.string(),
  transcriptHash: z.string(),
  noteId: z.string(),
  lastProcessedIso: z.string(),
});

const stateSnapshotSchema = z.object({
  version: z.literal(STATE_SNAPSHOT_VERSION),
  records: z.array(pairRecordSchema),
});

export type NodeStateStoreOptions = {
  stateFile: string;
  hasher: FileHasher;
  logger: Logger;
  backupCount?: number;
  clock?: Clock;
};

type BackupFile = {
  path: string;
  stamp: string;
  seq: number;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** 2024-03-04T10:00:00.123Z -> 20240304T100000123 */
function backupStamp(date: Date): string {
  return date.toISOString().replace(/[-:.Z]/g, "");
}

/**
 * JSON snapshot of processed pairs, one file on disk. Every update copies the
 * previous file to a timestamped backup next to it before the new snapshot is
 * renamed into place; only the newest `backupCount` backups are kept.
 */
export class NodeStateStore implements StateStore {
  private readonly stateFile: string;
  private readonly hasher: FileHasher;
  private readonly logger: Logger;
  private readonly backupCount: number;
  private readonly clock: Clock;
  private readonly backupPattern: RegExp;
  private records = new Map<PairKey, PairRecord>();

  constructor(options: NodeStateStoreOptions) {
    const backupCount = options.backupCount ?? DEFAULT_BACKUP_COUNT;
    if (!Number.isInteger(backupCount) || backupCount < 1) {
      throw new PairSyncError(`backupCount must be a whole number of at least 1, got ${backupCount}`);
    }

    this.stateFile = path.resolve(options.stateFile);
    this.hasher = options.hasher;
    this.logger = options.logger;
    this.backupCount = backupCount;
    this.clock = options.clock ?? systemClock;

    const stem = path.basename(this.stateFile, path.extname(this.stateFile));
    this.backupPattern = new RegExp(`^${escapeRegExp(stem)}\\.(\\d{8}T\\d{9})(?:-(\\d+))?\\.bak$`);
  }

  async load(): Promise<void> {
    this.records = new Map();

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFile, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        this.logger.info({ file: this.stateFile }, "No state file found, starting with empty state");
        return;
      }
      this.logger.warn({ err, file: this.stateFile }, "Could not read state file");
      await this.restoreFromBackup();
      return;
    }

    const snapshot = this.parseSnapshot(raw);
    if (!snapshot) {
      this.logger.warn({ file: this.stateFile }, "State file is corrupt");
      await this.restoreFromBackup();
      return;
    }

    this.records = this.toMap(snapshot);
    this.logger.info({ records: this.records.size }, "Loaded state");
  }

  get(pairKey: PairKey): PairRecord | null {
    return this.records.get(pairKey) ?? null;
  }

  getForPair(summaryPath: string, transcriptPath: string): PairRecord | null {
    return this.get(createPairKey(summaryPath, transcriptPath));
  }

  async hashPair(summaryPath: string, transcriptPath: string): Promise<PairHashes> {
    const [summary, transcript] = await Promise.all([
      this.hasher.hashFile(summaryPath),
      this.hasher.hashFile(transcriptPath),
    ]);
    this.logger.debug(
      { summaryPath, summaryBytes: summary.sizeBytes, transcriptPath, transcriptBytes: transcript.sizeBytes },
      "Hashed pair"
    );
    return { summaryHash: summary.value, transcriptHash: transcript.value };
  }

  async hasChanged(summaryPath: string, transcriptPath: string): Promise<boolean> {
    const record = this.getForPair(summaryPath, transcriptPath);
    if (!record) return true;

    let hashes: PairHashes;
    try {
      hashes = await this.hashPair(summaryPath, transcriptPath);
    } catch (err) {
      this.logger.debug({ err, summaryPath, transcriptPath }, "Could not hash pair, treating as changed");
      return true;
    }

    return hashes.summaryHash !== record.summaryHash || hashes.transcriptHash !== record.transcriptHash;
  }

  async update(pairKey: PairKey, update: PairRecordUpdate): Promise<PairRecord> {
    const record: PairRecord = {
      pairKey,
      summaryPath: update.summaryPath,
      summaryHash: update.summaryHash,
      transcriptPath: update.transcriptPath,
      transcriptHash: update.transcriptHash,
      noteId: update.noteId,
      lastProcessedIso: this.clock().toISOString(),
    };

    const before = new Map(this.records);
    this.records.set(pairKey, record);

    try {
      await this.backupCurrent();
      await this.persist();
    } catch (err) {
      this.records = before;
      throw err;
    }

    await this.pruneBackups();
    return record;
  }

  async remove(pairKey: PairKey): Promise<boolean> {
    if (!this.records.has(pairKey)) return false;

    const before = new Map(this.records);
    this.records.delete(pairKey);
    try {
      await this.persist();
    } catch (err) {
      this.records = before;
      throw err;
    }
    return true;
  }

  list(): PairRecord[] {
    return [...this.records.values()];
  }

  /** Backups next to the state file, newest first. */
  async listBackups(): Promise<string[]> {
    return (await this.findBackups()).map((b) => b.path);
  }

  private parseSnapshot(raw: string): StateSnapshot | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }
    const result = stateSnapshotSchema.safeParse(json);
    return result.success ? result.data : null;
  }

  private toMap(snapshot: StateSnapshot): Map<PairKey, PairRecord> {
    return new Map(snapshot.records.map((r) => [r.pairKey, r]));
  }

  private async restoreFromBackup(): Promise<void> {
    let backups: BackupFile[] = [];
    try {
      backups = await this.findBackups();
    } catch (err) {
      this.logger.warn({ err, file: this.stateFile }, "Could not list backups");
    }

    for (const backup of backups) {
      let raw: string;
      try {
        raw = await fs.readFile(backup.path, "utf-8");
      } catch (err) {
        this.logger.warn({ err, backup: backup.path }, "Could not read backup");
        continue;
      }

      const snapshot = this.parseSnapshot(raw);
      if (!snapshot) {
        this.logger.warn({ backup: backup.path }, "Backup is corrupt");
        continue;
      }

      this.records = this.toMap(snapshot);
      try {
        await fs.copyFile(backup.path, this.stateFile);
      } catch (err) {
        this.logger.warn({ err, backup: backup.path }, "Could not copy backup over state file");
      }
      this.logger.warn({ backup: backup.path, records: this.records.size }, "Restored state from backup");
      return;
    }

    this.logger.warn({ file: this.stateFile }, "No usable backup, starting with empty state");
  }

  private async findBackups(): Promise<BackupFile[]> {
    const dir = path.dirname(this.stateFile);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err) {
      if (errorCode(err) === "ENOENT") return [];
      throw err;
    }

    const backups: BackupFile[] = [];
    for (const name of names) {
      const match = this.backupPattern.exec(name);
      const stamp = match?.[1];
      if (!match || stamp === undefined) continue;
      backups.push({ path: path.join(dir, name), stamp, seq: Number(match[2] ?? 0) });
    }

    return backups.sort((a, b) => b.stamp.localeCompare(a.stamp) || b.seq - a.seq);
  }

  private async backupCurrent(): Promise<void> {
    const dir = path.dirname(this.stateFile);
    const stem = path.basename(this.stateFile, path.extname(this.stateFile));
    const base = path.join(dir, `${stem}.${backupStamp(this.clock())}`);

    for (let seq = 0; ; seq++) {
      const target = seq === 0 ? `${base}.bak` : `${base}-${seq}.bak`;
      try {
        await fs.copyFile(this.stateFile, target, fs.constants.COPYFILE_EXCL);
        return;
      } catch (err) {
        const code = errorCode(err);
        if (code === "EEXIST") continue;
        // nothing to back up yet
        if (code === "ENOENT") return;
        throw err;
      }
    }
  }

  private async pruneBackups(): Promise<void> {
    let backups: BackupFile[];
    try {
      backups = await this.findBackups();
    } catch (err) {
      this.logger.warn({ err }, "Could not list backups for pruning");
      return;
    }

    for (const old of backups.slice(this.backupCount)) {
      try {
        await fs.unlink(old.path);
        this.logger.debug({ backup: old.path }, "Removed old backup");
      } catch (err) {
        this.logger.warn({ err, backup: old.path }, "Could not remove old backup");
      }
    }
  }

  private async persist(): Promise<void> {
    const snapshot: StateSnapshot = { version: STATE_SNAPSHOT_VERSION, records: this.list() };
    await fs.mkdir(path.dirname(this.stateFile), { recursive: true });
    await this.atomicWrite(this.stateFile, snapshot);
  }

  private async atomicWrite(filePath: string, data: StateSnapshot): Promise<void> {
    const tempPath = `${filePath}.tmp.${Date.now()}`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(data, null, 2), "utf-8");
      await fs.rename(tempPath, filePath);
    } catch (err) {
      await fs.unlink(tempPath).catch((cleanupErr: unknown) => {
        this.logger.debug({ err: cleanupErr, file: tempPath }, "Could not remove temp state file");
      });
      throw err;
    }
  }
}
