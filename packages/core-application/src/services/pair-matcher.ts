import path from "node:path";
import type { FileRole, MatchedPair, TrackedFile } from "@pairsync/core-domain";
import type { Logger } from "../ports/logger";

/**
 * "Weekly Sync-summary-2025-03-04T16-17-00.058Z.pdf"
 *  name        role    timestamp (UTC, ms)       extension optional
 */
const PAIR_FILENAME_PATTERN =
  /^(?<name>.*?)-(?<role>summary|transcript)-(?<timestamp>\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.\d{3}Z)(?:\.[a-z0-9]+)?$/i;

export const DEFAULT_MATCH_WINDOW_MS = 5_000;

export type ParsedPairFilename = {
  groupName: string;
  role: FileRole;
  timestamp: Date;
};

export type MatchOptions = {
  windowMs?: number;
  logger?: Logger;
};

export type MatchResult = {
  pairs: MatchedPair[];
  // files that parsed but found no partner in this pass
  unmatched: TrackedFile[];
};

type Bucket = {
  groupName: string;
  timestamp: Date;
  summary?: TrackedFile;
  transcript?: TrackedFile;
};

export function parsePairFilename(fileName: string): ParsedPairFilename | null {
  const groups = PAIR_FILENAME_PATTERN.exec(fileName)?.groups;
  if (!groups) return null;

  const { name, role, timestamp } = groups;
  if (name === undefined || role === undefined || timestamp === undefined) return null;

  // 2025-03-04T16-17-00.058Z -> 2025-03-04T16:17:00.058Z
  const iso = `${timestamp.slice(0, 10)}T${timestamp.slice(11, 19).replaceAll("-", ":")}${timestamp.slice(19)}`;
  const date = new Date(iso);
  if (Number.isNaN(date.getTime()) || date.toISOString() !== iso) return null;

  return {
    groupName: name.trim(),
    role: role.toLowerCase() === "summary" ? "summary" : "transcript",
    timestamp: date,
  };
}

/**
 * Groups files into summary/transcript pairs. A file joins the first open
 * bucket with the same name whose opening timestamp is less than `windowMs`
 * away; otherwise it opens a new bucket. When two files land in the same role
 * slot the later one wins.
 *
 * Pairs come back sorted by timestamp, then name.
 */
export function matchFiles(files: TrackedFile[], options: MatchOptions = {}): MatchResult {
  const windowMs = options.windowMs ?? DEFAULT_MATCH_WINDOW_MS;
  const logger = options.logger;
  const buckets: Bucket[] = [];

  for (const file of files) {
    const parsed = parsePairFilename(path.basename(file.path));
    if (!parsed) {
      logger?.warn({ file: file.path }, "Failed to parse filename");
      continue;
    }

    let bucket = buckets.find(
      (b) =>
        b.groupName === parsed.groupName &&
        Math.abs(b.timestamp.getTime() - parsed.timestamp.getTime()) < windowMs
    );
    if (!bucket) {
      bucket = { groupName: parsed.groupName, timestamp: parsed.timestamp };
      buckets.push(bucket);
    }

    const previous = bucket[parsed.role];
    if (previous) {
      logger?.warn(
        { role: parsed.role, kept: file.path, dropped: previous.path },
        "Two files for the same role in one pair; keeping the later one"
      );
    }
    bucket[parsed.role] = file;
  }

  const pairs: MatchedPair[] = [];
  const unmatched: TrackedFile[] = [];

  for (const bucket of buckets) {
    if (bucket.summary && bucket.transcript) {
      pairs.push({
        summary: bucket.summary,
        transcript: bucket.transcript,
        groupTimestamp: bucket.timestamp,
        groupName: bucket.groupName,
      });
      continue;
    }

    logger?.info(
      { meeting: bucket.groupName, timestamp: bucket.timestamp.toISOString() },
      "Incomplete file pair"
    );
    const present = bucket.summary ?? bucket.transcript;
    if (present) unmatched.push(present);
  }

  pairs.sort(
    (a, b) =>
      a.groupTimestamp.getTime() - b.groupTimestamp.getTime() || a.groupName.localeCompare(b.groupName)
  );

  return { pairs, unmatched };
}

export function matchPairs(files: TrackedFile[], options: MatchOptions = {}): MatchedPair[] {
  return matchFiles(files, options).pairs;
}
