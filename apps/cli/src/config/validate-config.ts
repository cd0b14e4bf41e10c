import { access, mkdir, stat } from "node:fs/promises";
import { constants } from "node:fs";
import path from "node:path";
import { templatePlaceholders } from "@pairsync/core-application";

import { ConfigError } from "./errors";
import type { PairSyncConfig } from "./schema";

const MIN_RECOMMENDED_INTERVAL_SECONDS = 60;
const TITLE_PLACEHOLDERS = new Set(["date", "name", "meeting_name"]);

async function assertReadableDirectory(label: string, dir: string): Promise<void> {
  try {
    const info = await stat(dir);
    if (!info.isDirectory()) throw new ConfigError(`${label} is not a directory: ${dir}`);
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`${label} does not exist: ${dir}`, undefined, err);
  }

  try {
    await access(dir, constants.R_OK);
  } catch (err) {
    throw new ConfigError(`Cannot read from ${label.toLowerCase()}: ${dir}`, undefined, err);
  }
}

async function assertWritableStateDirectory(stateFile: string): Promise<void> {
  const dir = path.dirname(stateFile);
  try {
    await mkdir(dir, { recursive: true });
    await access(dir, constants.W_OK);
  } catch (err) {
    throw new ConfigError(`Cannot write to state directory: ${dir}`, undefined, err);
  }
}

export function titleTemplateWarnings(template: string): string[] {
  const warnings: string[] = [];
  const placeholders = templatePlaceholders(template);

  if (!placeholders.includes("date")) {
    warnings.push("Title template does not contain {date} placeholder");
  }
  if (!placeholders.includes("name") && !placeholders.includes("meeting_name")) {
    warnings.push("Title template does not contain meeting name placeholder");
  }
  const unknown = placeholders.filter((p) => !TITLE_PLACEHOLDERS.has(p));
  if (unknown.length > 0) {
    warnings.push(`Title template has unknown placeholders: ${unknown.join(", ")}`);
  }
  return warnings;
}

/**
 * Checks what the schema cannot: folders on disk and settings that are legal
 * but probably unintended. Throws ConfigError on the former, returns warnings
 * for the latter.
 */
export async function validateConfig(config: PairSyncConfig): Promise<string[]> {
  await assertReadableDirectory("Summary directory", config.directories.summaryDir);
  await assertReadableDirectory("Transcript directory", config.directories.transcriptDir);
  await assertWritableStateDirectory(config.service.stateFile);

  const warnings = titleTemplateWarnings(config.note.titleTemplate);
  if (config.service.intervalSeconds < MIN_RECOMMENDED_INTERVAL_SECONDS) {
    warnings.push(`Sleep interval is less than ${MIN_RECOMMENDED_INTERVAL_SECONDS} seconds`);
  }
  return warnings;
}
