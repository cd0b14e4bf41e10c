import { copyFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

import { ConfigError } from "../config/errors";
import { DEFAULT_CONFIG_PATH, getLocalConfigPath } from "../config/load-config";
import type { CommandEnv } from "./context";

const InitOptionsSchema = z.object({
  force: z.boolean().optional(),
});

/** Writes the default config to ./.pairsync/config.json. */
export async function initCommand(opts: unknown, env: CommandEnv = {}): Promise<number> {
  const options = InitOptionsSchema.parse(opts);
  const out = env.out ?? ((line: string) => console.log(line));
  const target = getLocalConfigPath(env.cwd);

  if (existsSync(target) && !options.force) {
    throw new ConfigError(`Config file already exists: ${target} (use --force to overwrite)`, target);
  }

  await mkdir(path.dirname(target), { recursive: true });
  await copyFile(DEFAULT_CONFIG_PATH, target);

  out(`Wrote default configuration to ${target}`);
  out("Edit directories.summaryDir and directories.transcriptDir before running.");
  return 0;
}
