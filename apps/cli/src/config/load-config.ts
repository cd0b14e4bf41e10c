import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import envPaths from "env-paths";
import type { z } from "zod";

import { ConfigError } from "./errors";
import {
  PairSyncConfigSchema,
  PartialPairSyncConfigSchema,
  type PairSyncConfig,
  type PartialPairSyncConfig,
} from "./schema";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CONFIG_PATH = path.join(__dirname, "..", "..", "config", "default.json");
export const LOCAL_CONFIG_DIR = ".pairsync";

const paths = envPaths("pairsync", { suffix: "" });

export function getUserConfigPath(configDir: string = paths.config): string {
  return path.join(configDir, "config.json");
}

export function getLocalConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, LOCAL_CONFIG_DIR, "config.json");
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Error loading config file ${filePath}`, filePath, err);
  }
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, filePath, err);
  }
}

export async function loadDefaultConfig(defaultsPath: string = DEFAULT_CONFIG_PATH): Promise<PairSyncConfig> {
  const result = PairSyncConfigSchema.safeParse(await readJson(defaultsPath));
  if (!result.success) {
    throw new ConfigError(`Invalid default config: ${describeIssues(result.error)}`, defaultsPath);
  }
  return result.data;
}

async function loadPartialConfig(filePath: string): Promise<PartialPairSyncConfig> {
  const result = PartialPairSyncConfigSchema.safeParse(await readJson(filePath));
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${filePath}: ${describeIssues(result.error)}`, filePath);
  }
  return result.data;
}

export function mergeConfig(base: PairSyncConfig, override: PartialPairSyncConfig): PairSyncConfig {
  return {
    directories: { ...base.directories, ...override.directories },
    note: { ...base.note, ...override.note },
    service: { ...base.service, ...override.service },
    logging: { ...base.logging, ...override.logging },
  };
}

export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === "~") return homeDir;
  if (p.startsWith("~/") || p.startsWith("~\\")) return path.join(homeDir, p.slice(2));
  return p;
}

/** Expands `~` and makes every configured path absolute against `cwd`. */
export function resolveConfigPaths(config: PairSyncConfig, cwd: string, homeDir?: string): PairSyncConfig {
  const resolve = (p: string) => path.resolve(cwd, expandHome(p, homeDir));
  return {
    ...config,
    directories: {
      ...config.directories,
      summaryDir: resolve(config.directories.summaryDir),
      transcriptDir: resolve(config.directories.transcriptDir),
    },
    service: { ...config.service, stateFile: resolve(config.service.stateFile) },
    logging: {
      ...config.logging,
      ...(config.logging.file ? { file: resolve(config.logging.file) } : {}),
    },
  };
}

export type LoadConfigOptions = {
  // explicit --config path
  custom?: string;
  cwd?: string;
  userConfigDir?: string;
  homeDir?: string;
  defaultsPath?: string;
};

export type LoadConfigResult = {
  config: PairSyncConfig;
  // files that contributed, lowest priority first
  sources: string[];
};

/**
 * Load and merge configuration.
 * Priority: --config path > ./.pairsync/config.json > user config > defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadConfigResult> {
  const cwd = options.cwd ?? process.cwd();
  const defaultsPath = options.defaultsPath ?? DEFAULT_CONFIG_PATH;

  let config = await loadDefaultConfig(defaultsPath);
  const sources = [defaultsPath];

  for (const candidate of [getUserConfigPath(options.userConfigDir), getLocalConfigPath(cwd)]) {
    if (!existsSync(candidate)) continue;
    config = mergeConfig(config, await loadPartialConfig(candidate));
    sources.push(candidate);
  }

  if (options.custom) {
    const customPath = path.resolve(cwd, expandHome(options.custom, options.homeDir));
    if (!existsSync(customPath)) {
      throw new ConfigError(`Config file not found: ${customPath}`, customPath);
    }
    config = mergeConfig(config, await loadPartialConfig(customPath));
    sources.push(customPath);
  }

  const merged = PairSyncConfigSchema.safeParse(config);
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(merged.error)}`);
  }

  return { config: resolveConfigPaths(merged.data, cwd, options.homeDir), sources };
}
