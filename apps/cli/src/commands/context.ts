import { z } from "zod";
import { createLogger, type Logger } from "@pairsync/core-application";

import type { ContainerOverrides } from "../container";
import { loadConfig } from "../config/load-config";
import type { PairSyncConfig } from "../config/schema";
import { validateConfig } from "../config/validate-config";
import type { ProcessSignals } from "../signals";

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/** Everything a command touches outside its arguments; tests swap these. */
export type CommandEnv = {
  cwd?: string;
  userConfigDir?: string;
  overrides?: ContainerOverrides;
  signals?: ProcessSignals;
  out?: (line: string) => void;
};

export type CommandContext = {
  config: PairSyncConfig;
  logger: Logger;
  out: (line: string) => void;
};

export async function prepareCommand(
  options: GlobalOptions,
  env: CommandEnv,
  { validate }: { validate: boolean }
): Promise<CommandContext> {
  const { config, sources } = await loadConfig({
    custom: options.config,
    cwd: env.cwd,
    userConfigDir: env.userConfigDir,
  });

  const logger = createLogger({
    level: options.verbose ? "debug" : config.logging.level,
    file: config.logging.file,
  });
  logger.debug({ sources }, "Loaded configuration");

  if (validate) {
    for (const warning of await validateConfig(config)) logger.warn(warning);
  }

  return { config, logger, out: env.out ?? ((line) => console.log(line)) };
}
