import { z } from "zod";
import {
  CancellationToken,
  WakeSignal,
  type CycleSummary,
  type FileWatcher,
  type PairOutcome,
} from "@pairsync/core-application";

import { ConfigError } from "../config/errors";
import { createContainer, startFolderWatcher } from "../container";
import { bindShutdownSignals } from "../signals";
import { GlobalOptionsSchema, prepareCommand, type CommandEnv } from "./context";

const RunOptionsSchema = GlobalOptionsSchema.extend({
  summary: z.string().optional(),
  transcript: z.string().optional(),
  watch: z.boolean().optional(),
});

export function describeOutcome(outcome: PairOutcome): string {
  switch (outcome.status) {
    case "skipped":
      return `Unchanged, nothing to do: ${outcome.pairKey}`;
    case "published":
      return `${outcome.mode === "update" ? "Updated" : "Created"} note for ${outcome.pairKey}`;
    case "failed":
      return `Failed at ${outcome.step}: ${outcome.error}`;
  }
}

export function describeCycle(summary: CycleSummary): string {
  if (summary.error) return `Cycle ended early: ${summary.error}`;
  return (
    `Processed ${summary.pairs} pair(s): ${summary.published} published, ` +
    `${summary.skipped} unchanged, ${summary.failed} failed`
  );
}

export async function runCommand(opts: unknown, env: CommandEnv = {}): Promise<number> {
  const options = RunOptionsSchema.parse(opts);
  if (Boolean(options.summary) !== Boolean(options.transcript)) {
    throw new ConfigError("--summary and --transcript must be given together");
  }

  const { config, logger, out } = await prepareCommand(options, env, { validate: true });
  const { runner, stateStore } = createContainer(config, logger, env.overrides);
  await stateStore.load();

  if (options.summary && options.transcript) {
    const outcome = await runner.processSpecificPair(options.summary, options.transcript);
    out(describeOutcome(outcome));
    return outcome.status === "failed" ? 1 : 0;
  }

  if (!options.watch) {
    out(describeCycle(await runner.runOneCycle()));
    return 0;
  }

  const token = new CancellationToken();
  const unbind = bindShutdownSignals(token, logger, env.signals);
  const wake = new WakeSignal();
  let watcher: FileWatcher | null = null;

  try {
    if (config.service.watchEvents) watcher = await startFolderWatcher(config, wake, logger);
    await runner.runForever(token, { intervalMs: config.service.intervalSeconds * 1000, wake });
  } finally {
    unbind();
    await watcher?.stop();
  }
  return 0;
}
