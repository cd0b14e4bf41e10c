import type { PairRecord } from "@pairsync/core-domain";

import { createContainer } from "../container";
import { GlobalOptionsSchema, prepareCommand, type CommandEnv } from "./context";

export function formatRecord(record: PairRecord): string {
  return `${record.lastProcessedIso}  ${record.noteId || "-"}  ${record.pairKey}`;
}

export async function listCommand(opts: unknown, env: CommandEnv = {}): Promise<number> {
  const options = GlobalOptionsSchema.parse(opts);
  const { config, logger, out } = await prepareCommand(options, env, { validate: false });

  const { stateStore } = createContainer(config, logger, env.overrides);
  await stateStore.load();

  const records = stateStore.list();
  if (records.length === 0) {
    out("No processed pairs yet.");
    return 0;
  }
  for (const record of records) out(formatRecord(record));
  return 0;
}
