import { PairSyncError } from "@pairsync/core-application";

export class ConfigError extends PairSyncError {
  constructor(message: string, public configPath?: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}
