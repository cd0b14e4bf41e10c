import {
  BearNotePublisher,
  ChokidarFileWatcher,
  NodeDirectoryScanner,
  NodeFileHasher,
  NodeStateStore,
  PairOrchestrator,
  PairSyncRunner,
  PdfParseDocumentParser,
  TemplateNoteGenerator,
  createWatchIgnore,
  retryPolicyFromSettings,
  type DocumentParser,
  type FileWatcher,
  type Logger,
  type NotePublisher,
  type Sleeper,
  type WakeSignal,
} from "@pairsync/core-application";

import type { PairSyncConfig } from "./config/schema";

export type ContainerOverrides = {
  parser?: DocumentParser;
  publisher?: NotePublisher;
  sleep?: Sleeper;
};

export type Container = {
  config: PairSyncConfig;
  logger: Logger;
  stateStore: NodeStateStore;
  runner: PairSyncRunner;
};

/** Wires the pipeline from a resolved config. Nothing touches disk until used. */
export function createContainer(
  config: PairSyncConfig,
  logger: Logger,
  overrides: ContainerOverrides = {}
): Container {
  const { directories, note, service } = config;

  const stateStore = new NodeStateStore({
    stateFile: service.stateFile,
    backupCount: service.backupCount,
    hasher: new NodeFileHasher(),
    logger: logger.child({ component: "state" }),
  });

  const orchestrator = new PairOrchestrator({
    stateStore,
    parser: overrides.parser ?? new PdfParseDocumentParser({ logger: logger.child({ component: "parser" }) }),
    generator: new TemplateNoteGenerator({
      titleTemplate: note.titleTemplate,
      separator: note.separator,
      logger: logger.child({ component: "generator" }),
    }),
    publisher:
      overrides.publisher ?? new BearNotePublisher({ tags: note.tags, logger: logger.child({ component: "bear" }) }),
    logger: logger.child({ component: "orchestrator" }),
    retryPolicy: retryPolicyFromSettings({
      maxRetries: service.maxRetries,
      retryDelaySeconds: service.retryDelaySeconds,
    }),
    sleep: overrides.sleep,
  });

  const scanner = new NodeDirectoryScanner({
    roots: [directories.summaryDir, directories.transcriptDir],
    extensions: directories.extensions,
    logger: logger.child({ component: "scanner" }),
  });

  const runner = new PairSyncRunner({
    scanner,
    processor: orchestrator,
    stateStore,
    logger: logger.child({ component: "runner" }),
  });

  return { config, logger, stateStore, runner };
}

/**
 * Starts a watcher on both folders that pokes `wake` on every relevant file
 * event. Returns the watcher so the caller can stop it.
 */
export async function startFolderWatcher(
  config: PairSyncConfig,
  wake: WakeSignal,
  logger: Logger,
  watcher: FileWatcher = new ChokidarFileWatcher(logger.child({ component: "watcher" }))
): Promise<FileWatcher> {
  const roots = [config.directories.summaryDir, config.directories.transcriptDir];
  watcher.onEvent((event) => {
    logger.debug({ type: event.type, file: event.path }, "File event");
    wake.notify();
  });
  await watcher.start({ roots, ignore: createWatchIgnore(roots, config.directories.extensions) });
  return watcher;
}
