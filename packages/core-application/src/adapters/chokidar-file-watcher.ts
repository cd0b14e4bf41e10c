import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "node:path";

import type { Logger } from "../ports/logger";
import type {
  FileWatcher,
  FileWatcherOptions,
  FileChangeEvent,
  FileChangeType,
} from "../ports/file-watcher";

export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((event: FileChangeEvent) => void) | null = null;

  constructor(private readonly logger?: Logger) {}

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  async start(options: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const roots = options.roots.map((r) => path.resolve(r));

    this.watcher = chokidar.watch(roots, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold: 250,
        pollInterval: 50,
      },
      ignored: (p, stats) => options.ignore(path.resolve(p), stats?.isDirectory()),
    });

    const emit = (type: FileChangeType, filePath: string) => {
      if (!this.handler) return;

      this.handler({
        type,
        path: path.resolve(filePath),
        occurredAt: new Date(),
      });
    };

    this.watcher
      .on("add", (p: string) => emit("created", p))
      .on("change", (p: string) => emit("modified", p))
      .on("unlink", (p: string) => emit("deleted", p))
      .on("error", (err: unknown) => this.logger?.warn({ err }, "File watcher error"));

    this.logger?.debug({ roots }, "Watching folders");
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
