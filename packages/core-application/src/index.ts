// Public API of the core-application package: ports, the pipeline services
// and the Node adapters behind them.

// Ports (interfaces)
export * from "./ports/clock";
export type { Logger, LogLevel } from "./ports/logger";
export type { DirectoryScanner } from "./ports/directory-scanner";
export type { DocumentParser, ParsedDocument } from "./ports/document-parser";
export type { FileHash, FileHasher } from "./ports/file-hasher";
export type {
  FileChangeType,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
} from "./ports/file-watcher";
export type { GeneratedNote, NoteGenerator } from "./ports/note-generator";
export type { NotePublisher, PublishRequest, PublishResult } from "./ports/note-publisher";
export type { RetryContext, RetryPolicy, Sleeper } from "./ports/retry-policy";
export type { PairHashes, PairRecordUpdate, StateStore } from "./ports/state-store";

// Application
export * from "./application/errors";
export * from "./application/cancellation";
export * from "./application/wake-signal";
export * from "./application/with-retry";
export * from "./application/default-retry-policy";
export * from "./infra/sleep";

// Services
export * from "./services/pair-matcher";
export * from "./services/template-note-generator";
export * from "./services/pair-orchestrator";
export * from "./services/pair-sync-runner";

// Node adapters
export * from "./adapters/node-directory-scanner";
export * from "./adapters/node-file-hasher";
export * from "./adapters/node-state-store";
export * from "./adapters/pdf-parse-document-parser";
export * from "./adapters/bear-note-publisher";
export * from "./adapters/chokidar-file-watcher";
export * from "./adapters/watch-ignore";
export * from "./adapters/pino-logger";
