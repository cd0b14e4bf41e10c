import fs from "node:fs/promises";
import path from "node:path";
import { createPairKey, type MatchedPair, type PairKey, type PairRecord, type TrackedFile } from "@pairsync/core-domain";

import { RetryableError, TerminalError, errorMessage, isTransientIoError } from "../application/errors";
import { retryPolicyFromSettings } from "../application/default-retry-policy";
import { withRetry } from "../application/with-retry";
import { sleep as realSleep } from "../infra/sleep";
import type { DocumentParser, ParsedDocument } from "../ports/document-parser";
import type { Logger } from "../ports/logger";
import type { GeneratedNote, NoteGenerator } from "../ports/note-generator";
import type { NotePublisher, PublishRequest, PublishResult } from "../ports/note-publisher";
import type { RetryContext, RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { StateStore } from "../ports/state-store";
import { parsePairFilename } from "./pair-matcher";

export type PairStep = "resolve" | "check" | "parse" | "generate" | "publish" | "record";

export type PairOutcome =
  | { status: "skipped"; pairKey: PairKey }
  | { status: "published"; pairKey: PairKey; mode: PublishRequest["kind"]; noteId: string; record: PairRecord }
  | { status: "failed"; pairKey: PairKey; step: PairStep; error: string };

export type PairOrchestratorDeps = {
  stateStore: StateStore;
  parser: DocumentParser;
  generator: NoteGenerator;
  publisher: NotePublisher;
  logger: Logger;
  retryPolicy?: RetryPolicy;
  sleep?: Sleeper;
};

class StepFailure extends Error {
  constructor(public step: PairStep, public cause: unknown) {
    super(errorMessage(cause));
    this.name = "StepFailure";
  }
}

function logRetry(log: Logger, step: PairStep): (ctx: RetryContext) => void {
  return (ctx) =>
    log.warn(
      {
        step,
        attempt: ctx.attempt,
        delayMs: ctx.delayMs,
        elapsedMs: Date.now() - ctx.startedAt,
        err: ctx.lastError,
      },
      "Retrying step"
    );
}

/**
 * Takes one matched pair through check → parse → generate → publish → record.
 * Parse and publish are retried with backoff; every other failure ends the
 * pair. Nothing is recorded unless the note was published.
 */
export class PairOrchestrator {
  private readonly stateStore: StateStore;
  private readonly parser: DocumentParser;
  private readonly generator: NoteGenerator;
  private readonly publisher: NotePublisher;
  private readonly logger: Logger;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleeper;

  constructor(deps: PairOrchestratorDeps) {
    this.stateStore = deps.stateStore;
    this.parser = deps.parser;
    this.generator = deps.generator;
    this.publisher = deps.publisher;
    this.logger = deps.logger;
    this.retryPolicy = deps.retryPolicy ?? retryPolicyFromSettings();
    this.sleep = deps.sleep ?? realSleep;
  }

  async process(pair: MatchedPair): Promise<PairOutcome> {
    const pairKey = createPairKey(pair.summary.path, pair.transcript.path);
    const log = this.logger.child({ pair: pairKey });

    try {
      return await this.run(pair, pairKey, log);
    } catch (err) {
      const failure = err instanceof StepFailure ? err : new StepFailure("check", err);
      log.error({ step: failure.step, err: failure.cause }, "Pair processing failed");
      return { status: "failed", pairKey, step: failure.step, error: failure.message };
    }
  }

  /** Processes two explicitly named files without scanning or matching. */
  async processSpecificPair(summaryPath: string, transcriptPath: string): Promise<PairOutcome> {
    let pair: MatchedPair;
    try {
      pair = await this.resolvePair(path.resolve(summaryPath), path.resolve(transcriptPath));
    } catch (err) {
      const pairKey = createPairKey(summaryPath, transcriptPath);
      this.logger.error({ pair: pairKey, step: "resolve", err }, "Pair processing failed");
      return { status: "failed", pairKey, step: "resolve", error: errorMessage(err) };
    }
    return this.process(pair);
  }

  private async run(pair: MatchedPair, pairKey: PairKey, log: Logger): Promise<PairOutcome> {
    const changed = await this.step("check", () =>
      this.stateStore.hasChanged(pair.summary.path, pair.transcript.path)
    );
    if (!changed) {
      log.debug("Pair unchanged, skipping");
      return { status: "skipped", pairKey };
    }

    log.info({ meeting: pair.groupName, timestamp: pair.groupTimestamp.toISOString() }, "Processing pair");

    const [summary, transcript] = await this.step("parse", () =>
      withRetry(() => this.parseBoth(pair), this.retryPolicy, this.sleep, logRetry(log, "parse"))
    );

    const note = await this.step("generate", async () => this.generateNote(pair, summary, transcript));

    const existing = this.stateStore.get(pairKey);
    const request: PublishRequest =
      existing && existing.noteId ? { kind: "update", noteId: existing.noteId } : { kind: "create" };

    const noteId = await this.step("publish", () =>
      withRetry(() => this.publishOnce(note, request), this.retryPolicy, this.sleep, logRetry(log, "publish"))
    );

    const record = await this.step("record", async () => {
      const hashes = await this.stateStore.hashPair(pair.summary.path, pair.transcript.path);
      return this.stateStore.update(pairKey, {
        summaryPath: pair.summary.path,
        transcriptPath: pair.transcript.path,
        ...hashes,
        noteId,
      });
    });

    log.info({ mode: request.kind, noteId }, request.kind === "update" ? "Updated note" : "Created note");
    return { status: "published", pairKey, mode: request.kind, noteId, record };
  }

  private async step<T>(step: PairStep, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StepFailure(step, err);
    }
  }

  private async parseBoth(pair: MatchedPair): Promise<[ParsedDocument, ParsedDocument]> {
    const summary = await this.parseOne("summary", pair.summary.path);
    const transcript = await this.parseOne("transcript", pair.transcript.path);
    return [summary, transcript];
  }

  private async parseOne(role: string, filePath: string): Promise<ParsedDocument> {
    let parsed: ParsedDocument;
    try {
      parsed = await this.parser.parse(filePath);
    } catch (err) {
      if (isTransientIoError(err)) {
        throw new RetryableError(`Error reading ${role} ${filePath}: ${errorMessage(err)}`, err);
      }
      throw new TerminalError(`Error parsing ${role} ${filePath}: ${errorMessage(err)}`, err);
    }
    if (parsed.error) {
      throw new TerminalError(`Error parsing ${role}: ${parsed.error}`);
    }
    return parsed;
  }

  private generateNote(pair: MatchedPair, summary: ParsedDocument, transcript: ParsedDocument): GeneratedNote {
    const note = this.generator.generate(pair, summary, transcript);
    if (note.error) throw new TerminalError(note.error);
    return note;
  }

  private async publishOnce(note: GeneratedNote, request: PublishRequest): Promise<string> {
    let result: PublishResult;
    try {
      result = await this.publisher.publish(note, request);
    } catch (err) {
      throw new TerminalError(`Publisher error: ${errorMessage(err)}`, err);
    }
    if (!result.success) throw new RetryableError(result.error);
    return result.noteId;
  }

  private async resolvePair(summaryPath: string, transcriptPath: string): Promise<MatchedPair> {
    const [summary, transcript] = await Promise.all([trackedFile(summaryPath), trackedFile(transcriptPath)]);
    const parsed = parsePairFilename(path.basename(summaryPath));

    return {
      summary,
      transcript,
      groupName: parsed?.groupName ?? path.basename(summaryPath, path.extname(summaryPath)),
      groupTimestamp: parsed?.timestamp ?? new Date(summary.lastModifiedMs),
    };
  }
}

async function trackedFile(filePath: string): Promise<TrackedFile> {
  const stat = await fs.stat(filePath);
  if (!stat.isFile()) throw new TerminalError(`Not a file: ${filePath}`);
  return { path: filePath, lastModifiedMs: stat.mtimeMs, sizeBytes: stat.size };
}
