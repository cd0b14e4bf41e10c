import { createPairKey, type MatchedPair, type PairRecord } from "@pairsync/core-domain";

import { CancellationToken } from "../application/cancellation";
import { errorMessage } from "../application/errors";
import type { WakeSignal } from "../application/wake-signal";
import { idle as defaultIdle } from "../infra/sleep";
import type { DirectoryScanner } from "../ports/directory-scanner";
import type { Logger } from "../ports/logger";
import type { StateStore } from "../ports/state-store";
import type { PairOutcome } from "./pair-orchestrator";
import { DEFAULT_MATCH_WINDOW_MS, matchPairs } from "./pair-matcher";

export interface PairProcessor {
  process(pair: MatchedPair): Promise<PairOutcome>;
  processSpecificPair(summaryPath: string, transcriptPath: string): Promise<PairOutcome>;
}

export type CycleSummary = {
  changedFiles: number;
  pairs: number;
  published: number;
  skipped: number;
  failed: number;
  cancelled: boolean;
  error?: string;
};

export type PairSyncRunnerDeps = {
  scanner: DirectoryScanner;
  processor: PairProcessor;
  stateStore: StateStore;
  logger: Logger;
  matchWindowMs?: number;
};

export type RunForeverOptions = {
  intervalMs: number;
  // file events end the wait between cycles early
  wake?: WakeSignal;
  idle?: typeof defaultIdle;
};

function emptySummary(): CycleSummary {
  return { changedFiles: 0, pairs: 0, published: 0, skipped: 0, failed: 0, cancelled: false };
}

/**
 * Scan → match → process, one pair at a time.
 *
 * Matching runs over every tracked file so a transcript that shows up a cycle
 * after its summary still pairs. Only pairs touching a changed path, or one
 * whose last attempt failed, are handed to the processor.
 */
export class PairSyncRunner {
  private readonly scanner: DirectoryScanner;
  private readonly processor: PairProcessor;
  private readonly stateStore: StateStore;
  private readonly logger: Logger;
  private readonly matchWindowMs: number;
  private readonly dirty = new Set<string>();

  constructor(deps: PairSyncRunnerDeps) {
    this.scanner = deps.scanner;
    this.processor = deps.processor;
    this.stateStore = deps.stateStore;
    this.logger = deps.logger;
    this.matchWindowMs = deps.matchWindowMs ?? DEFAULT_MATCH_WINDOW_MS;
  }

  async runOneCycle(token: CancellationToken = new CancellationToken()): Promise<CycleSummary> {
    const summary = emptySummary();
    if (token.isCancelled) {
      summary.cancelled = true;
      return summary;
    }

    let pairs: MatchedPair[];
    try {
      const changed = await this.scanner.scan();
      summary.changedFiles = changed.length;
      for (const file of changed) this.dirty.add(file.path);

      const tracked = this.scanner.tracked();
      const trackedPaths = new Set(tracked.map((f) => f.path));
      for (const p of [...this.dirty]) {
        if (!trackedPaths.has(p)) this.dirty.delete(p);
      }

      pairs = matchPairs(tracked, { windowMs: this.matchWindowMs, logger: this.logger }).filter(
        (pair) => this.dirty.has(pair.summary.path) || this.dirty.has(pair.transcript.path)
      );
    } catch (err) {
      this.logger.error({ err }, "Scan or match failed, ending cycle early");
      summary.error = errorMessage(err);
      return summary;
    }

    summary.pairs = pairs.length;

    for (const pair of pairs) {
      if (token.isCancelled) {
        summary.cancelled = true;
        this.logger.info({ reason: token.reason }, "Cancellation requested, stopping before next pair");
        break;
      }

      const outcome = await this.processIsolated(pair);
      if (outcome.status === "failed") {
        summary.failed++;
        continue;
      }

      this.dirty.delete(pair.summary.path);
      this.dirty.delete(pair.transcript.path);
      if (outcome.status === "published") summary.published++;
      else summary.skipped++;
    }

    this.logger.info(summary, "Cycle complete");
    return summary;
  }

  processSpecificPair(summaryPath: string, transcriptPath: string): Promise<PairOutcome> {
    return this.processor.processSpecificPair(summaryPath, transcriptPath);
  }

  listRecords(): PairRecord[] {
    return this.stateStore.list();
  }

  async runForever(token: CancellationToken, options: RunForeverOptions): Promise<void> {
    const idle = options.idle ?? defaultIdle;
    this.logger.info({ intervalMs: options.intervalMs }, "Runner started");

    while (!token.isCancelled) {
      await this.runOneCycle(token);
      if (token.isCancelled) break;

      const outcome = await idle(options.intervalMs, token, options.wake);
      if (outcome === "woken") this.logger.debug("Woken early by a file event");
    }

    this.logger.info({ reason: token.reason }, "Runner stopped");
  }

  private async processIsolated(pair: MatchedPair): Promise<PairOutcome> {
    try {
      return await this.processor.process(pair);
    } catch (err) {
      // processors report failures as outcomes; this covers one that throws anyway
      const pairKey = createPairKey(pair.summary.path, pair.transcript.path);
      this.logger.error({ err, pair: pairKey }, "Unexpected error processing pair");
      return { status: "failed", pairKey, step: "check", error: errorMessage(err) };
    }
  }
}
