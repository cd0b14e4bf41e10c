import type { PairKey } from '../value-objects/pair-key';

export interface PairRecord {
  pairKey: PairKey;
  summaryPath: string;
  summaryHash: string;
  transcriptPath: string;
  transcriptHash: string;
  // empty when the note store gave no identifier back on create
  noteId: string;
  lastProcessedIso: string;
}

export const STATE_SNAPSHOT_VERSION = 1;

export interface StateSnapshot {
  version: typeof STATE_SNAPSHOT_VERSION;
  records: PairRecord[];
}
