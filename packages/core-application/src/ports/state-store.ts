import type { PairKey, PairRecord } from "@pairsync/core-domain";

export type PairHashes = {
  summaryHash: string;
  transcriptHash: string;
};

export type PairRecordUpdate = PairHashes & {
  summaryPath: string;
  transcriptPath: string;
  noteId: string;
};

export interface StateStore {
  load(): Promise<void>;
  get(pairKey: PairKey): PairRecord | null;
  getForPair(summaryPath: string, transcriptPath: string): PairRecord | null;
  hasChanged(summaryPath: string, transcriptPath: string): Promise<boolean>;
  hashPair(summaryPath: string, transcriptPath: string): Promise<PairHashes>;
  update(pairKey: PairKey, update: PairRecordUpdate): Promise<PairRecord>;
  remove(pairKey: PairKey): Promise<boolean>;
  list(): PairRecord[];
}
