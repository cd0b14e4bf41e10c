import type { TrackedFile } from './tracked-file';

export type FileRole = 'summary' | 'transcript';

export const FILE_ROLES: readonly FileRole[] = ['summary', 'transcript'];

/**
 * Two tracked files judged to describe the same meeting. Built fresh on every
 * matching pass and never persisted.
 */
export interface MatchedPair {
  summary: TrackedFile;
  transcript: TrackedFile;
  groupTimestamp: Date;
  groupName: string;
}
