import type { TrackedFile } from "@pairsync/core-domain";

export interface DirectoryScanner {
  /** Files that are new or changed since the previous call. */
  scan(): Promise<TrackedFile[]>;

  /** Everything seen by the last scan, changed or not. */
  tracked(): TrackedFile[];
}
