/**
 * A file as last observed by the directory scanner. Instances are snapshots:
 * the scanner replaces them instead of mutating them.
 */
export interface TrackedFile {
  path: string;
  lastModifiedMs: number;
  sizeBytes: number;
}
