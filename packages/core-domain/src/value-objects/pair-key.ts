export type PairKey = string;

function baseName(filePath: string): string {
  const parts = filePath.split(/[\\/]/);
  return parts[parts.length - 1] ?? filePath;
}

/**
 * Identity of a pair in the state store. Built from file names only, so moving
 * both folders somewhere else keeps the same key.
 */
export function createPairKey(summaryPath: string, transcriptPath: string): PairKey {
  return `${baseName(summaryPath)}|${baseName(transcriptPath)}`;
}
