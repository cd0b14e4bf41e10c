/** Content digest used to decide whether a pair needs publishing again. */
export type FileHash = {
  algorithm: "sha256";
  // lowercase hex
  value: string;
  sizeBytes: number;
};

export interface FileHasher {
  hashFile(absolutePath: string): Promise<FileHash>;
}
