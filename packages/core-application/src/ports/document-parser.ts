export type ParsedDocument = {
  title: string;
  text: string;
  pageCount: number;
  // set when the file was read but its content is unusable
  error?: string;
};

/**
 * Extracts plain text from a document. Rejects on file-system errors; content
 * problems come back in `error`.
 */
export interface DocumentParser {
  parse(absolutePath: string): Promise<ParsedDocument>;
}
