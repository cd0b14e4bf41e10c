import type { MatchedPair } from "@pairsync/core-domain";
import type { ParsedDocument } from "./document-parser";

export type GeneratedNote = {
  title: string;
  body: string;
  error?: string;
};

export interface NoteGenerator {
  generate(pair: MatchedPair, summary: ParsedDocument, transcript: ParsedDocument): GeneratedNote;
}
