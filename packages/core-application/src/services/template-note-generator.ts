import type { MatchedPair } from "@pairsync/core-domain";

import { errorMessage } from "../application/errors";
import type { ParsedDocument } from "../ports/document-parser";
import type { Logger } from "../ports/logger";
import type { GeneratedNote, NoteGenerator } from "../ports/note-generator";

export const DEFAULT_TITLE_TEMPLATE = "{date} - {meeting_name}";
export const DEFAULT_SEPARATOR = "--==RAW NOTES==--";

const FALLBACK_TITLE_TEMPLATE = "{date} - {name}";
const PLACEHOLDER = /\{(\w+)\}/g;

export type TemplateNoteGeneratorOptions = {
  titleTemplate?: string;
  separator?: string;
  logger: Logger;
};

/** UTC calendar date as YYYYMMDD. */
export function formatNoteDate(date: Date): string {
  return date.toISOString().slice(0, 10).replaceAll("-", "");
}

export function templatePlaceholders(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER)].map((m) => m[1] ?? "");
}

export class TemplateNoteGenerator implements NoteGenerator {
  private readonly titleTemplate: string;
  private readonly separator: string;
  private readonly logger: Logger;

  constructor(options: TemplateNoteGeneratorOptions) {
    this.titleTemplate = options.titleTemplate ?? DEFAULT_TITLE_TEMPLATE;
    this.separator = options.separator ?? DEFAULT_SEPARATOR;
    this.logger = options.logger;
  }

  generate(pair: MatchedPair, summary: ParsedDocument, transcript: ParsedDocument): GeneratedNote {
    if (summary.error) {
      return { title: "Error", body: "", error: `Error parsing summary: ${summary.error}` };
    }
    if (transcript.error) {
      return { title: "Error", body: "", error: `Error parsing transcript: ${transcript.error}` };
    }

    try {
      return {
        title: this.formatTitle(pair),
        body: this.formatBody(summary.text, transcript.text),
      };
    } catch (err) {
      const error = `Error generating note: ${errorMessage(err)}`;
      this.logger.error({ err, meeting: pair.groupName }, "Error generating note");
      return { title: "Error", body: "", error };
    }
  }

  formatTitle(pair: MatchedPair): string {
    const values: Record<string, string> = {
      date: formatNoteDate(pair.groupTimestamp),
      name: pair.groupName,
      meeting_name: pair.groupName,
    };

    const unknown = templatePlaceholders(this.titleTemplate).filter((p) => !(p in values));
    const template = unknown.length > 0 ? FALLBACK_TITLE_TEMPLATE : this.titleTemplate;
    if (unknown.length > 0) {
      this.logger.warn(
        { template: this.titleTemplate, unknown },
        "Unknown placeholder in title template, using default title"
      );
    }

    return template.replace(PLACEHOLDER, (_match, key: string) => values[key] ?? "");
  }

  formatBody(summaryText: string, transcriptText: string): string {
    return (
      "## Summary\n\n" +
      summaryText.trim() +
      `\n\n\n${this.separator}\n\n\n` +
      "## Transcript\n\n" +
      transcriptText.trim()
    );
  }
}
