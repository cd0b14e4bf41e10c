import open from "open";

import { errorMessage } from "../application/errors";
import type { Logger } from "../ports/logger";
import type { GeneratedNote } from "../ports/note-generator";
import type { NotePublisher, PublishRequest, PublishResult } from "../ports/note-publisher";

const BEAR_BASE_URL = "bear://x-callback-url";

export type BearAction = "create" | "add-text";

/** Hands a URL to the OS. Rejects when the handler could not be launched. */
export type UrlOpener = (url: string) => Promise<void>;

/** The part of the spawned `open`/`xdg-open` process the opener listens to. */
export type LaunchedProcess = {
  once(event: "error", listener: (err: Error) => void): unknown;
  once(event: "exit", listener: (code: number | null) => void): unknown;
  ref(): void;
};

export type UrlLauncher = (url: string, options: { background: boolean }) => Promise<LaunchedProcess>;

/**
 * Resolves once the launcher process has handed the URL over and exited.
 * It does not wait for Bear itself, which keeps running.
 */
export function createSystemOpener(launch: UrlLauncher = open): UrlOpener {
  return async (url) => {
    const child = await launch(url, { background: true });
    // open() unrefs the child; keep the process alive until it reports back
    child.ref();
    await new Promise<void>((resolve, reject) => {
      child.once("error", reject);
      child.once("exit", (code) => {
        if (code === 0) resolve();
        else reject(new Error(`URL handler exited with code ${code ?? "null"}`));
      });
    });
  };
}

export const openWithSystemHandler: UrlOpener = createSystemOpener();

export function buildBearUrl(action: BearAction, params: Record<string, string>): string {
  const query = Object.entries(params)
    .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
    .join("&");
  return `${BEAR_BASE_URL}/${action}?${query}`;
}

/** "meeting, notes" -> "#meeting #notes" */
export function formatTags(tags: string): string {
  return tags
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t.length > 0)
    .map((t) => `#${t}`)
    .join(" ");
}

// Bear shows its identifier at the end of a title: "My Note [1A2B3C]"
export function extractNoteIdentifier(title: string): string {
  return /\[([A-F0-9]+)\]$/.exec(title)?.[1] ?? "";
}

export type BearNotePublisherOptions = {
  logger: Logger;
  tags?: string;
  opener?: UrlOpener;
};

export class BearNotePublisher implements NotePublisher {
  private readonly logger: Logger;
  private readonly tags: string;
  private readonly opener: UrlOpener;

  constructor(options: BearNotePublisherOptions) {
    this.logger = options.logger;
    this.tags = options.tags ?? "";
    this.opener = options.opener ?? openWithSystemHandler;
  }

  async publish(note: GeneratedNote, request: PublishRequest): Promise<PublishResult> {
    const text = this.withTags(note.body);

    if (request.kind === "update") {
      const url = buildBearUrl("add-text", {
        id: request.noteId,
        title: note.title,
        text,
        mode: "replace",
        open_note: "no",
      });
      return this.send(url, request.noteId, "Error updating note in Bear");
    }

    const url = buildBearUrl("create", { title: note.title, text, open_note: "no" });
    return this.send(url, extractNoteIdentifier(note.title), "Error creating note in Bear");
  }

  private withTags(body: string): string {
    const tags = formatTags(this.tags);
    return tags ? `${body}\n\n${tags}` : body;
  }

  private async send(url: string, noteId: string, failure: string): Promise<PublishResult> {
    try {
      await this.opener(url);
    } catch (err) {
      const error = `${failure}: ${errorMessage(err)}`;
      this.logger.error({ err }, failure);
      return { success: false, error };
    }
    return { success: true, noteId };
  }
}
