import type { GeneratedNote } from "./note-generator";

export type PublishRequest =
  | { kind: "create" }
  | { kind: "update"; noteId: string };

export type PublishResult =
  | { success: true; noteId: string }
  | { success: false; error: string };

export interface NotePublisher {
  publish(note: GeneratedNote, request: PublishRequest): Promise<PublishResult>;
}
