import pino from "pino";
import type { Logger } from "../ports/logger";

export type LogEntry = {
  level: number;
  msg: string;
  [key: string]: unknown;
};

export const LEVEL = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
} as const;

/** A debug-level pino logger that keeps every line in memory. */
export function createRecordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        entries.push(JSON.parse(line) as LogEntry);
      },
    }
  );
  return { logger, entries };
}

export function messagesAt(entries: LogEntry[], level: number): string[] {
  return entries.filter((e) => e.level === level).map((e) => e.msg);
}
