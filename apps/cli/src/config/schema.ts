import { z } from "zod";

export const DirectoriesConfigSchema = z.object({
  summaryDir: z.string().min(1),
  transcriptDir: z.string().min(1),
  extensions: z.array(z.string().min(1)).min(1),
});

export const NoteConfigSchema = z.object({
  titleTemplate: z.string().min(1, "Title template cannot be empty"),
  separator: z.string(),
  // comma separated, without the leading #
  tags: z.string().optional(),
});

export const ServiceConfigSchema = z.object({
  intervalSeconds: z.number().positive(),
  stateFile: z.string().min(1),
  backupCount: z.number().int().min(1, "Backup count must be at least 1"),
  maxRetries: z.number().int().min(0),
  retryDelaySeconds: z.number().min(0),
  watchEvents: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]),
  file: z.string().optional(),
});

export const PairSyncConfigSchema = z.object({
  directories: DirectoriesConfigSchema,
  note: NoteConfigSchema,
  service: ServiceConfigSchema,
  logging: LoggingConfigSchema,
});

// user, project and --config files may set any subset
export const PartialPairSyncConfigSchema = z
  .object({
    directories: DirectoriesConfigSchema.partial(),
    note: NoteConfigSchema.partial(),
    service: ServiceConfigSchema.partial(),
    logging: LoggingConfigSchema.partial(),
  })
  .partial()
  .strict();

export type PairSyncConfig = z.infer<typeof PairSyncConfigSchema>;
export type PartialPairSyncConfig = z.infer<typeof PartialPairSyncConfigSchema>;
