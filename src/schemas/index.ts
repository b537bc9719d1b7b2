import { z } from "zod";

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

// Registry reports precision as "fp16" or 16 depending on the endpoint
const precisionValue = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

// File metadata as returned by GET /api/v1/model-versions/{id}
export const FileMetadataSchema = z.object({
  format: optionalString,
  size: optionalString,
  fp: precisionValue,
});
export type FileMetadata = z.infer<typeof FileMetadataSchema>;

export const FileDescriptorSchema = z.object({
  id: z.number().optional(),
  name: z.string(),
  type: z.string(),
  sizeKB: z.number().nullish().transform((value) => value ?? undefined),
  downloadUrl: optionalString,
  primary: z.boolean().nullish().transform((value) => value ?? undefined),
  metadata: FileMetadataSchema.nullish().transform((value): FileMetadata => value ?? {}),
});
export type FileDescriptor = z.infer<typeof FileDescriptorSchema>;

export const VersionMetadataSchema = z.object({
  id: z.number().optional(),
  modelId: z.number().optional(),
  name: z.string().optional(),
  files: z.array(FileDescriptorSchema),
});
export type VersionMetadata = z.infer<typeof VersionMetadataSchema>;

// Selection constraint values accepted from flags and config
export const SizeSchema = z.enum(["full", "pruned"]);
export type ModelSize = z.infer<typeof SizeSchema>;

export const PrecisionSchema = z.preprocess(
  (value) => (typeof value === "number" ? String(value) : value),
  z.enum(["8", "16", "32"])
);
export type Precision = z.infer<typeof PrecisionSchema>;

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

// Config file (air-fetch.yaml)
export const ConfigFileSchema = z
  .object({
    token: z.string().trim().min(1).optional(),
    localDir: z.string().min(1).optional(),
    size: SizeSchema.optional(),
    fp: PrecisionSchema.optional(),
    includeCompanions: z.boolean().optional(),
    allowUnsafeFormat: z.boolean().optional(),
    concurrency: z.number().int().min(1).max(8).optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .strict();
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
