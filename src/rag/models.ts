import { z } from "zod";
import { ValidationError } from "./errors.js";

export const ENTRY_TYPES = ["text_entry", "heading", "plain_text", "attachment_metadata"] as const;

export const entryTypeSchema = z.enum(ENTRY_TYPES);
export type EntryType = z.infer<typeof entryTypeSchema>;

export const MAX_CHUNK_TEXT_LENGTH = 5000;
export const MAX_VECTOR_DIMENSIONS = 4096;

export const chunkMetadataSchema = z.object({
  collectionId: z.string().min(1),
  collectionName: z.string(),
  pageId: z.string().min(1),
  pageTitle: z.string(),
  entryId: z.string().min(1),
  entryType: entryTypeSchema,
  author: z.string(),
  date: z.string().datetime({ offset: true }),
  folderPath: z.string().optional(),
  tags: z.array(z.string()).default([]),
  url: z
    .string()
    .url()
    .refine((u) => u.startsWith("http://") || u.startsWith("https://"), "url must be http(s)"),
  embeddingVersion: z.string().min(1),
});

export type ChunkMetadata = z.infer<typeof chunkMetadataSchema>;
export type ChunkMetadataInput = z.input<typeof chunkMetadataSchema>;

export const embeddedChunkSchema = z.object({
  id: z
    .string()
    .refine(
      (id) => id.split("_").length >= 4,
      "id must have the form collection_page_entry_chunk (4+ parts)",
    ),
  text: z.string().min(1).max(MAX_CHUNK_TEXT_LENGTH),
  vector: z
    .array(z.number())
    .min(1)
    .max(MAX_VECTOR_DIMENSIONS)
    .superRefine((vector, ctx) => {
      const bad = vector.findIndex((v) => !Number.isFinite(v));
      if (bad !== -1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `vector contains a non-finite value at index ${bad}`,
        });
      }
    }),
  metadata: chunkMetadataSchema,
});

export type EmbeddedChunk = z.infer<typeof embeddedChunkSchema>;
export type EmbeddedChunkInput = z.input<typeof embeddedChunkSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function createChunkMetadata(input: ChunkMetadataInput): ChunkMetadata {
  const parsed = chunkMetadataSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid chunk metadata: ${describeIssues(parsed.error)}`, {
      context: { entryId: input.entryId },
    });
  }
  return parsed.data;
}

export function createEmbeddedChunk(input: EmbeddedChunkInput): EmbeddedChunk {
  const parsed = embeddedChunkSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid embedded chunk ${input.id}: ${describeIssues(parsed.error)}`, {
      context: { id: input.id },
    });
  }
  return parsed.data;
}

export function chunkId(
  collectionId: string,
  pageId: string,
  entryId: string,
  chunkIndex: number,
): string {
  return `${collectionId}_${pageId}_${entryId}_${chunkIndex}`;
}

export const buildRecordSchema = z.object({
  builtAt: z.string().datetime({ offset: true }),
  embeddingVersion: z.string(),
  configFingerprint: z.string(),
  backend: z.string(),
  indexName: z.string(),
  namespace: z.string().nullable(),
  unitFingerprints: z.record(z.string()),
  processedCount: z.number().int().nonnegative(),
  skippedCount: z.number().int().nonnegative(),
  failedCount: z.number().int().nonnegative(),
  failedUnits: z.array(z.string()).default([]),
});

export type BuildRecord = z.infer<typeof buildRecordSchema>;
