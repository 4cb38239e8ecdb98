import { z } from "zod";

// ODT metadata tools schemas
export const ReadOdtMetadataArgsSchema = z.object({
  path: z.string().min(1),
});

export const OdtMetadataChangesSchema = z.object({
  title: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  subject: z.string().nullable().optional(),
  // Comma-separated; each token becomes one meta:keyword element.
  keywords: z.string().nullable().optional(),
  author: z.string().nullable().optional(),
}).strict();

export const WriteOdtMetadataArgsSchema = z.object({
  path: z.string().min(1),
  outputPath: z.string().min(1).optional(),
  metadata: OdtMetadataChangesSchema,
});

// Empty schemas
export const ListMetadataFieldsArgsSchema = z.object({});
