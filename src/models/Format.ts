import { z } from 'zod';

export const formatSummarySchema = z.object({
  id: z.string(),
  title: z.string(),
  university: z.string().default(''),
  category: z.string().default(''),
  documentType: z.string().nullable().optional(),
  version: z.string().default(''),
});

export const formatFieldSchema = z
  .object({
    name: z.string(),
    label: z.string(),
    type: z.string(),
    required: z.boolean().default(false),
    default: z.unknown().optional(),
    options: z.array(z.string()).nullable().optional(),
    order: z.number().nullable().optional(),
    section: z.string().nullable().optional(),
  })
  .passthrough();

export const formatDetailSchema = formatSummarySchema
  .extend({
    templateRef: z.object({ kind: z.string(), uri: z.string() }).nullable().optional(),
    fields: z.array(formatFieldSchema).default([]),
    assets: z.array(z.object({ id: z.string(), kind: z.string(), url: z.string() })).default([]),
    rules: z.record(z.unknown()).nullable().optional(),
    definition: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

export const catalogVersionSchema = z.object({
  version: z.string(),
  generatedAt: z.string(),
});

export type FormatSummary = z.infer<typeof formatSummarySchema>;
export type FormatDetail = z.infer<typeof formatDetailSchema>;
export type CatalogVersion = z.infer<typeof catalogVersionSchema>;

/** Arbitrarily nested JSON document owned by the formats service. */
export type FormatDefinition = { [key: string]: unknown };
