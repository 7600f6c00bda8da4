import { z } from 'zod';

const identifier = z.string().trim().min(1).max(128);

const variableValues = z
  .record(z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value)))
  .refine((value) => Object.keys(value).length <= 200, { message: 'Too many template values' });

export const projectCreateSchema = z.object({
  title: z.string().trim().min(1, 'Project title is required').max(300),
  formatId: identifier,
  formatName: z.string().trim().max(300).optional(),
  formatVersion: z.string().trim().max(64).optional(),
  promptId: identifier,
  promptName: z.string().trim().max(300).optional(),
  values: variableValues.optional(),
});

export const projectUpdateSchema = projectCreateSchema
  .partial()
  .refine((value) => Object.keys(value).length > 0, { message: 'At least one field must be provided' });

export const formatQuerySchema = z.object({
  university: z.string().trim().min(1).max(200).optional(),
  category: z.string().trim().min(1).max(200).optional(),
  documentType: z.string().trim().min(1).max(200).optional(),
});

export type ProjectCreateInput = z.infer<typeof projectCreateSchema>;
export type ProjectUpdateInput = z.infer<typeof projectUpdateSchema>;
export type FormatQuery = z.infer<typeof formatQuerySchema>;
