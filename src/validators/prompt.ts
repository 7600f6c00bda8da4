import { z } from 'zod';

const variableName = z
  .string()
  .trim()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Variable names must be identifiers');

export const promptCreateSchema = z.object({
  name: z.string().trim().min(1, 'Prompt name is required').max(160),
  docType: z.string().trim().min(1).max(120).optional(),
  isActive: z.boolean().optional(),
  template: z.string().trim().min(1, 'Template text is required').max(50_000),
  variables: z.array(variableName).max(100).optional(),
});

export const promptUpdateSchema = promptCreateSchema
  .partial()
  .refine((value) => Object.keys(value).length > 0, { message: 'At least one field must be provided' });

export type PromptCreateInput = z.infer<typeof promptCreateSchema>;
export type PromptUpdateInput = z.infer<typeof promptUpdateSchema>;
