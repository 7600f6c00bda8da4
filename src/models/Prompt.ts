import { z } from 'zod';

export const promptRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  docType: z.string().default('general'),
  isActive: z.boolean().default(true),
  template: z.string(),
  variables: z.array(z.string()).default([]),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type PromptTemplate = z.infer<typeof promptRecordSchema>;
