import { z } from 'zod';

export const FilePurposeSchema = z.enum(['assistants', 'retrieval']);

export const UploadFileFields = z.object({
  purpose: FilePurposeSchema.default('assistants'),
});

export const ListFilesQuery = z.object({
  purpose: FilePurposeSchema.optional(),
});

export const RegisterFunctionRequest = z.object({
  name: z.string().regex(/^[a-zA-Z0-9_-]{1,64}$/, 'Function name must match ^[a-zA-Z0-9_-]{1,64}$'),
  description: z.string().max(1024).optional(),
  parameters: z.record(z.string(), z.unknown()).default({ type: 'object', properties: {} }),
});

export const ListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  order: z.enum(['asc', 'desc']).default('desc'),
  after: z.string().optional(),
});

export type RegisterFunctionInput = z.infer<typeof RegisterFunctionRequest>;
export type ListQueryInput = z.infer<typeof ListQuery>;
