import { z } from 'zod';
import { FileIdsSchema, MetadataSchema } from './assistant';
import { CreateMessageRequest } from './message';

export const CreateThreadRequest = z.object({
  messages: z.array(CreateMessageRequest).max(32).default([]),
  file_ids: FileIdsSchema.default([]),
  metadata: MetadataSchema.default({}),
});

export const UpdateThreadRequest = z.object({
  metadata: MetadataSchema,
});

export type CreateThreadInput = z.infer<typeof CreateThreadRequest>;
export type UpdateThreadInput = z.infer<typeof UpdateThreadRequest>;
