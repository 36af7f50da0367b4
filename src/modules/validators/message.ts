import { z } from 'zod';
import type { MessageContent } from '../models';
import { FileIdsSchema, MetadataSchema } from './assistant';

export const FileCitationAnnotationSchema = z.object({
  type: z.literal('file_citation'),
  text: z.string(),
  start_index: z.number().int().min(0),
  end_index: z.number().int().min(0),
  file_citation: z.object({
    file_id: z.string(),
    quote: z.string().optional(),
  }),
});

export const MessageContentSchema: z.ZodType<MessageContent> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('text'),
    text: z.object({
      value: z.string(),
      annotations: z.array(FileCitationAnnotationSchema),
    }),
  }),
  z.object({
    type: z.literal('image_file'),
    image_file: z.object({ file_id: z.string() }),
  }),
]);

export const MessageContentListSchema = z.array(MessageContentSchema);

// Content is either plain text or a list of text parts
export const CreateMessageRequest = z.object({
  role: z.enum(['user', 'assistant']).default('user'),
  content: z.union([
    z.string().min(1).max(256_000),
    z.array(z.object({ type: z.literal('text'), text: z.string().min(1) })).min(1),
  ]),
  file_ids: FileIdsSchema.default([]),
  metadata: MetadataSchema.default({}),
});

export type CreateMessageInput = z.infer<typeof CreateMessageRequest>;
