import { z } from 'zod';
import type { RequiredAction, RunError } from '../models';
import { AssistantToolsSchema, MetadataSchema } from './assistant';

export const RunFailureKindSchema = z.enum([
  'server_error',
  'rate_limit',
  'invalid_tool_output',
  'invalid_tool_call',
  'retrieval_error',
  'sandbox_exhausted',
  'action_error',
  'context_exceeded',
  'max_rounds_exceeded',
]);

export const RunErrorSchema: z.ZodType<RunError> = z.object({
  code: RunFailureKindSchema,
  message: z.string(),
});

export const RequiredActionSchema: z.ZodType<RequiredAction> = z.object({
  type: z.literal('submit_tool_outputs'),
  submit_tool_outputs: z.object({
    tool_calls: z.array(z.object({
      id: z.string(),
      type: z.literal('function'),
      function: z.object({
        name: z.string(),
        arguments: z.string(),
      }),
    })),
  }),
});

// Request schemas
export const CreateRunRequest = z.object({
  assistant_id: z.string().min(1),
  model: z.string().min(1).optional(),
  instructions: z.string().max(32768).nullable().optional(),
  additional_instructions: z.string().max(32768).optional(),
  tools: AssistantToolsSchema.optional(),
  metadata: MetadataSchema.default({}),
});

export const SubmitToolOutputsRequest = z.object({
  tool_outputs: z.array(z.object({
    tool_call_id: z.string().min(1),
    output: z.string(),
  })).min(1),
});

export const UpdateRunRequest = z.object({
  metadata: MetadataSchema,
});

export type CreateRunInput = z.infer<typeof CreateRunRequest>;
export type SubmitToolOutputsInput = z.infer<typeof SubmitToolOutputsRequest>;
export type UpdateRunInput = z.infer<typeof UpdateRunRequest>;
