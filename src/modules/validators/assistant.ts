import { z } from 'zod';
import type { AssistantTool, JsonSchema, OpenAPIDocument } from '../models';

export const MetadataSchema = z.record(z.string().max(64), z.string().max(512))
  .refine(value => Object.keys(value).length <= 16, { message: 'metadata can hold at most 16 keys' });

export const FileIdsSchema = z.array(z.string().min(1)).max(20);

export const JsonSchemaSchema: z.ZodType<JsonSchema> = z.record(z.string(), z.unknown());

// Function names are what the model sees; OpenAI restricts them to this pattern
export const FunctionNameSchema = z.string().regex(/^[a-zA-Z0-9_-]{1,64}$/, 'Function name must match ^[a-zA-Z0-9_-]{1,64}$');

export const FunctionDefinitionSchema = z.object({
  name: FunctionNameSchema,
  description: z.string().max(1024).optional(),
  parameters: JsonSchemaSchema.optional(),
});

export const OpenAPIDocumentSchema: z.ZodType<OpenAPIDocument> = z.object({
  openapi: z.string().optional(),
  servers: z.array(z.object({
    url: z.string().min(1),
    description: z.string().optional(),
  })).optional(),
  paths: z.record(z.string(), z.record(z.string(), z.unknown())),
}).passthrough();

// Tool configuration, discriminated on type
export const AssistantToolSchema: z.ZodType<AssistantTool> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('function'),
    function: FunctionDefinitionSchema,
  }),
  z.object({
    type: z.literal('retrieval'),
    retrieval: z.object({
      file_ids: FileIdsSchema.optional(),
      max_chars: z.number().int().positive().max(100_000).optional(),
    }).optional(),
  }),
  z.object({
    type: z.literal('code_interpreter'),
    code_interpreter: z.object({
      timeout_ms: z.number().int().positive().max(600_000).optional(),
      allow_network: z.boolean().optional(),
    }).optional(),
  }),
  z.object({
    type: z.literal('action'),
    action: z.object({
      openapi: OpenAPIDocumentSchema,
      headers: z.record(z.string(), z.string()).optional(),
    }),
  }),
]);

export const AssistantToolsSchema = z.array(AssistantToolSchema).max(128);

// Request schemas
export const CreateAssistantRequest = z.object({
  model: z.string().min(1),
  name: z.string().max(256).nullable().optional(),
  description: z.string().max(512).nullable().optional(),
  instructions: z.string().max(32768).nullable().optional(),
  tools: AssistantToolsSchema.default([]),
  file_ids: FileIdsSchema.default([]),
  metadata: MetadataSchema.default({}),
});

export const UpdateAssistantRequest = z.object({
  model: z.string().min(1).optional(),
  name: z.string().max(256).nullable().optional(),
  description: z.string().max(512).nullable().optional(),
  instructions: z.string().max(32768).nullable().optional(),
  tools: AssistantToolsSchema.optional(),
  file_ids: FileIdsSchema.optional(),
  metadata: MetadataSchema.optional(),
});

export type CreateAssistantInput = z.infer<typeof CreateAssistantRequest>;
export type UpdateAssistantInput = z.infer<typeof UpdateAssistantRequest>;
