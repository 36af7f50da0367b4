import { z } from 'zod';
import { FunctionDefinitionSchema } from './assistant';

const ChatToolCallSchema = z.object({
  id: z.string().min(1),
  type: z.literal('function'),
  function: z.object({
    name: z.string().min(1),
    arguments: z.string(),
  }),
});

export const ChatCompletionMessageSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('system'), content: z.string() }),
  z.object({ role: z.literal('user'), content: z.string() }),
  z.object({
    role: z.literal('assistant'),
    content: z.string().nullable().default(null),
    tool_calls: z.array(ChatToolCallSchema).optional(),
  }),
  z.object({ role: z.literal('tool'), tool_call_id: z.string().min(1), content: z.string() }),
]);

// Stateless completion through the configured model providers; responses are never streamed
export const ChatCompletionRequest = z.object({
  model: z.string().min(1),
  messages: z.array(ChatCompletionMessageSchema).min(1),
  tools: z.array(z.object({
    type: z.literal('function'),
    function: FunctionDefinitionSchema,
  })).max(128).default([]),
  stream: z.literal(false, { errorMap: () => ({ message: 'Streaming responses are not supported' }) }).optional(),
});

export type ChatCompletionInput = z.infer<typeof ChatCompletionRequest>;
