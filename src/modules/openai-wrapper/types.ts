import type { JsonSchema } from '../models';

// Provider-neutral chat shapes the engine talks in

export interface ChatToolCall {
  id: string;
  name: string;
  arguments: string;
}

export type ChatMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: ChatToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export interface ModelToolSchema {
  name: string;
  description?: string;
  parameters: JsonSchema;
}

export interface ModelRequest {
  model: string;
  instructions: string | null;
  messages: ChatMessage[];
  tools: ModelToolSchema[];
  signal?: AbortSignal;
}

export interface ToolInvocation {
  name: string;
  arguments: string;
}

export type ModelTurn =
  | { type: 'text'; text: string }
  | { type: 'tool_calls'; text: string | null; invocations: ToolInvocation[] };

export type ModelErrorKind = 'transient' | 'rate_limit' | 'context_length' | 'fatal';

export class ModelClientError extends Error {
  readonly kind: ModelErrorKind;
  readonly status?: number;

  constructor(kind: ModelErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ModelClientError';
    this.kind = kind;
    this.status = options.status;
  }
}

/**
 * Model inference collaborator
 */
export interface ModelClient {
  complete(request: ModelRequest): Promise<ModelTurn>;
}

export interface OpenAIConfig {
  apiKey: string;
  baseUrl?: string;
  organization?: string;
  timeout?: number;
}

export const OPENAI_DEFAULTS = {
  BASE_URL: 'https://api.openai.com/v1',
  TIMEOUT_MS: 60000,
} as const;
