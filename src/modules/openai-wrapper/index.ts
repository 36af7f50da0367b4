export { OpenAIClient } from './client';
export {
  ProviderRegistry,
  ProviderType,
  createProviderRegistry,
  type ProviderRegistration,
  type ProviderSettings,
} from './registry';
export { PromptBuilder, type Conversation } from './prompt-builder';
export { ToolSchemaConverter, RETRIEVAL_FUNCTION_NAME, CODE_INTERPRETER_FUNCTION_NAME } from './tool-converter';
export {
  ModelClientError,
  OPENAI_DEFAULTS,
  type ChatMessage,
  type ChatToolCall,
  type ModelClient,
  type ModelErrorKind,
  type ModelRequest,
  type ModelToolSchema,
  type ModelTurn,
  type OpenAIConfig,
  type ToolInvocation,
} from './types';
