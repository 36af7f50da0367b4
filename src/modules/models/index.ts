// Model exports
export type {
  Assistant,
  AssistantTool,
  ActionTool,
  CodeInterpreterTool,
  FunctionDefinition,
  FunctionTool,
  JsonSchema,
  OpenAPIDocument,
  OpenAPIServer,
  RetrievalTool,
  ToolKind,
} from './assistant';
export type { Thread } from './thread';
export type { Message, MessageContent, MessageRole, TextContent, ImageFileContent, FileCitationAnnotation } from './message';
export type { Run, RunStatus, RunError, RunFailureKind, RequiredAction, RequiredToolCall } from './run';
export { TERMINAL_RUN_STATUSES, isTerminalStatus } from './run';
export type { ToolCall, ToolOutput, RegisteredFunction } from './tool';
export type { FileObject, FileStatus, Chunk } from './file';
export type { RunStep, RunStepStatus, ToolCallStepDetail } from './run-step';
export type { ChatCompletion, ChatCompletionChoice, ChatCompletionToolCall } from './chat';
