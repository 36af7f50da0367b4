// Assistant Model
export type JsonSchema = Record<string, unknown>;

export interface FunctionDefinition {
  name: string;
  description?: string;
  parameters?: JsonSchema;
}

export interface OpenAPIServer {
  url: string;
  description?: string;
}

// Only the parts the action tool reads are typed; the rest passes through
export interface OpenAPIDocument {
  openapi?: string;
  servers?: OpenAPIServer[];
  paths: Record<string, Record<string, unknown>>;
  [key: string]: unknown;
}

export interface FunctionTool {
  type: "function";
  function: FunctionDefinition;
}

export interface RetrievalTool {
  type: "retrieval";
  retrieval?: {
    file_ids?: string[];
    max_chars?: number;
  };
}

export interface CodeInterpreterTool {
  type: "code_interpreter";
  code_interpreter?: {
    timeout_ms?: number;
    allow_network?: boolean;
  };
}

export interface ActionTool {
  type: "action";
  action: {
    openapi: OpenAPIDocument;
    headers?: Record<string, string>;
  };
}

export type AssistantTool = FunctionTool | RetrievalTool | CodeInterpreterTool | ActionTool;

export type ToolKind = AssistantTool["type"];

export interface Assistant {
  id: string;
  object: "assistant";
  owner_id: string;
  created_at: number;
  name: string | null;
  description: string | null;
  model: string;
  instructions: string | null;
  tools: AssistantTool[];
  file_ids: string[];
  metadata: Record<string, string>;
}
