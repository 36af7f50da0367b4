import type { JsonSchema, ToolKind } from "./assistant";

// Tool call Model
export interface ToolCall {
  id: string;
  run_id: string;
  thread_id: string;
  round: number;
  position: number;
  type: ToolKind;
  name: string;
  arguments: string;
  output: string | null;
  is_error: boolean;
  created_at: number;
  completed_at: number | null;
}

export interface ToolOutput {
  tool_call_id: string;
  output: string;
}

// Function registered by name and referenced from assistant tool configuration
export interface RegisteredFunction {
  id: string;
  object: "function";
  owner_id: string;
  name: string;
  description: string | null;
  parameters: JsonSchema;
  created_at: number;
}
