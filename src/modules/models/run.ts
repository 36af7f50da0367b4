import type { AssistantTool } from "./assistant";

// Run Model
export type RunStatus =
  | "queued"
  | "running"
  | "requires_action"
  | "cancelling"
  | "cancelled"
  | "failed"
  | "completed"
  | "expired";

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = ["cancelled", "failed", "completed", "expired"];

export function isTerminalStatus(status: RunStatus): boolean {
  return TERMINAL_RUN_STATUSES.includes(status);
}

export type RunFailureKind =
  | "server_error"
  | "rate_limit"
  | "invalid_tool_output"
  | "invalid_tool_call"
  | "retrieval_error"
  | "sandbox_exhausted"
  | "action_error"
  | "context_exceeded"
  | "max_rounds_exceeded";

export interface RunError {
  code: RunFailureKind;
  message: string;
}

export interface RequiredToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string;
  };
}

export interface RequiredAction {
  type: "submit_tool_outputs";
  submit_tool_outputs: {
    tool_calls: RequiredToolCall[];
  };
}

/**
 * model, instructions, tools and file_ids are copied from the assistant when
 * the run is created and never change afterwards.
 */
export interface Run {
  id: string;
  object: "thread.run";
  thread_id: string;
  assistant_id: string;
  owner_id: string;
  status: RunStatus;
  required_action: RequiredAction | null;
  last_error: RunError | null;
  created_at: number;
  expires_at: number;
  started_at: number | null;
  cancelled_at: number | null;
  failed_at: number | null;
  completed_at: number | null;
  model: string;
  instructions: string | null;
  tools: AssistantTool[];
  file_ids: string[];
  metadata: Record<string, string>;
  version: number;
}
