import type { ToolKind } from "./assistant";

// Run steps are derived from tool call rounds and the run's final message
export type RunStepStatus = "in_progress" | "completed" | "cancelled" | "failed" | "expired";

export interface ToolCallStepDetail {
  id: string;
  type: ToolKind;
  name: string;
  arguments: string;
  output: string | null;
}

export interface RunStep {
  id: string;
  object: "thread.run.step";
  run_id: string;
  thread_id: string;
  assistant_id: string;
  type: "message_creation" | "tool_calls";
  status: RunStepStatus;
  step_details:
    | { type: "message_creation"; message_creation: { message_id: string } }
    | { type: "tool_calls"; tool_calls: ToolCallStepDetail[] };
  created_at: number;
  completed_at: number | null;
}
