// Message Model
export type MessageRole = "user" | "assistant";

export interface FileCitationAnnotation {
  type: "file_citation";
  text: string;
  start_index: number;
  end_index: number;
  file_citation: {
    file_id: string;
    quote?: string;
  };
}

export interface TextContent {
  type: "text";
  text: {
    value: string;
    annotations: FileCitationAnnotation[];
  };
}

export interface ImageFileContent {
  type: "image_file";
  image_file: {
    file_id: string;
  };
}

export type MessageContent = TextContent | ImageFileContent;

// Messages are immutable once appended; position orders them within a thread
export interface Message {
  id: string;
  object: "thread.message";
  thread_id: string;
  owner_id: string;
  position: number;
  role: MessageRole;
  content: MessageContent[];
  assistant_id: string | null;
  run_id: string | null;
  file_ids: string[];
  metadata: Record<string, string>;
  created_at: number;
}
