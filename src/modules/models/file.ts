// File Model
export type FileStatus = "uploaded" | "processed" | "error";

export interface FileObject {
  id: string;
  object: "file";
  owner_id: string;
  filename: string;
  bytes: number;
  purpose: string;
  status: FileStatus;
  created_at: number;
}

export interface Chunk {
  id: string;
  file_id: string;
  sequence: number;
  start_index: number;
  end_index: number;
  data: string;
  created_at: number;
}
