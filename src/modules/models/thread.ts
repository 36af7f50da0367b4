// Thread Model
export interface Thread {
  id: string;
  object: "thread";
  owner_id: string;
  created_at: number;
  file_ids: string[];
  metadata: Record<string, string>;
}
