import fs from 'node:fs';
import path from 'node:path';
import SQLite from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { MessageRole, RunStatus, ToolKind, FileStatus } from '../models';

// Table definitions. JSON columns hold serialized text; booleans are 0/1.

export interface AssistantsTable {
  id: string;
  owner_id: string;
  created_at: number;
  name: string | null;
  description: string | null;
  model: string;
  instructions: string | null;
  tools: string;
  file_ids: string;
  metadata: string;
}

export interface ThreadsTable {
  id: string;
  owner_id: string;
  created_at: number;
  file_ids: string;
  metadata: string;
}

export interface MessagesTable {
  id: string;
  thread_id: string;
  owner_id: string;
  position: number;
  role: MessageRole;
  content: string;
  assistant_id: string | null;
  run_id: string | null;
  file_ids: string;
  metadata: string;
  created_at: number;
}

export interface RunsTable {
  id: string;
  thread_id: string;
  assistant_id: string;
  owner_id: string;
  status: RunStatus;
  required_action: string | null;
  last_error: string | null;
  created_at: number;
  expires_at: number;
  started_at: number | null;
  cancelled_at: number | null;
  failed_at: number | null;
  completed_at: number | null;
  model: string;
  instructions: string | null;
  tools: string;
  file_ids: string;
  metadata: string;
  version: number;
}

export interface ToolCallsTable {
  id: string;
  run_id: string;
  thread_id: string;
  round: number;
  position: number;
  type: ToolKind;
  name: string;
  arguments: string;
  output: string | null;
  is_error: number;
  created_at: number;
  completed_at: number | null;
}

export interface FunctionsTable {
  id: string;
  owner_id: string;
  name: string;
  description: string | null;
  parameters: string;
  created_at: number;
}

export interface FilesTable {
  id: string;
  owner_id: string;
  filename: string;
  bytes: number;
  purpose: string;
  status: FileStatus;
  created_at: number;
}

export interface ChunksTable {
  id: string;
  file_id: string;
  sequence: number;
  start_index: number;
  end_index: number;
  data: string;
  created_at: number;
}

// Times in this table are epoch milliseconds
export interface RunQueueTable {
  run_id: string;
  enqueued_at: number;
  available_at: number;
  lease_token: string | null;
  lease_expires_at: number | null;
  attempts: number;
  pending_push: number;
}

export interface Database {
  assistants: AssistantsTable;
  threads: ThreadsTable;
  messages: MessagesTable;
  runs: RunsTable;
  tool_calls: ToolCallsTable;
  functions: FunctionsTable;
  files: FilesTable;
  chunks: ChunksTable;
  run_queue: RunQueueTable;
}

/**
 * Open a SQLite database through Kysely. ":memory:" gives a private in-process database.
 */
export function createDatabase(databasePath: string): Kysely<Database> {
  if (databasePath !== ':memory:') {
    fs.mkdirSync(path.dirname(databasePath), { recursive: true });
  }

  const sqlite = new SQLite(databasePath);
  sqlite.pragma('foreign_keys = ON');
  if (databasePath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('busy_timeout = 5000');
  }

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database: sqlite }),
  });
}
