import { z } from 'zod';
import type { Assistant, Chunk, FileObject, Message, RegisteredFunction, Run, Thread, ToolCall } from '../models';
import {
  AssistantToolsSchema,
  JsonSchemaSchema,
  MessageContentListSchema,
  RequiredActionSchema,
  RunErrorSchema,
} from '../validators';
import type {
  AssistantsTable,
  ChunksTable,
  FilesTable,
  FunctionsTable,
  MessagesTable,
  RunsTable,
  ThreadsTable,
  ToolCallsTable,
} from './database';
import { parseJsonColumn, parseNullableJsonColumn, toJson } from './json';

// Stored metadata is not re-checked against the request limits
const StoredMetadata = z.record(z.string(), z.string());
const StoredFileIds = z.array(z.string());

export function assistantFromRow(row: AssistantsTable): Assistant {
  return {
    id: row.id,
    object: 'assistant',
    owner_id: row.owner_id,
    created_at: row.created_at,
    name: row.name,
    description: row.description,
    model: row.model,
    instructions: row.instructions,
    tools: parseJsonColumn(row.tools, AssistantToolsSchema, 'assistants.tools'),
    file_ids: parseJsonColumn(row.file_ids, StoredFileIds, 'assistants.file_ids'),
    metadata: parseJsonColumn(row.metadata, StoredMetadata, 'assistants.metadata'),
  };
}

export function assistantToRow(assistant: Assistant): AssistantsTable {
  return {
    id: assistant.id,
    owner_id: assistant.owner_id,
    created_at: assistant.created_at,
    name: assistant.name,
    description: assistant.description,
    model: assistant.model,
    instructions: assistant.instructions,
    tools: toJson(assistant.tools),
    file_ids: toJson(assistant.file_ids),
    metadata: toJson(assistant.metadata),
  };
}

export function threadFromRow(row: ThreadsTable): Thread {
  return {
    id: row.id,
    object: 'thread',
    owner_id: row.owner_id,
    created_at: row.created_at,
    file_ids: parseJsonColumn(row.file_ids, StoredFileIds, 'threads.file_ids'),
    metadata: parseJsonColumn(row.metadata, StoredMetadata, 'threads.metadata'),
  };
}

export function messageFromRow(row: MessagesTable): Message {
  return {
    id: row.id,
    object: 'thread.message',
    thread_id: row.thread_id,
    owner_id: row.owner_id,
    position: row.position,
    role: row.role,
    content: parseJsonColumn(row.content, MessageContentListSchema, 'messages.content'),
    assistant_id: row.assistant_id,
    run_id: row.run_id,
    file_ids: parseJsonColumn(row.file_ids, StoredFileIds, 'messages.file_ids'),
    metadata: parseJsonColumn(row.metadata, StoredMetadata, 'messages.metadata'),
    created_at: row.created_at,
  };
}

export function messageToRow(message: Message): MessagesTable {
  return {
    id: message.id,
    thread_id: message.thread_id,
    owner_id: message.owner_id,
    position: message.position,
    role: message.role,
    content: toJson(message.content),
    assistant_id: message.assistant_id,
    run_id: message.run_id,
    file_ids: toJson(message.file_ids),
    metadata: toJson(message.metadata),
    created_at: message.created_at,
  };
}

export function runFromRow(row: RunsTable): Run {
  return {
    id: row.id,
    object: 'thread.run',
    thread_id: row.thread_id,
    assistant_id: row.assistant_id,
    owner_id: row.owner_id,
    status: row.status,
    required_action: parseNullableJsonColumn(row.required_action, RequiredActionSchema, 'runs.required_action'),
    last_error: parseNullableJsonColumn(row.last_error, RunErrorSchema, 'runs.last_error'),
    created_at: row.created_at,
    expires_at: row.expires_at,
    started_at: row.started_at,
    cancelled_at: row.cancelled_at,
    failed_at: row.failed_at,
    completed_at: row.completed_at,
    model: row.model,
    instructions: row.instructions,
    tools: parseJsonColumn(row.tools, AssistantToolsSchema, 'runs.tools'),
    file_ids: parseJsonColumn(row.file_ids, StoredFileIds, 'runs.file_ids'),
    metadata: parseJsonColumn(row.metadata, StoredMetadata, 'runs.metadata'),
    version: row.version,
  };
}

export function runToRow(run: Run): RunsTable {
  return {
    id: run.id,
    thread_id: run.thread_id,
    assistant_id: run.assistant_id,
    owner_id: run.owner_id,
    status: run.status,
    required_action: run.required_action === null ? null : toJson(run.required_action),
    last_error: run.last_error === null ? null : toJson(run.last_error),
    created_at: run.created_at,
    expires_at: run.expires_at,
    started_at: run.started_at,
    cancelled_at: run.cancelled_at,
    failed_at: run.failed_at,
    completed_at: run.completed_at,
    model: run.model,
    instructions: run.instructions,
    tools: toJson(run.tools),
    file_ids: toJson(run.file_ids),
    metadata: toJson(run.metadata),
    version: run.version,
  };
}

export function toolCallFromRow(row: ToolCallsTable): ToolCall {
  return {
    id: row.id,
    run_id: row.run_id,
    thread_id: row.thread_id,
    round: row.round,
    position: row.position,
    type: row.type,
    name: row.name,
    arguments: row.arguments,
    output: row.output,
    is_error: row.is_error === 1,
    created_at: row.created_at,
    completed_at: row.completed_at,
  };
}

export function toolCallToRow(call: ToolCall): ToolCallsTable {
  return { ...call, is_error: call.is_error ? 1 : 0 };
}

export function functionFromRow(row: FunctionsTable): RegisteredFunction {
  return {
    id: row.id,
    object: 'function',
    owner_id: row.owner_id,
    name: row.name,
    description: row.description,
    parameters: parseJsonColumn(row.parameters, JsonSchemaSchema, 'functions.parameters'),
    created_at: row.created_at,
  };
}

export function fileFromRow(row: FilesTable): FileObject {
  return { ...row, object: 'file' };
}

export function chunkFromRow(row: ChunksTable): Chunk {
  return { ...row };
}
