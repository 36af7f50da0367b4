import type { Kysely } from 'kysely';
import type { Database } from './database';

/**
 * Create every table and index. Safe to run on an existing database.
 */
export async function migrate(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable('assistants')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('owner_id', 'text', col => col.notNull())
    .addColumn('created_at', 'integer', col => col.notNull())
    .addColumn('name', 'text')
    .addColumn('description', 'text')
    .addColumn('model', 'text', col => col.notNull())
    .addColumn('instructions', 'text')
    .addColumn('tools', 'text', col => col.notNull())
    .addColumn('file_ids', 'text', col => col.notNull())
    .addColumn('metadata', 'text', col => col.notNull())
    .execute();

  await db.schema
    .createTable('threads')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('owner_id', 'text', col => col.notNull())
    .addColumn('created_at', 'integer', col => col.notNull())
    .addColumn('file_ids', 'text', col => col.notNull())
    .addColumn('metadata', 'text', col => col.notNull())
    .execute();

  await db.schema
    .createTable('messages')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('thread_id', 'text', col => col.notNull().references('threads.id').onDelete('cascade'))
    .addColumn('owner_id', 'text', col => col.notNull())
    .addColumn('position', 'integer', col => col.notNull())
    .addColumn('role', 'text', col => col.notNull())
    .addColumn('content', 'text', col => col.notNull())
    .addColumn('assistant_id', 'text')
    .addColumn('run_id', 'text')
    .addColumn('file_ids', 'text', col => col.notNull())
    .addColumn('metadata', 'text', col => col.notNull())
    .addColumn('created_at', 'integer', col => col.notNull())
    .execute();

  await db.schema
    .createIndex('messages_thread_position_idx')
    .ifNotExists()
    .on('messages')
    .columns(['thread_id', 'position'])
    .unique()
    .execute();

  await db.schema
    .createTable('runs')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('thread_id', 'text', col => col.notNull().references('threads.id'))
    .addColumn('assistant_id', 'text', col => col.notNull().references('assistants.id'))
    .addColumn('owner_id', 'text', col => col.notNull())
    .addColumn('status', 'text', col => col.notNull())
    .addColumn('required_action', 'text')
    .addColumn('last_error', 'text')
    .addColumn('created_at', 'integer', col => col.notNull())
    .addColumn('expires_at', 'integer', col => col.notNull())
    .addColumn('started_at', 'integer')
    .addColumn('cancelled_at', 'integer')
    .addColumn('failed_at', 'integer')
    .addColumn('completed_at', 'integer')
    .addColumn('model', 'text', col => col.notNull())
    .addColumn('instructions', 'text')
    .addColumn('tools', 'text', col => col.notNull())
    .addColumn('file_ids', 'text', col => col.notNull())
    .addColumn('metadata', 'text', col => col.notNull())
    .addColumn('version', 'integer', col => col.notNull().defaultTo(0))
    .execute();

  await db.schema
    .createIndex('runs_thread_idx')
    .ifNotExists()
    .on('runs')
    .columns(['thread_id', 'created_at'])
    .execute();

  await db.schema
    .createIndex('runs_status_expires_idx')
    .ifNotExists()
    .on('runs')
    .columns(['status', 'expires_at'])
    .execute();

  await db.schema
    .createTable('tool_calls')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('run_id', 'text', col => col.notNull().references('runs.id').onDelete('cascade'))
    .addColumn('thread_id', 'text', col => col.notNull())
    .addColumn('round', 'integer', col => col.notNull())
    .addColumn('position', 'integer', col => col.notNull())
    .addColumn('type', 'text', col => col.notNull())
    .addColumn('name', 'text', col => col.notNull())
    .addColumn('arguments', 'text', col => col.notNull())
    .addColumn('output', 'text')
    .addColumn('is_error', 'integer', col => col.notNull().defaultTo(0))
    .addColumn('created_at', 'integer', col => col.notNull())
    .addColumn('completed_at', 'integer')
    .execute();

  await db.schema
    .createIndex('tool_calls_run_idx')
    .ifNotExists()
    .on('tool_calls')
    .columns(['run_id', 'round', 'position'])
    .unique()
    .execute();

  await db.schema
    .createTable('functions')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('owner_id', 'text', col => col.notNull())
    .addColumn('name', 'text', col => col.notNull())
    .addColumn('description', 'text')
    .addColumn('parameters', 'text', col => col.notNull())
    .addColumn('created_at', 'integer', col => col.notNull())
    .execute();

  await db.schema
    .createIndex('functions_owner_name_idx')
    .ifNotExists()
    .on('functions')
    .columns(['owner_id', 'name'])
    .unique()
    .execute();

  await db.schema
    .createTable('files')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('owner_id', 'text', col => col.notNull())
    .addColumn('filename', 'text', col => col.notNull())
    .addColumn('bytes', 'integer', col => col.notNull())
    .addColumn('purpose', 'text', col => col.notNull())
    .addColumn('status', 'text', col => col.notNull())
    .addColumn('created_at', 'integer', col => col.notNull())
    .execute();

  await db.schema
    .createTable('chunks')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('file_id', 'text', col => col.notNull().references('files.id').onDelete('cascade'))
    .addColumn('sequence', 'integer', col => col.notNull())
    .addColumn('start_index', 'integer', col => col.notNull())
    .addColumn('end_index', 'integer', col => col.notNull())
    .addColumn('data', 'text', col => col.notNull())
    .addColumn('created_at', 'integer', col => col.notNull())
    .execute();

  await db.schema
    .createIndex('chunks_file_sequence_idx')
    .ifNotExists()
    .on('chunks')
    .columns(['file_id', 'sequence'])
    .unique()
    .execute();

  await db.schema
    .createTable('run_queue')
    .ifNotExists()
    .addColumn('run_id', 'text', col => col.primaryKey())
    .addColumn('enqueued_at', 'integer', col => col.notNull())
    .addColumn('available_at', 'integer', col => col.notNull())
    .addColumn('lease_token', 'text')
    .addColumn('lease_expires_at', 'integer')
    .addColumn('attempts', 'integer', col => col.notNull().defaultTo(0))
    .addColumn('pending_push', 'integer', col => col.notNull().defaultTo(0))
    .execute();
}
