import type { Kysely } from 'kysely';
import { PersistenceError, VersionConflictError } from '../errors';
import type {
  Assistant,
  Chunk,
  FileObject,
  FileStatus,
  Message,
  RegisteredFunction,
  Run,
  RunStatus,
  Thread,
  ToolCall,
} from '../models';
import type { Database } from './database';
import {
  assistantFromRow,
  assistantToRow,
  chunkFromRow,
  fileFromRow,
  functionFromRow,
  messageFromRow,
  messageToRow,
  runFromRow,
  runToRow,
  threadFromRow,
  toolCallFromRow,
  toolCallToRow,
} from './mappers';
import { toJson } from './json';

export interface ListOptions {
  limit: number;
  order: 'asc' | 'desc';
  after?: string;
}

export interface Page<T> {
  data: T[];
  hasMore: boolean;
}

export type NewMessage = Omit<Message, 'position'>;

function toPage<T>(rows: T[], limit: number): Page<T> {
  return { data: rows.slice(0, limit), hasMore: rows.length > limit };
}

/**
 * Relational store for every entity the API and the run engine share.
 * Methods called on the store handed to `transaction` run inside that transaction.
 */
export class EntityStore {
  // Exposed so that the SQL run queue can join a transaction opened here
  readonly db: Kysely<Database>;

  constructor(db: Kysely<Database>) {
    this.db = db;
  }

  /**
   * Run fn atomically. Nested calls join the outer transaction.
   */
  async transaction<T>(fn: (store: EntityStore) => Promise<T>): Promise<T> {
    if (this.db.isTransaction) {
      return fn(this);
    }
    return this.db.transaction().execute(trx => fn(new EntityStore(trx)));
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }

  // Assistants

  async insertAssistant(assistant: Assistant): Promise<Assistant> {
    await this.guard('insert assistant', () =>
      this.db.insertInto('assistants').values(assistantToRow(assistant)).execute()
    );
    return assistant;
  }

  async getAssistant(id: string, ownerId?: string): Promise<Assistant | null> {
    const row = await this.guard('get assistant', () => {
      let query = this.db.selectFrom('assistants').selectAll().where('id', '=', id);
      if (ownerId !== undefined) {
        query = query.where('owner_id', '=', ownerId);
      }
      return query.executeTakeFirst();
    });
    return row ? assistantFromRow(row) : null;
  }

  async listAssistants(ownerId: string, options: ListOptions): Promise<Page<Assistant>> {
    const rows = await this.guard('list assistants', async () => {
      let query = this.db.selectFrom('assistants').selectAll().where('owner_id', '=', ownerId);
      if (options.after) {
        const cursor = await this.db.selectFrom('assistants').select(['created_at', 'id'])
          .where('id', '=', options.after).executeTakeFirst();
        if (cursor) {
          const op = options.order === 'asc' ? '>' : '<';
          query = query.where(eb => eb.or([
            eb('created_at', op, cursor.created_at),
            eb.and([eb('created_at', '=', cursor.created_at), eb('id', op, cursor.id)]),
          ]));
        }
      }
      return query.orderBy('created_at', options.order).orderBy('id', options.order)
        .limit(options.limit + 1).execute();
    });
    return toPage(rows.map(assistantFromRow), options.limit);
  }

  async updateAssistant(assistant: Assistant): Promise<Assistant> {
    const { id, owner_id, created_at, ...fields } = assistantToRow(assistant);
    await this.guard('update assistant', () =>
      this.db.updateTable('assistants').set(fields)
        .where('id', '=', id).where('owner_id', '=', owner_id).execute()
    );
    return assistant;
  }

  async deleteAssistant(id: string, ownerId: string): Promise<boolean> {
    const result = await this.guard('delete assistant', () =>
      this.db.deleteFrom('assistants').where('id', '=', id).where('owner_id', '=', ownerId).executeTakeFirst()
    );
    return Number(result.numDeletedRows) > 0;
  }

  /**
   * Whether any run references the assistant or thread
   */
  async hasRuns(filter: { assistantId: string } | { threadId: string }): Promise<boolean> {
    const row = await this.guard('check runs', () => {
      const query = this.db.selectFrom('runs').select('id');
      const scoped = 'assistantId' in filter
        ? query.where('assistant_id', '=', filter.assistantId)
        : query.where('thread_id', '=', filter.threadId);
      return scoped.limit(1).executeTakeFirst();
    });
    return row !== undefined;
  }

  // Threads

  async insertThread(thread: Thread): Promise<Thread> {
    await this.guard('insert thread', () =>
      this.db.insertInto('threads').values({
        id: thread.id,
        owner_id: thread.owner_id,
        created_at: thread.created_at,
        file_ids: toJson(thread.file_ids),
        metadata: toJson(thread.metadata),
      }).execute()
    );
    return thread;
  }

  async getThread(id: string, ownerId?: string): Promise<Thread | null> {
    const row = await this.guard('get thread', () => {
      let query = this.db.selectFrom('threads').selectAll().where('id', '=', id);
      if (ownerId !== undefined) {
        query = query.where('owner_id', '=', ownerId);
      }
      return query.executeTakeFirst();
    });
    return row ? threadFromRow(row) : null;
  }

  async listThreads(ownerId: string, options: ListOptions): Promise<Page<Thread>> {
    const rows = await this.guard('list threads', async () => {
      let query = this.db.selectFrom('threads').selectAll().where('owner_id', '=', ownerId);
      if (options.after) {
        const cursor = await this.db.selectFrom('threads').select(['created_at', 'id'])
          .where('id', '=', options.after).executeTakeFirst();
        if (cursor) {
          const op = options.order === 'asc' ? '>' : '<';
          query = query.where(eb => eb.or([
            eb('created_at', op, cursor.created_at),
            eb.and([eb('created_at', '=', cursor.created_at), eb('id', op, cursor.id)]),
          ]));
        }
      }
      return query.orderBy('created_at', options.order).orderBy('id', options.order)
        .limit(options.limit + 1).execute();
    });
    return toPage(rows.map(threadFromRow), options.limit);
  }

  async updateThreadMetadata(id: string, metadata: Record<string, string>): Promise<void> {
    await this.guard('update thread', () =>
      this.db.updateTable('threads').set({ metadata: toJson(metadata) }).where('id', '=', id).execute()
    );
  }

  async deleteThread(id: string, ownerId: string): Promise<boolean> {
    const result = await this.guard('delete thread', () =>
      this.db.deleteFrom('threads').where('id', '=', id).where('owner_id', '=', ownerId).executeTakeFirst()
    );
    return Number(result.numDeletedRows) > 0;
  }

  // Messages

  /**
   * Append a message at the end of its thread
   */
  async appendMessage(message: NewMessage): Promise<Message> {
    return this.transaction(store => store.guard('append message', async () => {
      const last = await store.db.selectFrom('messages').select('position')
        .where('thread_id', '=', message.thread_id)
        .orderBy('position', 'desc').limit(1).executeTakeFirst();

      const stored: Message = { ...message, position: last ? last.position + 1 : 0 };
      await store.db.insertInto('messages').values(messageToRow(stored)).execute();
      return stored;
    }));
  }

  async getMessage(threadId: string, id: string): Promise<Message | null> {
    const row = await this.guard('get message', () =>
      this.db.selectFrom('messages').selectAll()
        .where('thread_id', '=', threadId).where('id', '=', id).executeTakeFirst()
    );
    return row ? messageFromRow(row) : null;
  }

  async listMessages(threadId: string, options: ListOptions): Promise<Page<Message>> {
    const rows = await this.guard('list messages', async () => {
      let query = this.db.selectFrom('messages').selectAll().where('thread_id', '=', threadId);
      if (options.after) {
        const cursor = await this.db.selectFrom('messages').select('position')
          .where('thread_id', '=', threadId).where('id', '=', options.after).executeTakeFirst();
        if (cursor) {
          query = query.where('position', options.order === 'asc' ? '>' : '<', cursor.position);
        }
      }
      return query.orderBy('position', options.order).limit(options.limit + 1).execute();
    });
    return toPage(rows.map(messageFromRow), options.limit);
  }

  /**
   * Whole thread history in append order
   */
  async listThreadHistory(threadId: string): Promise<Message[]> {
    const rows = await this.guard('list thread history', () =>
      this.db.selectFrom('messages').selectAll().where('thread_id', '=', threadId)
        .orderBy('position', 'asc').execute()
    );
    return rows.map(messageFromRow);
  }

  async findRunMessages(runId: string): Promise<Message[]> {
    const rows = await this.guard('find run messages', () =>
      this.db.selectFrom('messages').selectAll().where('run_id', '=', runId)
        .orderBy('position', 'asc').execute()
    );
    return rows.map(messageFromRow);
  }

  // Runs

  async insertRun(run: Run): Promise<Run> {
    await this.guard('insert run', () => this.db.insertInto('runs').values(runToRow(run)).execute());
    return run;
  }

  async getRun(id: string): Promise<Run | null> {
    const row = await this.guard('get run', () =>
      this.db.selectFrom('runs').selectAll().where('id', '=', id).executeTakeFirst()
    );
    return row ? runFromRow(row) : null;
  }

  async getThreadRun(threadId: string, id: string, ownerId?: string): Promise<Run | null> {
    const row = await this.guard('get run', () => {
      let query = this.db.selectFrom('runs').selectAll().where('thread_id', '=', threadId).where('id', '=', id);
      if (ownerId !== undefined) {
        query = query.where('owner_id', '=', ownerId);
      }
      return query.executeTakeFirst();
    });
    return row ? runFromRow(row) : null;
  }

  async listRuns(threadId: string, options: ListOptions): Promise<Page<Run>> {
    const rows = await this.guard('list runs', async () => {
      let query = this.db.selectFrom('runs').selectAll().where('thread_id', '=', threadId);
      if (options.after) {
        const cursor = await this.db.selectFrom('runs').select(['created_at', 'id'])
          .where('id', '=', options.after).executeTakeFirst();
        if (cursor) {
          const op = options.order === 'asc' ? '>' : '<';
          query = query.where(eb => eb.or([
            eb('created_at', op, cursor.created_at),
            eb.and([eb('created_at', '=', cursor.created_at), eb('id', op, cursor.id)]),
          ]));
        }
      }
      return query.orderBy('created_at', options.order).orderBy('id', options.order)
        .limit(options.limit + 1).execute();
    });
    return toPage(rows.map(runFromRow), options.limit);
  }

  /**
   * Write the run if its version is still expectedVersion; returns the run with the bumped version.
   * Metadata is left alone, it changes through updateRunMetadata only.
   */
  async updateRun(run: Run, expectedVersion: number): Promise<Run> {
    const next: Run = { ...run, version: expectedVersion + 1 };
    const { id, metadata, ...fields } = runToRow(next);
    const result = await this.guard('update run', () =>
      this.db.updateTable('runs').set(fields)
        .where('id', '=', id).where('version', '=', expectedVersion).executeTakeFirst()
    );
    if (Number(result.numUpdatedRows) === 0) {
      throw new VersionConflictError(id, expectedVersion);
    }
    return next;
  }

  // Does not bump the version, so a worker holding the run is not interrupted
  async updateRunMetadata(id: string, metadata: Record<string, string>): Promise<void> {
    await this.guard('update run metadata', () =>
      this.db.updateTable('runs').set({ metadata: toJson(metadata) }).where('id', '=', id).execute()
    );
  }

  /**
   * Non-terminal runs whose deadline has passed and that no worker holds a live lease on
   */
  async listExpiredRuns(nowMs: number, statuses: RunStatus[], limit: number): Promise<Run[]> {
    const nowSeconds = Math.floor(nowMs / 1000);
    const rows = await this.guard('list expired runs', () =>
      this.db.selectFrom('runs').selectAll()
        .where('status', 'in', statuses)
        .where('expires_at', '<=', nowSeconds)
        .where(eb => eb.not(eb.exists(
          eb.selectFrom('run_queue')
            .select('run_queue.run_id')
            .whereRef('run_queue.run_id', '=', 'runs.id')
            .where('run_queue.lease_expires_at', '>', nowMs)
        )))
        .orderBy('expires_at', 'asc').limit(limit).execute()
    );
    return rows.map(runFromRow);
  }

  // Tool calls

  async insertToolCalls(calls: ToolCall[]): Promise<void> {
    if (calls.length === 0) return;
    await this.guard('insert tool calls', () =>
      this.db.insertInto('tool_calls').values(calls.map(toolCallToRow)).execute()
    );
  }

  async listToolCalls(runId: string): Promise<ToolCall[]> {
    const rows = await this.guard('list tool calls', () =>
      this.db.selectFrom('tool_calls').selectAll().where('run_id', '=', runId)
        .orderBy('round', 'asc').orderBy('position', 'asc').execute()
    );
    return rows.map(toolCallFromRow);
  }

  /**
   * Record a tool output. Returns false when the call already had one.
   */
  async recordToolOutput(id: string, output: string, isError: boolean, completedAt: number): Promise<boolean> {
    const result = await this.guard('record tool output', () =>
      this.db.updateTable('tool_calls')
        .set({ output, is_error: isError ? 1 : 0, completed_at: completedAt })
        .where('id', '=', id).where('output', 'is', null).executeTakeFirst()
    );
    return Number(result.numUpdatedRows) > 0;
  }

  // Functions

  async insertFunction(fn: RegisteredFunction): Promise<RegisteredFunction> {
    await this.guard('insert function', () =>
      this.db.insertInto('functions').values({
        id: fn.id,
        owner_id: fn.owner_id,
        name: fn.name,
        description: fn.description,
        parameters: toJson(fn.parameters),
        created_at: fn.created_at,
      }).execute()
    );
    return fn;
  }

  async getFunctionByName(ownerId: string, name: string): Promise<RegisteredFunction | null> {
    const row = await this.guard('get function', () =>
      this.db.selectFrom('functions').selectAll()
        .where('owner_id', '=', ownerId).where('name', '=', name).executeTakeFirst()
    );
    return row ? functionFromRow(row) : null;
  }

  async listFunctions(ownerId: string): Promise<RegisteredFunction[]> {
    const rows = await this.guard('list functions', () =>
      this.db.selectFrom('functions').selectAll().where('owner_id', '=', ownerId)
        .orderBy('name', 'asc').execute()
    );
    return rows.map(functionFromRow);
  }

  // Files and chunks

  async insertFile(file: FileObject): Promise<FileObject> {
    const { object, ...row } = file;
    await this.guard('insert file', () => this.db.insertInto('files').values(row).execute());
    return file;
  }

  async getFile(id: string, ownerId?: string): Promise<FileObject | null> {
    const row = await this.guard('get file', () => {
      let query = this.db.selectFrom('files').selectAll().where('id', '=', id);
      if (ownerId !== undefined) {
        query = query.where('owner_id', '=', ownerId);
      }
      return query.executeTakeFirst();
    });
    return row ? fileFromRow(row) : null;
  }

  async listFiles(ownerId: string, options: ListOptions, purpose?: string): Promise<Page<FileObject>> {
    const rows = await this.guard('list files', async () => {
      let query = this.db.selectFrom('files').selectAll().where('owner_id', '=', ownerId);
      if (purpose !== undefined) {
        query = query.where('purpose', '=', purpose);
      }
      if (options.after) {
        const cursor = await this.db.selectFrom('files').select(['created_at', 'id'])
          .where('id', '=', options.after).executeTakeFirst();
        if (cursor) {
          const op = options.order === 'asc' ? '>' : '<';
          query = query.where(eb => eb.or([
            eb('created_at', op, cursor.created_at),
            eb.and([eb('created_at', '=', cursor.created_at), eb('id', op, cursor.id)]),
          ]));
        }
      }
      return query.orderBy('created_at', options.order).orderBy('id', options.order)
        .limit(options.limit + 1).execute();
    });
    return toPage(rows.map(fileFromRow), options.limit);
  }

  async updateFileStatus(id: string, status: FileStatus): Promise<void> {
    await this.guard('update file', () =>
      this.db.updateTable('files').set({ status }).where('id', '=', id).execute()
    );
  }

  async insertChunks(chunks: Chunk[]): Promise<void> {
    if (chunks.length === 0) return;
    await this.guard('insert chunks', () => this.db.insertInto('chunks').values(chunks).execute());
  }

  async listChunks(fileIds: string[]): Promise<Chunk[]> {
    if (fileIds.length === 0) return [];
    const rows = await this.guard('list chunks', () =>
      this.db.selectFrom('chunks').selectAll().where('file_id', 'in', fileIds)
        .orderBy('file_id', 'asc').orderBy('sequence', 'asc').execute()
    );
    return rows.map(chunkFromRow);
  }

  async ping(): Promise<boolean> {
    await this.guard('ping', () => this.db.selectFrom('runs').select('id').limit(1).execute());
    return true;
  }
}
