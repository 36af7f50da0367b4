import type { Thread } from '../models';
import type { Logger } from '../monitoring';
import type { EntityStore, ListOptions } from '../storage';
import type { CreateThreadInput, UpdateThreadInput } from '../validators';
import { toMessageContent } from './message';
import type { Clock, IdGenerator, ListResponse, ServiceConfig, ServiceResult } from './types';
import { ServiceUtils } from './utils';

/**
 * Thread service. Deleting a thread removes its messages; a thread with runs is kept.
 */
export class ThreadService {
  private readonly store: EntityStore;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly ids: IdGenerator;

  constructor(config: ServiceConfig) {
    this.store = config.store;
    this.logger = config.logger;
    this.clock = config.clock;
    this.ids = config.ids;
  }

  /**
   * Create a thread together with its initial messages
   */
  async create(ownerId: string, data: CreateThreadInput): Promise<ServiceResult<Thread>> {
    try {
      const createdAt = ServiceUtils.toSeconds(this.clock.now());
      const thread: Thread = {
        id: this.ids.generateThreadId(),
        object: 'thread',
        owner_id: ownerId,
        created_at: createdAt,
        file_ids: data.file_ids,
        metadata: data.metadata,
      };

      await this.store.transaction(async trx => {
        await trx.insertThread(thread);
        for (const message of data.messages) {
          await trx.appendMessage({
            id: this.ids.generateMessageId(),
            object: 'thread.message',
            thread_id: thread.id,
            owner_id: ownerId,
            role: message.role,
            content: toMessageContent(message.content),
            assistant_id: null,
            run_id: null,
            file_ids: message.file_ids,
            metadata: message.metadata,
            created_at: createdAt,
          });
        }
      });

      return ServiceUtils.createSuccessResult(thread);
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'create thread', error);
    }
  }

  async get(ownerId: string, id: string): Promise<ServiceResult<Thread>> {
    try {
      const thread = await this.store.getThread(id, ownerId);
      return thread ? ServiceUtils.createSuccessResult(thread) : ServiceUtils.notFound('Thread', id);
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'get thread', error);
    }
  }

  async list(ownerId: string, options: ListOptions): Promise<ServiceResult<ListResponse<Thread>>> {
    try {
      const page = await this.store.listThreads(ownerId, options);
      return ServiceUtils.createSuccessResult(ServiceUtils.toListResponse(page.data, page.hasMore));
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'list threads', error);
    }
  }

  async update(ownerId: string, id: string, data: UpdateThreadInput): Promise<ServiceResult<Thread>> {
    try {
      const thread = await this.store.getThread(id, ownerId);
      if (!thread) {
        return ServiceUtils.notFound('Thread', id);
      }
      await this.store.updateThreadMetadata(id, data.metadata);
      return ServiceUtils.createSuccessResult({ ...thread, metadata: data.metadata });
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'update thread', error);
    }
  }

  async delete(ownerId: string, id: string): Promise<ServiceResult<{ id: string; object: 'thread.deleted'; deleted: boolean }>> {
    try {
      const outcome = await this.store.transaction(async store => {
        if (!(await store.getThread(id, ownerId))) return 'missing';
        if (await store.hasRuns({ threadId: id })) return 'referenced';
        await store.deleteThread(id, ownerId);
        return 'deleted';
      });
      if (outcome === 'missing') {
        return ServiceUtils.notFound('Thread', id);
      }
      if (outcome === 'referenced') {
        return ServiceUtils.conflict(`Thread '${id}' has runs and cannot be deleted`);
      }
      return ServiceUtils.createSuccessResult({ id, object: 'thread.deleted', deleted: true });
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'delete thread', error);
    }
  }
}
