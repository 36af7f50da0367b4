import type { Message, MessageContent } from '../models';
import type { Logger } from '../monitoring';
import type { EntityStore, ListOptions } from '../storage';
import type { CreateMessageInput } from '../validators';
import type { Clock, IdGenerator, ListResponse, ServiceConfig, ServiceResult } from './types';
import { ServiceUtils } from './utils';

/**
 * Message content from the request shape: a string or a list of text parts
 */
export function toMessageContent(content: CreateMessageInput['content']): MessageContent[] {
  const parts = typeof content === 'string' ? [content] : content.map(part => part.text);
  return parts.map((value): MessageContent => ({ type: 'text', text: { value, annotations: [] } }));
}

/**
 * Messages are append-only; position orders them within their thread
 */
export class MessageService {
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

  async create(ownerId: string, threadId: string, data: CreateMessageInput): Promise<ServiceResult<Message>> {
    try {
      const thread = await this.store.getThread(threadId, ownerId);
      if (!thread) {
        return ServiceUtils.notFound('Thread', threadId);
      }

      const message = await this.store.appendMessage({
        id: this.ids.generateMessageId(),
        object: 'thread.message',
        thread_id: threadId,
        owner_id: ownerId,
        role: data.role,
        content: toMessageContent(data.content),
        assistant_id: null,
        run_id: null,
        file_ids: data.file_ids,
        metadata: data.metadata,
        created_at: ServiceUtils.toSeconds(this.clock.now()),
      });
      return ServiceUtils.createSuccessResult(message);
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'create message', error);
    }
  }

  async get(ownerId: string, threadId: string, id: string): Promise<ServiceResult<Message>> {
    try {
      const message = await this.store.getMessage(threadId, id);
      if (!message || message.owner_id !== ownerId) {
        return ServiceUtils.notFound('Message', id);
      }
      return ServiceUtils.createSuccessResult(message);
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'get message', error);
    }
  }

  async list(ownerId: string, threadId: string, options: ListOptions): Promise<ServiceResult<ListResponse<Message>>> {
    try {
      const thread = await this.store.getThread(threadId, ownerId);
      if (!thread) {
        return ServiceUtils.notFound('Thread', threadId);
      }
      const page = await this.store.listMessages(threadId, options);
      return ServiceUtils.createSuccessResult(ServiceUtils.toListResponse(page.data, page.hasMore));
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'list messages', error);
    }
  }
}
