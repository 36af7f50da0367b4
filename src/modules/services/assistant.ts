import { RunValidationError } from '../errors';
import type { Assistant, AssistantTool } from '../models';
import type { Logger } from '../monitoring';
import type { EntityStore, ListOptions } from '../storage';
import type { CreateAssistantInput, UpdateAssistantInput } from '../validators';
import { ToolCatalog } from './tool-dispatcher';
import type { Clock, IdGenerator, ListResponse, ServiceConfig, ServiceResult } from './types';
import { ServiceUtils } from './utils';

/**
 * Assistant CRUD. Tool configuration is checked the way the run engine will read it.
 */
export class AssistantService {
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

  async create(ownerId: string, data: CreateAssistantInput): Promise<ServiceResult<Assistant>> {
    try {
      const invalid = this.validateTools<Assistant>(data.tools);
      if (invalid) return invalid;

      const assistant: Assistant = {
        id: this.ids.generateAssistantId(),
        object: 'assistant',
        owner_id: ownerId,
        created_at: ServiceUtils.toSeconds(this.clock.now()),
        name: data.name ?? null,
        description: data.description ?? null,
        model: data.model,
        instructions: data.instructions ?? null,
        tools: data.tools,
        file_ids: data.file_ids,
        metadata: data.metadata,
      };

      return ServiceUtils.createSuccessResult(await this.store.insertAssistant(assistant));
    } catch (error) {
      return this.internalError('create assistant', error);
    }
  }

  async get(ownerId: string, id: string): Promise<ServiceResult<Assistant>> {
    try {
      const assistant = await this.store.getAssistant(id, ownerId);
      return assistant ? ServiceUtils.createSuccessResult(assistant) : ServiceUtils.notFound('Assistant', id);
    } catch (error) {
      return this.internalError('get assistant', error);
    }
  }

  async list(ownerId: string, options: ListOptions): Promise<ServiceResult<ListResponse<Assistant>>> {
    try {
      const page = await this.store.listAssistants(ownerId, options);
      return ServiceUtils.createSuccessResult(ServiceUtils.toListResponse(page.data, page.hasMore));
    } catch (error) {
      return this.internalError('list assistants', error);
    }
  }

  /**
   * Update an assistant. Existing runs keep the snapshot they were created with.
   */
  async update(ownerId: string, id: string, data: UpdateAssistantInput): Promise<ServiceResult<Assistant>> {
    try {
      const existing = await this.store.getAssistant(id, ownerId);
      if (!existing) {
        return ServiceUtils.notFound('Assistant', id);
      }
      if (data.tools) {
        const invalid = this.validateTools<Assistant>(data.tools);
        if (invalid) return invalid;
      }

      const updated: Assistant = {
        ...existing,
        model: data.model ?? existing.model,
        name: data.name !== undefined ? data.name : existing.name,
        description: data.description !== undefined ? data.description : existing.description,
        instructions: data.instructions !== undefined ? data.instructions : existing.instructions,
        tools: data.tools ?? existing.tools,
        file_ids: data.file_ids ?? existing.file_ids,
        metadata: data.metadata ?? existing.metadata,
      };

      return ServiceUtils.createSuccessResult(await this.store.updateAssistant(updated));
    } catch (error) {
      return this.internalError('update assistant', error);
    }
  }

  async delete(ownerId: string, id: string): Promise<ServiceResult<{ id: string; object: 'assistant.deleted'; deleted: boolean }>> {
    try {
      const outcome = await this.store.transaction(async store => {
        if (!(await store.getAssistant(id, ownerId))) return 'missing';
        if (await store.hasRuns({ assistantId: id })) return 'referenced';
        await store.deleteAssistant(id, ownerId);
        return 'deleted';
      });
      if (outcome === 'missing') {
        return ServiceUtils.notFound('Assistant', id);
      }
      if (outcome === 'referenced') {
        return ServiceUtils.conflict(`Assistant '${id}' is referenced by runs and cannot be deleted`);
      }
      return ServiceUtils.createSuccessResult({ id, object: 'assistant.deleted', deleted: true });
    } catch (error) {
      return this.internalError('delete assistant', error);
    }
  }

  private validateTools<T>(tools: AssistantTool[]): ServiceResult<T> | null {
    try {
      ToolCatalog.fromTools(tools);
      return null;
    } catch (error) {
      if (error instanceof RunValidationError) {
        return ServiceUtils.createErrorResult(error.message, 'VALIDATION_ERROR', error.details);
      }
      throw error;
    }
  }

  private internalError<T>(operation: string, error: unknown): ServiceResult<T> {
    return ServiceUtils.internalError(this.logger, operation, error);
  }
}
