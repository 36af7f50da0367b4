import type { RegisteredFunction } from '../models';
import type { Logger } from '../monitoring';
import type { EntityStore } from '../storage';
import type { RegisterFunctionInput } from '../validators';
import type { Clock, IdGenerator, ListResponse, ServiceConfig, ServiceResult } from './types';
import { ServiceUtils } from './utils';

/**
 * Named function definitions that assistant and run function tools can refer to
 */
export class FunctionService {
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

  async register(ownerId: string, data: RegisterFunctionInput): Promise<ServiceResult<RegisteredFunction>> {
    try {
      const existing = await this.store.getFunctionByName(ownerId, data.name);
      if (existing) {
        return ServiceUtils.conflict(`Function '${data.name}' is already registered`);
      }

      const fn: RegisteredFunction = {
        id: this.ids.generateFunctionId(),
        object: 'function',
        owner_id: ownerId,
        name: data.name,
        description: data.description ?? null,
        parameters: data.parameters,
        created_at: ServiceUtils.toSeconds(this.clock.now()),
      };
      return ServiceUtils.createSuccessResult(await this.store.insertFunction(fn));
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'register function', error);
    }
  }

  async list(ownerId: string): Promise<ServiceResult<ListResponse<RegisteredFunction>>> {
    try {
      const functions = await this.store.listFunctions(ownerId);
      return ServiceUtils.createSuccessResult(ServiceUtils.toListResponse(functions, false));
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'list functions', error);
    }
  }
}
