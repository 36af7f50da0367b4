// Service exports
export { AssistantService } from './assistant';
export { ThreadService } from './thread';
export { MessageService, toMessageContent } from './message';
export { FileService, type FileUpload } from './file';
export { FunctionService } from './function';
export { RunService } from './run';
export { ChatService } from './chat';
export { deriveRunSteps } from './run-steps';
export { RunExecutionEngine, type EngineConfig, type RunExecutionEngineDependencies } from './run-execution-engine';
export { RunStateManager, type TransitionPatch } from './state-management';
export {
  ToolCatalog,
  ToolDispatcher,
  isAutoResolvable,
  type CatalogEntry,
  type ToolContext,
  type ToolDispatcherDependencies,
  type ToolExecution,
} from './tool-dispatcher';

// Utility exports
export { DefaultIdGenerator, ServiceUtils, systemClock } from './utils';

// Type exports
export type {
  Clock,
  IdGenerator,
  ListResponse,
  ServiceConfig,
  ServiceErrorCode,
  ServiceResult,
} from './types';

/**
 * Service factory for creating all services with shared configuration
 */
import { AssistantService } from './assistant';
import { ThreadService } from './thread';
import { MessageService } from './message';
import { FileService } from './file';
import { FunctionService } from './function';
import { RunService } from './run';
import { ChatService } from './chat';
import { RunStateManager } from './state-management';
import type { ServiceConfig } from './types';

export interface Services {
  assistants: AssistantService;
  threads: ThreadService;
  messages: MessageService;
  files: FileService;
  functions: FunctionService;
  runs: RunService;
  chat: ChatService;
}

export class ServiceFactory {
  private readonly config: ServiceConfig;
  private readonly stateManager: RunStateManager;

  constructor(config: ServiceConfig, stateManager?: RunStateManager) {
    this.config = config;
    this.stateManager = stateManager ?? new RunStateManager(config.clock, config.logger);
  }

  /**
   * Create all services at once
   */
  createAllServices(): Services {
    return {
      assistants: new AssistantService(this.config),
      threads: new ThreadService(this.config),
      messages: new MessageService(this.config),
      files: new FileService(this.config),
      functions: new FunctionService(this.config),
      runs: new RunService(this.config, this.stateManager),
      chat: new ChatService(this.config),
    };
  }
}
