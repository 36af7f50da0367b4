import { RunValidationError } from '../errors';
import type { AssistantTool, Run, RunStep, ToolOutput } from '../models';
import { isTerminalStatus } from '../models';
import type { Logger } from '../monitoring';
import type { RunQueue } from '../queue';
import type { EntityStore, ListOptions } from '../storage';
import type { CreateRunInput, SubmitToolOutputsInput, UpdateRunInput } from '../validators';
import { deriveRunSteps } from './run-steps';
import type { RunStateManager } from './state-management';
import { ToolCatalog } from './tool-dispatcher';
import type { Clock, IdGenerator, ListResponse, ServiceConfig, ServiceResult } from './types';
import { ServiceUtils } from './utils';

/**
 * Run lifecycle operations exposed by the API. Execution happens in the engine;
 * every operation here that needs the engine to act enqueues the run in the
 * same transaction as its state change.
 */
export class RunService {
  private readonly store: EntityStore;
  private readonly queue: RunQueue;
  private readonly stateManager: RunStateManager;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly ids: IdGenerator;
  private readonly expiresAfterSeconds: number;

  constructor(config: ServiceConfig, stateManager: RunStateManager) {
    this.store = config.store;
    this.queue = config.queue;
    this.stateManager = stateManager;
    this.logger = config.logger;
    this.clock = config.clock;
    this.ids = config.ids;
    this.expiresAfterSeconds = config.config.RUN_EXPIRES_AFTER_SECONDS;
  }

  /**
   * Snapshot the assistant configuration into a queued run and enqueue it
   */
  async create(ownerId: string, threadId: string, data: CreateRunInput): Promise<ServiceResult<Run>> {
    try {
      const thread = await this.store.getThread(threadId, ownerId);
      if (!thread) {
        return ServiceUtils.notFound('Thread', threadId);
      }
      const assistant = await this.store.getAssistant(data.assistant_id, ownerId);
      if (!assistant) {
        return ServiceUtils.notFound('Assistant', data.assistant_id);
      }

      const tools = await this.resolveFunctions(ownerId, data.tools ?? assistant.tools);
      try {
        ToolCatalog.fromTools(tools);
      } catch (error) {
        if (error instanceof RunValidationError) {
          return ServiceUtils.createErrorResult(error.message, 'VALIDATION_ERROR', error.details);
        }
        throw error;
      }

      const baseInstructions = data.instructions !== undefined ? data.instructions : assistant.instructions;
      const instructions = data.additional_instructions
        ? [baseInstructions, data.additional_instructions].filter(Boolean).join('\n\n')
        : baseInstructions;

      const createdAt = ServiceUtils.toSeconds(this.clock.now());
      const run: Run = {
        id: this.ids.generateRunId(),
        object: 'thread.run',
        thread_id: threadId,
        assistant_id: assistant.id,
        owner_id: ownerId,
        status: 'queued',
        required_action: null,
        last_error: null,
        created_at: createdAt,
        expires_at: createdAt + this.expiresAfterSeconds,
        started_at: null,
        cancelled_at: null,
        failed_at: null,
        completed_at: null,
        model: data.model ?? assistant.model,
        instructions,
        tools,
        file_ids: assistant.file_ids,
        metadata: data.metadata,
        version: 0,
      };

      await this.store.transaction(async trx => {
        await trx.insertRun(run);
        await this.queue.push(run.id, trx);
      });
      this.logger.info('Run created', { run_id: run.id, thread_id: threadId, assistant_id: assistant.id });

      return ServiceUtils.createSuccessResult(run);
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'create run', error);
    }
  }

  async get(ownerId: string, threadId: string, runId: string): Promise<ServiceResult<Run>> {
    try {
      const run = await this.store.getThreadRun(threadId, runId, ownerId);
      return run ? ServiceUtils.createSuccessResult(run) : ServiceUtils.notFound('Run', runId);
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'get run', error);
    }
  }

  async list(ownerId: string, threadId: string, options: ListOptions): Promise<ServiceResult<ListResponse<Run>>> {
    try {
      const thread = await this.store.getThread(threadId, ownerId);
      if (!thread) {
        return ServiceUtils.notFound('Thread', threadId);
      }
      const page = await this.store.listRuns(threadId, options);
      return ServiceUtils.createSuccessResult(ServiceUtils.toListResponse(page.data, page.hasMore));
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'list runs', error);
    }
  }

  /**
   * Replace the run's metadata. Allowed in any status and invisible to a worker executing the run.
   */
  async update(ownerId: string, threadId: string, runId: string, data: UpdateRunInput): Promise<ServiceResult<Run>> {
    try {
      const run = await this.store.getThreadRun(threadId, runId, ownerId);
      if (!run) {
        return ServiceUtils.notFound('Run', runId);
      }
      await this.store.updateRunMetadata(run.id, data.metadata);
      return ServiceUtils.createSuccessResult({ ...run, metadata: data.metadata });
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'update run', error);
    }
  }

  /**
   * Record the caller's function outputs and resume the run. The submitted ids
   * must be exactly the open function calls; otherwise nothing changes.
   */
  async submitToolOutputs(
    ownerId: string,
    threadId: string,
    runId: string,
    data: SubmitToolOutputsInput
  ): Promise<ServiceResult<Run>> {
    try {
      const outcome = await this.store.transaction(async trx => {
        const run = await trx.getThreadRun(threadId, runId, ownerId);
        if (!run) {
          return ServiceUtils.notFound<Run>('Run', runId);
        }
        if (run.status !== 'requires_action') {
          return ServiceUtils.createErrorResult<Run>(
            `Run is ${run.status}; tool outputs are only accepted while it requires action`,
            'VALIDATION_ERROR'
          );
        }

        const open = (await trx.listToolCalls(run.id))
          .filter(call => call.type === 'function' && call.output === null)
          .map(call => call.id);
        const mismatch = this.compareOutputs(open, data.tool_outputs);
        if (mismatch) {
          return ServiceUtils.createErrorResult<Run>(mismatch, 'VALIDATION_ERROR', {
            expected_tool_call_ids: open,
            received_tool_call_ids: data.tool_outputs.map(output => output.tool_call_id),
          });
        }

        const completedAt = ServiceUtils.toSeconds(this.clock.now());
        for (const output of data.tool_outputs) {
          await trx.recordToolOutput(output.tool_call_id, output.output, false, completedAt);
        }
        const resumed = await this.stateManager.transition(trx, run, 'running');
        await this.queue.push(run.id, trx);
        return ServiceUtils.createSuccessResult(resumed);
      });

      if (outcome.success) {
        this.logger.info('Tool outputs submitted', { run_id: runId, outputs: data.tool_outputs.length });
      }
      return outcome;
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'submit tool outputs', error);
    }
  }

  /**
   * Ask the engine to stop the run at its next checkpoint
   */
  async cancel(ownerId: string, threadId: string, runId: string): Promise<ServiceResult<Run>> {
    try {
      return await this.store.transaction(async trx => {
        const run = await trx.getThreadRun(threadId, runId, ownerId);
        if (!run) {
          return ServiceUtils.notFound<Run>('Run', runId);
        }
        if (run.status === 'cancelling') {
          return ServiceUtils.createSuccessResult(run);
        }
        if (isTerminalStatus(run.status)) {
          return ServiceUtils.createErrorResult<Run>(`Cannot cancel run with status '${run.status}'`, 'VALIDATION_ERROR');
        }

        const cancelling = await this.stateManager.transition(trx, run, 'cancelling');
        await this.queue.push(run.id, trx);
        return ServiceUtils.createSuccessResult(cancelling);
      });
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'cancel run', error);
    }
  }

  async listSteps(ownerId: string, threadId: string, runId: string): Promise<ServiceResult<ListResponse<RunStep>>> {
    try {
      const run = await this.store.getThreadRun(threadId, runId, ownerId);
      if (!run) {
        return ServiceUtils.notFound('Run', runId);
      }
      const calls = await this.store.listToolCalls(run.id);
      const messages = await this.store.findRunMessages(run.id);
      return ServiceUtils.createSuccessResult(ServiceUtils.toListResponse(deriveRunSteps(run, calls, messages), false));
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'list run steps', error);
    }
  }

  /**
   * Problem with the submitted set, or null when it matches the open calls exactly
   */
  private compareOutputs(open: string[], outputs: ToolOutput[]): string | null {
    const submitted = outputs.map(output => output.tool_call_id);
    const unique = new Set(submitted);
    if (unique.size !== submitted.length) {
      return 'Each tool call may receive only one output';
    }

    const expected = new Set(open);
    const unknown = submitted.filter(id => !expected.has(id));
    if (unknown.length > 0) {
      return `Unknown or already resolved tool call ids: ${unknown.join(', ')}`;
    }
    const missing = open.filter(id => !unique.has(id));
    if (missing.length > 0) {
      return `Missing outputs for tool call ids: ${missing.join(', ')}`;
    }
    return null;
  }

  /**
   * Fill in function tools that omit parameters from the function registry
   */
  private async resolveFunctions(ownerId: string, tools: AssistantTool[]): Promise<AssistantTool[]> {
    const resolved: AssistantTool[] = [];
    for (const tool of tools) {
      if (tool.type !== 'function' || tool.function.parameters !== undefined) {
        resolved.push(tool);
        continue;
      }
      const registered = await this.store.getFunctionByName(ownerId, tool.function.name);
      resolved.push(registered
        ? {
            type: 'function',
            function: {
              name: registered.name,
              description: tool.function.description ?? registered.description ?? undefined,
              parameters: registered.parameters,
            },
          }
        : tool);
    }
    return resolved;
  }
}
