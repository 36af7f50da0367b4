import type { Config } from '../config';
import {
  DeadlineExceededError,
  InvalidTransitionError,
  LeaseLostError,
  PersistenceError,
  RunFailure,
  RunValidationError,
  VersionConflictError,
  errorMessage,
} from '../errors';
import type { Message, RequiredAction, Run, RunFailureKind, RunStatus, Thread, ToolCall } from '../models';
import { isTerminalStatus } from '../models';
import type { Logger } from '../monitoring';
import {
  ModelClientError,
  PromptBuilder,
  RETRIEVAL_FUNCTION_NAME,
  type Conversation,
  type ModelClient,
  type ModelTurn,
  type ToolInvocation,
} from '../openai-wrapper';
import type { DeadlineSweeper, RunDisposition, RunProcessor } from '../queue';
import { withRetry, withTimeout } from '../retry';
import type { EntityStore } from '../storage';
import { buildCitationAnnotations, parseRetrievalOutput } from '../tools';
import type { RunStateManager } from './state-management';
import { ToolCatalog, isAutoResolvable, type ToolContext, type ToolDispatcher } from './tool-dispatcher';
import type { Clock, IdGenerator } from './types';
import { ServiceUtils } from './utils';

export type EngineConfig = Pick<
  Config,
  | 'MODEL_TIMEOUT_MS'
  | 'MODEL_MAX_ATTEMPTS'
  | 'ENGINE_MAX_ROUNDS'
  | 'SANDBOX_MAX_ATTEMPTS'
  | 'RETRY_INITIAL_BACKOFF_MS'
  | 'RETRY_MAX_BACKOFF_MS'
>;

export interface RunExecutionEngineDependencies {
  store: EntityStore;
  model: ModelClient;
  dispatcher: ToolDispatcher;
  stateManager: RunStateManager;
  logger: Logger;
  clock: Clock;
  ids: IdGenerator;
  config: EngineConfig;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

// Statuses the sweeper expires when unleased; running runs are expired at their worker's next checkpoint
const SWEPT_STATUSES: RunStatus[] = ['queued', 'requires_action'];
const SWEEP_BATCH_SIZE = 100;

/**
 * RunExecutionEngine drives a claimed run from its persisted state to the next
 * point where it waits on the caller or finishes. Every step is re-derived from
 * the entity store, so a redelivered run resumes where the last attempt stopped.
 */
export class RunExecutionEngine implements RunProcessor, DeadlineSweeper {
  private readonly deps: RunExecutionEngineDependencies;
  private readonly logger: Logger;

  constructor(deps: RunExecutionEngineDependencies) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'run-execution-engine' });
  }

  async processRun(runId: string, signal: AbortSignal): Promise<RunDisposition> {
    const logger = this.logger.child({ run_id: runId });

    try {
      await this.drive(runId, signal, logger);
      return 'release';
    } catch (error) {
      if (signal.aborted || error instanceof LeaseLostError) {
        logger.warn('Run attempt interrupted', { reason: errorMessage(signal.aborted ? signal.reason : error) });
        return 'abandon';
      }
      if (error instanceof VersionConflictError || error instanceof InvalidTransitionError) {
        // Changed underneath us (cancelled, expired, resumed); whoever changed it re-enqueued it if needed
        logger.info('Run changed during attempt', { reason: error.message });
        return 'release';
      }
      if (error instanceof PersistenceError) {
        logger.error('Entity store failure, leaving run for redelivery', {}, error);
        return 'abandon';
      }
      if (error instanceof RunFailure) {
        return this.failRun(runId, error.kind, error.message, logger);
      }

      logger.error('Unexpected error while executing run', {}, error);
      return this.failRun(runId, 'server_error', errorMessage(error), logger);
    }
  }

  /**
   * Expire unclaimed runs whose deadline has passed
   */
  async sweepExpiredRuns(): Promise<number> {
    const { store, stateManager, clock } = this.deps;
    const candidates = await store.listExpiredRuns(clock.now(), SWEPT_STATUSES, SWEEP_BATCH_SIZE);

    let expired = 0;
    for (const run of candidates) {
      try {
        await stateManager.transition(store, run, 'expired');
        expired++;
      } catch (error) {
        if (error instanceof VersionConflictError) continue;
        throw error;
      }
    }
    return expired;
  }

  private async drive(runId: string, signal: AbortSignal, logger: Logger): Promise<void> {
    const { store, stateManager } = this.deps;

    const loaded = await store.getRun(runId);
    if (!loaded) {
      logger.warn('Run no longer exists');
      return;
    }
    if (isTerminalStatus(loaded.status) || loaded.status === 'requires_action') {
      return;
    }
    if (loaded.status === 'cancelling') {
      await stateManager.transition(store, loaded, 'cancelled');
      return;
    }
    if (this.isPastDeadline(loaded)) {
      await stateManager.transition(store, loaded, 'expired');
      return;
    }

    let run = loaded.status === 'queued'
      ? await stateManager.transition(store, loaded, 'running')
      : loaded;

    const thread = await store.getThread(run.thread_id);
    if (!thread) {
      throw new RunFailure('server_error', `Thread ${run.thread_id} not found`);
    }

    let catalog: ToolCatalog;
    try {
      catalog = ToolCatalog.fromTools(run.tools);
    } catch (error) {
      if (error instanceof RunValidationError) {
        throw new RunFailure('invalid_tool_call', error.message, error);
      }
      throw error;
    }

    for (;;) {
      const current = await this.checkpoint(run, signal);
      if (!current) return;
      run = current;

      let calls = await store.listToolCalls(run.id);
      const history = await store.listThreadHistory(thread.id);
      const context: ToolContext = { run, thread, history, signal, logger };

      const pendingAuto = calls.filter(call => call.output === null && isAutoResolvable(call.type));
      if (pendingAuto.length > 0) {
        const resolved = await this.resolveAutoCalls(run, pendingAuto, catalog, context);
        if (!resolved) return;
        run = resolved;
        calls = await store.listToolCalls(run.id);
      }

      const openFunctions = calls.filter(call => call.output === null && call.type === 'function');
      if (openFunctions.length > 0) {
        await stateManager.transition(store, run, 'requires_action', {
          required_action: this.requiredAction(openFunctions),
        });
        logger.info('Run waiting on tool outputs', { open_calls: openFunctions.length });
        return;
      }

      const turn = await this.callModel(run, PromptBuilder.buildConversation(history, calls), catalog, signal, logger);

      if (turn.type === 'text' || turn.invocations.length === 0) {
        await this.complete(run, turn.text ?? '', calls);
        logger.info('Run completed', { rounds: this.nextRound(calls) });
        return;
      }

      const round = this.nextRound(calls);
      if (round >= this.deps.config.ENGINE_MAX_ROUNDS) {
        throw new RunFailure(
          'max_rounds_exceeded',
          `Model requested tools after ${this.deps.config.ENGINE_MAX_ROUNDS} rounds`
        );
      }
      const done = await this.persistRound(run, thread, round, turn.invocations, catalog);
      if (done) return;
    }
  }

  /**
   * Re-read the run and settle cancellation or expiry. Returns null when the
   * attempt must stop.
   */
  private async checkpoint(run: Run, signal: AbortSignal): Promise<Run | null> {
    signal.throwIfAborted();

    const { store, stateManager } = this.deps;
    const fresh = await store.getRun(run.id);
    if (!fresh) {
      throw new PersistenceError(`Run ${run.id} disappeared during execution`);
    }
    if (fresh.status === 'cancelling') {
      await stateManager.transition(store, fresh, 'cancelled');
      return null;
    }
    if (fresh.status !== 'running') {
      return null;
    }
    if (this.isPastDeadline(fresh)) {
      await stateManager.transition(store, fresh, 'expired');
      return null;
    }
    return fresh;
  }

  private isPastDeadline(run: Run): boolean {
    return this.deps.clock.now() >= run.expires_at * 1000;
  }

  private nextRound(calls: ToolCall[]): number {
    return calls.reduce((max, call) => Math.max(max, call.round + 1), 0);
  }

  /**
   * Execute unresolved retrieval, code interpreter and action calls one at a
   * time, committing each output with a version bump on the run.
   */
  private async resolveAutoCalls(
    run: Run,
    pending: ToolCall[],
    catalog: ToolCatalog,
    context: ToolContext
  ): Promise<Run | null> {
    const { store, stateManager, dispatcher, clock } = this.deps;
    let current = run;

    for (const call of pending) {
      const checked = await this.checkpoint(current, context.signal);
      if (!checked) return null;
      current = checked;

      const entry = catalog.get(call.name);
      if (!entry || entry.kind !== call.type) {
        throw new RunFailure('invalid_tool_call', `Tool '${call.name}' is not available to this run`);
      }

      const startedAt = clock.now();
      const execution = await dispatcher.execute(call, entry, { ...context, run: current });
      context.logger.info('Tool call resolved', {
        tool_call_id: call.id,
        tool: call.name,
        type: call.type,
        is_error: execution.isError,
        duration_ms: clock.now() - startedAt,
      });

      const runAtCommit: Run = current;
      current = await store.transaction(async trx => {
        await trx.recordToolOutput(call.id, execution.output, execution.isError, ServiceUtils.toSeconds(clock.now()));
        return stateManager.touch(trx, runAtCommit);
      });

      if (call.type === 'code_interpreter' && execution.isError) {
        const failures = (await store.listToolCalls(current.id))
          .filter(recorded => recorded.type === 'code_interpreter' && recorded.is_error).length;
        if (failures >= this.deps.config.SANDBOX_MAX_ATTEMPTS) {
          throw new RunFailure('sandbox_exhausted', `Code execution failed ${failures} times`);
        }
      }
    }
    return current;
  }

  /**
   * Persist the model's tool calls for a round. A round of function calls only
   * moves the run to requires_action in the same transaction; returns true then.
   */
  private async persistRound(
    run: Run,
    thread: Thread,
    round: number,
    invocations: ToolInvocation[],
    catalog: ToolCatalog
  ): Promise<boolean> {
    const { store, stateManager, clock, ids } = this.deps;
    const now = ServiceUtils.toSeconds(clock.now());

    const calls: ToolCall[] = invocations.map((invocation, position) => {
      const entry = catalog.get(invocation.name);
      if (!entry) {
        throw new RunFailure('invalid_tool_call', `Model requested unknown tool '${invocation.name}'`);
      }
      return {
        id: ids.generateToolCallId(),
        run_id: run.id,
        thread_id: thread.id,
        round,
        position,
        type: entry.kind,
        name: invocation.name,
        arguments: invocation.arguments,
        output: null,
        is_error: false,
        created_at: now,
        completed_at: null,
      };
    });

    const functionsOnly = calls.every(call => !isAutoResolvable(call.type));
    await store.transaction(async trx => {
      await trx.insertToolCalls(calls);
      if (functionsOnly) {
        await stateManager.transition(trx, run, 'requires_action', {
          required_action: this.requiredAction(calls),
        });
      } else {
        await stateManager.touch(trx, run);
      }
    });
    return functionsOnly;
  }

  private requiredAction(calls: ToolCall[]): RequiredAction {
    return {
      type: 'submit_tool_outputs',
      submit_tool_outputs: {
        tool_calls: calls.map(call => ({
          id: call.id,
          type: 'function',
          function: { name: call.name, arguments: call.arguments },
        })),
      },
    };
  }

  /**
   * Call the model with retries. A context overflow truncates history once.
   */
  private async callModel(
    run: Run,
    initial: Conversation,
    catalog: ToolCatalog,
    signal: AbortSignal,
    logger: Logger
  ): Promise<ModelTurn> {
    const { model, config } = this.deps;
    let conversation = initial;
    let truncated = false;

    for (;;) {
      const messages = PromptBuilder.toMessages(conversation);
      try {
        return await withRetry(
          () => withTimeout(
            attemptSignal => model.complete({
              model: run.model,
              instructions: run.instructions,
              messages,
              tools: catalog.schemas(),
              signal: attemptSignal,
            }),
            config.MODEL_TIMEOUT_MS,
            'model call',
            signal
          ),
          {
            maxAttempts: config.MODEL_MAX_ATTEMPTS,
            initialBackoffMs: config.RETRY_INITIAL_BACKOFF_MS,
            maxBackoffMs: config.RETRY_MAX_BACKOFF_MS,
          },
          {
            isRetryable: error =>
              error instanceof DeadlineExceededError ||
              (error instanceof ModelClientError && (error.kind === 'transient' || error.kind === 'rate_limit')),
            signal,
            sleep: this.deps.sleep,
            onRetry: (error, attempt, delayMs) => {
              logger.warn('Retrying model call', { attempt, delay_ms: Math.round(delayMs), reason: errorMessage(error) });
            },
          }
        );
      } catch (error) {
        if (signal.aborted) throw error;

        if (error instanceof ModelClientError && error.kind === 'context_length') {
          if (truncated) {
            throw new RunFailure('context_exceeded', 'Conversation exceeds the model context window', error);
          }
          const before = conversation.history.length;
          conversation = PromptBuilder.truncate(conversation);
          truncated = true;
          logger.warn('Truncated conversation after context overflow', {
            history_before: before,
            history_after: conversation.history.length,
          });
          continue;
        }
        if (error instanceof ModelClientError && error.kind === 'rate_limit') {
          throw new RunFailure('rate_limit', `Model rate limit: ${error.message}`, error);
        }
        throw new RunFailure('server_error', `Model call failed: ${errorMessage(error)}`, error);
      }
    }
  }

  /**
   * Append the assistant message and complete the run in one transaction
   */
  private async complete(run: Run, text: string, calls: ToolCall[]): Promise<void> {
    const { store, stateManager, clock, ids } = this.deps;

    const sources = calls
      .filter(call => call.name === RETRIEVAL_FUNCTION_NAME && call.type === 'retrieval' && call.output !== null)
      .flatMap(call => parseRetrievalOutput(call.output ?? ''));

    const message: Omit<Message, 'position'> = {
      id: ids.generateMessageId(),
      object: 'thread.message',
      thread_id: run.thread_id,
      owner_id: run.owner_id,
      role: 'assistant',
      content: [{ type: 'text', text: { value: text, annotations: buildCitationAnnotations(text, sources) } }],
      assistant_id: run.assistant_id,
      run_id: run.id,
      file_ids: [],
      metadata: {},
      created_at: ServiceUtils.toSeconds(clock.now()),
    };

    await store.transaction(async trx => {
      await trx.appendMessage(message);
      await stateManager.transition(trx, run, 'completed');
    });
  }

  /**
   * Record the failure on the run. When the store cannot take the write the
   * lease is abandoned, so a redelivered attempt settles the run.
   */
  private async failRun(runId: string, kind: RunFailureKind, message: string, logger: Logger): Promise<RunDisposition> {
    const { store, stateManager } = this.deps;
    try {
      const run = await store.getRun(runId);
      if (!run || isTerminalStatus(run.status)) return 'release';
      await stateManager.transition(store, run, 'failed', { last_error: { code: kind, message } });
      logger.warn('Run failed', { error_code: kind, reason: message });
      return 'release';
    } catch (error) {
      if (error instanceof VersionConflictError || error instanceof InvalidTransitionError) {
        logger.info('Run changed before the failure was recorded', { error_code: kind, reason: error.message });
        return 'release';
      }
      logger.error('Could not mark run as failed, leaving run for redelivery', { error_code: kind }, error);
      return 'abandon';
    }
  }
}
