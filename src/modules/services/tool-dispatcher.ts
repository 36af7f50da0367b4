/**
 * Tool dispatcher
 * Maps model-visible function names to the run's tools and executes the auto-resolvable ones
 */

import type { Config } from '../config';
import {
  DeadlineExceededError,
  RunFailure,
  RunValidationError,
  SandboxExecutionError,
  TransientCollaboratorError,
  errorMessage,
} from '../errors';
import type { AssistantTool, Message, Run, Thread, ToolCall, ToolKind } from '../models';
import type { Logger } from '../monitoring';
import {
  CODE_INTERPRETER_FUNCTION_NAME,
  PromptBuilder,
  RETRIEVAL_FUNCTION_NAME,
  ToolSchemaConverter,
  type ModelToolSchema,
} from '../openai-wrapper';
import { withRetry, withTimeout, type RetryPolicy } from '../retry';
import {
  ActionSpecError,
  assertSandboxSucceeded,
  buildActionRequest,
  formatRetrievalOutput,
  formatSandboxError,
  formatSandboxOutput,
  operationToolSchema,
  parseOperations,
  selectSources,
  validateActionArguments,
  type ActionCaller,
  type ActionOperation,
  type Retriever,
  type Sandbox,
} from '../tools';

export type CatalogEntry =
  | { name: string; kind: 'function'; schema: ModelToolSchema }
  | { name: string; kind: 'retrieval'; schema: ModelToolSchema; fileIds: string[]; maxChars?: number }
  | { name: string; kind: 'code_interpreter'; schema: ModelToolSchema; timeoutMs?: number; allowNetwork?: boolean }
  | { name: string; kind: 'action'; schema: ModelToolSchema; operation: ActionOperation; headers: Record<string, string> };

/**
 * Function names the model may call in a run, built from the run's tool snapshot
 */
export class ToolCatalog {
  private readonly entries: Map<string, CatalogEntry>;

  private constructor(entries: Map<string, CatalogEntry>) {
    this.entries = entries;
  }

  /**
   * Throws RunValidationError on duplicate names or an unusable action document
   */
  static fromTools(tools: AssistantTool[]): ToolCatalog {
    const entries = new Map<string, CatalogEntry>();
    const add = (entry: CatalogEntry) => {
      if (entries.has(entry.name)) {
        throw new RunValidationError(`Tool name '${entry.name}' is declared more than once`);
      }
      entries.set(entry.name, entry);
    };

    for (const tool of tools) {
      switch (tool.type) {
        case 'function': {
          const validation = ToolSchemaConverter.validateFunctionSchema(tool.function);
          if (!validation.valid) {
            throw new RunValidationError('Invalid function tool', validation.errors);
          }
          add({ name: tool.function.name, kind: 'function', schema: ToolSchemaConverter.functionTool(tool.function) });
          break;
        }
        case 'retrieval': {
          const existing = entries.get(RETRIEVAL_FUNCTION_NAME);
          // Several retrieval tools share one function and pool their files
          if (existing && existing.kind === 'retrieval') {
            existing.fileIds.push(...(tool.retrieval?.file_ids ?? []));
            break;
          }
          add({
            name: RETRIEVAL_FUNCTION_NAME,
            kind: 'retrieval',
            schema: ToolSchemaConverter.retrievalTool(),
            fileIds: [...(tool.retrieval?.file_ids ?? [])],
            maxChars: tool.retrieval?.max_chars,
          });
          break;
        }
        case 'code_interpreter':
          if (entries.get(CODE_INTERPRETER_FUNCTION_NAME)?.kind === 'code_interpreter') break;
          add({
            name: CODE_INTERPRETER_FUNCTION_NAME,
            kind: 'code_interpreter',
            schema: ToolSchemaConverter.codeInterpreterTool(),
            timeoutMs: tool.code_interpreter?.timeout_ms,
            allowNetwork: tool.code_interpreter?.allow_network,
          });
          break;
        case 'action': {
          let operations: ActionOperation[];
          try {
            operations = parseOperations(tool.action.openapi);
          } catch (error) {
            if (error instanceof ActionSpecError) {
              throw new RunValidationError(`Invalid action tool: ${error.message}`);
            }
            throw error;
          }
          for (const operation of operations) {
            add({
              name: operation.operationId,
              kind: 'action',
              schema: operationToolSchema(operation),
              operation,
              headers: tool.action.headers ?? {},
            });
          }
          break;
        }
      }
    }

    return new ToolCatalog(entries);
  }

  get(name: string): CatalogEntry | undefined {
    return this.entries.get(name);
  }

  schemas(): ModelToolSchema[] {
    return [...this.entries.values()].map(entry => entry.schema);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Function tools are resolved by the caller through submit_tool_outputs
 */
export function isAutoResolvable(kind: ToolKind): boolean {
  return kind !== 'function';
}

export interface ToolContext {
  run: Run;
  thread: Thread;
  history: Message[];
  signal: AbortSignal;
  logger: Logger;
}

export interface ToolExecution {
  output: string;
  isError: boolean;
}

export interface ToolDispatcherDependencies {
  retriever: Retriever;
  sandbox: Sandbox;
  actionCaller: ActionCaller;
  config: Pick<
    Config,
    | 'RETRIEVAL_TIMEOUT_MS'
    | 'RETRIEVAL_MAX_ATTEMPTS'
    | 'RETRIEVAL_MAX_CHARS'
    | 'SANDBOX_TIMEOUT_MS'
    | 'SANDBOX_MAX_ATTEMPTS'
    | 'SANDBOX_ALLOW_NETWORK'
    | 'ACTION_TIMEOUT_MS'
    | 'ACTION_MAX_ATTEMPTS'
    | 'RETRY_INITIAL_BACKOFF_MS'
    | 'RETRY_MAX_BACKOFF_MS'
  >;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function isTransient(error: unknown): boolean {
  return error instanceof TransientCollaboratorError || error instanceof DeadlineExceededError;
}

function parseArguments(raw: string): { ok: true; value: unknown } | { ok: false; error: string } {
  if (raw.trim() === '') {
    return { ok: true, value: {} };
  }
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, error: `arguments are not valid JSON: ${errorMessage(error)}` };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Executes retrieval, code interpreter and action calls. Collaborator
 * failures that outlast their retries surface as RunFailure.
 */
export class ToolDispatcher {
  private readonly deps: ToolDispatcherDependencies;

  constructor(deps: ToolDispatcherDependencies) {
    this.deps = deps;
  }

  async execute(call: ToolCall, entry: CatalogEntry, context: ToolContext): Promise<ToolExecution> {
    switch (entry.kind) {
      case 'function':
        throw new RunValidationError(`Function '${call.name}' must be resolved by the caller`);
      case 'retrieval':
        return this.retrieve(entry.fileIds, entry.maxChars, call, context);
      case 'code_interpreter':
        return this.interpret(entry.timeoutMs, entry.allowNetwork, call, context);
      case 'action':
        return this.callAction(entry.operation, entry.headers, call, context);
    }
  }

  private policy(maxAttempts: number): RetryPolicy {
    return {
      maxAttempts,
      initialBackoffMs: this.deps.config.RETRY_INITIAL_BACKOFF_MS,
      maxBackoffMs: this.deps.config.RETRY_MAX_BACKOFF_MS,
    };
  }

  private retryOptions(context: ToolContext, call: ToolCall) {
    return {
      isRetryable: isTransient,
      signal: context.signal,
      sleep: this.deps.sleep,
      onRetry: (error: unknown, attempt: number, delayMs: number) => {
        context.logger.warn('Retrying tool call', {
          tool_call_id: call.id,
          tool: call.name,
          attempt,
          delay_ms: Math.round(delayMs),
          reason: errorMessage(error),
        });
      },
    };
  }

  private async retrieve(
    toolFileIds: string[],
    maxChars: number | undefined,
    call: ToolCall,
    context: ToolContext
  ): Promise<ToolExecution> {
    const fileIds = [...new Set([...toolFileIds, ...context.run.file_ids, ...context.thread.file_ids])];
    const budget = maxChars ?? this.deps.config.RETRIEVAL_MAX_CHARS;

    let query = PromptBuilder.latestUserText(context.history);
    if (query === '') {
      const args = parseArguments(call.arguments);
      if (args.ok && isRecord(args.value) && typeof args.value.query === 'string') {
        query = args.value.query;
      }
    }

    if (fileIds.length === 0) {
      return { output: formatRetrievalOutput([]), isError: false };
    }

    try {
      const hits = await withRetry(
        () => withTimeout(
          signal => this.deps.retriever.search({ fileIds, query, maxChars: budget, signal }),
          this.deps.config.RETRIEVAL_TIMEOUT_MS,
          'retrieval',
          context.signal
        ),
        this.policy(this.deps.config.RETRIEVAL_MAX_ATTEMPTS),
        this.retryOptions(context, call)
      );
      return { output: formatRetrievalOutput(selectSources(hits, budget)), isError: false };
    } catch (error) {
      if (context.signal.aborted) throw error;
      throw new RunFailure('retrieval_error', `Retrieval failed: ${errorMessage(error)}`, error);
    }
  }

  private async interpret(
    timeoutMs: number | undefined,
    allowNetwork: boolean | undefined,
    call: ToolCall,
    context: ToolContext
  ): Promise<ToolExecution> {
    const args = parseArguments(call.arguments);
    if (!args.ok) {
      return { output: JSON.stringify({ error: args.error }), isError: true };
    }
    if (!isRecord(args.value) || typeof args.value.code !== 'string' || args.value.code.trim() === '') {
      return { output: JSON.stringify({ error: "argument 'code' must be a non-empty string" }), isError: true };
    }
    const code = args.value.code;
    const limit = timeoutMs ?? this.deps.config.SANDBOX_TIMEOUT_MS;

    try {
      const result = await withRetry(
        () => withTimeout(
          signal => this.deps.sandbox.run(code, {
            timeoutMs: limit,
            allowNetwork: allowNetwork ?? this.deps.config.SANDBOX_ALLOW_NETWORK,
            signal,
          }),
          // Leave the sandbox room to report its own timeout
          limit + 5000,
          'sandbox execution',
          context.signal
        ),
        this.policy(this.deps.config.SANDBOX_MAX_ATTEMPTS),
        this.retryOptions(context, call)
      );
      return { output: formatSandboxOutput(assertSandboxSucceeded(result)), isError: false };
    } catch (error) {
      if (error instanceof SandboxExecutionError) {
        return { output: formatSandboxError(error), isError: true };
      }
      if (context.signal.aborted) throw error;
      throw new RunFailure('server_error', `Sandbox unavailable: ${errorMessage(error)}`, error);
    }
  }

  private async callAction(
    operation: ActionOperation,
    headers: Record<string, string>,
    call: ToolCall,
    context: ToolContext
  ): Promise<ToolExecution> {
    const args = parseArguments(call.arguments);
    if (!args.ok) {
      return { output: JSON.stringify({ error: args.error }), isError: true };
    }
    const problems = validateActionArguments(operation, args.value);
    if (problems.length > 0 || !isRecord(args.value)) {
      return { output: JSON.stringify({ error: 'invalid arguments', problems }), isError: true };
    }
    const request = buildActionRequest(operation, args.value, headers);

    try {
      const response = await withRetry(
        () => withTimeout(
          signal => this.deps.actionCaller.invoke(request, { signal }),
          this.deps.config.ACTION_TIMEOUT_MS,
          `action ${operation.operationId}`,
          context.signal
        ),
        this.policy(this.deps.config.ACTION_MAX_ATTEMPTS),
        this.retryOptions(context, call)
      );
      return {
        output: JSON.stringify({ status: response.status, body: response.body }),
        isError: response.status < 200 || response.status >= 300,
      };
    } catch (error) {
      if (context.signal.aborted) throw error;
      throw new RunFailure('action_error', `Action ${operation.operationId} failed: ${errorMessage(error)}`, error);
    }
  }
}
