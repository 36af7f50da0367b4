import { DeadlineExceededError } from '../errors';
import type { ChatCompletion, ChatCompletionToolCall } from '../models';
import type { Logger } from '../monitoring';
import { ModelClientError, type ChatMessage, type ModelClient, type ModelTurn } from '../openai-wrapper';
import { withTimeout } from '../retry';
import type { ChatCompletionInput } from '../validators';
import type { Clock, IdGenerator, ServiceConfig, ServiceResult } from './types';
import { ServiceUtils } from './utils';

/**
 * Stateless chat completions through the same model client the run engine uses.
 * Nothing is persisted.
 */
export class ChatService {
  private readonly model: ModelClient;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly ids: IdGenerator;
  private readonly timeoutMs: number;

  constructor(config: ServiceConfig) {
    this.model = config.model;
    this.logger = config.logger;
    this.clock = config.clock;
    this.ids = config.ids;
    this.timeoutMs = config.config.MODEL_TIMEOUT_MS;
  }

  async complete(data: ChatCompletionInput): Promise<ServiceResult<ChatCompletion>> {
    // System messages are folded into the instructions, in order
    const system = data.messages.flatMap(message => message.role === 'system' ? [message.content] : []);
    const messages = data.messages.flatMap((message): ChatMessage[] => {
      switch (message.role) {
        case 'system':
          return [];
        case 'user':
          return [{ role: 'user', content: message.content }];
        case 'tool':
          return [{ role: 'tool', tool_call_id: message.tool_call_id, content: message.content }];
        case 'assistant':
          return [{
            role: 'assistant',
            content: message.content,
            tool_calls: message.tool_calls?.map(call => ({
              id: call.id,
              name: call.function.name,
              arguments: call.function.arguments,
            })),
          }];
      }
    });

    let turn: ModelTurn;
    try {
      turn = await withTimeout(
        signal => this.model.complete({
          model: data.model,
          instructions: system.length > 0 ? system.join('\n\n') : null,
          messages,
          tools: data.tools.map(tool => ({
            name: tool.function.name,
            description: tool.function.description,
            parameters: tool.function.parameters ?? { type: 'object', properties: {} },
          })),
          signal,
        }),
        this.timeoutMs,
        'chat completion'
      );
    } catch (error) {
      return this.modelError(error);
    }

    const toolCalls: ChatCompletionToolCall[] = turn.type === 'tool_calls'
      ? turn.invocations.map(invocation => ({
        id: this.ids.generateToolCallId(),
        type: 'function',
        function: { name: invocation.name, arguments: invocation.arguments },
      }))
      : [];

    const completion: ChatCompletion = {
      id: this.ids.generateChatCompletionId(),
      object: 'chat.completion',
      created: ServiceUtils.toSeconds(this.clock.now()),
      model: data.model,
      choices: [{
        index: 0,
        message: {
          role: 'assistant',
          content: turn.text,
          ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
        },
        finish_reason: toolCalls.length > 0 ? 'tool_calls' : 'stop',
      }],
    };
    return ServiceUtils.createSuccessResult(completion);
  }

  private modelError(error: unknown): ServiceResult<ChatCompletion> {
    if (error instanceof ModelClientError) {
      const rejected = error.kind === 'context_length' ||
        (error.kind === 'fatal' && error.status !== undefined && error.status >= 400 && error.status < 500);
      this.logger.warn('Chat completion failed', { kind: error.kind, status: error.status, reason: error.message });
      return ServiceUtils.createErrorResult(
        `Model call failed: ${error.message}`,
        rejected ? 'VALIDATION_ERROR' : 'UPSTREAM_ERROR'
      );
    }
    if (error instanceof DeadlineExceededError) {
      this.logger.warn('Chat completion timed out', { timeout_ms: error.timeoutMs });
      return ServiceUtils.createErrorResult(`Model call failed: ${error.message}`, 'UPSTREAM_ERROR');
    }
    return ServiceUtils.internalError(this.logger, 'complete chat', error);
  }
}
