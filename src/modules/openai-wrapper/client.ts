import OpenAI from 'openai';
import { ModelClientError, OPENAI_DEFAULTS } from './types';
import type { ChatMessage, ModelClient, ModelRequest, ModelTurn, OpenAIConfig } from './types';

/**
 * ModelClient backed by the Chat Completions API of any OpenAI-compatible endpoint
 */
export class OpenAIClient implements ModelClient {
  private readonly client: OpenAI;

  constructor(config: OpenAIConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl || OPENAI_DEFAULTS.BASE_URL,
      organization: config.organization || undefined,
      timeout: config.timeout || OPENAI_DEFAULTS.TIMEOUT_MS,
      // The run engine owns retries
      maxRetries: 0,
    });
  }

  /**
   * Generate one model turn
   */
  async complete(request: ModelRequest): Promise<ModelTurn> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        this.buildOpenAIRequest(request),
        { signal: request.signal }
      );
    } catch (error) {
      throw this.handleError(error);
    }
    return this.toModelTurn(completion);
  }

  /**
   * Build OpenAI SDK request from our internal format
   */
  private buildOpenAIRequest(request: ModelRequest): OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming {
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (request.instructions) {
      messages.push({ role: 'system', content: request.instructions });
    }
    for (const message of request.messages) {
      messages.push(this.convertMessage(message));
    }

    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages,
    };
    if (request.tools.length > 0) {
      params.tools = request.tools.map(tool => ({
        type: 'function' as const,
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }));
    }
    return params;
  }

  private convertMessage(message: ChatMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
    switch (message.role) {
      case 'user':
        return { role: 'user', content: message.content };
      case 'tool':
        return { role: 'tool', tool_call_id: message.tool_call_id, content: message.content };
      case 'assistant':
        if (message.tool_calls && message.tool_calls.length > 0) {
          return {
            role: 'assistant',
            content: message.content,
            tool_calls: message.tool_calls.map(call => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: call.arguments },
            })),
          };
        }
        return { role: 'assistant', content: message.content ?? '' };
    }
  }

  private toModelTurn(completion: OpenAI.Chat.Completions.ChatCompletion): ModelTurn {
    const choice = completion.choices[0];
    if (!choice) {
      throw new ModelClientError('fatal', 'Model returned no choices');
    }

    const toolCalls = choice.message.tool_calls ?? [];
    if (toolCalls.length > 0) {
      return {
        type: 'tool_calls',
        text: choice.message.content,
        invocations: toolCalls.map(call => ({
          name: call.function.name,
          arguments: call.function.arguments,
        })),
      };
    }

    return { type: 'text', text: choice.message.content ?? '' };
  }

  /**
   * Classify SDK errors for the engine's retry policy
   */
  private handleError(error: unknown): ModelClientError {
    if (error instanceof ModelClientError) {
      return error;
    }

    if (error instanceof OpenAI.APIConnectionError) {
      // Includes connection timeouts
      return new ModelClientError('transient', error.message, { cause: error });
    }

    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      const code = typeof error.code === 'string' ? error.code : undefined;

      if (code === 'context_length_exceeded' || /maximum context length/i.test(error.message)) {
        return new ModelClientError('context_length', error.message, { status, cause: error });
      }
      if (status === 429) {
        return code === 'insufficient_quota'
          ? new ModelClientError('fatal', error.message, { status, cause: error })
          : new ModelClientError('rate_limit', error.message, { status, cause: error });
      }
      if (status === undefined || status === 408 || status === 409 || status >= 500) {
        return new ModelClientError('transient', error.message, { status, cause: error });
      }
      return new ModelClientError('fatal', error.message, { status, cause: error });
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new ModelClientError('transient', message, { cause: error });
  }
}
