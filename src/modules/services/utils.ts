import { randomUUID } from 'node:crypto';
import type { Logger } from '../monitoring';
import type { Clock, IdGenerator, ListResponse, ServiceErrorCode, ServiceResult } from './types';

function compactId(): string {
  return randomUUID().replace(/-/g, '');
}

/**
 * Default ID generator using random UUIDs
 */
export class DefaultIdGenerator implements IdGenerator {
  generateAssistantId(): string {
    return `asst_${compactId()}`;
  }

  generateThreadId(): string {
    return `thread_${compactId()}`;
  }

  generateMessageId(): string {
    return `msg_${compactId()}`;
  }

  generateRunId(): string {
    return `run_${compactId()}`;
  }

  generateToolCallId(): string {
    return `call_${compactId()}`;
  }

  generateFunctionId(): string {
    return `func_${compactId()}`;
  }

  generateFileId(): string {
    return `file_${compactId()}`;
  }

  generateChunkId(): string {
    return `chunk_${compactId()}`;
  }

  generateChatCompletionId(): string {
    return `chatcmpl-${compactId()}`;
  }
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export class ServiceUtils {
  static createSuccessResult<T>(data: T): ServiceResult<T> {
    return { success: true, data };
  }

  static createErrorResult<T = never>(error: string, code: ServiceErrorCode, details?: unknown): ServiceResult<T> {
    return { success: false, error, code, details };
  }

  static notFound<T = never>(resource: string, id: string): ServiceResult<T> {
    return ServiceUtils.createErrorResult(`${resource} with id '${id}' not found`, 'NOT_FOUND_ERROR');
  }

  static conflict<T = never>(message: string, details?: unknown): ServiceResult<T> {
    return ServiceUtils.createErrorResult(message, 'CONFLICT_ERROR', details);
  }

  /**
   * Log an unexpected failure and hide its details from the caller
   */
  static internalError<T = never>(logger: Logger, operation: string, error: unknown): ServiceResult<T> {
    logger.error(`Failed to ${operation}`, {}, error);
    return ServiceUtils.createErrorResult(`Failed to ${operation}`, 'INTERNAL_ERROR');
  }

  /**
   * Epoch seconds, the unit of every persisted timestamp
   */
  static toSeconds(ms: number): number {
    return Math.floor(ms / 1000);
  }

  static toListResponse<T extends { id: string }>(data: T[], hasMore: boolean): ListResponse<T> {
    return {
      object: 'list',
      data,
      first_id: data[0]?.id ?? null,
      last_id: data[data.length - 1]?.id ?? null,
      has_more: hasMore,
    };
  }
}
