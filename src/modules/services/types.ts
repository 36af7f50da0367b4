import type { Config } from '../config';
import type { Logger } from '../monitoring';
import type { ModelClient } from '../openai-wrapper';
import type { BlobStore, EntityStore } from '../storage';
import type { RunQueue } from '../queue';
import type { TextExtractor } from '../tools';

/**
 * Dependencies shared by every API service
 */
export interface ServiceConfig {
  store: EntityStore;
  queue: RunQueue;
  blobs: BlobStore;
  model: ModelClient;
  extractor: TextExtractor;
  config: Config;
  logger: Logger;
  clock: Clock;
  ids: IdGenerator;
}

export interface Clock {
  /** Epoch milliseconds */
  now(): number;
}

export type ServiceErrorCode =
  | 'NOT_FOUND_ERROR'
  | 'VALIDATION_ERROR'
  | 'CONFLICT_ERROR'
  | 'UPSTREAM_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Service operation result
 */
export interface ServiceResult<T = void> {
  success: boolean;
  data?: T;
  error?: string;
  code?: ServiceErrorCode;
  details?: unknown;
}

/**
 * OpenAI-style list envelope
 */
export interface ListResponse<T> {
  object: 'list';
  data: T[];
  first_id: string | null;
  last_id: string | null;
  has_more: boolean;
}

/**
 * ID generation utilities
 */
export interface IdGenerator {
  generateAssistantId(): string;
  generateThreadId(): string;
  generateMessageId(): string;
  generateRunId(): string;
  generateToolCallId(): string;
  generateFunctionId(): string;
  generateFileId(): string;
  generateChunkId(): string;
  generateChatCompletionId(): string;
}
