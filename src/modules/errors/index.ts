/**
 * Error Handling System
 * Provides consistent error responses, correlation IDs, and error tracking
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ConfigUtils, type Config } from '../config';
import type { Logger } from '../monitoring';

// Error types
export enum ErrorType {
  VALIDATION_ERROR = 'validation_error',
  AUTHENTICATION_ERROR = 'authentication_error',
  AUTHORIZATION_ERROR = 'authorization_error',
  NOT_FOUND = 'not_found',
  METHOD_NOT_ALLOWED = 'method_not_allowed',
  CONFLICT = 'conflict',
  PAYLOAD_TOO_LARGE = 'payload_too_large',
  INVALID_CONTENT_TYPE = 'invalid_content_type',
  FILE_UPLOAD_ERROR = 'file_upload_error',
  INTERNAL_ERROR = 'internal_error',
  TIMEOUT_ERROR = 'timeout_error',
  UPSTREAM_ERROR = 'upstream_error',
  CONFIGURATION_ERROR = 'configuration_error',
}

// HTTP Status codes mapping
export const ErrorStatusMap: Record<ErrorType, number> = {
  [ErrorType.VALIDATION_ERROR]: 400,
  [ErrorType.AUTHENTICATION_ERROR]: 401,
  [ErrorType.AUTHORIZATION_ERROR]: 403,
  [ErrorType.NOT_FOUND]: 404,
  [ErrorType.METHOD_NOT_ALLOWED]: 405,
  [ErrorType.CONFLICT]: 409,
  [ErrorType.PAYLOAD_TOO_LARGE]: 413,
  [ErrorType.INVALID_CONTENT_TYPE]: 415,
  [ErrorType.FILE_UPLOAD_ERROR]: 422,
  [ErrorType.TIMEOUT_ERROR]: 408,
  [ErrorType.UPSTREAM_ERROR]: 502,
  [ErrorType.CONFIGURATION_ERROR]: 500,
  [ErrorType.INTERNAL_ERROR]: 500,
};

// Error response schema
export const ErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string(),
    code: z.string().optional(),
    param: z.string().optional(),
    details: z.unknown().optional(),
    correlation_id: z.string(),
    timestamp: z.string(),
    path: z.string().optional(),
    method: z.string().optional(),
  }),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

export interface APIErrorOptions {
  code?: string;
  param?: string;
  details?: unknown;
  correlationId?: string;
  path?: string;
  method?: string;
  cause?: Error;
}

/**
 * Custom error class for API errors
 */
export class APIError extends Error {
  public readonly type: ErrorType;
  public readonly statusCode: number;
  public readonly code?: string;
  public readonly param?: string;
  public readonly details?: unknown;
  public readonly correlationId: string;
  public readonly timestamp: string;
  public readonly path?: string;
  public readonly method?: string;
  public readonly cause?: Error;

  constructor(type: ErrorType, message: string, options: APIErrorOptions = {}) {
    super(message);
    this.name = 'APIError';
    this.type = type;
    this.statusCode = ErrorStatusMap[type];
    this.code = options.code;
    this.param = options.param;
    this.details = options.details;
    this.correlationId = options.correlationId || generateCorrelationId();
    this.timestamp = new Date().toISOString();
    this.path = options.path;
    this.method = options.method;
    this.cause = options.cause;
  }

  /**
   * Copy of this error carrying the request path and method
   */
  withRequest(request: Request): APIError {
    const url = new URL(request.url);
    return new APIError(this.type, this.message, {
      code: this.code,
      param: this.param,
      details: this.details,
      correlationId: this.correlationId,
      path: url.pathname,
      method: request.method,
      cause: this.cause,
    });
  }

  /**
   * Convert error to response object
   */
  toResponse(config: Config): ErrorResponse {
    const exposeDetails = config.EXPOSE_ERROR_DETAILS || ConfigUtils.isDevelopment(config);

    return {
      error: {
        message: this.message,
        type: this.type,
        correlation_id: this.correlationId,
        timestamp: this.timestamp,
        ...(this.code && { code: this.code }),
        ...(this.param && { param: this.param }),
        ...(this.path && { path: this.path }),
        ...(this.method && { method: this.method }),
        ...(exposeDetails && this.details !== undefined && { details: this.details }),
      },
    };
  }

  /**
   * Create Response object from error
   */
  toHTTPResponse(config: Config): Response {
    return new Response(JSON.stringify(this.toResponse(config)), {
      status: this.statusCode,
      headers: {
        'Content-Type': 'application/json',
        'X-Correlation-ID': this.correlationId,
      },
    });
  }
}

/**
 * Generate unique correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Create standardized error responses
 */
export const ErrorFactory = {
  validationError(message: string, details?: unknown, param?: string): APIError {
    return new APIError(ErrorType.VALIDATION_ERROR, message, {
      param,
      details,
      code: 'VALIDATION_FAILED',
    });
  },

  authenticationError(message: string = 'Authentication required'): APIError {
    return new APIError(ErrorType.AUTHENTICATION_ERROR, message, {
      code: 'AUTHENTICATION_FAILED',
    });
  },

  notFound(resource: string, id?: string): APIError {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    return new APIError(ErrorType.NOT_FOUND, message, {
      param: id,
      code: 'RESOURCE_NOT_FOUND',
    });
  },

  methodNotAllowed(method: string, path: string): APIError {
    return new APIError(ErrorType.METHOD_NOT_ALLOWED, `Method ${method} is not allowed on ${path}`, {
      code: 'METHOD_NOT_ALLOWED',
    });
  },

  conflict(message: string, details?: unknown): APIError {
    return new APIError(ErrorType.CONFLICT, message, {
      details,
      code: 'CONFLICT',
    });
  },

  payloadTooLarge(message: string = 'Request payload too large'): APIError {
    return new APIError(ErrorType.PAYLOAD_TOO_LARGE, message, {
      code: 'PAYLOAD_TOO_LARGE',
    });
  },

  invalidContentType(message: string = 'Invalid content type'): APIError {
    return new APIError(ErrorType.INVALID_CONTENT_TYPE, message, {
      code: 'INVALID_CONTENT_TYPE',
    });
  },

  fileUploadError(message: string, details?: unknown): APIError {
    return new APIError(ErrorType.FILE_UPLOAD_ERROR, message, {
      details,
      code: 'FILE_UPLOAD_FAILED',
    });
  },

  internalError(message: string = 'Internal server error', cause?: Error): APIError {
    return new APIError(ErrorType.INTERNAL_ERROR, message, {
      cause,
      code: 'INTERNAL_ERROR',
    });
  },

  /**
   * Wrap any error into an APIError
   */
  wrapError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): APIError {
    if (error instanceof APIError) {
      return error;
    }

    if (error instanceof z.ZodError) {
      return ErrorFactory.validationError(
        'Validation failed',
        error.issues,
        error.issues[0]?.path?.join('.')
      );
    }

    if (error instanceof SyntaxError) {
      return ErrorFactory.validationError('Request body is not valid JSON');
    }

    if (error instanceof Error) {
      return ErrorFactory.internalError(defaultMessage, error);
    }

    return ErrorFactory.internalError(defaultMessage);
  },
};

/**
 * Error handling utilities
 */
export const ErrorUtils = {
  /**
   * Log error with context
   */
  logError(error: APIError, config: Config, logger: Logger): void {
    if (!config.LOG_ERRORS) return;

    const fields = {
      correlation_id: error.correlationId,
      type: error.type,
      status_code: error.statusCode,
      path: error.path,
      method: error.method,
      ...(error.param && { param: error.param }),
      ...(error.code && { code: error.code }),
      ...(error.cause && { cause: error.cause.message }),
    };

    const message = `[${error.correlationId}] ${error.type}: ${error.message}`;
    if (error.statusCode >= 500) {
      logger.error(message, fields);
    } else {
      logger.warn(message, fields);
    }
  },

  /**
   * Create error handler used by the router
   */
  createErrorHandler(config: Config, logger: Logger) {
    return (error: unknown, request?: Request): Response => {
      let apiError = ErrorFactory.wrapError(error);
      if (request) {
        apiError = apiError.withRequest(request);
      }

      ErrorUtils.logError(apiError, config, logger);
      return apiError.toHTTPResponse(config);
    };
  },
};

export * from './engine';
