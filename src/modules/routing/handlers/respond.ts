/**
 * Shared handler helpers: JSON bodies in, JSON or APIError out
 */

import { z } from 'zod';
import { APIError, ErrorFactory, ErrorType } from '../../errors';
import type { ServiceErrorCode, ServiceResult } from '../../services';
import type { ListOptions } from '../../storage';
import { ListQuery } from '../../validators';

export function jsonResponse(data: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const CODE_TO_ERROR_TYPE: Record<ServiceErrorCode, ErrorType> = {
  NOT_FOUND_ERROR: ErrorType.NOT_FOUND,
  VALIDATION_ERROR: ErrorType.VALIDATION_ERROR,
  CONFLICT_ERROR: ErrorType.CONFLICT,
  UPSTREAM_ERROR: ErrorType.UPSTREAM_ERROR,
  INTERNAL_ERROR: ErrorType.INTERNAL_ERROR,
};

/**
 * JSON response for a successful result; throws the matching APIError otherwise
 */
export function resultResponse<T>(result: ServiceResult<T>, status: number = 200): Response {
  if (result.success) {
    return jsonResponse(result.data ?? null, status);
  }
  if (result.code === 'CONFLICT_ERROR') {
    throw ErrorFactory.conflict(result.error ?? 'Request conflicts with current state', result.details);
  }
  throw new APIError(CODE_TO_ERROR_TYPE[result.code ?? 'INTERNAL_ERROR'], result.error ?? 'Request failed', {
    code: result.code,
    details: result.details,
  });
}

/**
 * Parse and validate a JSON request body
 */
export async function parseJsonBody<T extends z.ZodTypeAny>(request: Request, schema: T): Promise<z.output<T>> {
  const contentType = request.headers.get('Content-Type') ?? '';
  if (!contentType.includes('application/json')) {
    throw ErrorFactory.invalidContentType('Content-Type must be application/json');
  }

  const text = await request.text();
  // JSON.parse failures surface as validation errors through ErrorFactory.wrapError
  const body: unknown = text.trim() === '' ? {} : JSON.parse(text);
  return schema.parse(body);
}

export function parseListQuery(request: Request): ListOptions {
  const url = new URL(request.url);
  return ListQuery.parse(Object.fromEntries(url.searchParams.entries()));
}

export function requireParam(params: Record<string, string>, name: string): string {
  const value = params[name];
  if (!value) {
    throw ErrorFactory.validationError(`${name} is required`, undefined, name);
  }
  return value;
}
