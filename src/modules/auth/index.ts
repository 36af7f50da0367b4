/**
 * Authorization
 * Bearer token authentication and owner scoping
 */

import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { APIError, ErrorFactory } from '../errors';
import type { Config } from '../config';
import type { Logger } from '../monitoring';

// Authentication token schema
const AuthTokenSchema = z.object({
  token: z.string().min(1, 'Token is required'),
  type: z.literal('Bearer'),
});

export type AuthToken = z.infer<typeof AuthTokenSchema>;

// Owner ids scope every stored entity; keep them to a safe alphabet
const OwnerIdSchema = z.string().regex(/^[A-Za-z0-9_.:@-]{1,128}$/);

export const OWNER_HEADER = 'X-Owner-Id';

// Authentication context
export interface AuthContext {
  authenticated: boolean;
  ownerId: string;
}

/**
 * Parse authorization header
 */
export function parseAuthHeader(authHeader: string | null): AuthToken | null {
  if (!authHeader) return null;

  if (authHeader.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    if (!token) return null;

    return { token, type: 'Bearer' };
  }

  // Raw token without a scheme
  if (!authHeader.includes(' ')) {
    return { token: authHeader.trim(), type: 'Bearer' };
  }

  return null;
}

function constantTimeEquals(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Validate authentication token
 */
export function validateAuthToken(token: AuthToken | null, config: Config): APIError | null {
  if (!token) {
    return ErrorFactory.authenticationError('Missing authentication token');
  }
  if (!constantTimeEquals(token.token, config.API_KEY)) {
    return ErrorFactory.authenticationError('Invalid authentication token');
  }
  return null;
}

/**
 * Owner of the request, from the X-Owner-Id header or the configured default
 */
export function resolveOwnerId(request: Request, config: Config): string | APIError {
  const header = request.headers.get(OWNER_HEADER);
  if (header === null || header.trim() === '') {
    return config.DEFAULT_OWNER_ID;
  }
  const parsed = OwnerIdSchema.safeParse(header.trim());
  if (!parsed.success) {
    return ErrorFactory.validationError(`${OWNER_HEADER} header is not a valid owner id`, undefined, OWNER_HEADER);
  }
  return parsed.data;
}

/**
 * Create authentication middleware. With ENABLE_AUTH off every request is let through.
 */
export function createAuthMiddleware(config: Config, logger: Logger) {
  return async (request: Request): Promise<AuthContext | APIError> => {
    const ownerId = resolveOwnerId(request, config);
    if (ownerId instanceof APIError) {
      return ownerId;
    }

    if (!config.ENABLE_AUTH) {
      return { authenticated: false, ownerId };
    }

    const token = parseAuthHeader(request.headers.get('Authorization'));
    const error = validateAuthToken(token, config);
    if (error) {
      logger.warn('Authentication rejected', {
        path: new URL(request.url).pathname,
        method: request.method,
        token: token ? AuthUtils.sanitizeToken(token.token) : null,
        reason: error.message,
      });
      return error;
    }

    return { authenticated: true, ownerId };
  };
}

/**
 * Utility functions for authorization
 */
export const AuthUtils = {
  /**
   * Sanitize token for logging (show only first/last 4 characters)
   */
  sanitizeToken(token: string): string {
    if (token.length <= 8) return '*'.repeat(token.length);
    return token.substring(0, 4) + '*'.repeat(token.length - 8) + token.substring(token.length - 4);
  },
};
