/**
 * Router middleware
 * CORS and request size checks
 */

import { ConfigUtils } from '../config';
import { ErrorFactory } from '../errors';
import type { Middleware, ResponseTransform } from './router';

const ALLOWED_METHODS = 'GET, POST, DELETE, OPTIONS';
const ALLOWED_HEADERS = 'Content-Type, Authorization, X-Owner-Id, X-Correlation-ID';

function allowedOrigin(request: Request, origins: string[]): string | null {
  if (origins.includes('*')) return '*';
  const origin = request.headers.get('Origin');
  return origin && origins.includes(origin) ? origin : null;
}

// CORS preflight
export const corsMiddleware: Middleware = async (request, app) => {
  if (request.method !== 'OPTIONS' || !app.config.ENABLE_CORS) {
    return null;
  }

  const origin = allowedOrigin(request, ConfigUtils.getAllowedOrigins(app.config));
  return new Response(null, {
    status: 204,
    headers: {
      ...(origin && { 'Access-Control-Allow-Origin': origin }),
      'Access-Control-Allow-Methods': ALLOWED_METHODS,
      'Access-Control-Allow-Headers': ALLOWED_HEADERS,
      'Access-Control-Max-Age': '86400',
    },
  });
};

// Reject bodies over MAX_REQUEST_SIZE before they are read
export const payloadSizeMiddleware: Middleware = async (request, app) => {
  const length = Number(request.headers.get('Content-Length') ?? '0');
  if (Number.isFinite(length) && length > app.config.MAX_REQUEST_SIZE) {
    throw ErrorFactory.payloadTooLarge(`Request body exceeds ${app.config.MAX_REQUEST_SIZE} bytes`);
  }
  return null;
};

// Utility to add CORS headers to responses
export const addCorsHeaders: ResponseTransform = (response, request, app) => {
  if (!app.config.ENABLE_CORS) return response;

  const origin = allowedOrigin(request, ConfigUtils.getAllowedOrigins(app.config));
  if (!origin) return response;

  const headers = new Headers(response.headers);
  headers.set('Access-Control-Allow-Origin', origin);
  headers.set('Access-Control-Allow-Methods', ALLOWED_METHODS);
  headers.set('Access-Control-Allow-Headers', ALLOWED_HEADERS);
  if (origin !== '*') headers.append('Vary', 'Origin');
  return new Response(response.body, { status: response.status, statusText: response.statusText, headers });
};
