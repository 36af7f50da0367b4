import { describe, expect, it } from 'vitest';
import { getDefaultConfig } from '../config';
import { APIError } from '../errors';
import { createLogger } from '../monitoring';
import { AuthUtils, createAuthMiddleware, parseAuthHeader, resolveOwnerId } from './index';

const config = getDefaultConfig({ API_KEY: 'test-secret', DEFAULT_OWNER_ID: 'default' });
const logger = createLogger(config, () => {});

const request = (headers: Record<string, string> = {}) => new Request('http://localhost/v1/threads', { headers });

describe('parseAuthHeader', () => {
  it('accepts bearer and bare tokens', () => {
    expect(parseAuthHeader('Bearer test-secret')).toEqual({ token: 'test-secret', type: 'Bearer' });
    expect(parseAuthHeader('test-secret')).toEqual({ token: 'test-secret', type: 'Bearer' });
    expect(parseAuthHeader('Basic dXNlcg==')).toBeNull();
    expect(parseAuthHeader(null)).toBeNull();
  });
});

describe('resolveOwnerId', () => {
  it('uses the header or falls back to the default owner', () => {
    expect(resolveOwnerId(request({ 'X-Owner-Id': 'team-a' }), config)).toBe('team-a');
    expect(resolveOwnerId(request(), config)).toBe('default');
    expect(resolveOwnerId(request({ 'X-Owner-Id': 'a b' }), config)).toBeInstanceOf(APIError);
  });
});

describe('createAuthMiddleware', () => {
  const authenticate = createAuthMiddleware(config, logger);

  it('authenticates a matching key', async () => {
    expect(await authenticate(request({ Authorization: 'Bearer test-secret', 'X-Owner-Id': 'team-a' })))
      .toEqual({ authenticated: true, ownerId: 'team-a' });
  });

  it('rejects a wrong key', async () => {
    const result = await authenticate(request({ Authorization: 'Bearer wrong-key' }));
    expect(result).toBeInstanceOf(APIError);
    expect(result instanceof APIError && result.statusCode).toBe(401);
  });

  it('lets everything through when auth is disabled', async () => {
    const open = createAuthMiddleware(getDefaultConfig({ ENABLE_AUTH: false }), logger);
    expect(await open(request())).toEqual({ authenticated: false, ownerId: 'default' });
  });
});

describe('AuthUtils.sanitizeToken', () => {
  it('masks all but the ends of the token', () => {
    expect(AuthUtils.sanitizeToken('abcd1234efgh')).toBe('abcd****efgh');
    expect(AuthUtils.sanitizeToken('short')).toBe('*****');
  });
});
