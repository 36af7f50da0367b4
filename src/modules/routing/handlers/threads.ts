/**
 * Threads API Handlers
 */

import { CreateThreadRequest, UpdateThreadRequest } from '../../validators';
import type { RouteHandler } from '../router';
import { parseJsonBody, parseListQuery, requireParam, resultResponse } from './respond';

// Create thread, optionally with initial messages
export const createThread: RouteHandler = async (request, ctx) => {
  const data = await parseJsonBody(request, CreateThreadRequest);
  return resultResponse(await ctx.app.services.threads.create(ctx.auth.ownerId, data));
};

export const listThreads: RouteHandler = async (request, ctx) => {
  return resultResponse(await ctx.app.services.threads.list(ctx.auth.ownerId, parseListQuery(request)));
};

export const getThread: RouteHandler = async (_request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  return resultResponse(await ctx.app.services.threads.get(ctx.auth.ownerId, threadId));
};

// Only metadata can change
export const updateThread: RouteHandler = async (request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  const data = await parseJsonBody(request, UpdateThreadRequest);
  return resultResponse(await ctx.app.services.threads.update(ctx.auth.ownerId, threadId, data));
};

export const deleteThread: RouteHandler = async (_request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  return resultResponse(await ctx.app.services.threads.delete(ctx.auth.ownerId, threadId));
};
