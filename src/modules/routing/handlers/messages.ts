/**
 * Messages API Handlers
 */

import { CreateMessageRequest } from '../../validators';
import type { RouteHandler } from '../router';
import { parseJsonBody, parseListQuery, requireParam, resultResponse } from './respond';

export const createMessage: RouteHandler = async (request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  const data = await parseJsonBody(request, CreateMessageRequest);
  return resultResponse(await ctx.app.services.messages.create(ctx.auth.ownerId, threadId, data));
};

export const listMessages: RouteHandler = async (request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  return resultResponse(await ctx.app.services.messages.list(ctx.auth.ownerId, threadId, parseListQuery(request)));
};

export const getMessage: RouteHandler = async (_request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  const messageId = requireParam(params, 'message_id');
  return resultResponse(await ctx.app.services.messages.get(ctx.auth.ownerId, threadId, messageId));
};
