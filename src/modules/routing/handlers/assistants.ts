/**
 * Assistants API Handlers
 */

import { CreateAssistantRequest, UpdateAssistantRequest } from '../../validators';
import type { RouteHandler } from '../router';
import { parseJsonBody, parseListQuery, requireParam, resultResponse } from './respond';

// Create assistant
export const createAssistant: RouteHandler = async (request, ctx) => {
  const data = await parseJsonBody(request, CreateAssistantRequest);
  return resultResponse(await ctx.app.services.assistants.create(ctx.auth.ownerId, data));
};

// List assistants
export const listAssistants: RouteHandler = async (request, ctx) => {
  return resultResponse(await ctx.app.services.assistants.list(ctx.auth.ownerId, parseListQuery(request)));
};

// Get assistant
export const getAssistant: RouteHandler = async (_request, ctx, params) => {
  const assistantId = requireParam(params, 'assistant_id');
  return resultResponse(await ctx.app.services.assistants.get(ctx.auth.ownerId, assistantId));
};

// Update assistant
export const updateAssistant: RouteHandler = async (request, ctx, params) => {
  const assistantId = requireParam(params, 'assistant_id');
  const data = await parseJsonBody(request, UpdateAssistantRequest);
  return resultResponse(await ctx.app.services.assistants.update(ctx.auth.ownerId, assistantId, data));
};

// Delete assistant
export const deleteAssistant: RouteHandler = async (_request, ctx, params) => {
  const assistantId = requireParam(params, 'assistant_id');
  return resultResponse(await ctx.app.services.assistants.delete(ctx.auth.ownerId, assistantId));
};
