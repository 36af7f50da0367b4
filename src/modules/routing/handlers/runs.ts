/**
 * Runs API Handlers
 * Runs are created queued and executed by the engine workers
 */

import { CreateRunRequest, SubmitToolOutputsRequest, UpdateRunRequest } from '../../validators';
import type { RouteHandler } from '../router';
import { parseJsonBody, parseListQuery, requireParam, resultResponse } from './respond';

// Create run
export const createRun: RouteHandler = async (request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  const data = await parseJsonBody(request, CreateRunRequest);
  return resultResponse(await ctx.app.services.runs.create(ctx.auth.ownerId, threadId, data));
};

export const listRuns: RouteHandler = async (request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  return resultResponse(await ctx.app.services.runs.list(ctx.auth.ownerId, threadId, parseListQuery(request)));
};

export const getRun: RouteHandler = async (_request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  const runId = requireParam(params, 'run_id');
  return resultResponse(await ctx.app.services.runs.get(ctx.auth.ownerId, threadId, runId));
};

// Only metadata can change
export const updateRun: RouteHandler = async (request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  const runId = requireParam(params, 'run_id');
  const data = await parseJsonBody(request, UpdateRunRequest);
  return resultResponse(await ctx.app.services.runs.update(ctx.auth.ownerId, threadId, runId, data));
};

// Resume a run waiting on function outputs
export const submitToolOutputs: RouteHandler = async (request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  const runId = requireParam(params, 'run_id');
  const data = await parseJsonBody(request, SubmitToolOutputsRequest);
  return resultResponse(await ctx.app.services.runs.submitToolOutputs(ctx.auth.ownerId, threadId, runId, data));
};

export const cancelRun: RouteHandler = async (_request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  const runId = requireParam(params, 'run_id');
  return resultResponse(await ctx.app.services.runs.cancel(ctx.auth.ownerId, threadId, runId));
};

export const listRunSteps: RouteHandler = async (_request, ctx, params) => {
  const threadId = requireParam(params, 'thread_id');
  const runId = requireParam(params, 'run_id');
  return resultResponse(await ctx.app.services.runs.listSteps(ctx.auth.ownerId, threadId, runId));
};
