/**
 * Function registry handlers
 */

import { RegisterFunctionRequest } from '../../validators';
import type { RouteHandler } from '../router';
import { parseJsonBody, resultResponse } from './respond';

export const registerFunction: RouteHandler = async (request, ctx) => {
  const data = await parseJsonBody(request, RegisterFunctionRequest);
  return resultResponse(await ctx.app.services.functions.register(ctx.auth.ownerId, data));
};

export const listFunctions: RouteHandler = async (_request, ctx) => {
  return resultResponse(await ctx.app.services.functions.list(ctx.auth.ownerId));
};
