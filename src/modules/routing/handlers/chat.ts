/**
 * Chat Completions Handler
 */

import { ChatCompletionRequest } from '../../validators';
import type { RouteHandler } from '../router';
import { parseJsonBody, resultResponse } from './respond';

export const createChatCompletion: RouteHandler = async (request, ctx) => {
  const data = await parseJsonBody(request, ChatCompletionRequest);
  return resultResponse(await ctx.app.services.chat.complete(data));
};
