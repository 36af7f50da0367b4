/**
 * Assistants API routing configuration
 * Builds the router for all /v1 endpoints
 */

import { createAuthMiddleware } from '../auth';
import { createMetricsHandler } from '../monitoring';
import { Router, type AppContext } from './router';
import { addCorsHeaders, corsMiddleware, payloadSizeMiddleware } from './middleware';

// Import all handlers
import * as assistantHandlers from './handlers/assistants';
import * as threadHandlers from './handlers/threads';
import * as messageHandlers from './handlers/messages';
import * as runHandlers from './handlers/runs';
import * as fileHandlers from './handlers/files';
import * as functionHandlers from './handlers/functions';
import * as chatHandlers from './handlers/chat';

export function createRouter(app: AppContext): Router {
  const router = new Router(app, createAuthMiddleware(app.config, app.logger));

  // Global middleware
  router.use(corsMiddleware);
  router.use(payloadSizeMiddleware);
  router.useResponse(addCorsHeaders);

  // Health
  router.get('/health', () => app.health(), { public: true });
  router.get('/metrics', createMetricsHandler(app.logger));

  // Assistant endpoints
  router.post('/v1/assistants', assistantHandlers.createAssistant);
  router.get('/v1/assistants', assistantHandlers.listAssistants);
  router.get('/v1/assistants/{assistant_id}', assistantHandlers.getAssistant);
  router.post('/v1/assistants/{assistant_id}', assistantHandlers.updateAssistant);
  router.delete('/v1/assistants/{assistant_id}', assistantHandlers.deleteAssistant);

  // Function registry endpoints
  router.post('/v1/functions', functionHandlers.registerFunction);
  router.get('/v1/functions', functionHandlers.listFunctions);

  // Thread endpoints
  router.post('/v1/threads', threadHandlers.createThread);
  router.get('/v1/threads', threadHandlers.listThreads);
  router.get('/v1/threads/{thread_id}', threadHandlers.getThread);
  router.post('/v1/threads/{thread_id}', threadHandlers.updateThread);
  router.delete('/v1/threads/{thread_id}', threadHandlers.deleteThread);

  // Message endpoints
  router.post('/v1/threads/{thread_id}/messages', messageHandlers.createMessage);
  router.get('/v1/threads/{thread_id}/messages', messageHandlers.listMessages);
  router.get('/v1/threads/{thread_id}/messages/{message_id}', messageHandlers.getMessage);

  // Run endpoints
  router.post('/v1/threads/{thread_id}/runs', runHandlers.createRun);
  router.get('/v1/threads/{thread_id}/runs', runHandlers.listRuns);
  router.get('/v1/threads/{thread_id}/runs/{run_id}', runHandlers.getRun);
  router.post('/v1/threads/{thread_id}/runs/{run_id}', runHandlers.updateRun);
  router.post('/v1/threads/{thread_id}/runs/{run_id}/submit_tool_outputs', runHandlers.submitToolOutputs);
  router.post('/v1/threads/{thread_id}/runs/{run_id}/cancel', runHandlers.cancelRun);
  router.get('/v1/threads/{thread_id}/runs/{run_id}/steps', runHandlers.listRunSteps);

  // Stateless chat completions
  router.post('/v1/chat/completions', chatHandlers.createChatCompletion);

  // File endpoints
  router.post('/v1/files', fileHandlers.uploadFile);
  router.get('/v1/files', fileHandlers.listFiles);
  router.get('/v1/files/{file_id}', fileHandlers.getFile);
  router.get('/v1/files/{file_id}/content', fileHandlers.getFileContent);

  return router;
}

export { Router } from './router';
export type { AppContext, RequestContext, RouteHandler, Middleware, ResponseTransform } from './router';
export { startHttpServer, toWebRequest } from './node-adapter';
