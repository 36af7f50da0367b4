import { TransientCollaboratorError } from '../errors';
import type { ActionRequest } from './openapi';

export interface ActionResponse {
  status: number;
  body: string;
}

/**
 * Performs action HTTP calls
 */
export interface ActionCaller {
  invoke(request: ActionRequest, options: { signal: AbortSignal }): Promise<ActionResponse>;
}

const MAX_RESPONSE_CHARS = 20000;

/**
 * ActionCaller backed by the global fetch
 */
export class HttpActionCaller implements ActionCaller {
  async invoke(request: ActionRequest, options: { signal: AbortSignal }): Promise<ActionResponse> {
    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: options.signal,
      });
    } catch (error) {
      if (options.signal.aborted) {
        throw options.signal.reason;
      }
      throw new TransientCollaboratorError('action', `Request to ${request.url} failed`, { cause: error });
    }

    const text = await response.text();
    return {
      status: response.status,
      body: text.length > MAX_RESPONSE_CHARS ? text.slice(0, MAX_RESPONSE_CHARS) : text,
    };
  }
}
