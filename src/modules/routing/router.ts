/**
 * Centralized Router for the Assistants API
 * Method/path matching with {param} patterns, global middleware and per-route authentication
 */

import type { AuthContext } from '../auth';
import type { Config } from '../config';
import { APIError, ErrorFactory, ErrorUtils } from '../errors';
import { createRequestLoggingMiddleware, type Logger } from '../monitoring';
import type { Services } from '../services';

/**
 * Application-wide dependencies handed to every handler
 */
export interface AppContext {
  config: Config;
  logger: Logger;
  services: Services;
  health: () => Promise<Response>;
}

export interface RequestContext {
  app: AppContext;
  auth: AuthContext;
}

// Route handler type
export type RouteHandler = (request: Request, ctx: RequestContext, params: Record<string, string>) => Promise<Response>;

// Middleware may answer the request itself by returning a response
export type Middleware = (request: Request, app: AppContext) => Promise<Response | null>;

// Applied to every response, errors included
export type ResponseTransform = (response: Response, request: Request, app: AppContext) => Response;

export type Authenticator = (request: Request) => Promise<AuthContext | APIError>;

export interface RouteOptions {
  /** Skip authentication */
  public?: boolean;
}

// Route definition
export interface Route {
  method: string;
  path: string;
  pattern: RegExp;
  paramNames: string[];
  handler: RouteHandler;
  public: boolean;
}

// Router class
export class Router {
  private routes: Route[] = [];
  private middleware: Middleware[] = [];
  private transforms: ResponseTransform[] = [];
  private readonly app: AppContext;
  private readonly authenticate: Authenticator;
  private readonly logRequest: (request: Request, handler: () => Promise<Response>, route?: string) => Promise<Response>;
  private readonly handleError: (error: unknown, request?: Request) => Response;

  constructor(app: AppContext, authenticate: Authenticator) {
    this.app = app;
    this.authenticate = authenticate;
    this.logRequest = createRequestLoggingMiddleware(app.config, app.logger);
    this.handleError = ErrorUtils.createErrorHandler(app.config, app.logger);
  }

  // Add global middleware
  use(middleware: Middleware) {
    this.middleware.push(middleware);
  }

  // Add a response transform
  useResponse(transform: ResponseTransform) {
    this.transforms.push(transform);
  }

  // Add route
  addRoute(method: string, path: string, handler: RouteHandler, options: RouteOptions = {}) {
    const { pattern, paramNames } = this.parsePath(path);
    this.routes.push({
      method: method.toUpperCase(),
      path,
      pattern,
      paramNames,
      handler,
      public: options.public ?? false,
    });
  }

  // Convenience methods for HTTP verbs
  get(path: string, handler: RouteHandler, options?: RouteOptions) {
    this.addRoute('GET', path, handler, options);
  }

  post(path: string, handler: RouteHandler, options?: RouteOptions) {
    this.addRoute('POST', path, handler, options);
  }

  delete(path: string, handler: RouteHandler, options?: RouteOptions) {
    this.addRoute('DELETE', path, handler, options);
  }

  // Parse path with parameters (e.g., /v1/assistants/{id} -> /v1/assistants/([^/]+))
  private parsePath(path: string): { pattern: RegExp; paramNames: string[] } {
    const paramNames: string[] = [];
    const regexPath = path.replace(/\{([^}]+)\}/g, (_match, paramName: string) => {
      paramNames.push(paramName);
      return '([^/]+)';
    });

    return {
      pattern: new RegExp(`^${regexPath}$`),
      paramNames,
    };
  }

  // Extract parameters from path
  private extractParams(route: Route, path: string): Record<string, string> | null {
    const match = path.match(route.pattern);
    if (!match) return null;

    const params: Record<string, string> = {};
    route.paramNames.forEach((name, index) => {
      params[name] = decodeURIComponent(match[index + 1] ?? '');
    });

    return params;
  }

  // Handle request
  async handle(request: Request): Promise<Response> {
    let response: Response;
    try {
      response = await this.logRequest(request, () => this.dispatch(request), this.routePattern(request));
    } catch (error) {
      response = this.handleError(error, request);
    }
    return this.transforms.reduce((current, transform) => transform(current, request, this.app), response);
  }

  // Path pattern of the route the request would reach, whatever its method
  private routePattern(request: Request): string | undefined {
    const path = new URL(request.url).pathname;
    return this.routes.find(route => route.pattern.test(path))?.path;
  }

  private async dispatch(request: Request): Promise<Response> {
    for (const middleware of this.middleware) {
      const response = await middleware(request, this.app);
      if (response) return response;
    }

    const path = new URL(request.url).pathname;
    const method = request.method.toUpperCase();

    let pathMatched = false;
    for (const route of this.routes) {
      const params = this.extractParams(route, path);
      if (!params) continue;
      pathMatched = true;
      if (route.method !== method) continue;

      let auth: AuthContext = { authenticated: false, ownerId: this.app.config.DEFAULT_OWNER_ID };
      if (!route.public) {
        const result = await this.authenticate(request);
        if (result instanceof APIError) {
          throw result;
        }
        auth = result;
      }

      return route.handler(request, { app: this.app, auth }, params);
    }

    if (pathMatched) {
      throw ErrorFactory.methodNotAllowed(method, path);
    }
    throw ErrorFactory.notFound('Route', path);
  }

  // Get all routes (for debugging/testing)
  getRoutes(): Route[] {
    return this.routes;
  }
}
