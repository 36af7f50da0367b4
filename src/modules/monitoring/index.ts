/**
 * Monitoring and Observability System
 * Structured logging, request metrics, and health checks
 */

import { randomUUID } from 'node:crypto';
import { APIError, ErrorFactory } from '../errors';
import type { Config } from '../config';

// Log levels
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LEVEL_ORDER: string[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export type LogFields = Record<string, unknown>;

// Log entry structure; extra fields such as correlation_id, path or run_id sit beside these
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [field: string]: unknown;
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    case LogLevel.ERROR:
      console.error(line);
      break;
  }
};

// Metrics structure
export interface Metrics {
  total_requests: number;
  successful_requests: number;
  failed_requests: number;
  average_response_time: number;
  error_rate: number;
  auth_failures: number;
  endpoint_metrics: Record<string, EndpointMetrics>;
}

export interface EndpointMetrics {
  request_count: number;
  error_count: number;
  average_duration: number;
  last_request_at: string;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  version: string;
  uptime: number;
  metrics: Partial<Metrics>;
  dependencies: Record<string, 'up' | 'down'>;
  details?: Record<string, unknown>;
}

/**
 * Request counters shared by a logger and all of its children
 */
export class RequestMetrics {
  readonly startTime = Date.now();
  private metrics: Metrics = RequestMetrics.empty();

  private static empty(): Metrics {
    return {
      total_requests: 0,
      successful_requests: 0,
      failed_requests: 0,
      average_response_time: 0,
      error_rate: 0,
      auth_failures: 0,
      endpoint_metrics: {},
    };
  }

  record(endpoint: string, duration: number, failed: boolean, errorType?: string): void {
    const metrics = this.metrics;
    metrics.total_requests++;

    if (failed) {
      metrics.failed_requests++;
      if (errorType === 'authentication_error') {
        metrics.auth_failures++;
      }
    } else {
      metrics.successful_requests++;
    }

    const totalTime = metrics.average_response_time * (metrics.total_requests - 1);
    metrics.average_response_time = (totalTime + duration) / metrics.total_requests;
    metrics.error_rate = metrics.failed_requests / metrics.total_requests;

    const endpointMetric = metrics.endpoint_metrics[endpoint] ?? {
      request_count: 0,
      error_count: 0,
      average_duration: 0,
      last_request_at: new Date().toISOString(),
    };
    endpointMetric.request_count++;
    endpointMetric.last_request_at = new Date().toISOString();
    if (failed) {
      endpointMetric.error_count++;
    }
    const endpointTotal = endpointMetric.average_duration * (endpointMetric.request_count - 1);
    endpointMetric.average_duration = (endpointTotal + duration) / endpointMetric.request_count;
    metrics.endpoint_metrics[endpoint] = endpointMetric;
  }

  snapshot(): Metrics {
    return { ...this.metrics, endpoint_metrics: { ...this.metrics.endpoint_metrics } };
  }

  reset(): void {
    this.metrics = RequestMetrics.empty();
  }
}

// Metrics key for requests that match no route
export const UNMATCHED_ROUTE = '(unmatched)';

// Logger class
export class Logger {
  private readonly config: Pick<Config, 'LOG_LEVEL' | 'NODE_ENV'>;
  private readonly fields: LogFields;
  private readonly sink: LogSink;
  readonly metrics: RequestMetrics;

  constructor(
    config: Pick<Config, 'LOG_LEVEL' | 'NODE_ENV'>,
    options: { fields?: LogFields; sink?: LogSink; metrics?: RequestMetrics } = {}
  ) {
    this.config = config;
    this.fields = options.fields ?? {};
    this.sink = options.sink ?? consoleSink;
    this.metrics = options.metrics ?? new RequestMetrics();
  }

  /**
   * Logger that adds the given fields to every entry
   */
  child(fields: LogFields): Logger {
    return new Logger(this.config, {
      fields: { ...this.fields, ...fields },
      sink: this.sink,
      metrics: this.metrics,
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.LOG_LEVEL);
  }

  log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    const line = JSON.stringify({
      ...this.fields,
      ...entry,
      service: 'assistants-run-engine',
      environment: this.config.NODE_ENV,
    });
    this.sink(entry.level, line);
  }

  debug(message: string, fields: LogFields = {}): void {
    this.write(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields: LogFields = {}): void {
    this.write(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields: LogFields = {}): void {
    this.write(LogLevel.WARN, message, fields);
  }

  error(message: string, fields: LogFields = {}, error?: unknown): void {
    this.write(LogLevel.ERROR, message, {
      ...fields,
      ...(error instanceof Error && {
        error: { type: error.name, message: error.message, stack: error.stack },
      }),
    });
  }

  private write(level: LogLevel, message: string, fields: LogFields): void {
    this.log({ ...fields, timestamp: new Date().toISOString(), level, message });
  }

  /**
   * Log a finished request and record it under its route pattern
   */
  logRequest(
    request: Request,
    response: Response | undefined,
    duration: number,
    route: string = UNMATCHED_ROUTE,
    error?: APIError,
    correlationId?: string
  ): void {
    const url = new URL(request.url);

    this.log({
      timestamp: new Date().toISOString(),
      level: error && error.statusCode >= 500 ? LogLevel.ERROR : LogLevel.INFO,
      message: `${request.method} ${url.pathname}`,
      correlation_id: correlationId,
      path: url.pathname,
      route,
      method: request.method,
      status_code: response?.status ?? error?.statusCode,
      duration_ms: duration,
      user_agent: request.headers.get('User-Agent') ?? undefined,
      ...(error && { error: { type: error.type, message: error.message } }),
    });

    const failed = error !== undefined || (response !== undefined && response.status >= 400);
    this.metrics.record(`${request.method} ${route}`, duration, failed, error?.type);
  }
}

export function createLogger(config: Pick<Config, 'LOG_LEVEL' | 'NODE_ENV'>, sink?: LogSink): Logger {
  return new Logger(config, { sink });
}

/**
 * Create request logging middleware
 */
export function createRequestLoggingMiddleware(config: Config, logger: Logger) {
  return async (request: Request, handler: () => Promise<Response>, route?: string): Promise<Response> => {
    const startTime = Date.now();
    const correlationId = request.headers.get('X-Correlation-ID') ?? randomUUID();

    try {
      const response = await handler();
      if (config.LOG_REQUESTS) {
        logger.logRequest(request, response, Date.now() - startTime, route, undefined, correlationId);
      }
      return response;
    } catch (error) {
      const apiError = ErrorFactory.wrapError(error);
      if (config.LOG_REQUESTS) {
        logger.logRequest(request, undefined, Date.now() - startTime, route, apiError, correlationId);
      }
      throw apiError;
    }
  };
}

export type DependencyCheck = () => Promise<boolean>;

/**
 * Create health check endpoint handler
 */
export function createHealthCheckHandler(
  logger: Logger,
  checks: Record<string, DependencyCheck> = {},
  details?: () => Promise<Record<string, unknown>>
) {
  return async (): Promise<Response> => {
    const metrics = logger.metrics.snapshot();
    const dependencies: Record<string, 'up' | 'down'> = {};

    for (const [name, check] of Object.entries(checks)) {
      try {
        dependencies[name] = (await check()) ? 'up' : 'down';
      } catch (error) {
        logger.warn('Health check failed', { dependency: name, reason: error instanceof Error ? error.message : String(error) });
        dependencies[name] = 'down';
      }
    }

    let status: HealthCheckResponse['status'] = 'healthy';
    if (Object.values(dependencies).includes('down') || metrics.error_rate > 0.5) {
      status = 'unhealthy';
    } else if (metrics.error_rate > 0.1) {
      status = 'degraded';
    }

    const healthResponse: HealthCheckResponse = {
      status,
      timestamp: new Date().toISOString(),
      version: '0.1.0',
      uptime: Date.now() - logger.metrics.startTime,
      metrics: {
        total_requests: metrics.total_requests,
        error_rate: metrics.error_rate,
        average_response_time: metrics.average_response_time,
      },
      dependencies,
      ...(details && { details: await details() }),
    };

    return new Response(JSON.stringify(healthResponse), {
      status: status === 'unhealthy' ? 503 : 200,
      headers: {
        'Content-Type': 'application/json',
        'Cache-Control': 'no-cache',
      },
    });
  };
}

/**
 * Create metrics endpoint handler
 */
export function createMetricsHandler(logger: Logger) {
  return async (): Promise<Response> => {
    return new Response(JSON.stringify(logger.metrics.snapshot()), {
      headers: {
        'Content-Type': 'application/json',
        'Cache-Control': 'no-cache',
      },
    });
  };
}
