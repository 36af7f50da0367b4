/**
 * OpenAPI action operations
 * Turns an action tool's OpenAPI document into callable operations and model schemas
 */

import { z } from 'zod';
import type { JsonSchema, OpenAPIDocument } from '../models';
import type { ModelToolSchema } from '../openai-wrapper';

export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

const HTTP_METHODS: readonly HttpMethod[] = ['get', 'post', 'put', 'patch', 'delete'];

export interface ActionParameter {
  name: string;
  in: 'path' | 'query' | 'header';
  required: boolean;
  description?: string;
  schema: JsonSchema;
}

export interface ActionOperation {
  operationId: string;
  method: HttpMethod;
  path: string;
  baseUrl: string;
  description?: string;
  parameters: ActionParameter[];
  requestBody?: {
    required: boolean;
    schema: JsonSchema;
  };
}

export interface ActionRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export class ActionSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ActionSpecError';
  }
}

const ParameterSchema = z.object({
  name: z.string().min(1),
  in: z.enum(['path', 'query', 'header', 'cookie']),
  required: z.boolean().optional(),
  description: z.string().optional(),
  schema: z.record(z.string(), z.unknown()).optional(),
});

const OperationSchema = z.object({
  operationId: z.string().regex(/^[a-zA-Z0-9_-]{1,64}$/, 'operationId must match ^[a-zA-Z0-9_-]{1,64}$'),
  summary: z.string().optional(),
  description: z.string().optional(),
  parameters: z.array(ParameterSchema).optional(),
  requestBody: z.object({
    required: z.boolean().optional(),
    content: z.record(z.string(), z.object({
      schema: z.record(z.string(), z.unknown()).optional(),
    })),
  }).optional(),
});

/**
 * List the operations of a document. Cookie parameters are not supported and are skipped.
 */
export function parseOperations(document: OpenAPIDocument): ActionOperation[] {
  const baseUrl = document.servers?.[0]?.url;
  if (!baseUrl) {
    throw new ActionSpecError('OpenAPI document must declare at least one server url');
  }

  const operations: ActionOperation[] = [];
  for (const [path, item] of Object.entries(document.paths)) {
    for (const method of HTTP_METHODS) {
      const raw = item[method];
      if (raw === undefined) continue;

      const parsed = OperationSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ActionSpecError(
          `Invalid operation ${method.toUpperCase()} ${path}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'malformed'}`
        );
      }
      const operation = parsed.data;

      const parameters: ActionParameter[] = [];
      for (const parameter of operation.parameters ?? []) {
        if (parameter.in === 'cookie') continue;
        parameters.push({
          name: parameter.name,
          in: parameter.in,
          required: parameter.in === 'path' ? true : parameter.required ?? false,
          description: parameter.description,
          schema: parameter.schema ?? { type: 'string' },
        });
      }

      const jsonBody = operation.requestBody?.content['application/json'];
      operations.push({
        operationId: operation.operationId,
        method,
        path,
        baseUrl,
        description: operation.summary ?? operation.description,
        parameters,
        ...(operation.requestBody && {
          requestBody: {
            required: operation.requestBody.required ?? false,
            schema: jsonBody?.schema ?? { type: 'object' },
          },
        }),
      });
    }
  }

  if (operations.length === 0) {
    throw new ActionSpecError('OpenAPI document declares no operations');
  }
  return operations;
}

/**
 * Function schema the model sees for an operation. The request body, if any, is the `body` argument.
 */
export function operationToolSchema(operation: ActionOperation): ModelToolSchema {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const parameter of operation.parameters) {
    properties[parameter.name] = parameter.description
      ? { ...parameter.schema, description: parameter.description }
      : parameter.schema;
    if (parameter.required) required.push(parameter.name);
  }
  if (operation.requestBody) {
    properties.body = operation.requestBody.schema;
    if (operation.requestBody.required) required.push('body');
  }

  return {
    name: operation.operationId,
    description: operation.description ?? `${operation.method.toUpperCase()} ${operation.path}`,
    parameters: { type: 'object', properties, required },
  };
}

function matchesType(value: unknown, type: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    default:
      return true;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Problems with the model's arguments for an operation; empty when they are usable
 */
export function validateActionArguments(operation: ActionOperation, args: unknown): string[] {
  if (!isRecord(args)) {
    return ['arguments must be a JSON object'];
  }

  const problems: string[] = [];
  for (const parameter of operation.parameters) {
    const value = args[parameter.name];
    if (value === undefined || value === null) {
      if (parameter.required) problems.push(`missing required parameter '${parameter.name}'`);
      continue;
    }
    if (!matchesType(value, parameter.schema.type)) {
      problems.push(`parameter '${parameter.name}' must be of type ${String(parameter.schema.type)}`);
    }
  }

  if (operation.requestBody) {
    const body = args.body;
    if (body === undefined || body === null) {
      if (operation.requestBody.required) problems.push("missing required request 'body'");
    } else if (!matchesType(body, operation.requestBody.schema.type)) {
      problems.push(`request 'body' must be of type ${String(operation.requestBody.schema.type)}`);
    }
  }
  return problems;
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * HTTP request for validated arguments
 */
export function buildActionRequest(
  operation: ActionOperation,
  args: Record<string, unknown>,
  extraHeaders: Record<string, string> = {}
): ActionRequest {
  let path = operation.path;
  const query = new URLSearchParams();
  const headers: Record<string, string> = { Accept: 'application/json', ...extraHeaders };

  for (const parameter of operation.parameters) {
    const value = args[parameter.name];
    if (value === undefined || value === null) continue;

    switch (parameter.in) {
      case 'path':
        path = path.replace(`{${parameter.name}}`, encodeURIComponent(formatValue(value)));
        break;
      case 'query':
        query.append(parameter.name, formatValue(value));
        break;
      case 'header':
        headers[parameter.name] = formatValue(value);
        break;
    }
  }

  const search = query.toString();
  const url = `${operation.baseUrl.replace(/\/+$/, '')}${path}${search ? `?${search}` : ''}`;

  const request: ActionRequest = { method: operation.method.toUpperCase(), url, headers };
  if (operation.requestBody && args.body !== undefined && args.body !== null) {
    request.body = JSON.stringify(args.body);
    headers['Content-Type'] = 'application/json';
  }
  return request;
}
