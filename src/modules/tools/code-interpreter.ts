/**
 * Code interpreter sandbox client
 */

import { z } from 'zod';
import { SandboxExecutionError, TransientCollaboratorError } from '../errors';

export interface SandboxFile {
  name: string;
  bytes: number;
}

export interface SandboxResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  files: SandboxFile[];
}

export interface SandboxRunOptions {
  timeoutMs: number;
  allowNetwork: boolean;
  signal: AbortSignal;
}

/**
 * Isolated code execution
 */
export interface Sandbox {
  run(code: string, options: SandboxRunOptions): Promise<SandboxResult>;
}

const SandboxResponseSchema = z.object({
  stdout: z.string().default(''),
  stderr: z.string().default(''),
  exit_code: z.number().int(),
  timed_out: z.boolean().default(false),
  files: z.array(z.object({ name: z.string(), bytes: z.number().int().nonnegative() })).default([]),
});

/**
 * Sandbox reached over HTTP: POST {code, timeout_ms, allow_network} to /execute
 */
export class HttpSandbox implements Sandbox {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async run(code: string, options: SandboxRunOptions): Promise<SandboxResult> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/execute`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ code, timeout_ms: options.timeoutMs, allow_network: options.allowNetwork }),
        signal: options.signal,
      });
    } catch (error) {
      if (options.signal.aborted) {
        throw options.signal.reason;
      }
      throw new TransientCollaboratorError('sandbox', 'Sandbox is unreachable', { cause: error });
    }

    if (response.status === 429 || response.status >= 500) {
      throw new TransientCollaboratorError('sandbox', `Sandbox responded with status ${response.status}`, {
        rateLimited: response.status === 429,
      });
    }
    if (!response.ok) {
      throw new Error(`Sandbox rejected the request with status ${response.status}`);
    }

    const parsed = SandboxResponseSchema.parse(await response.json());
    return {
      stdout: parsed.stdout,
      stderr: parsed.stderr,
      exitCode: parsed.exit_code,
      timedOut: parsed.timed_out,
      files: parsed.files,
    };
  }
}

/**
 * Throws SandboxExecutionError when the code exited non-zero or timed out.
 * The error keeps the output and files the execution produced.
 */
export function assertSandboxSucceeded(result: SandboxResult): SandboxResult {
  const captured = { stdout: result.stdout, stderr: result.stderr, files: result.files, exitCode: result.exitCode };
  if (result.timedOut) {
    throw new SandboxExecutionError('Execution timed out', { ...captured, timedOut: true });
  }
  if (result.exitCode !== 0) {
    throw new SandboxExecutionError(result.stderr.trim() || `Process exited with code ${result.exitCode}`, captured);
  }
  return result;
}

export function formatSandboxOutput(result: SandboxResult): string {
  return JSON.stringify({ stdout: result.stdout, files: result.files });
}

export function formatSandboxError(error: SandboxExecutionError): string {
  const stderr = error.stderr.trim();
  return JSON.stringify({
    stdout: error.stdout,
    files: error.files,
    error: error.message,
    ...(stderr !== '' && stderr !== error.message && { stderr }),
  });
}
