import { afterEach, describe, expect, it, vi } from 'vitest';
import { SandboxExecutionError, TransientCollaboratorError } from '../errors';
import {
  HttpSandbox,
  assertSandboxSucceeded,
  formatSandboxError,
  formatSandboxOutput,
  type SandboxResult,
} from './code-interpreter';

const result = (overrides: Partial<SandboxResult> = {}): SandboxResult => ({
  stdout: '',
  stderr: '',
  exitCode: 0,
  timedOut: false,
  files: [],
  ...overrides,
});

describe('assertSandboxSucceeded', () => {
  it('passes a clean exit through', () => {
    const ok = result({ stdout: '23\n' });
    expect(assertSandboxSucceeded(ok)).toBe(ok);
    expect(formatSandboxOutput(ok)).toBe('{"stdout":"23\\n","files":[]}');
  });

  it('reports stderr of a failed execution', () => {
    try {
      assertSandboxSucceeded(result({ stdout: 'partial', stderr: 'ZeroDivisionError: division by zero\n', exitCode: 1 }));
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof SandboxExecutionError)) throw error;
      expect(error.message).toBe('ZeroDivisionError: division by zero');
      expect(formatSandboxError(error)).toBe(
        '{"stdout":"partial","files":[],"error":"ZeroDivisionError: division by zero"}'
      );
    }
  });

  it('reports the exit code when stderr is empty', () => {
    expect(() => assertSandboxSucceeded(result({ exitCode: 137 }))).toThrow('Process exited with code 137');
  });

  it('reports a timeout', () => {
    expect(() => assertSandboxSucceeded(result({ timedOut: true, exitCode: -1 }))).toThrow('Execution timed out');
  });

  it('keeps generated files and stderr of a failed execution', () => {
    try {
      assertSandboxSucceeded(result({
        stdout: 'step 1\n',
        stderr: 'still working\n',
        timedOut: true,
        exitCode: -1,
        files: [{ name: 'partial.csv', bytes: 64 }],
      }));
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof SandboxExecutionError)) throw error;
      expect(error.files).toEqual([{ name: 'partial.csv', bytes: 64 }]);
      expect(formatSandboxError(error)).toBe(
        '{"stdout":"step 1\\n","files":[{"name":"partial.csv","bytes":64}],"error":"Execution timed out","stderr":"still working"}'
      );
    }
  });
});

describe('HttpSandbox', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the code and maps the response', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({
      stdout: '23\n',
      exit_code: 0,
      files: [{ name: 'plot.png', bytes: 512 }],
    })));
    vi.stubGlobal('fetch', fetchMock);

    const sandbox = new HttpSandbox('http://sandbox.test/');
    const output = await sandbox.run('print(3*7+2)', {
      timeoutMs: 1000,
      allowNetwork: false,
      signal: new AbortController().signal,
    });

    expect(output).toEqual({
      stdout: '23\n',
      stderr: '',
      exitCode: 0,
      timedOut: false,
      files: [{ name: 'plot.png', bytes: 512 }],
    });
    expect(fetchMock).toHaveBeenCalledWith('http://sandbox.test/execute', expect.objectContaining({
      method: 'POST',
      body: '{"code":"print(3*7+2)","timeout_ms":1000,"allow_network":false}',
    }));
  });

  it('treats server errors as transient', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('busy', { status: 503 })));

    const sandbox = new HttpSandbox('http://sandbox.test');
    await expect(sandbox.run('1', {
      timeoutMs: 1000,
      allowNetwork: false,
      signal: new AbortController().signal,
    })).rejects.toBeInstanceOf(TransientCollaboratorError);
  });
});
