import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { API_KEY, createTestApp, textTurn, toolTurn, type TestApp } from '../../test/harness';

function request(method: string, path: string, body?: unknown, headers: Record<string, string> = {}): Request {
  return new Request(`http://localhost${path}`, {
    method,
    headers: {
      Authorization: `Bearer ${API_KEY}`,
      ...(body !== undefined && { 'Content-Type': 'application/json' }),
      ...headers,
    },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

describe('HTTP API', () => {
  let app: TestApp;

  const send = (method: string, path: string, body?: unknown, headers?: Record<string, string>) =>
    app.router.handle(request(method, path, body, headers));

  beforeEach(async () => {
    app = await createTestApp({ EXPOSE_ERROR_DETAILS: true });
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health without authentication', async () => {
    const response = await app.router.handle(new Request('http://localhost/health'));

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'healthy',
      dependencies: { database: 'up' },
      details: {
        queue_depth: 0,
        workers: { running: false, active: 0, processed: 0, abandoned: 0 },
      },
    });
  });

  it('rejects requests without a valid token', async () => {
    const missing = await app.router.handle(new Request('http://localhost/v1/assistants'));
    expect(missing.status).toBe(401);
    expect(await missing.json()).toMatchObject({
      error: { type: 'authentication_error', message: 'Missing authentication token' },
    });

    const wrong = await send('GET', '/v1/assistants', undefined, { Authorization: 'Bearer not-the-key' });
    expect(wrong.status).toBe(401);
  });

  it('distinguishes unknown routes from unsupported methods', async () => {
    const unknown = await send('GET', '/v1/unknown');
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toMatchObject({ error: { message: "Route with id '/v1/unknown' not found" } });

    const method = await send('DELETE', '/v1/threads/thread_1/runs');
    expect(method.status).toBe(405);
    expect(await method.json()).toMatchObject({
      error: { type: 'method_not_allowed', message: 'Method DELETE is not allowed on /v1/threads/thread_1/runs' },
    });
  });

  it('keys request metrics by route pattern', async () => {
    const logged = await createTestApp({ LOG_REQUESTS: true });
    try {
      await logged.router.handle(request('GET', '/v1/threads/thread_1'));
      await logged.router.handle(request('GET', '/v1/threads/thread_2'));
      await logged.router.handle(request('GET', '/v1/nothing/thread_3'));

      const metrics = await (await logged.router.handle(request('GET', '/metrics'))).json();
      expect(Object.keys(metrics.endpoint_metrics)).toEqual(['GET /v1/threads/{thread_id}', 'GET (unmatched)']);
      expect(metrics.endpoint_metrics['GET /v1/threads/{thread_id}']).toMatchObject({ request_count: 2, error_count: 2 });
    } finally {
      await logged.close();
    }
  });

  it('answers CORS preflight requests', async () => {
    const response = await app.router.handle(new Request('http://localhost/v1/assistants', { method: 'OPTIONS' }));

    expect(response.status).toBe(204);
    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('*');
    expect(response.headers.get('Access-Control-Allow-Headers')).toBe(
      'Content-Type, Authorization, X-Owner-Id, X-Correlation-ID'
    );
  });

  it('validates request bodies', async () => {
    const invalid = await send('POST', '/v1/assistants', { name: 'No model' });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toMatchObject({ error: { message: 'Validation failed', param: 'model' } });

    const notJson = await app.router.handle(new Request('http://localhost/v1/threads', {
      method: 'POST',
      headers: { Authorization: `Bearer ${API_KEY}`, 'Content-Type': 'text/plain' },
      body: 'hello',
    }));
    expect(notJson.status).toBe(415);

    const badTools = await send('POST', '/v1/assistants', {
      model: 'gpt-test',
      tools: [
        { type: 'function', function: { name: 'lookup' } },
        { type: 'function', function: { name: 'lookup' } },
      ],
    });
    expect(badTools.status).toBe(400);
    expect(await badTools.json()).toMatchObject({
      error: { message: "Tool name 'lookup' is declared more than once", code: 'VALIDATION_ERROR' },
    });
  });

  it('scopes resources to the owner header', async () => {
    expect((await send('POST', '/v1/assistants', { model: 'gpt-test' })).status).toBe(200);

    expect((await send('GET', '/v1/assistants/asst_1')).status).toBe(200);
    const other = await send('GET', '/v1/assistants/asst_1', undefined, { 'X-Owner-Id': 'someone-else' });
    expect(other.status).toBe(404);

    const invalidOwner = await send('GET', '/v1/assistants', undefined, { 'X-Owner-Id': 'bad owner!' });
    expect(invalidOwner.status).toBe(400);
  });

  it('runs a function-calling conversation end to end', async () => {
    await send('POST', '/v1/assistants', {
      model: 'gpt-test',
      tools: [{ type: 'function', function: { name: 'get_weather', parameters: { type: 'object', properties: {} } } }],
    });
    await send('POST', '/v1/threads', { messages: [{ role: 'user', content: 'Weather in Oslo?' }] });

    const created = await send('POST', '/v1/threads/thread_1/runs', { assistant_id: 'asst_1' });
    expect(created.status).toBe(200);
    expect(await created.json()).toMatchObject({ id: 'run_1', object: 'thread.run', status: 'queued' });

    app.model.script(toolTurn(['get_weather', { city: 'Oslo' }]), textTurn('Light rain in Oslo.'));
    await app.consumer.drain();

    const waiting = await send('GET', '/v1/threads/thread_1/runs/run_1');
    expect(await waiting.json()).toMatchObject({
      status: 'requires_action',
      required_action: {
        type: 'submit_tool_outputs',
        submit_tool_outputs: { tool_calls: [{ id: 'call_1', function: { name: 'get_weather', arguments: '{"city":"Oslo"}' } }] },
      },
    });

    const wrong = await send('POST', '/v1/threads/thread_1/runs/run_1/submit_tool_outputs', {
      tool_outputs: [{ tool_call_id: 'call_7', output: 'rain' }],
    });
    expect(wrong.status).toBe(400);
    expect(await wrong.json()).toMatchObject({
      error: {
        message: 'Unknown or already resolved tool call ids: call_7',
        details: { expected_tool_call_ids: ['call_1'], received_tool_call_ids: ['call_7'] },
      },
    });

    const submitted = await send('POST', '/v1/threads/thread_1/runs/run_1/submit_tool_outputs', {
      tool_outputs: [{ tool_call_id: 'call_1', output: 'rain, 8C' }],
    });
    expect(submitted.status).toBe(200);
    expect(await submitted.json()).toMatchObject({ status: 'running', required_action: null });

    await app.consumer.drain();

    expect(await (await send('GET', '/v1/threads/thread_1/runs/run_1')).json()).toMatchObject({ status: 'completed' });
    const messages = await send('GET', '/v1/threads/thread_1/messages?order=asc');
    expect(await messages.json()).toMatchObject({
      object: 'list',
      data: [
        { role: 'user', content: [{ type: 'text', text: { value: 'Weather in Oslo?' } }] },
        { role: 'assistant', run_id: 'run_1', content: [{ type: 'text', text: { value: 'Light rain in Oslo.' } }] },
      ],
      has_more: false,
    });

    const steps = await send('GET', '/v1/threads/thread_1/runs/run_1/steps');
    expect(await steps.json()).toMatchObject({
      data: [
        { id: 'step_1_0', type: 'tool_calls', status: 'completed' },
        { id: 'step_2', type: 'message_creation', status: 'completed' },
      ],
    });
  });

  it('cancels a run over HTTP', async () => {
    await send('POST', '/v1/assistants', { model: 'gpt-test' });
    await send('POST', '/v1/threads', {});
    await send('POST', '/v1/threads/thread_1/runs', { assistant_id: 'asst_1' });

    const cancelled = await send('POST', '/v1/threads/thread_1/runs/run_1/cancel');
    expect(await cancelled.json()).toMatchObject({ status: 'cancelling' });

    await app.consumer.drain();
    expect(await (await send('GET', '/v1/threads/thread_1/runs/run_1')).json()).toMatchObject({ status: 'cancelled' });

    const again = await send('POST', '/v1/threads/thread_1/runs/run_1/cancel');
    expect(again.status).toBe(400);
  });

  it('refuses to delete an assistant or thread that runs reference', async () => {
    await send('POST', '/v1/assistants', { model: 'gpt-test' });
    await send('POST', '/v1/threads', {});
    await send('POST', '/v1/threads/thread_1/runs', { assistant_id: 'asst_1' });

    const assistant = await send('DELETE', '/v1/assistants/asst_1');
    expect(assistant.status).toBe(409);
    expect(await assistant.json()).toMatchObject({
      error: {
        type: 'conflict',
        code: 'CONFLICT',
        message: "Assistant 'asst_1' is referenced by runs and cannot be deleted",
      },
    });

    const thread = await send('DELETE', '/v1/threads/thread_1');
    expect(thread.status).toBe(409);
    expect(await thread.json()).toMatchObject({
      error: { type: 'conflict', code: 'CONFLICT', message: "Thread 'thread_1' has runs and cannot be deleted" },
    });

    expect(await app.store.getRun('run_1')).toMatchObject({ id: 'run_1', thread_id: 'thread_1' });
    expect(await app.store.getAssistant('asst_1')).toMatchObject({ id: 'asst_1' });
  });

  it('deletes a thread without runs together with its messages', async () => {
    await send('POST', '/v1/threads', { messages: [{ role: 'user', content: 'Hello' }] });

    const deleted = await send('DELETE', '/v1/threads/thread_1');
    expect(deleted.status).toBe(200);
    expect(await deleted.json()).toEqual({ id: 'thread_1', object: 'thread.deleted', deleted: true });

    expect(await app.store.getMessage('thread_1', 'msg_1')).toBeNull();
    expect((await send('DELETE', '/v1/threads/thread_1')).status).toBe(404);
  });

  it('serves chat completions without streaming', async () => {
    app.model.script(textTurn('Hello there.'));

    const response = await send('POST', '/v1/chat/completions', {
      model: 'gpt-test',
      messages: [{ role: 'user', content: 'Hi' }],
    });
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      object: 'chat.completion',
      choices: [{ message: { role: 'assistant', content: 'Hello there.' }, finish_reason: 'stop' }],
    });

    const streaming = await send('POST', '/v1/chat/completions', {
      model: 'gpt-test',
      messages: [{ role: 'user', content: 'Hi' }],
      stream: true,
    });
    expect(streaming.status).toBe(400);
    expect(await streaming.json()).toMatchObject({ error: { param: 'stream' } });
  });

  it('lists threads and files and updates run metadata', async () => {
    await send('POST', '/v1/threads', {});
    app.clock.advance(1000);
    await send('POST', '/v1/threads', { metadata: { topic: 'billing' } });

    const threads = await (await send('GET', '/v1/threads?order=asc')).json();
    expect(threads).toMatchObject({ object: 'list', first_id: 'thread_1', last_id: 'thread_2', has_more: false });
    expect((await (await send('GET', '/v1/threads?limit=1')).json()).data.map((thread: { id: string }) => thread.id))
      .toEqual(['thread_2']);

    const form = new FormData();
    form.append('file', new Blob(['Opening hours are 9 to 5.']), 'hours.txt');
    form.append('purpose', 'retrieval');
    await app.router.handle(new Request('http://localhost/v1/files', {
      method: 'POST',
      headers: { Authorization: `Bearer ${API_KEY}` },
      body: form,
    }));
    expect((await (await send('GET', '/v1/files?purpose=retrieval')).json()).data).toHaveLength(1);
    expect((await (await send('GET', '/v1/files?purpose=assistants')).json()).data).toHaveLength(0);

    await send('POST', '/v1/assistants', { model: 'gpt-test' });
    await send('POST', '/v1/threads/thread_1/runs', { assistant_id: 'asst_1', metadata: { source: 'web' } });
    const updated = await send('POST', '/v1/threads/thread_1/runs/run_1', { metadata: { source: 'mobile' } });
    expect(await updated.json()).toMatchObject({ id: 'run_1', status: 'queued', version: 0, metadata: { source: 'mobile' } });
    expect(await app.store.getRun('run_1')).toMatchObject({ version: 0, metadata: { source: 'mobile' } });
  });

  it('uploads files and serves their content', async () => {
    const form = new FormData();
    form.append('file', new Blob(['Opening hours are 9 to 5.']), 'hours.txt');
    form.append('purpose', 'assistants');

    const uploaded = await app.router.handle(new Request('http://localhost/v1/files', {
      method: 'POST',
      headers: { Authorization: `Bearer ${API_KEY}` },
      body: form,
    }));
    expect(uploaded.status).toBe(200);
    expect(await uploaded.json()).toMatchObject({
      id: 'file_1',
      object: 'file',
      filename: 'hours.txt',
      bytes: 25,
      purpose: 'assistants',
      status: 'processed',
    });

    const content = await send('GET', '/v1/files/file_1/content');
    expect(content.headers.get('Content-Type')).toBe('application/octet-stream');
    expect(await content.text()).toBe('Opening hours are 9 to 5.');

    expect((await app.store.listChunks(['file_1'])).map(chunk => chunk.data)).toEqual(['Opening hours are 9 to 5.']);
  });
});
