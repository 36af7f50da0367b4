import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PersistenceError } from '../errors';
import type { Assistant, Run, Thread } from '../models';
import { ModelClientError } from '../openai-wrapper';
import { CreateAssistantRequest, CreateRunRequest, CreateThreadRequest } from '../validators';
import {
  OWNER,
  createTestApp,
  sandboxResult,
  textTurn,
  toolTurn,
  unwrap,
  type TestApp,
} from '../../test/harness';

const weatherTool = {
  type: 'function',
  function: {
    name: 'get_weather',
    description: 'Current weather for a city',
    parameters: { type: 'object', properties: { city: { type: 'string' } }, required: ['city'] },
  },
};

interface Started {
  assistant: Assistant;
  thread: Thread;
  run: Run;
}

async function startRun(
  app: TestApp,
  options: { tools?: unknown[]; messages?: unknown[]; fileIds?: string[] } = {}
): Promise<Started> {
  const assistant = unwrap(await app.services.assistants.create(OWNER, CreateAssistantRequest.parse({
    model: 'gpt-test',
    instructions: 'Be brief.',
    tools: options.tools ?? [],
    file_ids: options.fileIds ?? [],
  })));
  const thread = unwrap(await app.services.threads.create(OWNER, CreateThreadRequest.parse({
    messages: options.messages ?? [{ content: 'What is the weather in Paris?' }],
  })));
  const run = unwrap(await app.services.runs.create(OWNER, thread.id, CreateRunRequest.parse({
    assistant_id: assistant.id,
  })));
  return { assistant, thread, run };
}

async function reload(app: TestApp, run: Run): Promise<Run> {
  return unwrap(await app.services.runs.get(OWNER, run.thread_id, run.id));
}

async function threadTexts(app: TestApp, threadId: string): Promise<string[]> {
  const page = unwrap(await app.services.messages.list(OWNER, threadId, { limit: 100, order: 'asc' }));
  return page.data.map(message => message.content
    .map(part => part.type === 'text' ? part.text.value : '')
    .join(''));
}

function statusChanges(app: TestApp, runId: string): unknown[] {
  return app.logs
    .filter(entry => entry.message === 'Run status changed' && entry.run_id === runId)
    .map(entry => entry.to);
}

describe('RunExecutionEngine', () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('function tools', () => {
    it('pauses for the caller and completes once outputs are submitted', async () => {
      app.model.script(
        toolTurn(['get_weather', { city: 'Paris' }]),
        textTurn('It is 21 degrees in Paris.')
      );
      const { thread, run } = await startRun(app, { tools: [weatherTool] });

      expect(await app.consumer.drain()).toBe(1);

      const waiting = await reload(app, run);
      expect(waiting.status).toBe('requires_action');
      expect(waiting.required_action).toEqual({
        type: 'submit_tool_outputs',
        submit_tool_outputs: {
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_weather', arguments: '{"city":"Paris"}' } }],
        },
      });

      const resumed = unwrap(await app.services.runs.submitToolOutputs(OWNER, thread.id, run.id, {
        tool_outputs: [{ tool_call_id: 'call_1', output: '{"temp_c":21}' }],
      }));
      expect(resumed.status).toBe('running');
      expect(resumed.required_action).toBeNull();

      expect(await app.consumer.drain()).toBe(1);

      const finished = await reload(app, run);
      expect(finished.status).toBe('completed');
      expect(finished.completed_at).toBe(1704067200);
      expect(await threadTexts(app, thread.id)).toEqual(['What is the weather in Paris?', 'It is 21 degrees in Paris.']);

      expect(app.model.requests).toHaveLength(2);
      expect(app.model.requests[0]?.instructions).toBe('Be brief.');
      expect(app.model.requests[0]?.tools.map(tool => tool.name)).toEqual(['get_weather']);
      expect(app.model.requests[1]?.messages).toEqual([
        { role: 'user', content: 'What is the weather in Paris?' },
        { role: 'assistant', content: null, tool_calls: [{ id: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' }] },
        { role: 'tool', tool_call_id: 'call_1', content: '{"temp_c":21}' },
      ]);
    });

    it('rejects a submission that does not cover every open call', async () => {
      app.model.script(toolTurn(['get_weather', { city: 'Paris' }], ['get_weather', { city: 'Oslo' }]));
      const { thread, run } = await startRun(app, { tools: [weatherTool] });
      await app.consumer.drain();

      const subset = await app.services.runs.submitToolOutputs(OWNER, thread.id, run.id, {
        tool_outputs: [{ tool_call_id: 'call_1', output: 'sunny' }],
      });
      expect(subset).toEqual({
        success: false,
        error: 'Missing outputs for tool call ids: call_2',
        code: 'VALIDATION_ERROR',
        details: { expected_tool_call_ids: ['call_1', 'call_2'], received_tool_call_ids: ['call_1'] },
      });

      const unknown = await app.services.runs.submitToolOutputs(OWNER, thread.id, run.id, {
        tool_outputs: [
          { tool_call_id: 'call_1', output: 'sunny' },
          { tool_call_id: 'call_2', output: 'rain' },
          { tool_call_id: 'call_9', output: 'snow' },
        ],
      });
      expect(unknown.error).toBe('Unknown or already resolved tool call ids: call_9');

      const duplicate = await app.services.runs.submitToolOutputs(OWNER, thread.id, run.id, {
        tool_outputs: [{ tool_call_id: 'call_1', output: 'a' }, { tool_call_id: 'call_1', output: 'b' }],
      });
      expect(duplicate.error).toBe('Each tool call may receive only one output');

      const unchanged = await reload(app, run);
      expect(unchanged.status).toBe('requires_action');
      expect((await app.store.listToolCalls(run.id)).map(call => call.output)).toEqual([null, null]);

      const exact = unwrap(await app.services.runs.submitToolOutputs(OWNER, thread.id, run.id, {
        tool_outputs: [{ tool_call_id: 'call_2', output: 'rain' }, { tool_call_id: 'call_1', output: 'sunny' }],
      }));
      expect(exact.status).toBe('running');
      expect((await app.store.listToolCalls(run.id)).map(call => call.output)).toEqual(['sunny', 'rain']);
    });

    it('refuses outputs once the run no longer requires action', async () => {
      app.model.script(textTurn('Hello.'));
      const { thread, run } = await startRun(app);
      await app.consumer.drain();

      const result = await app.services.runs.submitToolOutputs(OWNER, thread.id, run.id, {
        tool_outputs: [{ tool_call_id: 'call_1', output: 'late' }],
      });
      expect(result.code).toBe('VALIDATION_ERROR');
      expect(result.error).toBe('Run is completed; tool outputs are only accepted while it requires action');
    });

    it('fails the run when the model asks for a tool it was not given', async () => {
      app.model.script(toolTurn(['delete_everything', {}]));
      const { run } = await startRun(app, { tools: [weatherTool] });
      await app.consumer.drain();

      const failed = await reload(app, run);
      expect(failed.status).toBe('failed');
      expect(failed.last_error).toEqual({
        code: 'invalid_tool_call',
        message: "Model requested unknown tool 'delete_everything'",
      });
    });
  });

  describe('code interpreter', () => {
    it('runs the code and feeds its output back to the model', async () => {
      app.sandbox.handler = () => sandboxResult({ stdout: '23\n' });
      app.model.script(
        toolTurn(['code_interpreter', { code: 'print(3*7+2)' }]),
        textTurn('3*7+2 is 23.')
      );
      const { thread, run } = await startRun(app, {
        tools: [{ type: 'code_interpreter' }],
        messages: [{ content: 'What is 3*7+2?' }],
      });

      expect(await app.consumer.drain()).toBe(1);

      expect(app.sandbox.executed).toEqual(['print(3*7+2)']);
      expect((await reload(app, run)).status).toBe('completed');
      expect(app.model.requests[1]?.messages[2]).toEqual({
        role: 'tool',
        tool_call_id: 'call_1',
        content: '{"stdout":"23\\n","files":[]}',
      });
      expect(await threadTexts(app, thread.id)).toEqual(['What is 3*7+2?', '3*7+2 is 23.']);
      expect(statusChanges(app, run.id)).toEqual(['running', 'completed']);

      const steps = unwrap(await app.services.runs.listSteps(OWNER, thread.id, run.id));
      expect(steps.data.map(step => [step.id, step.type, step.status])).toEqual([
        ['step_1_0', 'tool_calls', 'completed'],
        ['step_2', 'message_creation', 'completed'],
      ]);
    });

    it('fails with sandbox_exhausted after repeated execution errors', async () => {
      app.sandbox.handler = () => sandboxResult({ stderr: 'NameError: name x is not defined', exitCode: 1 });
      const attempt = toolTurn(['code_interpreter', { code: 'print(x)' }]);
      app.model.script(attempt, attempt, attempt);
      const { run } = await startRun(app, { tools: [{ type: 'code_interpreter' }] });

      await app.consumer.drain();

      const failed = await reload(app, run);
      expect(failed.status).toBe('failed');
      expect(failed.last_error).toEqual({ code: 'sandbox_exhausted', message: 'Code execution failed 3 times' });
      expect(app.sandbox.executed).toHaveLength(3);
      expect(app.model.requests).toHaveLength(3);
      expect(app.model.requests[1]?.messages[2]).toEqual({
        role: 'tool',
        tool_call_id: 'call_1',
        content: '{"stdout":"","files":[],"error":"NameError: name x is not defined"}',
      });
    });

    it('resumes an interrupted attempt without asking the model again', async () => {
      app.model.script(
        toolTurn(['code_interpreter', { code: 'print(3*7+2)' }]),
        textTurn('23')
      );
      const { run } = await startRun(app, { tools: [{ type: 'code_interpreter' }] });

      const stopping = new AbortController();
      app.sandbox.handler = () => {
        stopping.abort(new Error('worker stopping'));
        return new Promise<never>(() => {});
      };
      expect(await app.engine.processRun(run.id, stopping.signal)).toBe('abandon');

      const interrupted = await reload(app, run);
      expect(interrupted.status).toBe('running');
      expect((await app.store.listToolCalls(run.id)).map(call => call.output)).toEqual([null]);

      app.sandbox.handler = () => sandboxResult({ stdout: '23\n' });
      expect(await app.engine.processRun(run.id, new AbortController().signal)).toBe('release');

      expect((await reload(app, run)).status).toBe('completed');
      expect(app.model.requests).toHaveLength(2);
      expect(app.sandbox.executed).toEqual(['print(3*7+2)', 'print(3*7+2)']);
      expect(await app.store.listToolCalls(run.id)).toHaveLength(1);
    });
  });

  describe('retrieval', () => {
    it('answers from uploaded files with citations and never requires action', async () => {
      const file = unwrap(await app.services.files.upload(OWNER, {
        filename: 'policy.txt',
        purpose: 'assistants',
        data: new TextEncoder().encode('Refunds are accepted within 30 days of purchase.'),
      }));
      app.model.script(
        toolTurn(['retrieval', { query: 'refund window' }]),
        textTurn('You have 30 days [1].')
      );
      const { thread, run } = await startRun(app, {
        tools: [{ type: 'retrieval' }],
        fileIds: [file.id],
        messages: [{ content: 'How many days do I have for refunds?' }],
      });

      await app.consumer.drain();

      const finished = await reload(app, run);
      expect(finished.status).toBe('completed');
      expect(finished.required_action).toBeNull();
      expect(statusChanges(app, run.id)).toEqual(['running', 'completed']);

      const [call] = await app.store.listToolCalls(run.id);
      expect(call?.output).toBe(JSON.stringify({
        sources: [{
          index: 1,
          file_id: 'file_1',
          start_index: 0,
          end_index: 48,
          text: 'Refunds are accepted within 30 days of purchase.',
        }],
      }));

      const messages = unwrap(await app.services.messages.list(OWNER, thread.id, { limit: 10, order: 'desc' }));
      expect(messages.data[0]?.content).toEqual([{
        type: 'text',
        text: {
          value: 'You have 30 days [1].',
          annotations: [{
            type: 'file_citation',
            text: '[1]',
            start_index: 17,
            end_index: 20,
            file_citation: { file_id: 'file_1', quote: 'Refunds are accepted within 30 days of purchase.' },
          }],
        },
      }]);
    });

    it('returns an empty result when no files are attached', async () => {
      app.model.script(toolTurn(['retrieval', { query: 'anything' }]), textTurn('I could not find that.'));
      const { run } = await startRun(app, { tools: [{ type: 'retrieval' }] });

      await app.consumer.drain();

      const [call] = await app.store.listToolCalls(run.id);
      expect(call?.output).toBe('{"sources":[],"message":"No relevant documents were found."}');
      expect((await reload(app, run)).status).toBe('completed');
    });
  });

  describe('actions', () => {
    it('calls the operation and returns the response as the tool output', async () => {
      app.actionCaller.handler = () => ({ status: 200, body: '{"state":"shipped"}' });
      app.model.script(toolTurn(['getOrder', { order_id: 'o-42' }]), textTurn('Your order has shipped.'));
      const { run } = await startRun(app, {
        tools: [{
          type: 'action',
          action: {
            openapi: {
              servers: [{ url: 'https://orders.example.test' }],
              paths: {
                '/orders/{order_id}': {
                  get: { operationId: 'getOrder', parameters: [{ name: 'order_id', in: 'path', schema: { type: 'string' } }] },
                },
              },
            },
            headers: { Authorization: 'Bearer test-secret' },
          },
        }],
      });

      await app.consumer.drain();

      expect(app.actionCaller.requests).toEqual([{
        method: 'GET',
        url: 'https://orders.example.test/orders/o-42',
        headers: { Accept: 'application/json', Authorization: 'Bearer test-secret' },
      }]);
      const [call] = await app.store.listToolCalls(run.id);
      expect(call?.output).toBe('{"status":200,"body":"{\\"state\\":\\"shipped\\"}"}');
      expect(call?.is_error).toBe(false);
      expect((await reload(app, run)).status).toBe('completed');
    });
  });

  describe('model failures', () => {
    it('fails with server_error once transient failures use up the attempts', async () => {
      const outage = () => new ModelClientError('transient', 'upstream unavailable', { status: 503 });
      app.model.script(outage(), outage(), outage());
      const { run } = await startRun(app);

      await app.consumer.drain();

      const failed = await reload(app, run);
      expect(failed.status).toBe('failed');
      expect(failed.failed_at).toBe(1704067200);
      expect(failed.last_error).toEqual({ code: 'server_error', message: 'Model call failed: upstream unavailable' });
      expect(app.model.requests).toHaveLength(3);
    });

    it('recovers when a retry succeeds', async () => {
      app.model.script(new ModelClientError('transient', 'blip'), textTurn('Done.'));
      const { run } = await startRun(app);

      await app.consumer.drain();

      expect((await reload(app, run)).status).toBe('completed');
      expect(app.model.requests).toHaveLength(2);
    });

    it('reports a persistent rate limit as rate_limit', async () => {
      const limited = () => new ModelClientError('rate_limit', 'slow down', { status: 429 });
      app.model.script(limited(), limited(), limited());
      const { run } = await startRun(app);

      await app.consumer.drain();

      expect((await reload(app, run)).last_error).toEqual({ code: 'rate_limit', message: 'Model rate limit: slow down' });
    });

    it('leaves the run for redelivery when the failure cannot be recorded', async () => {
      const outage = () => new ModelClientError('transient', 'upstream unavailable', { status: 503 });
      app.model.script(outage(), outage(), outage(), outage(), outage(), outage());
      const { run } = await startRun(app);

      const updateRun = app.store.updateRun.bind(app.store);
      let refused = false;
      vi.spyOn(app.store, 'updateRun').mockImplementation(async (next, expectedVersion) => {
        if (next.status === 'failed' && !refused) {
          refused = true;
          throw new PersistenceError('disk I/O error');
        }
        return updateRun(next, expectedVersion);
      });

      expect(await app.consumer.drain()).toBe(1);
      expect((await reload(app, run)).status).toBe('running');
      expect(app.consumer.getStats().abandoned).toBe(1);
      expect(await app.queue.depth()).toBe(1);
      expect(app.logs.some(entry => entry.message === 'Could not mark run as failed, leaving run for redelivery')).toBe(true);

      app.clock.advance(30_000);
      expect(await app.consumer.drain()).toBe(1);

      const failed = await reload(app, run);
      expect(failed.status).toBe('failed');
      expect(failed.failed_at).toBe(1704067230);
      expect(failed.last_error).toEqual({ code: 'server_error', message: 'Model call failed: upstream unavailable' });
      expect(app.model.requests).toHaveLength(6);
      expect(await app.queue.depth()).toBe(0);
    });

    it('truncates the history once when the context window overflows', async () => {
      app.model.script(new ModelClientError('context_length', 'too many tokens'), textTurn('Short answer.'));
      const { run } = await startRun(app, {
        messages: [
          { content: 'one' },
          { role: 'assistant', content: 'two' },
          { content: 'three' },
          { role: 'assistant', content: 'four' },
          { content: 'five' },
        ],
      });

      await app.consumer.drain();

      expect((await reload(app, run)).status).toBe('completed');
      expect(app.model.requests[0]?.messages).toHaveLength(5);
      expect(app.model.requests[1]?.messages).toEqual([
        { role: 'user', content: 'three' },
        { role: 'assistant', content: 'four' },
        { role: 'user', content: 'five' },
      ]);
    });

    it('fails with context_exceeded when truncation is not enough', async () => {
      const overflow = () => new ModelClientError('context_length', 'too many tokens');
      app.model.script(overflow(), overflow());
      const { run } = await startRun(app);

      await app.consumer.drain();

      expect((await reload(app, run)).last_error).toEqual({
        code: 'context_exceeded',
        message: 'Conversation exceeds the model context window',
      });
    });
  });

  describe('deadlines and cancellation', () => {
    it('expires a queued run past its deadline without calling the model', async () => {
      const { run } = await startRun(app);
      app.clock.advance(601_000);

      expect(await app.engine.sweepExpiredRuns()).toBe(1);
      expect((await reload(app, run)).status).toBe('expired');

      expect(await app.consumer.drain()).toBe(1);
      expect(app.model.requests).toHaveLength(0);
      expect(statusChanges(app, run.id)).toEqual(['expired']);
    });

    it('leaves an overdue run alone while a worker holds its lease', async () => {
      const { run } = await startRun(app);
      const handle = await app.queue.pop(700_000);
      expect(handle?.runId).toBe(run.id);

      app.clock.advance(601_000);
      expect(await app.engine.sweepExpiredRuns()).toBe(0);
      expect((await reload(app, run)).status).toBe('queued');

      await handle?.abandon();
      app.clock.advance(100_000);
      expect(await app.engine.sweepExpiredRuns()).toBe(1);
      expect((await reload(app, run)).status).toBe('expired');
    });

    it('expires an overdue run when a worker picks it up', async () => {
      const { run } = await startRun(app);
      app.clock.advance(600_000);

      await app.consumer.drain();

      expect((await reload(app, run)).status).toBe('expired');
      expect(app.model.requests).toHaveLength(0);
    });

    it('cancels a run that is waiting on tool outputs', async () => {
      app.model.script(toolTurn(['get_weather', { city: 'Paris' }]));
      const { thread, run } = await startRun(app, { tools: [weatherTool] });
      await app.consumer.drain();

      const cancelling = unwrap(await app.services.runs.cancel(OWNER, thread.id, run.id));
      expect(cancelling.status).toBe('cancelling');

      expect(await app.consumer.drain()).toBe(1);

      const cancelled = await reload(app, run);
      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.cancelled_at).toBe(1704067200);
      expect(cancelled.required_action).toBeNull();

      const again = await app.services.runs.cancel(OWNER, thread.id, run.id);
      expect(again.error).toBe("Cannot cancel run with status 'cancelled'");
    });

    it('stops between tool calls of a round once the run is cancelled', async () => {
      app.sandbox.handler = () => sandboxResult({ stdout: '1\n' });
      app.model.script(toolTurn(
        ['code_interpreter', { code: 'print(1)' }],
        ['code_interpreter', { code: 'print(2)' }]
      ));
      const { thread, run } = await startRun(app, { tools: [{ type: 'code_interpreter' }] });

      const getRun = app.store.getRun.bind(app.store);
      let cancelled = false;
      vi.spyOn(app.store, 'getRun').mockImplementation(async id => {
        if (!cancelled && app.sandbox.executed.length === 1) {
          cancelled = true;
          unwrap(await app.services.runs.cancel(OWNER, thread.id, run.id));
        }
        return getRun(id);
      });

      await app.consumer.drain();

      expect((await reload(app, run)).status).toBe('cancelled');
      expect(app.sandbox.executed).toEqual(['print(1)']);
      expect((await app.store.listToolCalls(run.id)).map(call => call.output)).toEqual([
        '{"stdout":"1\\n","files":[]}',
        null,
      ]);
      expect(app.model.requests).toHaveLength(1);
    });

    it('cancels a queued run before the model is called', async () => {
      const { thread, run } = await startRun(app);
      unwrap(await app.services.runs.cancel(OWNER, thread.id, run.id));

      await app.consumer.drain();

      expect((await reload(app, run)).status).toBe('cancelled');
      expect(app.model.requests).toHaveLength(0);
    });
  });

  describe('redelivery', () => {
    it('leaves a completed run untouched when it is delivered again', async () => {
      app.model.script(textTurn('Only once.'));
      const { thread, run } = await startRun(app);
      await app.consumer.drain();

      await app.queue.push(run.id);
      expect(await app.consumer.drain()).toBe(1);

      expect(await threadTexts(app, thread.id)).toEqual(['What is the weather in Paris?', 'Only once.']);
      expect(app.model.requests).toHaveLength(1);
      expect((await reload(app, run)).version).toBe(2);
    });

    it('does not execute a tool again once its output is stored', async () => {
      app.model.script(
        toolTurn(['code_interpreter', { code: 'print(1)' }], ['code_interpreter', { code: 'print(2)' }]),
        textTurn('1 and 2')
      );
      const { run } = await startRun(app, { tools: [{ type: 'code_interpreter' }] });

      const stopping = new AbortController();
      app.sandbox.handler = code => {
        if (code === 'print(2)' && !stopping.signal.aborted) {
          stopping.abort(new Error('worker stopping'));
          return new Promise<never>(() => {});
        }
        return sandboxResult({ stdout: code === 'print(1)' ? '1\n' : '2\n' });
      };
      expect(await app.engine.processRun(run.id, stopping.signal)).toBe('abandon');
      expect((await app.store.listToolCalls(run.id)).map(call => call.output)).toEqual([
        '{"stdout":"1\\n","files":[]}',
        null,
      ]);

      expect(await app.engine.processRun(run.id, new AbortController().signal)).toBe('release');

      expect((await reload(app, run)).status).toBe('completed');
      expect(app.sandbox.executed).toEqual(['print(1)', 'print(2)', 'print(2)']);
      expect((await app.store.listToolCalls(run.id)).map(call => call.output)).toEqual([
        '{"stdout":"1\\n","files":[]}',
        '{"stdout":"2\\n","files":[]}',
      ]);
      expect(app.model.requests).toHaveLength(2);
    });
  });

  describe('round limit', () => {
    it('fails with max_rounds_exceeded when the model keeps asking for tools', async () => {
      await app.close();
      app = await createTestApp({ ENGINE_MAX_ROUNDS: 2 });
      app.sandbox.handler = () => sandboxResult({ stdout: '1\n' });
      const again = toolTurn(['code_interpreter', { code: 'print(1)' }]);
      app.model.script(again, again, again);
      const { run } = await startRun(app, { tools: [{ type: 'code_interpreter' }] });

      await app.consumer.drain();

      const failed = await reload(app, run);
      expect(failed.last_error).toEqual({ code: 'max_rounds_exceeded', message: 'Model requested tools after 2 rounds' });
      expect(app.sandbox.executed).toHaveLength(2);
      expect(app.model.requests).toHaveLength(3);
    });
  });
});
