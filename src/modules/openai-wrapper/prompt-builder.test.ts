import { describe, expect, it } from 'vitest';
import type { Message, ToolCall } from '../models';
import { PromptBuilder } from './prompt-builder';

function message(position: number, role: Message['role'], text: string): Message {
  return {
    id: `msg_${position}`,
    object: 'thread.message',
    thread_id: 'thread_1',
    owner_id: 'owner',
    position,
    role,
    content: [{ type: 'text', text: { value: text, annotations: [] } }],
    assistant_id: null,
    run_id: null,
    file_ids: [],
    metadata: {},
    created_at: 1,
  };
}

function call(id: string, round: number, output: string | null): ToolCall {
  return {
    id,
    run_id: 'run_1',
    thread_id: 'thread_1',
    round,
    position: 0,
    type: 'function',
    name: 'get_weather',
    arguments: '{"city":"Paris"}',
    output,
    is_error: false,
    created_at: 1,
    completed_at: output === null ? null : 2,
  };
}

describe('PromptBuilder', () => {
  it('replays resolved tool rounds after the history', () => {
    const conversation = PromptBuilder.buildConversation(
      [message(0, 'user', 'Weather in Paris?')],
      [call('call_a', 0, '{"temp":21}'), call('call_b', 1, null)]
    );

    expect(PromptBuilder.toMessages(conversation)).toEqual([
      { role: 'user', content: 'Weather in Paris?' },
      { role: 'assistant', content: null, tool_calls: [{ id: 'call_a', name: 'get_weather', arguments: '{"city":"Paris"}' }] },
      { role: 'tool', tool_call_id: 'call_a', content: '{"temp":21}' },
    ]);
  });

  it('skips messages without text', () => {
    const conversation = PromptBuilder.buildConversation([message(0, 'user', '   '), message(1, 'user', 'hi')], []);
    expect(conversation.history).toEqual([{ role: 'user', content: 'hi' }]);
  });

  it('truncates the oldest history but keeps the latest user message', () => {
    const history = [
      message(0, 'user', 'one'),
      message(1, 'assistant', 'two'),
      message(2, 'user', 'three'),
      message(3, 'assistant', 'four'),
      message(4, 'user', 'five'),
    ];
    const truncated = PromptBuilder.truncate(PromptBuilder.buildConversation(history, [call('call_a', 0, 'x')]));

    expect(truncated.history).toEqual([
      { role: 'user', content: 'three' },
      { role: 'assistant', content: 'four' },
      { role: 'user', content: 'five' },
    ]);
    expect(truncated.toolRounds).toHaveLength(2);
  });

  it('finds the latest user text', () => {
    const history = [message(0, 'user', 'first'), message(1, 'user', 'second'), message(2, 'assistant', 'reply')];
    expect(PromptBuilder.latestUserText(history)).toBe('second');
    expect(PromptBuilder.latestUserText([])).toBe('');
  });
});
