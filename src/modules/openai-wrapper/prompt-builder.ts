import type { Message, ToolCall } from '../models';
import type { ChatMessage } from './types';

/**
 * A model prompt split into thread history, which may be truncated, and the
 * current run's tool rounds, which are always sent.
 */
export interface Conversation {
  history: ChatMessage[];
  toolRounds: ChatMessage[];
}

export class PromptBuilder {
  /**
   * Build the conversation for a run from its thread and the tool calls it has resolved so far
   */
  static buildConversation(thread: Message[], toolCalls: ToolCall[]): Conversation {
    const history: ChatMessage[] = [];
    for (const message of thread) {
      const content = this.messageText(message);
      if (content.length === 0) continue;
      history.push(message.role === 'user'
        ? { role: 'user', content }
        : { role: 'assistant', content });
    }

    return { history, toolRounds: this.buildToolRounds(toolCalls) };
  }

  static toMessages(conversation: Conversation): ChatMessage[] {
    return [...conversation.history, ...conversation.toolRounds];
  }

  /**
   * Drop the oldest history messages until at most `ratio` of them remain.
   * The latest user message is always kept.
   */
  static truncate(conversation: Conversation, ratio: number = 0.5): Conversation {
    const lastUserIndex = this.findLastUserIndex(conversation.history);
    const candidates = conversation.history
      .map((_, index) => index)
      .filter(index => index !== lastUserIndex);

    const keepCount = Math.floor(candidates.length * ratio);
    const dropped = new Set(candidates.slice(0, candidates.length - keepCount));

    return {
      history: conversation.history.filter((_, index) => !dropped.has(index)),
      toolRounds: conversation.toolRounds,
    };
  }

  /**
   * Text of the most recent user message, used as the retrieval query
   */
  static latestUserText(thread: Message[]): string {
    for (let index = thread.length - 1; index >= 0; index--) {
      const message = thread[index];
      if (message && message.role === 'user') {
        return this.messageText(message);
      }
    }
    return '';
  }

  static messageText(message: Message): string {
    return message.content
      .map(part => part.type === 'text' ? part.text.value : `[image file ${part.image_file.file_id}]`)
      .join('\n')
      .trim();
  }

  /**
   * One assistant message per round followed by a tool message per resolved call.
   * Rounds with an unresolved call are left out.
   */
  private static buildToolRounds(toolCalls: ToolCall[]): ChatMessage[] {
    const rounds = new Map<number, ToolCall[]>();
    for (const call of toolCalls) {
      const round = rounds.get(call.round) ?? [];
      round.push(call);
      rounds.set(call.round, round);
    }

    const messages: ChatMessage[] = [];
    for (const round of [...rounds.keys()].sort((a, b) => a - b)) {
      const calls = rounds.get(round) ?? [];
      if (calls.some(call => call.output === null)) continue;

      messages.push({
        role: 'assistant',
        content: null,
        tool_calls: calls.map(call => ({ id: call.id, name: call.name, arguments: call.arguments })),
      });
      for (const call of calls) {
        messages.push({ role: 'tool', tool_call_id: call.id, content: call.output ?? '' });
      }
    }
    return messages;
  }

  private static findLastUserIndex(messages: ChatMessage[]): number {
    for (let index = messages.length - 1; index >= 0; index--) {
      if (messages[index]?.role === 'user') return index;
    }
    return -1;
  }
}
