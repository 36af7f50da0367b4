import type { Message, Run, RunStep, RunStepStatus, ToolCall } from '../models';

function unfinishedStatus(run: Run): RunStepStatus {
  switch (run.status) {
    case 'cancelled':
    case 'failed':
    case 'expired':
      return run.status;
    default:
      return 'in_progress';
  }
}

/**
 * Run steps are not stored: one tool_calls step per round of tool calls and a
 * message_creation step for the run's answer, oldest first.
 */
export function deriveRunSteps(run: Run, calls: ToolCall[], messages: Message[]): RunStep[] {
  const rounds = new Map<number, ToolCall[]>();
  for (const call of calls) {
    const round = rounds.get(call.round) ?? [];
    round.push(call);
    rounds.set(call.round, round);
  }

  const steps: RunStep[] = [];
  for (const round of [...rounds.keys()].sort((a, b) => a - b)) {
    const roundCalls = (rounds.get(round) ?? []).sort((a, b) => a.position - b.position);
    const first = roundCalls[0];
    if (!first) continue;

    const done = roundCalls.every(call => call.output !== null);
    const completedAt = done
      ? roundCalls.reduce((latest, call) => Math.max(latest, call.completed_at ?? 0), 0)
      : null;

    steps.push({
      id: `step_${run.id.replace(/^run_/, '')}_${round}`,
      object: 'thread.run.step',
      run_id: run.id,
      thread_id: run.thread_id,
      assistant_id: run.assistant_id,
      type: 'tool_calls',
      status: done ? 'completed' : unfinishedStatus(run),
      step_details: {
        type: 'tool_calls',
        tool_calls: roundCalls.map(call => ({
          id: call.id,
          type: call.type,
          name: call.name,
          arguments: call.arguments,
          output: call.output,
        })),
      },
      created_at: first.created_at,
      completed_at: completedAt,
    });
  }

  for (const message of messages) {
    steps.push({
      id: `step_${message.id.replace(/^msg_/, '')}`,
      object: 'thread.run.step',
      run_id: run.id,
      thread_id: run.thread_id,
      assistant_id: run.assistant_id,
      type: 'message_creation',
      status: 'completed',
      step_details: { type: 'message_creation', message_creation: { message_id: message.id } },
      created_at: message.created_at,
      completed_at: message.created_at,
    });
  }
  return steps;
}
