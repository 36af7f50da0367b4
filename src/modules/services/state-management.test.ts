import type { Kysely } from 'kysely';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidTransitionError, VersionConflictError } from '../errors';
import type { Run } from '../models';
import { EntityStore, createDatabase, migrate, type Database } from '../storage';
import { ManualClock } from '../../test/harness';
import { RunStateManager } from './state-management';

describe('RunStateManager', () => {
  let db: Kysely<Database>;
  let store: EntityStore;
  let clock: ManualClock;
  let manager: RunStateManager;
  let run: Run;

  beforeEach(async () => {
    db = createDatabase(':memory:');
    await migrate(db);
    store = new EntityStore(db);
    clock = new ManualClock();
    manager = new RunStateManager(clock);

    await store.insertAssistant({
      id: 'asst_1',
      object: 'assistant',
      owner_id: 'owner',
      created_at: 1704067200,
      name: null,
      description: null,
      model: 'gpt-test',
      instructions: null,
      tools: [],
      file_ids: [],
      metadata: {},
    });
    await store.insertThread({ id: 'thread_1', object: 'thread', owner_id: 'owner', created_at: 1704067200, file_ids: [], metadata: {} });
    run = await store.insertRun({
      id: 'run_1',
      object: 'thread.run',
      thread_id: 'thread_1',
      assistant_id: 'asst_1',
      owner_id: 'owner',
      status: 'queued',
      required_action: null,
      last_error: null,
      created_at: 1704067200,
      expires_at: 1704067800,
      started_at: null,
      cancelled_at: null,
      failed_at: null,
      completed_at: null,
      model: 'gpt-test',
      instructions: null,
      tools: [],
      file_ids: [],
      metadata: {},
      version: 0,
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('accepts the transitions of the run lifecycle', () => {
    expect(manager.validateTransition('queued', 'running')).toEqual({ valid: true });
    expect(manager.validateTransition('running', 'running')).toEqual({ valid: true });
    expect(manager.validateTransition('requires_action', 'expired')).toEqual({ valid: true });
    expect(manager.validateTransition('cancelling', 'cancelled')).toEqual({ valid: true });
  });

  it('rejects moves out of terminal states and skipped steps', () => {
    expect(manager.validateTransition('completed', 'running')).toEqual({
      valid: false,
      reason: "Run in terminal state 'completed' cannot change",
    });
    expect(manager.validateTransition('queued', 'completed')).toEqual({
      valid: false,
      reason: "Transition from 'queued' to 'completed' is not allowed. Allowed transitions: running, cancelling, expired, failed",
    });
    expect(manager.validateTransition('requires_action', 'completed').valid).toBe(false);
  });

  it('stamps timestamps and bumps the version', async () => {
    clock.advance(5_000);
    const running = await manager.transition(store, run, 'running');
    expect(running.status).toBe('running');
    expect(running.started_at).toBe(1704067205);
    expect(running.version).toBe(1);

    const failed = await manager.transition(store, running, 'failed', {
      last_error: { code: 'server_error', message: 'boom' },
    });
    expect(failed.failed_at).toBe(1704067205);
    expect(failed.last_error).toEqual({ code: 'server_error', message: 'boom' });
    expect(await store.getRun('run_1')).toEqual(failed);
  });

  it('keeps required_action only while the run requires action', async () => {
    const running = await manager.transition(store, run, 'running');
    const waiting = await manager.transition(store, running, 'requires_action', {
      required_action: {
        type: 'submit_tool_outputs',
        submit_tool_outputs: { tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'f', arguments: '{}' } }] },
      },
    });
    expect(waiting.required_action?.submit_tool_outputs.tool_calls).toHaveLength(1);

    const resumed = await manager.transition(store, waiting, 'running');
    expect(resumed.required_action).toBeNull();
  });

  it('throws InvalidTransitionError without writing', async () => {
    await expect(manager.transition(store, run, 'completed')).rejects.toBeInstanceOf(InvalidTransitionError);
    expect((await store.getRun('run_1'))?.version).toBe(0);
  });

  it('detects a concurrent write through the version', async () => {
    await manager.transition(store, run, 'cancelling');
    await expect(manager.transition(store, run, 'running')).rejects.toBeInstanceOf(VersionConflictError);
    expect((await store.getRun('run_1'))?.status).toBe('cancelling');
  });
});
