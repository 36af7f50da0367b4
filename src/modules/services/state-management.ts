import { InvalidTransitionError } from '../errors';
import type { RequiredAction, Run, RunError, RunStatus } from '../models';
import type { Logger } from '../monitoring';
import type { EntityStore } from '../storage';
import type { Clock } from './types';
import { ServiceUtils } from './utils';

/**
 * Fields a transition may set alongside the status
 */
export interface TransitionPatch {
  required_action?: RequiredAction | null;
  last_error?: RunError | null;
}

/**
 * Run State Manager validates status changes and writes them with an optimistic version check
 */
export class RunStateManager {
  private readonly clock: Clock;
  private readonly logger?: Logger;
  private readonly validTransitions: Map<RunStatus, RunStatus[]>;

  constructor(clock: Clock, logger?: Logger) {
    this.clock = clock;
    this.logger = logger;
    this.validTransitions = this.initializeValidTransitions();
  }

  private initializeValidTransitions(): Map<RunStatus, RunStatus[]> {
    const transitions = new Map<RunStatus, RunStatus[]>();

    transitions.set('queued', ['running', 'cancelling', 'expired', 'failed']);
    transitions.set('running', ['requires_action', 'running', 'completed', 'cancelling', 'failed', 'expired']);
    transitions.set('requires_action', ['running', 'cancelling', 'expired', 'failed']);
    transitions.set('cancelling', ['cancelled', 'failed']);
    transitions.set('completed', []); // Terminal state
    transitions.set('failed', []); // Terminal state
    transitions.set('cancelled', []); // Terminal state
    transitions.set('expired', []); // Terminal state

    return transitions;
  }

  /**
   * Validate if a state transition is allowed
   */
  validateTransition(from: RunStatus, to: RunStatus): { valid: boolean; reason?: string } {
    const allowedStates = this.validTransitions.get(from);

    if (!allowedStates || allowedStates.length === 0) {
      return { valid: false, reason: `Run in terminal state '${from}' cannot change` };
    }

    if (!allowedStates.includes(to)) {
      return {
        valid: false,
        reason: `Transition from '${from}' to '${to}' is not allowed. Allowed transitions: ${allowedStates.join(', ')}`,
      };
    }

    return { valid: true };
  }

  /**
   * Move the run to a new status through the given store. Throws
   * InvalidTransitionError or, when the row changed since it was read,
   * VersionConflictError.
   */
  async transition(store: EntityStore, run: Run, to: RunStatus, patch: TransitionPatch = {}): Promise<Run> {
    const validation = this.validateTransition(run.status, to);
    if (!validation.valid) {
      throw new InvalidTransitionError(run.status, to, validation.reason ?? 'Transition not allowed');
    }

    const now = ServiceUtils.toSeconds(this.clock.now());
    const updated: Run = {
      ...run,
      status: to,
      required_action: to === 'requires_action' ? patch.required_action ?? run.required_action : null,
      last_error: to === 'failed' ? patch.last_error ?? run.last_error : run.last_error,
    };

    // Set timestamps based on status
    switch (to) {
      case 'running':
        updated.started_at = run.started_at ?? now;
        break;
      case 'cancelled':
        updated.cancelled_at = now;
        break;
      case 'failed':
        updated.failed_at = now;
        break;
      case 'completed':
        updated.completed_at = now;
        break;
    }

    const saved = await store.updateRun(updated, run.version);
    if (run.status !== to) {
      this.logger?.info('Run status changed', {
        run_id: run.id,
        from: run.status,
        to,
        ...(updated.last_error && to === 'failed' && { error_code: updated.last_error.code }),
      });
    }
    return saved;
  }

  /**
   * Bump the run's version without changing it, claiming the row for the enclosing transaction
   */
  async touch(store: EntityStore, run: Run): Promise<Run> {
    return store.updateRun(run, run.version);
  }
}
