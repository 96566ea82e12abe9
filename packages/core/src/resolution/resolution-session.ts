/**
 * Per-session resolution state.
 *
 * Holds one outcome per record id and drives the state machine described
 * in ./types.ts. The presentation layer calls in with the user's decisions;
 * the session never prompts. A settled outcome is written once and kept
 * until the caller resets it, so repeating a call against the same target
 * index returns the same result.
 */

import type { Logger } from 'pino';
import type { TestRecord } from '../records/types.js';
import type { KeyResolver } from './key-resolver.js';
import type { TargetIndex } from './target-index.js';
import type {
  ResolutionOutcome,
  ResolutionResult,
  ResolutionState,
} from './types.js';
import { isSettled } from './types.js';

const INITIAL_OUTCOME: ResolutionOutcome = {
  state: 'Unresolved',
  reason: 'Not resolved yet',
  candidates: [],
};

export class ResolutionSession {
  private readonly outcomes: Map<string, ResolutionOutcome> = new Map();
  private readonly resolver: KeyResolver;
  private readonly targetIndex: TargetIndex;
  private readonly logger: Logger;

  constructor(resolver: KeyResolver, targetIndex: TargetIndex, logger: Logger) {
    this.resolver = resolver;
    this.targetIndex = targetIndex;
    this.logger = logger.child({ component: 'resolution-session' });
  }

  outcomeOf(recordId: string): ResolutionOutcome {
    return this.outcomes.get(recordId) ?? INITIAL_OUTCOME;
  }

  stateOf(recordId: string): ResolutionState {
    return this.outcomeOf(recordId).state;
  }

  /** Snapshot of all outcomes recorded so far, for the export planner */
  snapshot(): ReadonlyMap<string, ResolutionOutcome> {
    return new Map(this.outcomes);
  }

  /**
   * Try an exact-match resolution. Settled records keep their outcome.
   * A failed attempt leaves a PendingManual record pending.
   */
  autoResolve(record: TestRecord): ResolutionResult {
    const current = this.outcomeOf(record.id);
    if (isSettled(current)) {
      return { recordId: record.id, outcome: current, error: null };
    }

    const result = this.resolver.resolve(record, this.targetIndex, 'AUTOMATIC');
    if (isSettled(result.outcome) || current.state === 'Unresolved') {
      this.transition(record.id, result.outcome);
      return result;
    }

    return { recordId: record.id, outcome: current, error: null };
  }

  /** Run autoResolve over many records, in order */
  autoResolveAll(records: readonly TestRecord[]): ResolutionResult[] {
    const results = records.map((record) => this.autoResolve(record));
    const resolved = results.filter((r) => isSettled(r.outcome)).length;
    this.logger.info(
      { records: records.length, resolved, unresolved: records.length - resolved },
      'Automatic resolution pass complete'
    );
    return results;
  }

  /** Mark a record as waiting for a manual decision */
  requestManual(recordId: string, reason?: string): ResolutionOutcome {
    const current = this.outcomeOf(recordId);
    if (current.state !== 'Unresolved') {
      return current;
    }
    const pending: ResolutionOutcome = {
      state: 'PendingManual',
      reason: reason ?? current.reason,
    };
    this.transition(recordId, pending);
    return pending;
  }

  /**
   * Apply a key typed by the user. An invalid key returns InvalidKeyFormat
   * and leaves the state as it was.
   */
  submitManualKey(record: TestRecord, key: string): ResolutionResult {
    const current = this.outcomeOf(record.id);
    if (isSettled(current)) {
      return alreadySettled(record.id, current);
    }

    const result = this.resolver.resolve(record, this.targetIndex, 'MANUAL', { manualKey: key });
    if (result.error) {
      return { recordId: record.id, outcome: current, error: result.error };
    }

    this.transition(record.id, result.outcome);
    return result;
  }

  /** Decide that a record becomes a new issue on the target */
  markCreateNew(record: TestRecord, projectKey?: string): ResolutionResult {
    const current = this.outcomeOf(record.id);
    if (isSettled(current)) {
      return alreadySettled(record.id, current);
    }

    const result = this.resolver.resolve(record, this.targetIndex, 'MANUAL', {
      createNew: true,
      projectKey,
    });
    if (isSettled(result.outcome)) {
      this.transition(record.id, result.outcome);
    }
    return result;
  }

  /**
   * Report the result of the caller's existence check for a manual key.
   * A confirmed key becomes Resolved; a missing one sends the record back
   * to PendingManual so the user can enter another key.
   */
  confirm(recordId: string, exists: boolean): ResolutionOutcome {
    const current = this.outcomeOf(recordId);
    if (current.state !== 'ResolvedUnverified') {
      return current;
    }

    const next: ResolutionOutcome = exists
      ? { state: 'Resolved', key: current.key, via: 'confirmed' }
      : { state: 'PendingManual', reason: `Key ${current.key} does not exist on the target` };
    this.transition(recordId, next);
    return next;
  }

  /** Forget any decision for a record */
  reset(recordId: string): void {
    if (this.outcomes.delete(recordId)) {
      this.logger.debug({ recordId }, 'Resolution reset');
    }
  }

  private transition(recordId: string, next: ResolutionOutcome): void {
    const previous = this.outcomeOf(recordId).state;
    this.outcomes.set(recordId, next);
    if (previous !== next.state) {
      this.logger.debug({ recordId, from: previous, to: next.state }, 'Resolution state changed');
    }
  }
}

function alreadySettled(recordId: string, current: ResolutionOutcome): ResolutionResult {
  return {
    recordId,
    outcome: current,
    error: {
      code: 'AlreadySettled',
      message: `Record ${recordId} is already ${current.state}; reset it before changing the decision`,
    },
  };
}
