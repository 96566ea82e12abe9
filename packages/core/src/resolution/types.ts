/**
 * Types for key resolution.
 *
 * Every record moves through a small state machine while the caller
 * decides which target issue it maps to:
 *
 *   Unresolved ──autoResolve(match)──▶ Resolved
 *   Unresolved ──requestManual──▶ PendingManual ──submitManualKey──▶ ResolvedUnverified
 *   ResolvedUnverified ──confirm(true)──▶ Resolved
 *   Unresolved | PendingManual ──markCreateNew──▶ CreateNew
 *   any ──reset──▶ Unresolved
 *
 * Settled states (Resolved, ResolvedUnverified, CreateNew) are never left
 * except through an explicit reset or a failed confirmation.
 */

/** How a resolution is requested */
export type ResolutionMode = 'MANUAL' | 'AUTOMATIC';

/** Per-record resolution state */
export type ResolutionState =
  | 'Unresolved'
  | 'PendingManual'
  | 'ResolvedUnverified'
  | 'Resolved'
  | 'CreateNew';

/** How an automatic or confirmed match was established */
export type MatchSource =
  | 'source-key'  // the record's own key exists on the target with the same summary
  | 'summary'     // exactly one target issue has the same normalized summary
  | 'confirmed';  // a manual key whose existence the caller confirmed

export type ResolutionOutcome =
  | { state: 'Resolved'; key: string; via: MatchSource }
  | { state: 'ResolvedUnverified'; key: string }
  | { state: 'CreateNew'; projectKey: string }
  | { state: 'PendingManual'; reason: string }
  | { state: 'Unresolved'; reason: string; candidates: string[] };

/** Outcomes that allow a record into an export batch */
export type SettledOutcome = Extract<
  ResolutionOutcome,
  { state: 'Resolved' | 'ResolvedUnverified' | 'CreateNew' }
>;

export type ResolutionErrorCode =
  | 'InvalidKeyFormat'  // manual key failed the pattern check; re-prompt
  | 'AlreadySettled';   // record already has an outcome; reset first

export interface ResolutionError {
  code: ResolutionErrorCode;
  message: string;
}

/** Result of a resolve call. Errors are returned, never thrown. */
export interface ResolutionResult {
  recordId: string;
  outcome: ResolutionOutcome;
  error: ResolutionError | null;
}

/** Options for a single resolve call */
export interface ResolveOptions {
  /** Key typed by the user (MANUAL mode) */
  manualKey?: string;

  /** Request creation of a new issue instead of a key (MANUAL mode) */
  createNew?: boolean;

  /** Project for a new issue; falls back to the source key prefix, then the configured default */
  projectKey?: string;
}

/** Resolver settings taken from the migration config */
export interface KeyResolverConfig {
  /** Pattern a target issue key must match */
  keyPattern: RegExp;

  /** Project used for new issues when none can be derived */
  defaultProjectKey: string | null;
}

/** Attachment already present on a target issue */
export interface TargetAttachment {
  filename: string;
  size: number;
}

/** An issue already present on the target instance */
export interface TargetIssue {
  key: string;
  summary: string;
  attachments: readonly TargetAttachment[];
}

export function isSettled(outcome: ResolutionOutcome): outcome is SettledOutcome {
  return (
    outcome.state === 'Resolved' ||
    outcome.state === 'ResolvedUnverified' ||
    outcome.state === 'CreateNew'
  );
}

/** Key of a settled outcome, or null for a record that will be created */
export function resolvedKeyOf(outcome: ResolutionOutcome): string | null {
  if (outcome.state === 'Resolved' || outcome.state === 'ResolvedUnverified') {
    return outcome.key;
  }
  return null;
}
