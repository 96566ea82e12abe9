export { KeyResolver, DEFAULT_KEY_PATTERN } from './key-resolver.js';
export { ResolutionSession } from './resolution-session.js';
export { TargetIndex, parseTargetSnapshot, loadTargetSnapshot } from './target-index.js';
export { normalizeSummary, normalizeKey, projectOfKey } from './normalize.js';
export { isSettled, resolvedKeyOf } from './types.js';
export type { TargetSnapshotError, TargetSnapshotResult } from './target-index.js';
export type {
  ResolutionMode,
  ResolutionState,
  MatchSource,
  ResolutionOutcome,
  SettledOutcome,
  ResolutionErrorCode,
  ResolutionError,
  ResolutionResult,
  ResolveOptions,
  KeyResolverConfig,
  TargetAttachment,
  TargetIssue,
} from './types.js';
