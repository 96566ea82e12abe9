/**
 * Key resolver: decides which target issue a source record maps to.
 *
 * Automatic resolution only accepts exact matches. A record resolves when
 * its own source key exists on the target with the same normalized
 * summary, or when exactly one target issue has the same normalized
 * summary. Partial overlaps and duplicate summaries stay Unresolved and
 * are left to the user. There is no similarity threshold.
 *
 * Manual keys are checked against the key pattern only. Whether the issue
 * exists on the target is for the caller to verify, so a manual key
 * resolves as ResolvedUnverified.
 */

import type { Logger } from 'pino';
import type { TestRecord } from '../records/types.js';
import type { TargetIndex } from './target-index.js';
import type {
  KeyResolverConfig,
  ResolutionMode,
  ResolutionOutcome,
  ResolutionResult,
  ResolveOptions,
} from './types.js';
import { normalizeKey, normalizeSummary, projectOfKey } from './normalize.js';

/** Default Jira issue key pattern: project key, dash, positive number */
export const DEFAULT_KEY_PATTERN = /^[A-Z][A-Z0-9_]*-[1-9][0-9]*$/;

const PROJECT_KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export class KeyResolver {
  private readonly config: KeyResolverConfig;
  private readonly logger: Logger;

  constructor(logger: Logger, config?: Partial<KeyResolverConfig>) {
    this.config = {
      keyPattern: config?.keyPattern ?? DEFAULT_KEY_PATTERN,
      defaultProjectKey: config?.defaultProjectKey ?? null,
    };
    this.logger = logger.child({ component: 'key-resolver' });
  }

  /** Whether a key (after trimming and upper-casing) matches the key pattern */
  isValidKey(key: string): boolean {
    const normalized = normalizeKey(key);
    return normalized !== '' && this.config.keyPattern.test(normalized);
  }

  resolve(
    record: TestRecord,
    targetIndex: TargetIndex,
    mode: ResolutionMode,
    options: ResolveOptions = {}
  ): ResolutionResult {
    const result =
      mode === 'AUTOMATIC'
        ? this.resolveAutomatic(record, targetIndex)
        : this.resolveManual(record, options);

    this.logger.debug(
      {
        recordId: record.id,
        mode,
        state: result.outcome.state,
        error: result.error?.code,
      },
      'Record resolved'
    );

    return result;
  }

  private resolveAutomatic(record: TestRecord, targetIndex: TargetIndex): ResolutionResult {
    const summary = normalizeSummary(record.summary);
    if (!summary) {
      return unresolved(record.id, 'Record has no summary to match against the target', []);
    }

    if (record.sourceKey) {
      const sameKey = targetIndex.get(record.sourceKey);
      if (sameKey && normalizeSummary(sameKey.summary) === summary) {
        return settled(record.id, { state: 'Resolved', key: sameKey.key, via: 'source-key' });
      }
    }

    const matches = targetIndex.findBySummary(record.summary);

    if (matches.length === 1) {
      return settled(record.id, { state: 'Resolved', key: matches[0].key, via: 'summary' });
    }

    if (matches.length > 1) {
      const candidates = matches.map((issue) => issue.key);
      return unresolved(
        record.id,
        `Ambiguous: ${matches.length} target issues share this summary (${candidates.join(', ')})`,
        candidates
      );
    }

    return unresolved(record.id, 'No target issue with an identical summary', []);
  }

  private resolveManual(record: TestRecord, options: ResolveOptions): ResolutionResult {
    if (options.createNew) {
      return this.resolveCreateNew(record, options.projectKey);
    }

    const key = normalizeKey(options.manualKey ?? '');
    if (!this.isValidKey(key)) {
      return {
        recordId: record.id,
        outcome: {
          state: 'Unresolved',
          reason: 'Manual key rejected',
          candidates: [],
        },
        error: {
          code: 'InvalidKeyFormat',
          message: key
            ? `"${key}" is not a valid issue key (expected ${this.config.keyPattern.source})`
            : 'No key entered',
        },
      };
    }

    return settled(record.id, { state: 'ResolvedUnverified', key });
  }

  private resolveCreateNew(record: TestRecord, projectKey: string | undefined): ResolutionResult {
    const project =
      (projectKey ? normalizeKey(projectKey) : null) ??
      (record.sourceKey ? projectOfKey(normalizeKey(record.sourceKey)) : null) ??
      this.config.defaultProjectKey;

    if (!project || !PROJECT_KEY_PATTERN.test(project)) {
      return unresolved(
        record.id,
        project
          ? `Cannot create a new issue: "${project}" is not a valid project key`
          : 'Cannot create a new issue: no project key given and none can be derived',
        []
      );
    }

    return settled(record.id, { state: 'CreateNew', projectKey: project });
  }
}

function settled(recordId: string, outcome: ResolutionOutcome): ResolutionResult {
  return { recordId, outcome, error: null };
}

function unresolved(recordId: string, reason: string, candidates: string[]): ResolutionResult {
  return {
    recordId,
    outcome: { state: 'Unresolved', reason, candidates },
    error: null,
  };
}
