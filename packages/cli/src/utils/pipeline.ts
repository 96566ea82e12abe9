/**
 * Export planning pipeline used by the `plan` command.
 *
 * Load the backup, pick records, apply the user's explicit decisions,
 * auto-resolve the rest, optionally prompt for what is still open, then
 * reconcile attachments, plan the batch and package datasets.
 */

import type { Logger } from 'pino';
import {
  AttachmentReconciler,
  ExportPlanner,
  KeyResolver,
  RecordStore,
  ResolutionSession,
  TargetIndex,
  discoverSourceFiles,
  isSettled,
  loadTargetSnapshot,
  packageDatasets,
  resolverConfigFrom,
  validateMigrationConfig,
} from '@testbridge/core';
import type {
  AttachmentDiff,
  DatasetSkip,
  LoadResult,
  MigrationConfig,
  PlanResult,
  ResolutionOutcome,
  TestRecord,
} from '@testbridge/core';
import { findRecord, selectRecords } from './selection.js';
import type { RecordSelection } from './selection.js';

/** Decisions given up front on the command line */
export interface ManualDecisions {
  /** Record id or source key -> target key */
  keys: Array<[string, string]>;

  /** Record ids or source keys to create as new issues */
  createNew: string[];

  /** Project for new issues, overriding the derived one */
  projectKey?: string;
}

/** Answer from an interactive prompt for one record */
export type PromptAnswer =
  | { action: 'key'; key: string }
  | { action: 'create' }
  | { action: 'skip' };

/**
 * Asks the user about an unresolved record. `error` is set when the
 * previous answer was rejected.
 */
export type KeyPrompt = (
  record: TestRecord,
  outcome: ResolutionOutcome,
  error: string | null
) => Promise<PromptAnswer>;

export interface PlanOutputs {
  load: LoadResult;
  selected: TestRecord[];
  resolutions: ReadonlyMap<string, ResolutionOutcome>;
  attachmentDiffs: ReadonlyMap<string, AttachmentDiff>;
  plan: PlanResult;
  datasets: Map<string, string>;

  /** Selected records whose dataset was not packaged */
  datasetSkips: DatasetSkip[];

  /** Problems with the command-line decisions, reported but not fatal */
  notices: string[];
}

export type PipelineResult =
  | { success: true; outputs: PlanOutputs }
  | { success: false; errors: string[] };

export async function runPlanPipeline(
  config: MigrationConfig,
  selection: RecordSelection,
  decisions: ManualDecisions,
  logger: Logger,
  prompt?: KeyPrompt
): Promise<PipelineResult> {
  const configErrors = validateMigrationConfig(config);
  if (configErrors.length > 0) {
    return { success: false, errors: configErrors };
  }

  let targetIndex = TargetIndex.empty();
  if (config.targetSnapshotPath) {
    const snapshot = loadTargetSnapshot(config.targetSnapshotPath);
    if (!snapshot.success) {
      return {
        success: false,
        errors: snapshot.errors.map((e) =>
          e.index === null ? e.message : `Target issue #${e.index}: ${e.message}`
        ),
      };
    }
    targetIndex = snapshot.index;
  }

  const store = new RecordStore(logger);
  const sourceFiles = discoverSourceFiles(...new Set([config.sourceDir, config.attachmentsDir]));
  if (sourceFiles.length === 0) {
    return { success: false, errors: [`No backup files found in ${config.sourceDir}`] };
  }
  const load = store.load(sourceFiles, { attachmentsDir: config.attachmentsDir });

  const notices: string[] = [];
  const { records: selected, unknownRefs } = selectRecords(store, selection);
  for (const ref of unknownRefs) {
    notices.push(`Selected record ${ref} was not found`);
  }

  const session = new ResolutionSession(
    new KeyResolver(logger, resolverConfigFrom(config)),
    targetIndex,
    logger
  );

  for (const [ref, key] of decisions.keys) {
    const record = findRecord(store, ref);
    if (!record) {
      notices.push(`Key assignment for unknown record ${ref} ignored`);
      continue;
    }
    const result = session.submitManualKey(record, key);
    if (result.error) {
      notices.push(`${ref}: ${result.error.message}`);
    }
  }

  for (const ref of decisions.createNew) {
    const record = findRecord(store, ref);
    if (!record) {
      notices.push(`Create-new request for unknown record ${ref} ignored`);
      continue;
    }
    const result = session.markCreateNew(record, decisions.projectKey);
    if (result.error) {
      notices.push(`${ref}: ${result.error.message}`);
    } else if (result.outcome.state === 'Unresolved') {
      notices.push(`${ref}: ${result.outcome.reason}`);
    }
  }

  session.autoResolveAll(selected);

  if (prompt) {
    await promptForUnresolved(session, selected, decisions, prompt);
  }

  const resolutions = session.snapshot();
  const reconciler = new AttachmentReconciler(logger);
  const attachmentDiffs = reconciler.missingForAll(selected, targetIndex, resolutions);
  const planner = new ExportPlanner(store, logger);
  const plan = planner.plan(selected, resolutions, attachmentDiffs);
  const packaged = packageDatasets(selected, resolutions, store, {
    extension: config.datasetExtension,
  });

  return {
    success: true,
    outputs: {
      load,
      selected,
      resolutions,
      attachmentDiffs,
      plan,
      datasets: packaged.files,
      datasetSkips: packaged.skipped,
      notices,
    },
  };
}

async function promptForUnresolved(
  session: ResolutionSession,
  records: readonly TestRecord[],
  decisions: ManualDecisions,
  prompt: KeyPrompt
): Promise<void> {
  for (const record of records) {
    if (record.kind !== 'test' || record.flags.length > 0) continue;
    if (isSettled(session.outcomeOf(record.id))) continue;

    session.requestManual(record.id);
    let error: string | null = null;

    for (;;) {
      const answer = await prompt(record, session.outcomeOf(record.id), error);
      if (answer.action === 'skip') break;

      const result =
        answer.action === 'create'
          ? session.markCreateNew(record, decisions.projectKey)
          : session.submitManualKey(record, answer.key);

      if (result.error) {
        error = result.error.message;
        continue;
      }
      if (!isSettled(result.outcome)) {
        error = result.outcome.state === 'Unresolved' ? result.outcome.reason : null;
        continue;
      }
      break;
    }
  }
}
