import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Logger } from 'pino';
import { ExportPlanner } from '../export/export-planner.js';
import {
  buildMissingAttachmentReport,
  rewriteAttachmentIds,
  serializeBatch,
  serializeSkipReport,
} from '../export/batch-output.js';
import type { RecordLookup } from '../export/types.js';
import type { AttachmentDiff } from '../attachments/types.js';
import type { ResolutionOutcome } from '../resolution/types.js';
import type { TestRecord } from '../records/types.js';

function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

function makeRecord(overrides?: Partial<TestRecord>): TestRecord {
  return {
    id: 't1',
    kind: 'test',
    sourceKey: null,
    summary: 'Login works',
    description: null,
    steps: [],
    preconditionIds: [],
    memberIds: [],
    datasetRef: null,
    attachments: [],
    testType: 'Manual',
    testVersionId: null,
    flags: [],
    ...overrides,
  };
}

function createLookup(records: TestRecord[]): RecordLookup {
  const byId = new Map(records.map((r) => [r.id, r]));
  return {
    get: (id) => byId.get(id),
    setsContaining: (recordId) =>
      records.filter((r) => r.kind === 'test-set' && r.memberIds.includes(recordId)),
  };
}

function resolved(key: string): ResolutionOutcome {
  return { state: 'Resolved', key, via: 'summary' };
}

const noDiffs = new Map<string, AttachmentDiff>();

describe('ExportPlanner', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('builds an update payload with steps in their original order', () => {
    const record = makeRecord({
      description: 'Checks the login form',
      steps: [
        { action: 'Open page', data: '', expected: 'Form shown' },
        { action: 'Enter user', data: 'alice', expected: 'Accepted' },
        { action: 'Submit', data: '', expected: 'Logged in' },
      ],
    });
    const planner = new ExportPlanner(createLookup([record]), logger);

    const { batch, skipped } = planner.plan([record], new Map([['t1', resolved('PROJ-42')]]), noDiffs);

    expect(skipped).toEqual([]);
    expect(batch.entries).toHaveLength(1);
    const entry = batch.entries[0];
    expect(entry.entryKey).toBe('PROJ-42');
    expect(entry.target).toBe('PROJ-42');
    expect(entry.action).toBe('update');
    expect(entry.unverified).toBe(false);
    expect(entry.payload).toEqual({
      testtype: 'Manual',
      update_key: 'PROJ-42',
      fields: {
        summary: 'Login works',
        description: 'Checks the login form',
        project: { key: 'PROJ' },
      },
      steps: [
        { action: 'Open page', data: '', result: 'Form shown' },
        { action: 'Enter user', data: 'alice', result: 'Accepted' },
        { action: 'Submit', data: '', result: 'Logged in' },
      ],
    });
    expect(batch.byEntryKey.get('PROJ-42')).toBe(entry);
  });

  it('skips an unresolved record and plans the others', () => {
    const records = [
      makeRecord({ id: 't1', summary: 'One' }),
      makeRecord({ id: 't2', summary: 'Two' }),
      makeRecord({ id: 't3', summary: 'Three' }),
    ];
    const planner = new ExportPlanner(createLookup(records), logger);
    const resolutions = new Map<string, ResolutionOutcome>([
      ['t1', resolved('PROJ-1')],
      ['t2', { state: 'Unresolved', reason: 'No target issue with an identical summary', candidates: [] }],
      ['t3', resolved('PROJ-3')],
    ]);

    const { batch, skipped } = planner.plan(records, resolutions, noDiffs);

    expect(batch.entries.map((e) => e.recordId)).toEqual(['t1', 't3']);
    expect(skipped).toEqual([
      {
        recordId: 't2',
        reason: 'Unresolved',
        message:
          'Record t2 has no target key and is not marked for creation (No target issue with an identical summary)',
      },
    ]);
  });

  it('skips a record with no resolution decision', () => {
    const record = makeRecord();
    const planner = new ExportPlanner(createLookup([record]), logger);

    const { skipped } = planner.plan([record], new Map(), noDiffs);

    expect(skipped[0].message).toBe(
      'Record t1 has no target key and is not marked for creation (no resolution decision was made)'
    );
  });

  it('plans a create entry for a record marked CreateNew', () => {
    const record = makeRecord({ attachments: [] });
    const planner = new ExportPlanner(createLookup([record]), logger);

    const { batch } = planner.plan(
      [record],
      new Map<string, ResolutionOutcome>([['t1', { state: 'CreateNew', projectKey: 'NEWP' }]]),
      noDiffs
    );

    const entry = batch.entries[0];
    expect(entry.entryKey).toBe('new:t1');
    expect(entry.target).toBe('new');
    expect(entry.action).toBe('create');
    expect('update_key' in entry.payload).toBe(false);
    expect(entry.payload.fields.project).toEqual({ key: 'NEWP' });
    expect(entry.attachments.uploadTiming).toBe('after-create');
  });

  it('marks entries with a manual key as unverified', () => {
    const record = makeRecord();
    const planner = new ExportPlanner(createLookup([record]), logger);

    const { batch } = planner.plan(
      [record],
      new Map<string, ResolutionOutcome>([['t1', { state: 'ResolvedUnverified', key: 'PROJ-7' }]]),
      noDiffs
    );

    expect(batch.entries[0].unverified).toBe(true);
  });

  it('refuses a second record for the same target key', () => {
    const records = [makeRecord({ id: 't1' }), makeRecord({ id: 't2' })];
    const planner = new ExportPlanner(createLookup(records), logger);

    const { batch, skipped } = planner.plan(
      records,
      new Map([
        ['t1', resolved('PROJ-42')],
        ['t2', resolved('PROJ-42')],
      ]),
      noDiffs
    );

    expect(batch.entries.map((e) => e.recordId)).toEqual(['t1']);
    expect(skipped).toEqual([
      {
        recordId: 't2',
        reason: 'DuplicateTargetKey',
        message: 'Target key PROJ-42 is already used by record t1 in this batch',
      },
    ]);
  });

  it('skips records that are not tests', () => {
    const record = makeRecord({ kind: 'precondition' });
    const planner = new ExportPlanner(createLookup([record]), logger);

    const { skipped } = planner.plan([record], new Map([['t1', resolved('PROJ-1')]]), noDiffs);

    expect(skipped[0].reason).toBe('NotImportable');
    expect(skipped[0].message).toBe('Record t1 is a precondition; the bulk import only accepts tests');
  });

  it('skips records flagged with a missing field', () => {
    const record = makeRecord({
      summary: '',
      flags: [{ code: 'MissingRequiredField', field: 'summary', message: 'Record t1 has no summary' }],
    });
    const planner = new ExportPlanner(createLookup([record]), logger);

    const { skipped } = planner.plan([record], new Map([['t1', resolved('PROJ-1')]]), noDiffs);

    expect(skipped).toEqual([
      {
        recordId: 't1',
        reason: 'MissingRequiredField',
        message: 'Record t1 has no summary; it cannot be exported',
      },
    ]);
  });

  it('plans a record selected twice only once', () => {
    const record = makeRecord();
    const planner = new ExportPlanner(createLookup([record]), logger);

    const { batch, skipped } = planner.plan([record, record], new Map([['t1', resolved('PROJ-1')]]), noDiffs);

    expect(batch.entries).toHaveLength(1);
    expect(skipped).toEqual([]);
  });

  it('links preconditions by resolved key, falling back to source keys', () => {
    const test = makeRecord({ preconditionIds: ['p1', 'p2', 'p3'] });
    const p1 = makeRecord({ id: 'p1', kind: 'precondition', sourceKey: 'SRC-1' });
    const p2 = makeRecord({ id: 'p2', kind: 'precondition', sourceKey: 'SRC-2' });
    const planner = new ExportPlanner(createLookup([test, p1, p2]), logger);

    const { batch } = planner.plan(
      [test],
      new Map([
        ['t1', resolved('PROJ-1')],
        ['p1', resolved('PROJ-5')],
      ]),
      noDiffs
    );

    const entry = batch.entries[0];
    expect(entry.payload.xray_preconditions).toEqual(['PROJ-5', 'SRC-2']);
    expect(entry.warnings).toEqual([
      'precondition p2 is not resolved on the target; using source key SRC-2',
      'precondition p3 has no known key and was left out',
    ]);
  });

  it('links the test sets containing the record', () => {
    const test = makeRecord();
    const set = makeRecord({ id: 's1', kind: 'test-set', summary: 'Smoke', memberIds: ['t1'] });
    const planner = new ExportPlanner(createLookup([test, set]), logger);

    const { batch } = planner.plan(
      [test],
      new Map([
        ['t1', resolved('PROJ-1')],
        ['s1', resolved('PROJ-9')],
      ]),
      noDiffs
    );

    expect(batch.entries[0].payload.xray_test_sets).toEqual(['PROJ-9']);
    expect('xray_preconditions' in batch.entries[0].payload).toBe(false);
  });

  it('carries the attachment diff for each entry', () => {
    const record = makeRecord();
    const diff: AttachmentDiff = {
      recordId: 't1',
      targetKey: 'PROJ-1',
      missing: [],
      present: [],
      duplicatesDropped: 0,
      uploadTiming: 'before-import',
    };
    const planner = new ExportPlanner(createLookup([record]), logger);

    const { batch } = planner.plan([record], new Map([['t1', resolved('PROJ-1')]]), new Map([['t1', diff]]));

    expect(batch.entries[0].attachments).toBe(diff);
  });
});

describe('batch output', () => {
  const logger = createMockLogger();

  function planOne(record: TestRecord, key: string) {
    const planner = new ExportPlanner(createLookup([record]), logger);
    return planner.plan([record], new Map([[record.id, resolved(key)]]), noDiffs);
  }

  it('serializes the payloads as the bulk import body', () => {
    const { batch } = planOne(makeRecord({ summary: 'S' }), 'PROJ-1');

    expect(serializeBatch(batch)).toBe(
      [
        '[',
        '  {',
        '    "testtype": "Manual",',
        '    "update_key": "PROJ-1",',
        '    "fields": {',
        '      "summary": "S",',
        '      "project": {',
        '        "key": "PROJ"',
        '      }',
        '    },',
        '    "steps": []',
        '  }',
        ']',
      ].join('\n')
    );
  });

  it('serializes identical input to identical bytes', () => {
    const record = makeRecord({ steps: [{ action: 'a', data: 'b', expected: 'c' }] });

    expect(serializeBatch(planOne(record, 'PROJ-1').batch)).toBe(serializeBatch(planOne(record, 'PROJ-1').batch));
  });

  it('lists missing attachments per entry', () => {
    const record = makeRecord({
      attachments: [
        {
          recordId: 't1',
          filename: 'b.png',
          size: 50,
          localPath: '/backup/att/bbbb',
          attachmentId: 'bbbb',
          checksum: 'abc',
        },
      ],
    });

    expect(buildMissingAttachmentReport(planOne(record, 'PROJ-1').batch)).toEqual([
      {
        recordId: 't1',
        target: 'PROJ-1',
        uploadTiming: 'before-import',
        files: [{ filename: 'b.png', size: 50, localPath: '/backup/att/bbbb', attachmentId: 'bbbb' }],
      },
    ]);
  });

  it('serializes the skip report', () => {
    expect(serializeSkipReport([{ recordId: 't2', reason: 'Unresolved', message: 'm' }])).toBe(
      '[\n  {\n    "recordId": "t2",\n    "reason": "Unresolved",\n    "message": "m"\n  }\n]'
    );
  });

  it('rewrites uploaded attachment ids without touching the original batch', () => {
    const record = makeRecord({
      steps: [{ action: 'See !xray-attachment://aaaa-1111|width=300!', data: '', expected: 'ok' }],
    });
    const { batch } = planOne(record, 'PROJ-1');

    const rewritten = rewriteAttachmentIds(batch, new Map([['aaaa-1111', 'bbbb-2222']]));

    expect(rewritten.entries[0].payload.steps[0].action).toBe('See !xray-attachment://bbbb-2222|width=300!');
    expect(rewritten.byEntryKey.get('PROJ-1')).toBe(rewritten.entries[0]);
    expect(batch.entries[0].payload.steps[0].action).toBe('See !xray-attachment://aaaa-1111|width=300!');
  });

  it('returns the batch unchanged when nothing was uploaded', () => {
    const { batch } = planOne(makeRecord(), 'PROJ-1');

    expect(rewriteAttachmentIds(batch, new Map())).toBe(batch);
  });
});
