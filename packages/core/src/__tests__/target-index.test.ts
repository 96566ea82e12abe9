import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { TargetIndex, loadTargetSnapshot, parseTargetSnapshot } from '../resolution/target-index.js';
import { normalizeKey, normalizeSummary, projectOfKey } from '../resolution/normalize.js';

describe('normalize', () => {
  it('collapses whitespace and case in summaries', () => {
    expect(normalizeSummary('  Login \t  WORKS\n')).toBe('login works');
  });

  it('upper-cases keys', () => {
    expect(normalizeKey(' proj-1 ')).toBe('PROJ-1');
  });

  it('takes the project from the last dash', () => {
    expect(projectOfKey('PROJ-42')).toBe('PROJ');
    expect(projectOfKey('MY-PROJ-42')).toBe('MY-PROJ');
    expect(projectOfKey('PROJ')).toBeNull();
  });
});

describe('TargetIndex', () => {
  it('looks up issues by key regardless of case', () => {
    const index = TargetIndex.fromIssues([{ key: 'proj-1', summary: 'A', attachments: [] }]);

    expect(index.has('PROJ-1')).toBe(true);
    expect(index.get('Proj-1')?.key).toBe('PROJ-1');
    expect(index.has('PROJ-2')).toBe(false);
  });

  it('keeps the first issue when a key repeats', () => {
    const index = TargetIndex.fromIssues([
      { key: 'PROJ-1', summary: 'First', attachments: [] },
      { key: 'PROJ-1', summary: 'Second', attachments: [] },
    ]);

    expect(index.size).toBe(1);
    expect(index.get('PROJ-1')?.summary).toBe('First');
  });

  it('finds issues by normalized summary in snapshot order', () => {
    const index = TargetIndex.fromIssues([
      { key: 'PROJ-2', summary: 'Login works', attachments: [] },
      { key: 'PROJ-1', summary: 'LOGIN  works', attachments: [] },
      { key: 'PROJ-3', summary: 'Logout works', attachments: [] },
    ]);

    expect(index.findBySummary('login works').map((i) => i.key)).toEqual(['PROJ-2', 'PROJ-1']);
    expect(index.findBySummary('nothing')).toEqual([]);
  });

  it('returns attachments of known keys only', () => {
    const index = TargetIndex.fromIssues([
      { key: 'PROJ-1', summary: 'A', attachments: [{ filename: 'a.png', size: 100 }] },
    ]);

    expect(index.attachmentsFor('proj-1')).toEqual([{ filename: 'a.png', size: 100 }]);
    expect(index.attachmentsFor('PROJ-9')).toEqual([]);
  });

  it('freezes its entries', () => {
    const index = TargetIndex.fromIssues([{ key: 'PROJ-1', summary: 'A', attachments: [] }]);

    expect(Object.isFrozen(index.get('PROJ-1'))).toBe(true);
  });
});

describe('parseTargetSnapshot', () => {
  it('accepts a bare array of issues', () => {
    const result = parseTargetSnapshot(JSON.stringify([{ key: 'PROJ-1', summary: 'A' }]));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.index.get('PROJ-1')).toEqual({ key: 'PROJ-1', summary: 'A', attachments: [] });
    }
  });

  it('accepts an object with an issues array and reads attachments', () => {
    const result = parseTargetSnapshot(
      JSON.stringify({
        issues: [
          {
            key: 'PROJ-1',
            summary: 'A',
            attachments: [{ filename: 'a.png', size: 100 }, { filename: 'b.png' }, 'junk'],
          },
        ],
      })
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.index.attachmentsFor('PROJ-1')).toEqual([
        { filename: 'a.png', size: 100 },
        { filename: 'b.png', size: 0 },
      ]);
    }
  });

  it('reports invalid JSON', () => {
    const result = parseTargetSnapshot('[');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0].index).toBeNull();
      expect(result.errors[0].message).toMatch(/^Invalid JSON: /);
    }
  });

  it('reports a document without issues', () => {
    const result = parseTargetSnapshot('{"total": 0}');

    expect(result).toEqual({
      success: false,
      errors: [
        { index: null, message: 'Snapshot must be an array of issues or an object with an "issues" array' },
      ],
    });
  });

  it('reports every invalid issue by position', () => {
    const result = parseTargetSnapshot(
      JSON.stringify([{ key: 'PROJ-1', summary: 'A' }, { summary: 'No key' }, { key: 'PROJ-3' }, 7])
    );

    expect(result).toEqual({
      success: false,
      errors: [
        { index: 1, message: 'Issue has no key' },
        { index: 2, message: 'Issue PROJ-3 has no summary' },
        { index: 3, message: 'Issue is not an object' },
      ],
    });
  });
});

describe('loadTargetSnapshot', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'target-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('loads a snapshot file', () => {
    const file = path.join(tmpDir, 'target.json');
    fs.writeFileSync(file, JSON.stringify([{ key: 'PROJ-1', summary: 'A' }]));

    const result = loadTargetSnapshot(file);

    expect(result.success && result.index.size).toBe(1);
  });

  it('reports a missing file', () => {
    const result = loadTargetSnapshot(path.join(tmpDir, 'missing.json'));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0].message).toMatch(/^Failed to read snapshot: /);
    }
  });
});
