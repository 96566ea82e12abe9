/**
 * Locate backup files in an extracted Xray backup.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/** File name patterns of an Xray backup, in load order */
export const SOURCE_FILE_PATTERNS: readonly RegExp[] = [
  /^jira_lookup_cache\.json$/,
  /^metadata_.*\.json$/,
  /^datasets.*\.json$/,
  /^preconditions.*\.json$/,
  /^tests.*\.json$/,
  /^testPlans.*\.json$/,
  /^testSets.*\.json$/,
];

/**
 * List backup files in the given directories, grouped by pattern and
 * sorted by name within a group so repeated runs see the same order.
 * Missing directories are skipped.
 */
export function discoverSourceFiles(...dirs: string[]): string[] {
  const names: Array<{ dir: string; name: string }> = [];

  for (const dir of dirs) {
    if (!fs.existsSync(dir)) continue;
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (entry.isFile()) {
        names.push({ dir, name: entry.name });
      }
    }
  }

  const files: string[] = [];
  for (const pattern of SOURCE_FILE_PATTERNS) {
    const matching = names
      .filter(({ name }) => pattern.test(name))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const { dir, name } of matching) {
      files.push(path.join(dir, name));
    }
  }
  return files;
}
