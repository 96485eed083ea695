// ──────────────────────────────────────────
// Ingestion: pending file discovery
// ──────────────────────────────────────────

import fs from 'fs/promises';
import path from 'path';
import { hasErrorCode } from '../../shared/errors';

/**
 * Files directly under `root` whose name matches `predicate`, sorted by name.
 * A missing root means nothing is pending.
 */
export async function listFiles(root: string, predicate: (name: string) => boolean): Promise<string[]> {
  let entries;
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return [];
    throw err;
  }
  return entries
    .filter((e) => e.isFile() && predicate(e.name))
    .map((e) => e.name)
    .sort()
    .map((name) => path.join(root, name));
}

export function listBronzeFiles(root: string, extension = '.csv'): Promise<string[]> {
  const ext = extension.toLowerCase();
  return listFiles(root, (name) => name.toLowerCase().endsWith(ext));
}
