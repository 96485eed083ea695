// ──────────────────────────────────────────
// Batch: idempotent source archival
// ──────────────────────────────────────────

import { constants as fsConstants } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { format } from 'date-fns';
import type { FileArchiver } from '../../shared/contracts';
import { ArchiveError, errorMessage, hasErrorCode } from '../../shared/errors';

export const ARCHIVE_STAMP_FORMAT = 'yyyyMMdd_HHmmss';

export type ArchiveNamer = (stem: string, ext: string, stamp: string) => string;

export const stampedName: ArchiveNamer = (stem, ext, stamp) => `${stem}_${stamp}${ext}`;

export interface ArchiverOptions {
  archiveRoot: string;
  naming?: ArchiveNamer;
  clock?: () => Date;
}

/**
 * Moves `from` to `to` without ever replacing an existing `to`: the target is
 * created by hard link, which fails with EEXIST when it is taken. Across
 * filesystems the bytes are first copied to a hidden partial name next to
 * `to`, so `to` only ever appears complete and no partial outlives the call.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.link(from, to);
  } catch (err) {
    if (!hasErrorCode(err, 'EXDEV')) throw err;
    await copyAcross(from, to);
  }
  await fs.unlink(from);
}

async function copyAcross(from: string, to: string): Promise<void> {
  const partial = path.join(path.dirname(to), `.${path.basename(to)}.partial`);
  try {
    await fs.copyFile(from, partial, fsConstants.COPYFILE_EXCL);
    await fs.link(partial, to);
  } finally {
    await fs.rm(partial, { force: true });
  }
}

export class Archiver implements FileArchiver {
  private naming: ArchiveNamer;
  private clock: () => Date;

  constructor(private options: ArchiverOptions) {
    this.naming = options.naming ?? stampedName;
    this.clock = options.clock ?? (() => new Date());
  }

  targetFor(sourcePath: string, at: Date = this.clock()): string {
    const ext = path.extname(sourcePath);
    const stem = path.basename(sourcePath, ext);
    return path.join(this.options.archiveRoot, this.naming(stem, ext, format(at, ARCHIVE_STAMP_FORMAT)));
  }

  async archive(sourcePath: string): Promise<string> {
    const target = this.targetFor(sourcePath);
    try {
      await fs.mkdir(this.options.archiveRoot, { recursive: true });
      await moveFile(sourcePath, target);
    } catch (err) {
      if (hasErrorCode(err, 'EEXIST')) {
        throw new ArchiveError(`Archive target already exists: ${target}`, { cause: err });
      }
      throw new ArchiveError(`Cannot archive ${sourcePath}: ${errorMessage(err)}`, { cause: err });
    }
    return target;
  }
}
