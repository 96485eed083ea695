// ──────────────────────────────────────────
// Modeling: Parquet-backed dimension source
// ──────────────────────────────────────────

import fs from 'fs/promises';
import type { DimensionSource } from '../../../shared/contracts';
import { EnrichmentError, errorMessage } from '../../../shared/errors';
import type { DimensionName, DimensionSet } from '../../../shared/types';
import type { DimensionPaths } from '../../../shared/config';
import { readParquetTable } from '../../silver/parquet.reader';

const DIMENSION_NAMES: readonly DimensionName[] = ['geo', 'customerGeo', 'product'];

/**
 * Loads the three dimension artifacts and keeps them until one of the files
 * changes on disk. Safe to share between concurrently processed files.
 */
export class ParquetDimensionSource implements DimensionSource {
  private cached: { stamp: string; dimensions: Promise<DimensionSet> } | null = null;

  constructor(private paths: DimensionPaths) {}

  async load(): Promise<DimensionSet> {
    const stamp = await this.stamp();
    if (this.cached && this.cached.stamp === stamp) {
      return this.cached.dimensions;
    }

    const dimensions = this.readAll();
    this.cached = { stamp, dimensions };
    try {
      return await dimensions;
    } catch (err) {
      if (this.cached?.dimensions === dimensions) this.cached = null;
      throw err;
    }
  }

  private async stamp(): Promise<string> {
    const parts = await Promise.all(
      DIMENSION_NAMES.map(async (name) => {
        const filePath = this.paths[name];
        try {
          const stat = await fs.stat(filePath);
          return `${filePath}:${stat.mtimeMs}:${stat.size}`;
        } catch (err) {
          throw new EnrichmentError(`Dimension ${name} unavailable at ${filePath}: ${errorMessage(err)}`, { cause: err });
        }
      })
    );
    return parts.join('|');
  }

  private async readAll(): Promise<DimensionSet> {
    const [geo, customerGeo, product] = await Promise.all(
      DIMENSION_NAMES.map(async (name) => {
        try {
          return await readParquetTable(this.paths[name]);
        } catch (err) {
          throw new EnrichmentError(`Cannot read dimension ${name}: ${errorMessage(err)}`, { cause: err });
        }
      })
    );
    return { geo, customerGeo, product };
  }
}

/** Fixed, already-loaded dimensions. */
export class StaticDimensionSource implements DimensionSource {
  constructor(private dimensions: DimensionSet) {}

  async load(): Promise<DimensionSet> {
    return this.dimensions;
  }
}
