import { describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { ParquetDimensionSource } from '../enrichment/dimension.source';
import { writeParquetTable } from '../../silver/parquet.writer';
import { EnrichmentError } from '../../../shared/errors';
import { createTable } from '../../../shared/table';
import { dimensionSet, makeTempDir, writeDimensionFiles } from '../../../test-support/fixtures';

describe('ParquetDimensionSource', () => {
  it('loads the three dimension artifacts', async () => {
    const paths = await writeDimensionFiles(await makeTempDir());
    const dims = await new ParquetDimensionSource(paths).load();

    expect(dims.geo.rows).toEqual(dimensionSet().geo.rows);
    expect(dims.customerGeo.rows).toEqual([{ customer_geo_id: 20, customer_country: 'EE. UU.', customer_state: 'CA' }]);
    expect(dims.product.columns.map((c) => c.name)).toEqual([
      'product_key',
      'product_name',
      'category_name',
      'department_name',
    ]);
  });

  it('returns the cached set while the files are unchanged', async () => {
    const paths = await writeDimensionFiles(await makeTempDir());
    const source = new ParquetDimensionSource(paths);

    const first = await source.load();
    const second = await source.load();
    expect(second).toBe(first);
  });

  it('reloads the set once an artifact changes on disk', async () => {
    const paths = await writeDimensionFiles(await makeTempDir());
    const source = new ParquetDimensionSource(paths);
    const before = await source.load();

    const product = dimensionSet().product;
    await writeParquetTable(
      createTable(
        product.columns,
        product.rows.map((row) => ({ ...row, product_key: 99 }))
      ),
      paths.product
    );
    const later = new Date(Date.now() + 60_000);
    await fs.utimes(paths.product, later, later);

    const after = await source.load();
    expect(after).not.toBe(before);
    expect(after.product.rows.map((r) => r.product_key)).toEqual([99]);
    expect(before.product.rows.map((r) => r.product_key)).toEqual([30]);
    expect(await source.load()).toBe(after);
  });

  it('raises an EnrichmentError when a dimension is missing', async () => {
    const dir = await makeTempDir();
    const paths = await writeDimensionFiles(dir);
    const source = new ParquetDimensionSource({ ...paths, product: path.join(dir, 'missing.parquet') });

    await expect(source.load()).rejects.toBeInstanceOf(EnrichmentError);
  });
});
