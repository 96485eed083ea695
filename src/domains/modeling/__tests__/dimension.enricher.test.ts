import { describe, it, expect } from 'vitest';
import { DIMENSION_SPECS, DimensionEnricher, leftJoinDimension } from '../enrichment/dimension.enricher';
import { EnrichmentError } from '../../../shared/errors';
import { createTable } from '../../../shared/table';
import { bronzeRow, bronzeTable, dimensionSet } from '../../../test-support/fixtures';

const geoSpec = DIMENSION_SPECS[0];

describe('leftJoinDimension', () => {
  it('attaches the surrogate key and drops the natural keys', () => {
    const facts = bronzeTable([bronzeRow()]);
    const joined = leftJoinDimension(facts, dimensionSet().geo, geoSpec);

    const names = joined.columns.map((c) => c.name);
    expect(names).toContain('geo_id');
    for (const key of geoSpec.keys) expect(names).not.toContain(key);
    expect(joined.rows[0].geo_id).toBe(10);
    expect(joined.rows[0].product_name).toBe('Pelican Kayak');
  });

  it('keeps unmatched rows with null dimension attributes', () => {
    const facts = bronzeTable([bronzeRow(), bronzeRow({ order_state: 'Nevada' }), bronzeRow({ market: null })]);
    const joined = leftJoinDimension(facts, dimensionSet().geo, geoSpec);
    expect(joined.rows.map((r) => r.geo_id)).toEqual([10, null, null]);
  });

  it('suffixes dimension attributes that collide with fact columns', () => {
    const dimension = createTable(
      [
        { name: 'customer_geo_id', type: 'int' },
        { name: 'customer_country', type: 'string' },
        { name: 'customer_state', type: 'string' },
        { name: 'customer_segment', type: 'string' },
      ],
      [{ customer_geo_id: 5, customer_country: 'EE. UU.', customer_state: 'CA', customer_segment: 'Retail' }]
    );
    const joined = leftJoinDimension(bronzeTable([bronzeRow()]), dimension, DIMENSION_SPECS[1]);
    expect(joined.rows[0].customer_segment).toBe('Consumer');
    expect(joined.rows[0].customer_segment_right).toBe('Retail');
  });

  it('rejects a dimension with duplicate natural keys', () => {
    const geo = dimensionSet().geo;
    const duplicated = createTable(geo.columns, [...geo.rows, { ...geo.rows[0], geo_id: 99 }]);
    expect(() => leftJoinDimension(bronzeTable([bronzeRow()]), duplicated, geoSpec)).toThrow(EnrichmentError);
  });

  it('rejects a dimension missing a key column', () => {
    const geo = dimensionSet().geo;
    const broken = createTable(
      geo.columns.filter((c) => c.name !== 'market'),
      geo.rows
    );
    expect(() => leftJoinDimension(bronzeTable([bronzeRow()]), broken, geoSpec)).toThrow(
      'Dimension geo is missing key column market'
    );
  });

  it('rejects facts missing a join column', () => {
    const facts = bronzeTable(
      [bronzeRow()],
      bronzeTable([]).columns.filter((c) => c.name !== 'order_region')
    );
    expect(() => leftJoinDimension(facts, dimensionSet().geo, geoSpec)).toThrow(
      'Fact table is missing join column order_region for geo'
    );
  });
});

describe('DimensionEnricher', () => {
  it('joins all three dimensions without changing the row count', () => {
    const facts = bronzeTable([
      bronzeRow(),
      bronzeRow({ product_name: 'Unknown Tent' }),
      bronzeRow({ customer_state: 'TX' }),
    ]);

    const enriched = new DimensionEnricher().enrich(facts, dimensionSet());

    expect(enriched.rows).toHaveLength(3);
    expect(enriched.rows.map((r) => [r.geo_id, r.customer_geo_id, r.product_key])).toEqual([
      [10, 20, 30],
      [10, 20, null],
      [10, null, 30],
    ]);
    const names = enriched.columns.map((c) => c.name);
    for (const definition of DIMENSION_SPECS) {
      for (const key of definition.keys) expect(names).not.toContain(key);
    }
  });
});
