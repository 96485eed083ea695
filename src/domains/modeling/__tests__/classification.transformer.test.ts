import { describe, it, expect } from 'vitest';
import {
  ClassificationTransformer,
  classifyDelivery,
  classifyPrice,
  classifyShippingMode,
  dayTypeOf,
  tradeRoute,
} from '../transformers/classification.transformer';
import { MetricsTransformer } from '../transformers/metrics.transformer';
import { DerivationError } from '../../../shared/errors';
import { bronzeRow, bronzeTable } from '../../../test-support/fixtures';

describe('classifyDelivery', () => {
  it('splits on the sign of the shipping delta', () => {
    expect(classifyDelivery(-2)).toBe('Early');
    expect(classifyDelivery(0)).toBe('On Time');
    expect(classifyDelivery(1)).toBe('Late');
    expect(classifyDelivery(null)).toBe('Late');
  });
});

describe('classifyShippingMode', () => {
  it.each([
    [0, 'Same Day'],
    [1, 'First Class'],
    [2, 'First Class'],
    [3, 'Second Class'],
    [4, 'Standard Class'],
    [null, 'Standard Class'],
  ] as const)('maps %s scheduled days to %s', (days, mode) => {
    expect(classifyShippingMode(days)).toBe(mode);
  });
});

describe('classifyPrice', () => {
  it.each([
    [59.99, 'Budget'],
    [60, 'Mainstream'],
    [250, 'Mainstream'],
    [250.01, 'Premium'],
    [null, 'Premium'],
  ] as const)('puts %s in %s', (price, segment) => {
    expect(classifyPrice(price)).toBe(segment);
  });
});

describe('dayTypeOf', () => {
  it('recognises the weekend', () => {
    expect(dayTypeOf('Saturday')).toBe('Weekend');
    expect(dayTypeOf('Sunday')).toBe('Weekend');
    expect(dayTypeOf('Friday')).toBe('Weekday');
    expect(dayTypeOf(null)).toBe('Weekday');
  });
});

describe('tradeRoute', () => {
  it('normalizes the customer country alias', () => {
    expect(tradeRoute('EE. UU.', 'CA', 'Estados Unidos')).toBe('USA_CA -> Estados Unidos');
  });

  it('leaves other countries as they are', () => {
    expect(tradeRoute('Puerto Rico', 'PR', 'México')).toBe('Puerto Rico_PR -> México');
  });

  it('is null when any part is missing', () => {
    expect(tradeRoute(null, 'CA', 'Francia')).toBeNull();
    expect(tradeRoute('EE. UU.', 'CA', null)).toBeNull();
  });
});

describe('ClassificationTransformer', () => {
  const metrics = new MetricsTransformer();
  const transformer = new ClassificationTransformer();

  it('derives every categorical column from the row', () => {
    const table = metrics.transform(
      bronzeTable([
        bronzeRow(),
        bronzeRow({ order_day: 6, days_for_shipping_real: 0, days_for_shipment_scheduled: 0, order_item_product_price: 20 }),
      ])
    );

    const result = transformer.transform(table);
    const pick = (i: number) => {
      const row = result.rows[i];
      return {
        delivery_class: row.delivery_class,
        shipping_mode_clean: row.shipping_mode_clean,
        day_name_str: row.day_name_str,
        order_day_type: row.order_day_type,
        price_segment: row.price_segment,
        trade_route: row.trade_route,
      };
    };

    expect(pick(0)).toEqual({
      delivery_class: 'Late',
      shipping_mode_clean: 'First Class',
      day_name_str: 'Saturday',
      order_day_type: 'Weekend',
      price_segment: 'Mainstream',
      trade_route: 'USA_CA -> Estados Unidos',
    });
    expect(pick(1)).toEqual({
      delivery_class: 'On Time',
      shipping_mode_clean: 'Same Day',
      day_name_str: 'Monday',
      order_day_type: 'Weekday',
      price_segment: 'Budget',
      trade_route: 'USA_CA -> Estados Unidos',
    });
  });

  it('requires shipping_delta from the metrics stage', () => {
    expect(() => transformer.transform(bronzeTable([bronzeRow()]))).toThrow(DerivationError);
  });
});
