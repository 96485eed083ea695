// ──────────────────────────────────────────
// Modeling: categorical segmentation
// ──────────────────────────────────────────

import { format } from 'date-fns';
import type { Table } from '../../../shared/types';
import { numberCell, requireColumn, stringCell, withColumns } from '../../../shared/table';
import { orderDateOf } from '../validation';

export type DeliveryClass = 'Early' | 'On Time' | 'Late';
export type ShippingMode = 'Same Day' | 'First Class' | 'Second Class' | 'Standard Class';
export type DayType = 'Weekend' | 'Weekday';
export type PriceSegment = 'Budget' | 'Mainstream' | 'Premium';

const WEEKEND_DAYS = new Set(['Saturday', 'Sunday']);

const COUNTRY_ALIASES: Readonly<Record<string, string>> = {
  'EE. UU.': 'USA',
};

// Comparisons against null are false, so null inputs fall through to the last branch.

export function classifyDelivery(shippingDelta: number | null): DeliveryClass {
  if (shippingDelta !== null && shippingDelta < 0) return 'Early';
  if (shippingDelta !== null && shippingDelta === 0) return 'On Time';
  return 'Late';
}

export function classifyShippingMode(scheduledDays: number | null): ShippingMode {
  if (scheduledDays === null) return 'Standard Class';
  if (scheduledDays === 0) return 'Same Day';
  if (scheduledDays <= 2) return 'First Class';
  if (scheduledDays === 3) return 'Second Class';
  return 'Standard Class';
}

export function classifyPrice(price: number | null): PriceSegment {
  if (price === null) return 'Premium';
  if (price < 60) return 'Budget';
  if (price <= 250) return 'Mainstream';
  return 'Premium';
}

export function dayTypeOf(dayName: string | null): DayType {
  return dayName !== null && WEEKEND_DAYS.has(dayName) ? 'Weekend' : 'Weekday';
}

export function normalizeCountry(country: string): string {
  return COUNTRY_ALIASES[country] ?? country;
}

export function tradeRoute(
  customerCountry: string | null,
  customerState: string | null,
  orderCountry: string | null
): string | null {
  if (customerCountry === null || customerState === null || orderCountry === null) return null;
  return `${normalizeCountry(customerCountry)}_${customerState} -> ${orderCountry}`;
}

export class ClassificationTransformer {
  transform(table: Table): Table {
    for (const name of ['shipping_delta', 'days_for_shipment_scheduled', 'order_item_product_price']) {
      requireColumn(table, name, ['int', 'float']);
    }
    for (const name of ['customer_country', 'customer_state', 'order_country']) {
      requireColumn(table, name, ['string']);
    }

    return withColumns(
      table,
      [
        { name: 'delivery_class', type: 'string' },
        { name: 'shipping_mode_clean', type: 'string' },
        { name: 'day_name_str', type: 'string' },
        { name: 'order_day_type', type: 'string' },
        { name: 'price_segment', type: 'string' },
        { name: 'trade_route', type: 'string' },
      ],
      (row) => {
        const date = orderDateOf(row);
        const dayName = date ? format(date, 'EEEE') : null;
        return {
          delivery_class: classifyDelivery(numberCell(row, 'shipping_delta')),
          shipping_mode_clean: classifyShippingMode(numberCell(row, 'days_for_shipment_scheduled')),
          day_name_str: dayName,
          order_day_type: dayTypeOf(dayName),
          price_segment: classifyPrice(numberCell(row, 'order_item_product_price')),
          trade_route: tradeRoute(
            stringCell(row, 'customer_country'),
            stringCell(row, 'customer_state'),
            stringCell(row, 'order_country')
          ),
        };
      }
    );
  }
}
