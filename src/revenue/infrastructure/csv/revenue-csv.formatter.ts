import { stringify } from 'csv-stringify/sync';
import type { CustomerTotal } from '../../domain/services/revenue-aggregator.service';
import { SaleAmount } from '../../domain/value-objects/sale-amount.vo';

/** At least two decimals, more only when the total carries sub-cent digits. */
export function formatRevenue(value: number): string {
  const [whole, fraction = ''] = SaleAmount.parse(value)
    .toDecimalString()
    .split('.');
  return `${whole}.${fraction.padEnd(2, '0')}`;
}

export function formatRevenueCsv(customers: CustomerTotal[]): string {
  return stringify(
    customers.map((c) => [c.customerId, formatRevenue(c.totalRevenue)]),
    { header: true, columns: ['customer_id', 'total_revenue'] },
  );
}
