import {
  Transaction,
  TransactionCandidate,
} from '../entities/transaction.entity';
import { RejectionReason } from '../enums/rejection-reason.enum';
import { SortOrder } from '../enums/sort-order.enum';
import { SaleAmount } from '../value-objects/sale-amount.vo';

export interface CustomerTotal {
  customerId: string;
  totalRevenue: number;
  transactionCount: number;
}

export interface RankedCustomerTotal extends CustomerTotal {
  rank: number;
}

export interface SkippedTransaction {
  index: number;
  reason: RejectionReason;
}

export interface AggregationResult {
  totals: CustomerTotal[];
  transactionsRead: number;
  transactionsAggregated: number;
  grandTotal: number;
  skipped: SkippedTransaction[];
}

export interface ReportOptions {
  source: string;
  sort?: SortOrder;
  limit?: number;
}

export interface RevenueReportSummary {
  transactionsRead: number;
  transactionsAggregated: number;
  transactionsSkipped: number;
  customerCount: number;
  grandTotal: number;
}

export interface RevenueReport {
  source: string;
  sort: SortOrder;
  customers: RankedCustomerTotal[];
  summary: RevenueReportSummary;
  skipped: SkippedTransaction[];
}

interface Accumulator {
  total: SaleAmount;
  count: number;
}

/**
 * Domain service that folds a sequence of transaction rows into revenue per
 * customer. Pure and synchronous: the same input always gives the same result.
 *
 * Rules:
 *  - rows with a missing/invalid customer id or sale amount are skipped and
 *    reported by position, they never abort the pass
 *  - every accepted row counts, duplicates included
 *  - customers without an accepted row do not appear
 *  - totals are summed in exact minor units
 */
export class RevenueAggregatorService {
  aggregate(candidates: Iterable<TransactionCandidate>): AggregationResult {
    // Map keeps first-seen order for SortOrder.NONE
    const accumulators = new Map<string, Accumulator>();
    const skipped: SkippedTransaction[] = [];
    let index = 0;

    for (const candidate of candidates) {
      const validated = Transaction.fromCandidate(candidate);
      if (validated.ok) {
        const key = validated.transaction.customerId.value;
        const entry = accumulators.get(key) ?? {
          total: SaleAmount.zero(),
          count: 0,
        };
        accumulators.set(key, {
          total: entry.total.plus(validated.transaction.saleAmount),
          count: entry.count + 1,
        });
      } else {
        skipped.push({ index, reason: validated.reason });
      }
      index++;
    }

    const totals: CustomerTotal[] = [];
    let grandTotal = SaleAmount.zero();
    for (const [customerId, entry] of accumulators) {
      grandTotal = grandTotal.plus(entry.total);
      totals.push({
        customerId,
        totalRevenue: entry.total.toNumber(),
        transactionCount: entry.count,
      });
    }

    return {
      totals,
      transactionsRead: index,
      transactionsAggregated: index - skipped.length,
      grandTotal: grandTotal.toNumber(),
      skipped,
    };
  }

  rank(
    totals: CustomerTotal[],
    sort: SortOrder = SortOrder.REVENUE_DESC,
    limit?: number,
  ): RankedCustomerTotal[] {
    const ordered = [...totals];

    if (sort === SortOrder.REVENUE_DESC) {
      ordered.sort(
        (a, b) =>
          b.totalRevenue - a.totalRevenue ||
          compareIds(a.customerId, b.customerId),
      );
    } else if (sort === SortOrder.CUSTOMER_ID) {
      ordered.sort((a, b) => compareIds(a.customerId, b.customerId));
    }

    const kept = limit !== undefined ? ordered.slice(0, limit) : ordered;
    return kept.map((total, i) => ({ ...total, rank: i + 1 }));
  }

  report(
    candidates: Iterable<TransactionCandidate>,
    options: ReportOptions,
  ): RevenueReport {
    const sort = options.sort ?? SortOrder.REVENUE_DESC;
    const result = this.aggregate(candidates);

    return {
      source: options.source,
      sort,
      customers: this.rank(result.totals, sort, options.limit),
      summary: {
        transactionsRead: result.transactionsRead,
        transactionsAggregated: result.transactionsAggregated,
        transactionsSkipped: result.skipped.length,
        customerCount: result.totals.length,
        grandTotal: result.grandTotal,
      },
      skipped: result.skipped,
    };
  }

  toRevenueMap(result: AggregationResult): Record<string, number> {
    return Object.fromEntries(
      result.totals.map((t) => [t.customerId, t.totalRevenue]),
    );
  }
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
