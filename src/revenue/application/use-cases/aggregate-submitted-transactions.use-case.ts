import { Injectable, Logger } from '@nestjs/common';
import { RevenueAggregatorService } from '../../domain/services/revenue-aggregator.service';
import type { RevenueReport } from '../../domain/services/revenue-aggregator.service';
import type { TransactionCandidate } from '../../domain/entities/transaction.entity';
import type { RevenueQueryOptions } from './aggregate-customer-revenue.use-case';

export const REQUEST_SOURCE = 'request';

function toCandidate(item: unknown): TransactionCandidate {
  if (typeof item !== 'object' || item === null || Array.isArray(item)) {
    return {};
  }
  return {
    customerId: 'customerId' in item ? item.customerId : undefined,
    saleAmount: 'saleAmount' in item ? item.saleAmount : undefined,
  };
}

@Injectable()
export class AggregateSubmittedTransactionsUseCase {
  private readonly logger = new Logger(
    AggregateSubmittedTransactionsUseCase.name,
  );

  constructor(private readonly aggregator: RevenueAggregatorService) {}

  execute(items: unknown[], options: RevenueQueryOptions = {}): RevenueReport {
    const report = this.aggregator.report(items.map(toCandidate), {
      source: REQUEST_SOURCE,
      sort: options.sort,
      limit: options.limit,
    });

    this.logger.debug(
      `Aggregated ${report.summary.transactionsAggregated}/${report.summary.transactionsRead} submitted transactions`,
    );
    return report;
  }
}
