import { Injectable, Inject, Logger } from '@nestjs/common';
import { TransactionSource } from '../interfaces/transaction-source.interface';
import { RevenueAggregatorService } from '../../domain/services/revenue-aggregator.service';
import type { RevenueReport } from '../../domain/services/revenue-aggregator.service';
import { SortOrder } from '../../domain/enums/sort-order.enum';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export interface RevenueQueryOptions {
  sort?: SortOrder;
  limit?: number;
}

@Injectable()
export class AggregateCustomerRevenueUseCase {
  private readonly logger = new Logger(AggregateCustomerRevenueUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.TRANSACTION_SOURCE)
    private readonly source: TransactionSource,
    private readonly aggregator: RevenueAggregatorService,
  ) {}

  async execute(options: RevenueQueryOptions = {}): Promise<RevenueReport> {
    const candidates = await this.source.loadCandidates();
    const report = this.aggregator.report(candidates, {
      source: this.source.name,
      sort: options.sort,
      limit: options.limit,
    });

    if (report.summary.transactionsSkipped > 0) {
      this.logger.warn(
        `Skipped ${report.summary.transactionsSkipped} of ${report.summary.transactionsRead} transactions from ${this.source.name}`,
      );
    }
    this.logger.log(
      `Aggregated ${report.summary.transactionsAggregated} transactions into ${report.summary.customerCount} customer totals`,
    );

    return report;
  }
}
