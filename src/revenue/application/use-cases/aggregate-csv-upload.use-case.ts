import { Injectable, Inject, Logger } from '@nestjs/common';
import { TransactionCsvParser } from '../interfaces/transaction-csv-parser.interface';
import { RevenueAggregatorService } from '../../domain/services/revenue-aggregator.service';
import type { RevenueReport } from '../../domain/services/revenue-aggregator.service';
import type { RevenueQueryOptions } from './aggregate-customer-revenue.use-case';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export const CSV_UPLOAD_SOURCE = 'csv-upload';

@Injectable()
export class AggregateCsvUploadUseCase {
  private readonly logger = new Logger(AggregateCsvUploadUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.TRANSACTION_CSV_PARSER)
    private readonly parser: TransactionCsvParser,
    private readonly aggregator: RevenueAggregatorService,
  ) {}

  execute(csvText: string, options: RevenueQueryOptions = {}): RevenueReport {
    const candidates = this.parser.parse(csvText);
    const report = this.aggregator.report(candidates, {
      source: CSV_UPLOAD_SOURCE,
      sort: options.sort,
      limit: options.limit,
    });

    if (report.summary.transactionsSkipped > 0) {
      this.logger.warn(
        `CSV upload: skipped ${report.summary.transactionsSkipped} malformed rows`,
      );
    }
    return report;
  }
}
