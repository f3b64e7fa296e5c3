import { Injectable, Inject } from '@nestjs/common';
import { TransactionSource } from '../interfaces/transaction-source.interface';
import { RevenueAggregatorService } from '../../domain/services/revenue-aggregator.service';
import type { RankedCustomerTotal } from '../../domain/services/revenue-aggregator.service';
import { CustomerRevenueNotFoundException } from '../../domain/exceptions/customer-revenue-not-found.exception';
import { CustomerId } from '../../domain/value-objects/customer-id.vo';
import { SortOrder } from '../../domain/enums/sort-order.enum';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class GetCustomerRevenueUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.TRANSACTION_SOURCE)
    private readonly source: TransactionSource,
    private readonly aggregator: RevenueAggregatorService,
  ) {}

  /** Rank is the customer's position in the full revenue ranking. */
  async execute(customerId: string): Promise<RankedCustomerTotal> {
    const id = CustomerId.parse(customerId);
    const candidates = await this.source.loadCandidates();
    const result = this.aggregator.aggregate(candidates);
    const ranked = this.aggregator.rank(result.totals, SortOrder.REVENUE_DESC);

    const match = ranked.find((total) =>
      CustomerId.parse(total.customerId).equals(id),
    );
    if (!match) {
      throw new CustomerRevenueNotFoundException(id.value);
    }
    return match;
  }
}
