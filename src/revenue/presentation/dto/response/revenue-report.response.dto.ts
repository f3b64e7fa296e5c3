import { ApiProperty } from '@nestjs/swagger';
import { RejectionReason } from '../../../domain/enums/rejection-reason.enum';
import { SortOrder } from '../../../domain/enums/sort-order.enum';

export class CustomerTotalResponseDto {
  @ApiProperty({ example: 1 })
  rank!: number;

  @ApiProperty({ example: '1003' })
  customerId!: string;

  @ApiProperty({ example: 210 })
  totalRevenue!: number;

  @ApiProperty({ example: 1 })
  transactionCount!: number;
}

export class SkippedTransactionDto {
  @ApiProperty({ example: 5, description: 'Zero-based position in the input' })
  index!: number;

  @ApiProperty({
    example: RejectionReason.MISSING_CUSTOMER_ID,
    enum: RejectionReason,
  })
  reason!: RejectionReason;
}

export class RevenueSummaryDto {
  @ApiProperty({ example: 8 })
  transactionsRead!: number;

  @ApiProperty({ example: 6 })
  transactionsAggregated!: number;

  @ApiProperty({ example: 2 })
  transactionsSkipped!: number;

  @ApiProperty({ example: 4 })
  customerCount!: number;

  @ApiProperty({ example: 470 })
  grandTotal!: number;
}

export class RevenueReportResponseDto {
  @ApiProperty({ example: 'database' })
  source!: string;

  @ApiProperty({ example: SortOrder.REVENUE_DESC, enum: SortOrder })
  sort!: SortOrder;

  @ApiProperty({ type: [CustomerTotalResponseDto] })
  customers!: CustomerTotalResponseDto[];

  @ApiProperty({ type: RevenueSummaryDto })
  summary!: RevenueSummaryDto;

  @ApiProperty({ type: [SkippedTransactionDto] })
  skipped!: SkippedTransactionDto[];
}
