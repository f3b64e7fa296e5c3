import { IsArray } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { RevenueQueryRequestDto } from './revenue-query.request.dto';

export class AggregateTransactionsRequestDto extends RevenueQueryRequestDto {
  @ApiProperty({
    description:
      'Transaction rows. Rows without a customerId or with a negative/non-numeric saleAmount are skipped, not rejected.',
    type: 'array',
    items: { type: 'object' },
    example: [
      { customerId: 'C1', saleAmount: 30 },
      { customerId: 'C2', saleAmount: '20.00' },
      { customerId: 'C1', saleAmount: 15 },
    ],
  })
  @IsArray()
  transactions!: unknown[];
}
