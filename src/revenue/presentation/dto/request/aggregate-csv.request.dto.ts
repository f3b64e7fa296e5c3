import { IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { RevenueQueryRequestDto } from './revenue-query.request.dto';

export class AggregateCsvRequestDto extends RevenueQueryRequestDto {
  @ApiProperty({
    description: 'CSV text with a header row containing CustomerID and SaleAmount',
    example: 'TransactionID,CustomerID,SaleAmount\n1,C1,30\n2,C2,20\n3,C1,15',
  })
  @IsString()
  csv!: string;
}
