import {
  IsEnum,
  IsInt,
  IsOptional,
  Max,
  Min,
  ValidateIf,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { SortOrder } from '../../../domain/enums/sort-order.enum';

export const MAX_REPORT_LIMIT = 1000;

export class RevenueQueryRequestDto {
  @ApiPropertyOptional({
    description: 'Ordering of the customer list',
    enum: SortOrder,
    default: SortOrder.REVENUE_DESC,
  })
  @IsOptional()
  @IsEnum(SortOrder)
  sort?: SortOrder;

  @ApiPropertyOptional({
    description: 'Keep only the first N customers after ordering',
    example: 10,
    minimum: 1,
    maximum: MAX_REPORT_LIMIT,
  })
  // may be omitted, but an explicit null is not a limit
  @ValidateIf((_, value) => value !== undefined)
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_REPORT_LIMIT)
  limit?: number;
}
