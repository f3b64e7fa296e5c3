import {
  Controller,
  Get,
  Post,
  Param,
  Query,
  Body,
  HttpCode,
  HttpStatus,
  BadRequestException,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';
import { AggregateCustomerRevenueUseCase } from '../../application/use-cases/aggregate-customer-revenue.use-case';
import { GetCustomerRevenueUseCase } from '../../application/use-cases/get-customer-revenue.use-case';
import { AggregateSubmittedTransactionsUseCase } from '../../application/use-cases/aggregate-submitted-transactions.use-case';
import { AggregateCsvUploadUseCase } from '../../application/use-cases/aggregate-csv-upload.use-case';
import { RevenueQueryRequestDto } from '../dto/request/revenue-query.request.dto';
import { AggregateTransactionsRequestDto } from '../dto/request/aggregate-transactions.request.dto';
import { AggregateCsvRequestDto } from '../dto/request/aggregate-csv.request.dto';
import {
  CustomerTotalResponseDto,
  RevenueReportResponseDto,
} from '../dto/response/revenue-report.response.dto';
import { ApiErrorDto } from '../dto/response/api-response.dto';
import { ResponseWrapperInterceptor } from '../../../shared/interceptors/response-wrapper.interceptor';
import { CustomerId } from '../../domain/value-objects/customer-id.vo';

@ApiTags('revenue')
@Controller('revenue')
@UseInterceptors(ResponseWrapperInterceptor)
export class RevenueController {
  constructor(
    private readonly aggregateCustomerRevenue: AggregateCustomerRevenueUseCase,
    private readonly getCustomerRevenue: GetCustomerRevenueUseCase,
    private readonly aggregateSubmitted: AggregateSubmittedTransactionsUseCase,
    private readonly aggregateCsvUpload: AggregateCsvUploadUseCase,
  ) {}

  @Get('customers')
  @ApiOperation({
    summary: 'Total revenue per customer',
    description:
      'Aggregates every transaction in the configured sales source into one total per customer. Malformed rows are skipped and listed.',
  })
  @ApiResponse({
    status: 200,
    description: 'Revenue report (customer list may be empty)',
    type: RevenueReportResponseDto,
  })
  @ApiResponse({
    status: 400,
    description: 'Invalid sort or limit',
    type: ApiErrorDto,
  })
  @ApiResponse({
    status: 503,
    description: 'Sales source unavailable',
    type: ApiErrorDto,
  })
  async customers(
    @Query() query: RevenueQueryRequestDto,
  ): Promise<RevenueReportResponseDto> {
    return this.aggregateCustomerRevenue.execute({
      sort: query.sort,
      limit: query.limit,
    });
  }

  @Get('customers/:customerId')
  @ApiOperation({
    summary: 'Total revenue for one customer',
    description:
      "Returns the customer's total and its rank among all customers by revenue.",
  })
  @ApiParam({
    name: 'customerId',
    description: 'Customer identifier',
    example: '1001',
  })
  @ApiResponse({
    status: 200,
    description: 'Customer total',
    type: CustomerTotalResponseDto,
  })
  @ApiResponse({
    status: 404,
    description: 'No valid transactions for this customer',
    type: ApiErrorDto,
  })
  async customer(
    @Param('customerId') customerId: string,
  ): Promise<CustomerTotalResponseDto> {
    if (!CustomerId.isValid(customerId)) {
      throw new BadRequestException(`Invalid customer id: '${customerId}'`);
    }
    return this.getCustomerRevenue.execute(customerId);
  }

  @Post('aggregate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Aggregate submitted transactions',
    description:
      'Aggregates the transaction rows in the request body. Nothing is stored.',
  })
  @ApiResponse({
    status: 200,
    description: 'Revenue report over the submitted rows',
    type: RevenueReportResponseDto,
  })
  @ApiResponse({
    status: 400,
    description: 'Body is not a transaction list',
    type: ApiErrorDto,
  })
  aggregate(
    @Body() dto: AggregateTransactionsRequestDto,
  ): RevenueReportResponseDto {
    return this.aggregateSubmitted.execute(dto.transactions, {
      sort: dto.sort,
      limit: dto.limit,
    });
  }

  @Post('aggregate/csv')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Aggregate an uploaded CSV',
    description:
      'Parses CSV text with CustomerID and SaleAmount columns and aggregates it. Nothing is stored.',
  })
  @ApiResponse({
    status: 200,
    description: 'Revenue report over the CSV rows',
    type: RevenueReportResponseDto,
  })
  @ApiResponse({
    status: 400,
    description: 'Unparseable CSV or missing required columns',
    type: ApiErrorDto,
  })
  aggregateCsv(@Body() dto: AggregateCsvRequestDto): RevenueReportResponseDto {
    return this.aggregateCsvUpload.execute(dto.csv, {
      sort: dto.sort,
      limit: dto.limit,
    });
  }
}
