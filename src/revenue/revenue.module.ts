import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TerminusModule } from '@nestjs/terminus';

// Domain
import { RevenueAggregatorService } from './domain/services/revenue-aggregator.service';

// Application - Use Cases
import { AggregateCustomerRevenueUseCase } from './application/use-cases/aggregate-customer-revenue.use-case';
import { GetCustomerRevenueUseCase } from './application/use-cases/get-customer-revenue.use-case';
import { AggregateSubmittedTransactionsUseCase } from './application/use-cases/aggregate-submitted-transactions.use-case';
import { AggregateCsvUploadUseCase } from './application/use-cases/aggregate-csv-upload.use-case';
import { CheckHealthUseCase } from './application/use-cases/check-health.use-case';

// Infrastructure - Persistence
import { SaleEntity } from './infrastructure/persistence/entities/sale.orm-entity';
import { SalesRepository } from './infrastructure/persistence/repositories/sales.repository';
import { SalesSeeder } from './infrastructure/persistence/seeders/sales.seeder';

// Infrastructure - CSV
import { CsvFileTransactionSource } from './infrastructure/csv/csv-file.source';
import { CsvParseTransactionParser } from './infrastructure/csv/transaction-csv.parser';

// Presentation
import { RevenueController } from './presentation/controllers/revenue.controller';
import { HealthController } from './presentation/controllers/health.controller';

// Shared
import { INJECTION_TOKENS } from '../shared/constants/injection-tokens';
import type { AppConfig } from '../shared/config/app.config';

@Module({
  imports: [TypeOrmModule.forFeature([SaleEntity]), TerminusModule],
  controllers: [RevenueController, HealthController],
  providers: [
    // Domain service (pure business logic, no interface)
    RevenueAggregatorService,

    // Application use cases
    AggregateCustomerRevenueUseCase,
    GetCustomerRevenueUseCase,
    AggregateSubmittedTransactionsUseCase,
    AggregateCsvUploadUseCase,
    CheckHealthUseCase,

    // Infrastructure: both sources exist, SALES_SOURCE picks the bound one
    SalesRepository,
    CsvFileTransactionSource,
    {
      provide: INJECTION_TOKENS.TRANSACTION_SOURCE,
      inject: [INJECTION_TOKENS.APP_CONFIG, SalesRepository, CsvFileTransactionSource],
      useFactory: (
        config: AppConfig,
        database: SalesRepository,
        csv: CsvFileTransactionSource,
      ) => (config.salesSource === 'csv' ? csv : database),
    },

    {
      provide: INJECTION_TOKENS.TRANSACTION_CSV_PARSER,
      useClass: CsvParseTransactionParser,
    },

    // Seeder
    SalesSeeder,
  ],
  exports: [AggregateCustomerRevenueUseCase],
})
export class RevenueModule {}
