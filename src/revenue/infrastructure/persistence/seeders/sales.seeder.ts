import { Injectable, Inject, Logger, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { SaleEntity } from '../entities/sale.orm-entity';
import { INJECTION_TOKENS } from '../../../../shared/constants/injection-tokens';
import type { AppConfig } from '../../../../shared/config/app.config';

// Includes a row with no customer and a negative amount, both skipped.
export const SAMPLE_SALES: SaleEntity[] = [
  sale(550, '2024-01-06', 1001, 102, 404, 1, 120.5, 0, 'Credit'),
  sale(551, '2024-01-06', 1002, 105, 403, null, 75.25, 5, 'Debit'),
  sale(552, '2024-01-16', 1001, 107, 404, 2, 39.5, 10, 'Credit'),
  sale(553, '2024-01-21', 1003, 102, 401, null, 210, 0, 'Cash'),
  sale(554, '2024-02-02', 1002, 103, 402, 1, 24.75, 0, 'Credit'),
  sale(555, '2024-02-10', null, 101, 401, null, 50, 0, 'Cash'),
  sale(556, '2024-02-14', 1003, 106, 403, 3, -15, 0, 'Credit'),
  sale(557, '2024-02-20', 1004, 104, 402, null, 0, 100, 'Debit'),
];

function sale(
  transactionId: number,
  saleDate: string,
  customerId: number | null,
  productId: number,
  storeId: number,
  campaignId: number | null,
  saleAmount: number,
  discountPercent: number,
  paymentType: string,
): SaleEntity {
  const entity = new SaleEntity();
  entity.transactionId = transactionId;
  entity.saleDate = saleDate;
  entity.customerId = customerId;
  entity.productId = productId;
  entity.storeId = storeId;
  entity.campaignId = campaignId;
  entity.saleAmount = saleAmount;
  entity.discountPercent = discountPercent;
  entity.paymentType = paymentType;
  return entity;
}

@Injectable()
export class SalesSeeder implements OnModuleInit {
  private readonly logger = new Logger(SalesSeeder.name);

  constructor(
    @InjectRepository(SaleEntity)
    private readonly repo: Repository<SaleEntity>,
    @Inject(INJECTION_TOKENS.APP_CONFIG)
    private readonly config: AppConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.seedSampleData) {
      return;
    }

    const table = this.repo.metadata.tableName;
    const found: unknown = await this.repo.query(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`,
      [table],
    );
    if (!Array.isArray(found) || found.length === 0) {
      this.logger.warn(`${table} does not exist in this database, skipping seed`);
      return;
    }

    const count = await this.repo.count();
    if (count > 0) {
      this.logger.log(`fact_sales already holds ${count} rows, skipping seed`);
      return;
    }

    this.logger.log('Seeding fact_sales with sample data...');
    await this.repo.save(SAMPLE_SALES);
    this.logger.log(`fact_sales seeded with ${SAMPLE_SALES.length} rows`);
  }
}
