import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TransactionSource } from '../../../application/interfaces/transaction-source.interface';
import { TransactionCandidate } from '../../../domain/entities/transaction.entity';
import { TransactionSourceUnavailableException } from '../../../domain/exceptions/transaction-source-unavailable.exception';
import { SaleEntity } from '../entities/sale.orm-entity';
import { SaleMapper } from '../mappers/sale.mapper';

@Injectable()
export class SalesRepository implements TransactionSource {
  readonly name = 'database';
  private readonly logger = new Logger(SalesRepository.name);

  constructor(
    @InjectRepository(SaleEntity)
    private readonly repo: Repository<SaleEntity>,
  ) {}

  async loadCandidates(): Promise<TransactionCandidate[]> {
    let entities: SaleEntity[];
    try {
      entities = await this.repo.find({
        order: { transactionId: 'ASC' },
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransactionSourceUnavailableException(this.name, message);
    }

    this.logger.debug(`Database: Read ${entities.length} rows from fact_sales`);
    return entities.map((e) => SaleMapper.toCandidate(e));
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.repo.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('Database health check failed', error);
      return false;
    }
  }
}
