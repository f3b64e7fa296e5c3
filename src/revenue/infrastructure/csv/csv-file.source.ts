import { Injectable, Inject, Logger } from '@nestjs/common';
import { access, readFile } from 'fs/promises';
import { constants } from 'fs';
import { TransactionSource } from '../../application/interfaces/transaction-source.interface';
import { TransactionCandidate } from '../../domain/entities/transaction.entity';
import { InvalidCsvException } from '../../domain/exceptions/invalid-csv.exception';
import { TransactionSourceUnavailableException } from '../../domain/exceptions/transaction-source-unavailable.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';
import type { AppConfig } from '../../../shared/config/app.config';
import { parseTransactionCsv } from './transaction-csv.parser';

@Injectable()
export class CsvFileTransactionSource implements TransactionSource {
  readonly name = 'csv';
  private readonly logger = new Logger(CsvFileTransactionSource.name);

  constructor(
    @Inject(INJECTION_TOKENS.APP_CONFIG)
    private readonly config: AppConfig,
  ) {}

  async loadCandidates(): Promise<TransactionCandidate[]> {
    const path = this.config.salesCsvPath;
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransactionSourceUnavailableException(this.name, message);
    }

    let candidates: TransactionCandidate[];
    try {
      candidates = parseTransactionCsv(text);
    } catch (error: unknown) {
      // configured file unusable: source failure (503), not a client error
      if (error instanceof InvalidCsvException) {
        this.logger.error(`CSV: ${path} is not a usable sales file`, error.stack);
        throw new TransactionSourceUnavailableException(this.name, error.message);
      }
      throw error;
    }
    this.logger.debug(`CSV: Read ${candidates.length} rows from ${path}`);
    return candidates;
  }

  async isHealthy(): Promise<boolean> {
    try {
      await access(this.config.salesCsvPath, constants.R_OK);
      return true;
    } catch (error) {
      this.logger.error('CSV source health check failed', error);
      return false;
    }
  }
}
