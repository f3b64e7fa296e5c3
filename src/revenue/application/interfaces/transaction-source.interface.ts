import { TransactionCandidate } from '../../domain/entities/transaction.entity';

/**
 * Interface defining what use cases need from a sales data source.
 * The SQLite fact table and the prepared CSV file both implement this.
 *
 * Using abstract class instead of interface because TypeScript interfaces
 * are erased at runtime and cannot serve as NestJS DI tokens.
 */
export abstract class TransactionSource {
  abstract readonly name: string;
  abstract loadCandidates(): Promise<TransactionCandidate[]>;
  abstract isHealthy(): Promise<boolean>;
}
